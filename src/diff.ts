/// # meaningful-line diff
///
/// two versions of a file, stripped of comments and blank lines, aligned
/// with a longest common subsequence. what's left over on the old side was
/// removed, what's left over on the new side was added. reformatting a
/// comment, adding blank lines or rewording a docstring moves nothing.

import { classifyLines, type ClassifiedLine, type SourceFormat } from "./classify.js";
import { countMeaningful } from "./count.js";
import { resolveRange, type RangeSpec } from "./ranges.js";

export type DiffOpKind = "equal" | "removed" | "added";

export interface DiffOp {
  kind: DiffOpKind;
  text: string;
}

export interface DiffOutcome {
  added: number;
  removed: number;
  /// meaningful lines in the whole old file.
  total: number;
  /// meaningful lines of the old file inside the section. only set when
  /// the diff was restricted to one.
  section?: number;
}

export interface SectionFilter {
  /// ranges of the section in the old file.
  old: RangeSpec;
  /// ranges in the new file. when absent, `old` is reapplied to the new
  /// file's line numbers, which is only as good as the two files' layouts
  /// agree.
  new?: RangeSpec;
}

export interface DiffOptions {
  section?: SectionFilter;
  /// receives the alignment before it's reduced to counts.
  onAligned?: (ops: readonly DiffOp[]) => void;
}

/// ## alignment
///
/// the classic dynamic-programming LCS. we fill the table from the *end*
/// (`table[i][j]` = LCS length of `a[i..]` and `b[j..]`) so that we can
/// then walk forward from the start: whenever the two current lines are
/// equal, matching them is always optimal, which gives the
/// earliest-possible match for repeated lines. when they differ we follow
/// the longer subsequence and, on a tie, drop the old line first.
///
/// identical prefixes and suffixes are matched up front. for a typical
/// edit that shrinks the quadratic part to the few lines that changed.

export function alignLines(a: readonly string[], b: readonly string[]): DiffOp[] {
  let prefix = 0;
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) prefix++;

  let suffix = 0;
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) {
    suffix++;
  }

  const ops: DiffOp[] = [];
  for (let i = 0; i < prefix; i++) ops.push({ kind: "equal", text: a[i] });

  const midA = a.slice(prefix, a.length - suffix);
  const midB = b.slice(prefix, b.length - suffix);
  alignMiddle(midA, midB, ops);

  for (let i = a.length - suffix; i < a.length; i++) ops.push({ kind: "equal", text: a[i] });
  return ops;
}

function alignMiddle(a: readonly string[], b: readonly string[], ops: DiffOp[]): void {
  const n = a.length;
  const m = b.length;
  const width = m + 1;
  /// one flat row-major table, `(n + 1) * (m + 1)` cells. the last row and
  /// column stay zero: the LCS of anything with an empty suffix.
  const table = new Uint32Array((n + 1) * width);

  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      table[i * width + j] =
        a[i] === b[j]
          ? table[(i + 1) * width + j + 1] + 1
          : Math.max(table[(i + 1) * width + j], table[i * width + j + 1]);
    }
  }

  let i = 0;
  let j = 0;
  while (i < n && j < m) {
    if (a[i] === b[j]) {
      ops.push({ kind: "equal", text: a[i] });
      i++;
      j++;
    } else if (table[(i + 1) * width + j] >= table[i * width + j + 1]) {
      ops.push({ kind: "removed", text: a[i] });
      i++;
    } else {
      ops.push({ kind: "added", text: b[j] });
      j++;
    }
  }
  for (; i < n; i++) ops.push({ kind: "removed", text: a[i] });
  for (; j < m; j++) ops.push({ kind: "added", text: b[j] });
}

export function countChanges(ops: readonly DiffOp[]): { added: number; removed: number } {
  let added = 0;
  let removed = 0;
  for (const op of ops) {
    if (op.kind === "added") added++;
    else if (op.kind === "removed") removed++;
  }
  return { added, removed };
}

/// ## diffing two sources
///
/// in section mode, both sides are cut down to the section's lines before
/// alignment: the old file by its own declared ranges, the new file by its
/// declared ranges if it has any, the old ones otherwise. the reported
/// `total` is still the whole old file, so you can see the section in
/// proportion.

export function diffSources(
  oldSource: string,
  newSource: string,
  format: SourceFormat,
  options: DiffOptions = {}
): DiffOutcome {
  const oldLines = classifyLines(oldSource, format);
  const newLines = classifyLines(newSource, format);
  const total = countMeaningful(oldLines);
  const { section, onAligned } = options;

  if (!section) {
    const ops = alignLines(meaningfulTexts(oldLines), meaningfulTexts(newLines));
    onAligned?.(ops);
    return { ...countChanges(ops), total };
  }

  const oldMember = resolveRange(section.old, oldLines.length);
  const newMember = resolveRange(section.new ?? section.old, newLines.length);
  const oldTexts = meaningfulTexts(oldLines, oldMember);
  const newTexts = meaningfulTexts(newLines, newMember);
  const ops = alignLines(oldTexts, newTexts);
  onAligned?.(ops);
  return { ...countChanges(ops), total, section: oldTexts.length };
}

function meaningfulTexts(lines: readonly ClassifiedLine[], member?: ReadonlySet<number>): string[] {
  return lines
    .filter(line => line.meaningful && (!member || member.has(line.number)))
    .map(line => line.stripped);
}
