/// # line ranges
///
/// a category says which lines of a file belong to it: either `all`, or a
/// list like `13-22,39-71,80`. ranges are inclusive and 1-based, exactly
/// how you'd read them off an editor gutter.

import { ConfigError } from "./errors.js";

export interface LineRange {
  start: number;
  end: number;
}

export type RangeSpec = "all" | readonly LineRange[];

/// `N/A` (or `none`) declares that a file has no lines in a category at
/// all. it's still a declaration: the category exists for that file, its
/// count is just zero.
const emptyMarkers = new Set(["n/a", "none"]);

export function parseRangeSpec(text: string): RangeSpec {
  const value = text.trim();
  if (value.toLowerCase() === "all") return "all";
  if (emptyMarkers.has(value.toLowerCase())) return [];
  if (value === "") throw new ConfigError("empty line range");

  const ranges: LineRange[] = [];
  for (const raw of value.split(",")) {
    const part = raw.trim();
    const match = /^(\d+)(?:\s*-\s*(\d+))?$/.exec(part);
    if (!match) {
      throw new ConfigError(`malformed line range "${part}" in "${value}"`);
    }
    const start = Number(match[1]);
    const end = match[2] === undefined ? start : Number(match[2]);
    if (start < 1) {
      throw new ConfigError(`line numbers start at 1, got "${part}"`);
    }
    if (start > end) {
      throw new ConfigError(`range "${part}" ends before it starts`);
    }
    ranges.push({ start, end });
  }
  return ranges;
}

export function formatRangeSpec(spec: RangeSpec): string {
  if (spec === "all") return "all";
  if (spec.length === 0) return "N/A";
  return spec.map(r => (r.start === r.end ? `${r.start}` : `${r.start}-${r.end}`)).join(",");
}

/// ## resolving against a file
///
/// a declared range can run past the end of the file (the file got shorter
/// since the stats were written, or someone typed `1-999` on purpose). we
/// clip to `[1, total]` and move on; counting a line that doesn't exist
/// would be worse than ignoring the overshoot.
///
/// overlapping ranges are fine, and so is any order. the mask collapses
/// them, and reading it back front to back gives ascending line numbers.

export function resolveRange(spec: RangeSpec, total: number): Set<number> {
  const lines = new Set<number>();
  if (total <= 0) return lines;

  if (spec === "all") {
    for (let n = 1; n <= total; n++) lines.add(n);
    return lines;
  }

  const member = new Uint8Array(total + 1);
  for (const { start, end } of spec) {
    const from = Math.max(1, start);
    const to = Math.min(total, end);
    for (let n = from; n <= to; n++) member[n] = 1;
  }
  for (let n = 1; n <= total; n++) {
    if (member[n]) lines.add(n);
  }
  return lines;
}

/// the inverse: squash a set of line numbers back into sorted, disjoint
/// ranges. feeding the result back into `resolveRange` gives the same set.
export function toRanges(lines: Iterable<number>): LineRange[] {
  const sorted = [...new Set(lines)].sort((a, b) => a - b);
  const ranges: LineRange[] = [];
  for (const n of sorted) {
    const last = ranges[ranges.length - 1];
    if (last && last.end + 1 === n) {
      last.end = n;
    } else {
      ranges.push({ start: n, end: n });
    }
  }
  return ranges;
}

/// used when a section is a combination like `Code+Data`: any `all`
/// swallows everything, otherwise the ranges just pile up (resolve takes
/// care of overlap).
export function unionRangeSpecs(specs: readonly RangeSpec[]): RangeSpec {
  const ranges: LineRange[] = [];
  for (const spec of specs) {
    if (spec === "all") return "all";
    ranges.push(...spec);
  }
  return ranges;
}
