/// # folder comparison
///
/// two implementations of the same set of charts, one file each, side by
/// side in two folders. for every file in the old folder we find its
/// counterpart by name and diff the two.
///
/// a file with no counterpart gets a warning entry and the batch moves on.

import { detectFormat } from "./classify.js";
import { parseCombination } from "./count.js";
import { diffSources, type DiffOp, type DiffOutcome, type SectionFilter } from "./diff.js";
import { ConfigError } from "./errors.js";
import { unionRangeSpecs, type RangeSpec } from "./ranges.js";
import type { FileSpec } from "./types.js";

export interface CompareOptions {
  /// restrict the diff to one category, or a `+` combination of several.
  section?: string;
  /// declarations for the old folder's files, keyed by filename.
  oldSpecs?: ReadonlyMap<string, FileSpec>;
  newSpecs?: ReadonlyMap<string, FileSpec>;
  onAligned?: (filename: string, ops: readonly DiffOp[]) => void;
}

export type CompareEntry =
  | { kind: "compared"; filename: string; outcome: DiffOutcome }
  | { kind: "missing"; filename: string; reason: string };

export function compareFolders(
  oldFiles: ReadonlyMap<string, string>,
  newFiles: ReadonlyMap<string, string>,
  options: CompareOptions = {}
): CompareEntry[] {
  const entries: CompareEntry[] = [];
  const sorted = [...oldFiles].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  for (const [filename, oldSource] of sorted) {
    const newSource = newFiles.get(filename);
    if (newSource === undefined) {
      entries.push({ kind: "missing", filename, reason: "no counterpart in the second folder" });
      continue;
    }

    let section: SectionFilter | undefined;
    if (options.section) {
      const oldSpec = options.oldSpecs?.get(filename);
      if (!oldSpec) {
        entries.push({ kind: "missing", filename, reason: "not declared in the stats file" });
        continue;
      }
      /// the new file's own declaration wins when it has the section;
      /// otherwise the old ranges are reapplied to the new numbering.
      const newSpec = options.newSpecs?.get(filename);
      section = {
        old: sectionRanges(oldSpec, options.section),
        new: newSpec && declaresSection(newSpec, options.section) ? sectionRanges(newSpec, options.section) : undefined
      };
    }

    const onAligned = options.onAligned;
    const outcome = diffSources(oldSource, newSource, detectFormat(filename), {
      section,
      onAligned: onAligned && ((ops: readonly DiffOp[]) => onAligned(filename, ops))
    });
    entries.push({ kind: "compared", filename, outcome });
  }

  return entries;
}

function declaresSection(spec: FileSpec, section: string): boolean {
  return parseCombination(section).every(name => spec.categories.has(name));
}

/// a section name can be a single category or several joined by `+`. the
/// lines of a combination are the union of its members' lines.
export function sectionRanges(spec: FileSpec, section: string): RangeSpec {
  const specs = parseCombination(section).map(name => {
    const ranges = spec.categories.get(name);
    if (ranges === undefined) {
      throw new ConfigError(`"${spec.chartType}/${spec.filename}" does not declare category "${name}"`);
    }
    return ranges;
  });
  return unionRangeSpecs(specs);
}
