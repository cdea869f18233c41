/// # category counts
///
/// the aggregator is where classification meets declaration. for each
/// category a file declares, we count the meaningful lines that fall in
/// its ranges.
///
/// categories are independent lenses, not a partition. `Annotation: all`
/// next to `Code: 1-40` means the first forty lines count twice, once per
/// lens, and combinations like `Code+Data` are plain sums of the
/// elemental counts. that's deliberate: the numbers answer "how much of
/// this file is X", not "what is each line".

import type { ClassifiedLine } from "./classify.js";
import { ConfigError } from "./errors.js";
import { resolveRange, type RangeSpec } from "./ranges.js";

export type CategoryCount = Map<string, number>;

export interface FileTally {
  counts: CategoryCount;
  /// meaningful lines in the whole file, regardless of categories.
  total: number;
}

export function countMeaningful(lines: readonly ClassifiedLine[]): number {
  let count = 0;
  for (const line of lines) {
    if (line.meaningful) count++;
  }
  return count;
}

export function tallyFile(lines: readonly ClassifiedLine[], categories: ReadonlyMap<string, RangeSpec>): FileTally {
  const counts: CategoryCount = new Map();

  for (const [category, spec] of categories) {
    const member = resolveRange(spec, lines.length);
    let count = 0;
    for (const line of lines) {
      if (line.meaningful && member.has(line.number)) count++;
    }
    counts.set(category, count);
  }

  return { counts, total: countMeaningful(lines) };
}

/// ## combinations
///
/// `Code+Data+Annotation` names three categories. whitespace around the
/// `+` is forgiven; an empty member (`Code++Data`) isn't.

export function parseCombination(name: string): string[] {
  const members = name.split("+").map(part => part.trim());
  if (members.some(member => member === "")) {
    throw new ConfigError(`malformed category combination "${name}"`);
  }
  return members;
}

export function combine(counts: ReadonlyMap<string, number>, names: readonly string[]): number {
  let sum = 0;
  for (const name of names) {
    const count = counts.get(name);
    if (count === undefined) {
      throw new ConfigError(`category "${name}" is not declared`);
    }
    sum += count;
  }
  return sum;
}
