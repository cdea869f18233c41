/// # shared types
///
/// the declaration structures everything else reads. they're built once
/// from `stats.txt` and never mutated afterwards.

import type { RangeSpec } from "./ranges.js";

/// one analysed file. `categories` keeps declaration order, which is the
/// order columns show up in the report.
export interface FileSpec {
  chartType: string;
  filename: string;
  categories: ReadonlyMap<string, RangeSpec>;
}

/// a chart type groups files, and doubles as the directory they live in.
export interface ChartSpec {
  chartType: string;
  files: readonly FileSpec[];
}
