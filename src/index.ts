/// # linetally
///
/// count and compare the *meaningful* lines of source files: lines that
/// are neither blank nor entirely comment. each file declares categories
/// (Code, Data, Annotation, whatever you like) as line ranges, and
/// linetally tells you how many meaningful lines each one holds, or how
/// many changed between two versions.
///
/// the library has two halves:
///
/// 1. **counting**: classify lines, resolve ranges, tally categories,
///    derive computed columns, assemble reports.
/// 2. **comparing**: strip both versions and align them with an LCS,
///    optionally inside a single section.

export { classifyLines, detectFormat, splitLines, stripComments, type ClassifiedLine, type LineKind, type SourceFormat } from "./classify.js";
export { formatRangeSpec, parseRangeSpec, resolveRange, toRanges, unionRangeSpecs, type LineRange, type RangeSpec } from "./ranges.js";
export { combine, countMeaningful, parseCombination, tallyFile, type CategoryCount, type FileTally } from "./count.js";
export {
  compileColumn,
  parseColumnExpression,
  UNDEFINED,
  type Cell,
  type ColumnExpression,
  type ColumnValue,
  type CompiledColumn,
  type ComputedColumn
} from "./columns.js";
export { alignLines, countChanges, diffSources, type DiffOp, type DiffOptions, type DiffOutcome, type SectionFilter } from "./diff.js";
export { fileSpecsOf, parseStats } from "./stats.js";
export { buildReport, sourcePath, type ChartReport, type ReportOptions, type ReportRow, type SourceReader } from "./report.js";
export { compareFolders, sectionRanges, type CompareEntry, type CompareOptions } from "./compare.js";
export { describeCategories, describeLines, formatCell, renderComparison, renderGrid, renderReportMarkdown, renderReportText } from "./format.js";
export { generateAnnotatedHtml, generateReportHtml, type HtmlOptions } from "./html.js";
export { ConfigError } from "./errors.js";
export type { ChartSpec, FileSpec } from "./types.js";
