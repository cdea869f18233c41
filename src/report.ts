/// # report building
///
/// the batch side of counting: walk every chart type and every file in
/// declaration order, classify each file, tally its categories, and lay
/// the results out as rows ready for printing.
///
/// reading files is the caller's job. `readSource` hands us the text of
/// `chartType/filename`, or `undefined` when it isn't there. a missing file
/// becomes a warning on its chart, not a hole in the middle of a run.

import { posix } from "path";
import { classifyLines, detectFormat, type ClassifiedLine } from "./classify.js";
import { compileColumn, type Cell, type ColumnValue, type CompiledColumn, type ComputedColumn } from "./columns.js";
import { combine, parseCombination, tallyFile } from "./count.js";
import { ConfigError } from "./errors.js";
import type { ChartSpec, FileSpec } from "./types.js";

export type SourceReader = (path: string) => string | undefined;

export interface ReportOptions {
  columns?: readonly ComputedColumn[];
  /// extra `+`-joined columns, e.g. `Code+Data`.
  combinations?: readonly string[];
  /// called with every classified file, for debug output.
  onClassified?: (path: string, lines: readonly ClassifiedLine[], spec: FileSpec) => void;
}

export interface ReportRow {
  filename: string;
  /// only the categories this file declares.
  counts: Map<string, number>;
  combinations: Map<string, number | null>;
  computed: Map<string, ColumnValue>;
  /// meaningful lines in the whole file.
  total: number;
}

export interface ChartReport {
  chartType: string;
  categories: string[];
  combinations: string[];
  /// titles of the computed columns, in order.
  columns: string[];
  rows: ReportRow[];
  missing: string[];
}

export function sourcePath(spec: FileSpec): string {
  return posix.join(spec.chartType, spec.filename);
}

export function buildReport(
  charts: readonly ChartSpec[],
  readSource: SourceReader,
  options: ReportOptions = {}
): ChartReport[] {
  return charts.map(chart => buildChartReport(chart, readSource, options));
}

function buildChartReport(chart: ChartSpec, readSource: SourceReader, options: ReportOptions): ChartReport {
  /// columns follow the order categories are first seen in, across all of
  /// the chart's files. a file that declares `Data` before `Code` doesn't
  /// get to reshuffle the table.
  const categories: string[] = [];
  for (const file of chart.files) {
    for (const category of file.categories.keys()) {
      if (!categories.includes(category)) categories.push(category);
    }
  }

  const combinations = [...(options.combinations ?? [])];
  const members = new Map<string, string[]>();
  for (const combination of combinations) {
    const names = parseCombination(combination);
    for (const name of names) {
      if (!categories.includes(name)) {
        throw new ConfigError(`combination "${combination}" uses "${name}", which no file in "${chart.chartType}" declares`);
      }
    }
    members.set(combination, names);
  }

  /// computed columns index into categories followed by combinations.
  /// binding happens here, per chart, because each chart can have a
  /// different number of data columns.
  const columnCount = categories.length + combinations.length;
  let compiled: CompiledColumn[];
  try {
    compiled = (options.columns ?? []).map(column => compileColumn(column, columnCount));
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigError(`${err.message} (chart "${chart.chartType}")`);
    }
    throw err;
  }

  const rows: ReportRow[] = [];
  const missing: string[] = [];

  for (const spec of chart.files) {
    const path = sourcePath(spec);
    const source = readSource(path);
    if (source === undefined) {
      missing.push(spec.filename);
      continue;
    }

    const lines = classifyLines(source, detectFormat(spec.filename));
    options.onClassified?.(path, lines, spec);
    const { counts, total } = tallyFile(lines, spec.categories);

    const combined = new Map<string, number | null>();
    for (const [combination, names] of members) {
      combined.set(combination, names.every(name => counts.has(name)) ? combine(counts, names) : null);
    }

    const cells: Cell[] = [
      ...categories.map(category => counts.get(category) ?? null),
      ...combinations.map(combination => combined.get(combination) ?? null)
    ];
    const computed = new Map<string, ColumnValue>();
    for (const column of compiled) {
      computed.set(column.title, column.evaluate(cells));
    }

    rows.push({ filename: spec.filename, counts, combinations: combined, computed, total });
  }

  return {
    chartType: chart.chartType,
    categories,
    combinations,
    columns: compiled.map(column => column.title),
    rows,
    missing
  };
}
