/// # stats file
///
/// the declaration of what's in each file lives in a small indented text
/// file, usually `stats.txt`:
///
/// ```
/// simple-barchart:
///     ggplot2.R:
///         Code: 1-12,30-41
///         Data: 13-29
///         Annotation: all
/// ```
///
/// three levels: chart type at column zero, files one level in, categories
/// deeper still. the chart type is also the directory the files live in.

import { ConfigError } from "./errors.js";
import { parseRangeSpec, type RangeSpec } from "./ranges.js";
import type { ChartSpec, FileSpec } from "./types.js";

interface ChartBuilder {
  chartType: string;
  files: Map<string, Map<string, RangeSpec>>;
}

function indentOf(line: string): number {
  let width = 0;
  for (const ch of line) {
    if (ch === " ") width += 1;
    else if (ch === "\t") width += 4;
    else break;
  }
  return width;
}

export function parseStats(text: string): ChartSpec[] {
  const charts = new Map<string, ChartBuilder>();
  let chart: ChartBuilder | null = null;
  let file: Map<string, RangeSpec> | null = null;
  /// the indentation of file lines is whatever the first file under a
  /// chart uses. anything deeper is a category.
  let fileIndent: number | null = null;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const raw = lines[i];
    const trimmed = raw.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;

    const colon = trimmed.indexOf(":");
    if (colon === -1) {
      throw new ConfigError(`expected "name:" but found "${trimmed}"`, lineNumber);
    }
    const name = trimmed.slice(0, colon).trim();
    const value = trimmed.slice(colon + 1).trim();
    if (name === "") {
      throw new ConfigError(`missing name before ":"`, lineNumber);
    }

    const indent = indentOf(raw);

    if (indent === 0) {
      if (value !== "") {
        throw new ConfigError(`chart type "${name}" must not have a value`, lineNumber);
      }
      /// a chart type declared twice just keeps collecting files.
      chart = charts.get(name) ?? { chartType: name, files: new Map() };
      charts.set(name, chart);
      file = null;
      fileIndent = null;
      continue;
    }

    if (!chart) {
      throw new ConfigError(`"${name}" is indented but no chart type comes before it`, lineNumber);
    }

    if (fileIndent === null) fileIndent = indent;

    if (indent === fileIndent) {
      if (value !== "") {
        throw new ConfigError(`file "${name}" must not have a value; indent its categories further`, lineNumber);
      }
      file = chart.files.get(name) ?? new Map();
      chart.files.set(name, file);
      continue;
    }

    if (indent < fileIndent) {
      throw new ConfigError(`inconsistent indentation for "${name}"`, lineNumber);
    }
    if (!file) {
      throw new ConfigError(`category "${name}" comes before any file`, lineNumber);
    }
    if (file.has(name)) {
      throw new ConfigError(`category "${name}" is declared twice for the same file`, lineNumber);
    }

    try {
      file.set(name, parseRangeSpec(value));
    } catch (err) {
      /// the range parser doesn't know where it is in the file. we do.
      if (err instanceof ConfigError && err.line === undefined) {
        throw new ConfigError(err.message, lineNumber);
      }
      throw err;
    }
  }

  return [...charts.values()].map(({ chartType, files }) => ({
    chartType,
    files: [...files].map(([filename, categories]): FileSpec => ({ chartType, filename, categories }))
  }));
}

/// the comparison tool looks files up by name within one chart type.
export function fileSpecsOf(charts: readonly ChartSpec[], chartType: string): Map<string, FileSpec> | undefined {
  const chart = charts.find(c => c.chartType === chartType);
  if (!chart) return undefined;
  return new Map(chart.files.map(spec => [spec.filename, spec]));
}
