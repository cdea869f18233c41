/// # plain-text output
///
/// everything the CLI prints that isn't html. the builders hand over
/// structured rows; this module decides how they look in a terminal or a
/// markdown file.

import type { ClassifiedLine } from "./classify.js";
import { UNDEFINED, type ColumnValue } from "./columns.js";
import type { CompareEntry } from "./compare.js";
import { formatRangeSpec, type RangeSpec } from "./ranges.js";
import type { ChartReport } from "./report.js";

/// empty cells print as `-`. fractions (from `/` in a computed column) get
/// at most two decimals, and `1.50` prints as `1.5`.
export function formatCell(value: ColumnValue): string {
  if (value === null) return "-";
  if (value === UNDEFINED) return UNDEFINED;
  if (Number.isInteger(value)) return String(value);
  return String(Math.round(value * 100) / 100);
}

export function reportHeaders(report: ChartReport): string[] {
  return ["File", ...report.categories, ...report.combinations, ...report.columns];
}

export function reportCells(report: ChartReport): string[][] {
  return report.rows.map(row => [
    row.filename,
    ...report.categories.map(category => formatCell(row.counts.get(category) ?? null)),
    ...report.combinations.map(combination => formatCell(row.combinations.get(combination) ?? null)),
    ...report.columns.map(title => formatCell(row.computed.get(title) ?? null))
  ]);
}

/// ## grid tables
///
/// ```
/// +-----------+------+
/// | File      | Code |
/// +===========+======+
/// | ggplot2.R |   12 |
/// +-----------+------+
/// ```
///
/// the file column is left-aligned, every count column right-aligned.

export function renderGrid(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((header, col) => Math.max(header.length, ...rows.map(row => (row[col] ?? "").length)));
  const rule = (fill: string) => "+" + widths.map(w => fill.repeat(w + 2)).join("+") + "+";
  const line = (cells: readonly string[]) =>
    "| " +
    widths.map((w, col) => (col === 0 ? (cells[col] ?? "").padEnd(w) : (cells[col] ?? "").padStart(w))).join(" | ") +
    " |";

  const out = [rule("-"), line(headers)];
  if (rows.length === 0) {
    out.push(rule("-"));
    return out.join("\n");
  }
  out.push(rule("="));
  for (const row of rows) {
    out.push(line(row), rule("-"));
  }
  return out.join("\n");
}

export function renderReportText(reports: readonly ChartReport[]): string {
  const out: string[] = [];
  for (const report of reports) {
    out.push(`\n${report.chartType}:`);
    out.push(renderGrid(reportHeaders(report), reportCells(report)));
  }
  return out.join("\n");
}

/// ## markdown
///
/// one `##` heading and one GFM table per chart. this is also what the
/// html report is rendered from.

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, "\\|");
}

export function renderReportMarkdown(reports: readonly ChartReport[]): string {
  const out: string[] = [];
  for (const report of reports) {
    const headers = reportHeaders(report);
    out.push(`## ${report.chartType}`, "");
    out.push(`| ${headers.map(escapeMarkdownCell).join(" | ")} |`);
    out.push(`| ${headers.map(() => "---").join(" | ")} |`);
    for (const cells of reportCells(report)) {
      out.push(`| ${cells.map(escapeMarkdownCell).join(" | ")} |`);
    }
    if (report.missing.length > 0) {
      out.push("", `> missing: ${report.missing.join(", ")}`);
    }
    out.push("");
  }
  return out.join("\n");
}

/// ## comparison
///
/// one line per file pair:
///
/// ```
/// ggplot2.R: +  3 | -  1 ||  42
/// ggplot2.R: +  3 | -  1 ||  17 /  42     (with --section)
/// ```
///
/// added, removed, then (with a section) the section's meaningful lines in
/// the old file, then the old file's total.

const pad3 = (n: number) => String(n).padStart(3);

export function renderComparison(entries: readonly CompareEntry[], section?: string): string {
  const width = Math.max(4, ...entries.map(entry => entry.filename.length));
  const out: string[] = [];

  if (section) {
    out.push(`Comparing only the '${section}' section in each file:`, "");
    out.push(`${"File".padEnd(width)}: added | removed || section / total`);
  } else {
    out.push(`${"File".padEnd(width)}: added | removed || total`);
  }

  for (const entry of entries) {
    const name = entry.filename.padEnd(width);
    if (entry.kind === "missing") {
      out.push(`${name}: warning: ${entry.reason}`);
      continue;
    }
    const { added, removed, total } = entry.outcome;
    const counts = `+${pad3(added)} | -${pad3(removed)} ||`;
    out.push(
      section
        ? `${name}: ${counts} ${pad3(entry.outcome.section ?? 0)} / ${pad3(total)}`
        : `${name}: ${counts} ${pad3(total)}`
    );
  }
  return out.join("\n");
}

/// ## debug listing
///
/// a file's categories the way the stats file declares them, one per line.
export function describeCategories(categories: ReadonlyMap<string, RangeSpec>): string {
  return [...categories].map(([name, spec]) => `${name}: ${formatRangeSpec(spec)}`).join("\n");
}

/// and every physical line with its number, its kind, and the categories it
/// falls in. the first thing to look at when a count seems off.

export function describeLines(lines: readonly ClassifiedLine[], membership?: ReadonlyMap<string, ReadonlySet<number>>): string {
  return lines
    .map(line => {
      const tags = membership
        ? [...membership].filter(([, member]) => member.has(line.number)).map(([name]) => name)
        : [];
      const tagText = tags.length > 0 ? ` [${tags.join(",")}]` : "";
      return `${String(line.number).padStart(4)} ${line.kind.padEnd(7)}${tagText} | ${line.text}`;
    })
    .join("\n");
}
