#!/usr/bin/env node

/// # CLI
///
/// the command-line interface for linetally. three commands:
///
/// - **`linetally report`**: count meaningful lines per category for every
///   file declared in the stats file, one table per chart type.
/// - **`linetally compare`**: diff the meaningful lines of two folders,
///   file by file, optionally only within one section.
/// - **`linetally annotate`**: render one file as html with every line
///   marked blank, comment or code and tagged with its categories.
///
/// everything the core computes comes back as data. this file is the only
/// place that touches the disk or prints.

import { existsSync, readFileSync, readdirSync, statSync } from "fs";
import { basename, dirname, join, resolve } from "path";
import { parseArgs, usage, type AnnotateCommand, type CompareCommand, type ReportCommand } from "./args.js";
import { compareFolders } from "./compare.js";
import { ConfigError } from "./errors.js";
import { describeCategories, describeLines, renderComparison, renderReportMarkdown, renderReportText } from "./format.js";
import { generateAnnotatedHtml, generateReportHtml } from "./html.js";
import { resolveRange } from "./ranges.js";
import { buildReport, type SourceReader } from "./report.js";
import { fileSpecsOf, parseStats } from "./stats.js";
import type { ChartSpec } from "./types.js";

/// ## command dispatch
///
/// configuration mistakes stop the run with a one-line message and exit
/// code 1. anything else is a bug or an I/O failure and keeps its stack.

try {
  const command = parseArgs(process.argv.slice(2));
  switch (command.command) {
    case "help":
      console.log(usage);
      break;
    case "report":
      await runReport(command);
      break;
    case "compare":
      runCompare(command);
      break;
    case "annotate":
      await runAnnotate(command);
      break;
  }
} catch (err) {
  if (!(err instanceof ConfigError)) throw err;
  console.error(`error: ${err.message}`);
  process.exitCode = 1;
}

/// ## helpers

function loadStats(path: string): ChartSpec[] {
  if (!existsSync(path)) {
    throw new ConfigError(`stats file not found: ${path}`);
  }
  return parseStats(readFileSync(path, "utf-8"));
}

/// a missing file is `undefined`, not an exception. the report builder
/// turns it into a warning.
function diskReader(root: string): SourceReader {
  return path => {
    const full = join(root, path);
    return existsSync(full) && statSync(full).isFile() ? readFileSync(full, "utf-8") : undefined;
  };
}

/// regular files directly inside a folder, by name. subfolders aren't
/// part of a chart.
function readFolder(dir: string): Map<string, string> {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new ConfigError(`folder not found: ${dir}`);
  }
  const files = new Map<string, string>();
  for (const entry of readdirSync(dir)) {
    const path = join(dir, entry);
    if (statSync(path).isFile()) {
      files.set(entry, readFileSync(path, "utf-8"));
    }
  }
  return files;
}

/// ## report

async function runReport(command: ReportCommand): Promise<void> {
  const charts = loadStats(command.stats);
  const debugTarget = command.debugFile;

  const reports = buildReport(charts, diskReader(command.root), {
    columns: command.columns,
    combinations: command.combinations,
    /// `--debug` alone dumps every file; with `--debug-file` only the one
    /// you're chasing.
    onClassified: command.debug
      ? (path, lines, spec) => {
          if (debugTarget !== undefined && debugTarget !== path) return;
          const membership = new Map(
            [...spec.categories].map(([name, ranges]) => [name, resolveRange(ranges, lines.length)] as const)
          );
          console.error(`\n=== ${path} ===`);
          console.error(describeCategories(spec.categories));
          console.error(describeLines(lines, membership));
        }
      : undefined
  });

  for (const report of reports) {
    for (const filename of report.missing) {
      console.error(`warning: ${join(command.root, report.chartType, filename)} not found, skipped`);
    }
  }

  switch (command.format) {
    case "text":
      console.log(renderReportText(reports));
      break;
    case "markdown":
      console.log(renderReportMarkdown(reports));
      break;
    case "html":
      console.log(await generateReportHtml(reports));
      break;
  }
}

/// ## compare
///
/// stats are only needed for `--section`. the chart type of each side is
/// its folder name, the same key the report uses.

function runCompare(command: CompareCommand): void {
  const oldFiles = readFolder(command.oldDir);
  const newFiles = readFolder(command.newDir);

  let charts: ChartSpec[] = [];
  if (command.section) {
    charts = loadStats(command.stats);
  }

  const oldChart = basename(resolve(command.oldDir));
  const newChart = basename(resolve(command.newDir));
  const oldSpecs = fileSpecsOf(charts, oldChart);
  const newSpecs = fileSpecsOf(charts, newChart);
  if (command.section) {
    if (!oldSpecs) console.error(`warning: '${oldChart}' not found in ${command.stats}`);
    if (!newSpecs) console.error(`warning: '${newChart}' not found in ${command.stats}`);
  }

  const entries = compareFolders(oldFiles, newFiles, {
    section: command.section,
    oldSpecs,
    newSpecs,
    onAligned: command.debug
      ? (filename, ops) => {
          console.error(`\n=== ${filename} ===`);
          for (const op of ops) {
            if (op.kind === "removed") console.error(`- ${op.text}`);
            else if (op.kind === "added") console.error(`+ ${op.text}`);
          }
        }
      : undefined
  });

  if (entries.length === 0) {
    console.error(`no files found in '${command.oldDir}'`);
    process.exitCode = 1;
    return;
  }

  console.log(renderComparison(entries, command.section));
}

/// ## annotate
///
/// the file's categories come from the stats file when it declares it
/// (chart type = the file's folder name). without a stats file, or for an
/// undeclared file, you still get the blank/comment/code view.

async function runAnnotate(command: AnnotateCommand): Promise<void> {
  if (!existsSync(command.file)) {
    throw new ConfigError(`file not found: ${command.file}`);
  }
  const source = readFileSync(command.file, "utf-8");

  const charts = existsSync(command.stats) ? loadStats(command.stats) : [];
  const chartType = basename(dirname(resolve(command.file)));
  const spec = fileSpecsOf(charts, chartType)?.get(basename(command.file));

  console.log(await generateAnnotatedHtml(command.file, source, spec?.categories));
}
