/// # argument parsing
///
/// three commands, a handful of flags, no config beyond the stats file. we
/// parse `process.argv` by hand: the grammar is small enough that a
/// library would be more ceremony than help.
///
/// the older snake_case spellings (`--stats_file`, `--col_process`,
/// `--debug_file`) are accepted too, so existing scripts keep working.

import type { ComputedColumn } from "./columns.js";
import { ConfigError } from "./errors.js";

export type ReportFormat = "text" | "markdown" | "html";

export interface ReportCommand {
  command: "report";
  stats: string;
  root: string;
  columns: ComputedColumn[];
  combinations: string[];
  format: ReportFormat;
  debug: boolean;
  debugFile?: string;
}

export interface CompareCommand {
  command: "compare";
  oldDir: string;
  newDir: string;
  stats: string;
  section?: string;
  debug: boolean;
}

export interface AnnotateCommand {
  command: "annotate";
  file: string;
  stats: string;
}

export type Command = ReportCommand | CompareCommand | AnnotateCommand | { command: "help" };

export const usage = `linetally - count and compare meaningful lines of chart source files

comments and blank lines never count. lines are grouped into categories
(Code, Data, Annotation, ...) declared per file in a stats file.

usage:
  linetally report [--stats FILE] [--root DIR] [--col TITLE EXPR]...
                   [--combine A+B]... [--format text|markdown|html]
                   [--debug] [--debug-file PATH]
  linetally compare <old-dir> <new-dir> [--stats FILE] [--section NAME] [--debug]
  linetally annotate <file> [--stats FILE]

examples:
  linetally report --col "Code+Data" "1+2" --col "Share" "3/(1+2+3)"
  linetally report --combine Code+Data --format html > report.html
  linetally compare simple-barchart simple-scatterplot --section Annotation
  linetally annotate simple-barchart/ggplot2.R > ggplot2.html
`;

const formats = new Set<string>(["text", "markdown", "html"]);

function isReportFormat(value: string): value is ReportFormat {
  return formats.has(value);
}

/// pulls the value(s) following a flag off the argument list, complaining
/// if there aren't enough of them.
function takeValues(args: readonly string[], index: number, count: number, flag: string): string[] {
  const values = args.slice(index + 1, index + 1 + count);
  if (values.length < count) {
    throw new ConfigError(`${flag} expects ${count === 1 ? "a value" : `${count} values`}`);
  }
  return values;
}

export function parseArgs(argv: readonly string[]): Command {
  const [command, ...args] = argv;

  if (command === undefined || command === "help" || command === "--help" || command === "-h") {
    return { command: "help" };
  }

  let stats = "stats.txt";
  let root = ".";
  let format: ReportFormat = "text";
  let debug = false;
  let debugFile: string | undefined;
  let section: string | undefined;
  const columns: ComputedColumn[] = [];
  const combinations: string[] = [];
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--stats":
      case "--stats_file":
        [stats] = takeValues(args, i, 1, arg);
        i += 1;
        break;
      case "--root":
        [root] = takeValues(args, i, 1, arg);
        i += 1;
        break;
      case "--col":
      case "--col_process": {
        const [title, expression] = takeValues(args, i, 2, arg);
        columns.push({ title, expression });
        i += 2;
        break;
      }
      case "--combine":
        combinations.push(takeValues(args, i, 1, arg)[0]);
        i += 1;
        break;
      case "--format": {
        const [value] = takeValues(args, i, 1, arg);
        if (!isReportFormat(value)) {
          throw new ConfigError(`unknown format "${value}" (expected text, markdown or html)`);
        }
        format = value;
        i += 1;
        break;
      }
      case "--section":
        [section] = takeValues(args, i, 1, arg);
        i += 1;
        break;
      case "--debug":
        debug = true;
        break;
      case "--debug-file":
      case "--debug_file":
        [debugFile] = takeValues(args, i, 1, arg);
        debug = true;
        i += 1;
        break;
      default:
        if (arg.startsWith("--")) throw new ConfigError(`unknown option ${arg}`);
        positional.push(arg);
    }
  }

  switch (command) {
    case "report":
      if (positional.length > 0) throw new ConfigError(`unexpected argument "${positional[0]}"`);
      return { command, stats, root, columns, combinations, format, debug, debugFile };

    case "compare": {
      if (positional.length !== 2) throw new ConfigError("compare needs exactly two folders");
      const [oldDir, newDir] = positional;
      return { command, oldDir, newDir, stats, section, debug };
    }

    case "annotate":
      if (positional.length !== 1) throw new ConfigError("annotate needs exactly one file");
      return { command, file: positional[0], stats };

    default:
      throw new ConfigError(`unknown command: ${command}`);
  }
}
