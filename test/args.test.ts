import { describe, it, expect } from "vitest";
import { parseArgs } from "../src/args.js";
import { ConfigError } from "../src/errors.js";

describe("parseArgs", () => {
  it.each([[[]], [["help"]], [["--help"]], [["-h"]]])("shows help for %j", argv => {
    expect(parseArgs(argv)).toEqual({ command: "help" });
  });

  it("fills in report defaults", () => {
    expect(parseArgs(["report"])).toEqual({
      command: "report",
      stats: "stats.txt",
      root: ".",
      columns: [],
      combinations: [],
      format: "text",
      debug: false,
      debugFile: undefined
    });
  });

  it("collects repeated report flags in order", () => {
    const command = parseArgs([
      "report",
      "--stats",
      "charts.txt",
      "--col",
      "Code+Data",
      "1+2",
      "--col_process",
      "Share",
      "3/(1+2+3)",
      "--combine",
      "Code+Data",
      "--format",
      "markdown"
    ]);
    expect(command).toMatchObject({
      command: "report",
      stats: "charts.txt",
      columns: [
        { title: "Code+Data", expression: "1+2" },
        { title: "Share", expression: "3/(1+2+3)" }
      ],
      combinations: ["Code+Data"],
      format: "markdown"
    });
  });

  it("turns on debug output for a single file", () => {
    expect(parseArgs(["report", "--debug_file", "bars/plot.R"])).toMatchObject({ debug: true, debugFile: "bars/plot.R" });
  });

  it("reads two folders and a section for compare", () => {
    expect(parseArgs(["compare", "old", "new", "--section", "Annotation", "--stats_file", "s.txt"])).toEqual({
      command: "compare",
      oldDir: "old",
      newDir: "new",
      stats: "s.txt",
      section: "Annotation",
      debug: false
    });
  });

  it("reads one file for annotate", () => {
    expect(parseArgs(["annotate", "bars/plot.R"])).toEqual({ command: "annotate", file: "bars/plot.R", stats: "stats.txt" });
  });

  it.each([
    [["report", "--verbose"], "unknown option --verbose"],
    [["report", "--stats"], "--stats expects a value"],
    [["report", "--col", "Share"], "--col expects 2 values"],
    [["report", "--format", "pdf"], 'unknown format "pdf" (expected text, markdown or html)'],
    [["report", "extra"], 'unexpected argument "extra"'],
    [["compare", "only-one"], "compare needs exactly two folders"],
    [["annotate"], "annotate needs exactly one file"],
    [["count"], "unknown command: count"]
  ])("rejects %j", (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(ConfigError);
    expect(() => parseArgs(argv)).toThrow(message);
  });
});
