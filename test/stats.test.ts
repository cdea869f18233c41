import { describe, it, expect } from "vitest";
import { ConfigError } from "../src/errors.js";
import { fileSpecsOf, parseStats } from "../src/stats.js";

const stats = (...lines: string[]) => lines.join("\n");

describe("parseStats", () => {
  it("reads charts, files and categories in declaration order", () => {
    const charts = parseStats(
      stats(
        "# comment at the top",
        "bars:",
        "    plot.R:",
        "        Code: 1-5, 9",
        "",
        "        Data: all",
        "    page.html:",
        "        Code: N/A",
        "lines:",
        "  chart.py:",
        "      Annotation: 3-4"
      )
    );

    expect(charts.map(chart => chart.chartType)).toEqual(["bars", "lines"]);
    const [bars, lines] = charts;
    expect(bars.files.map(file => file.filename)).toEqual(["plot.R", "page.html"]);
    expect(bars.files[0].chartType).toBe("bars");
    expect([...bars.files[0].categories]).toEqual([
      [
        "Code",
        [
          { start: 1, end: 5 },
          { start: 9, end: 9 }
        ]
      ],
      ["Data", "all"]
    ]);
    expect(bars.files[1].categories.get("Code")).toEqual([]);
    expect(lines.files[0].categories.get("Annotation")).toEqual([{ start: 3, end: 4 }]);
  });

  it("counts a tab as four spaces", () => {
    const [chart] = parseStats("bars:\n\tplot.R:\n\t\tCode: 1-3\n\tother.R:\n        Data: 2\n");
    expect(chart.files.map(file => [file.filename, [...file.categories.keys()]])).toEqual([
      ["plot.R", ["Code"]],
      ["other.R", ["Data"]]
    ]);
  });

  it("merges a chart type declared twice", () => {
    const charts = parseStats(stats("bars:", "  a.R:", "    Code: 1", "bars:", "  b.R:", "    Code: 2"));
    expect(charts).toHaveLength(1);
    expect(charts[0].files.map(file => file.filename)).toEqual(["a.R", "b.R"]);
  });

  it("returns nothing for an empty file", () => {
    expect(parseStats("\n# only comments\n")).toEqual([]);
  });

  it.each([
    [stats("bars:", "    plot.R"), 'line 2: expected "name:" but found "plot.R"'],
    [stats("bars: 1-3"), 'line 1: chart type "bars" must not have a value'],
    [stats("    plot.R:"), 'line 1: "plot.R" is indented but no chart type comes before it'],
    [stats("bars:", "    plot.R: 1-3"), 'line 2: file "plot.R" must not have a value; indent its categories further'],
    [stats("bars:", "    plot.R:", "        Code: 1-3", "  other.R:"), 'line 4: inconsistent indentation for "other.R"'],
    [
      stats("bars:", "    plot.R:", "        Code: 1-3", "        Code: 4"),
      'line 4: category "Code" is declared twice for the same file'
    ],
    [stats("bars:", "    plot.R:", "        Code: 9-3"), 'line 3: range "9-3" ends before it starts']
  ])("rejects %j", (text, message) => {
    expect(() => parseStats(text)).toThrow(ConfigError);
    expect(() => parseStats(text)).toThrow(message);
  });

  it("records the line number on the error", () => {
    try {
      parseStats(stats("bars:", "    plot.R:", "        Code: x"));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err instanceof ConfigError && err.line).toBe(3);
    }
  });
});

describe("fileSpecsOf", () => {
  const charts = parseStats(stats("bars:", "  a.R:", "    Code: 1", "  b.R:", "    Data: all"));

  it("indexes one chart's files by name", () => {
    const specs = fileSpecsOf(charts, "bars");
    expect([...(specs?.keys() ?? [])]).toEqual(["a.R", "b.R"]);
    expect(specs?.get("b.R")?.categories.get("Data")).toBe("all");
  });

  it("returns undefined for an unknown chart type", () => {
    expect(fileSpecsOf(charts, "pies")).toBeUndefined();
  });
});
