import { describe, it, expect } from "vitest";
import { existsSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { ConfigError } from "../src/errors.js";
import { buildReport, sourcePath, type SourceReader } from "../src/report.js";
import { parseStats } from "../src/stats.js";

const fixtures = join(dirname(fileURLToPath(import.meta.url)), "fixtures");

const charts = parseStats(
  [
    "bars:",
    "    plot.R:",
    "        Code: 1-2",
    "        Data: 3-4",
    "    page.html:",
    "        Code: 1",
    "        Data: 3",
    "    notes.txt:",
    "        Code: all",
    "    missing.R:",
    "        Code: all"
  ].join("\n")
);

const sources = new Map([
  ["bars/plot.R", "library(x)\nplot(df)\n# data\ndf <- 1\n"],
  ["bars/page.html", "<html>\n<!-- c -->\n<body>\n"],
  ["bars/notes.txt", "hello\n\nworld\n"]
]);
const read: SourceReader = path => sources.get(path);

describe("buildReport", () => {
  it("tallies every declared file of a chart", () => {
    const [report] = buildReport(charts, read);
    expect(report.chartType).toBe("bars");
    expect(report.categories).toEqual(["Code", "Data"]);
    expect(report.rows.map(row => [row.filename, Object.fromEntries(row.counts), row.total])).toEqual([
      ["plot.R", { Code: 2, Data: 1 }, 3],
      ["page.html", { Code: 1, Data: 1 }, 2],
      ["notes.txt", { Code: 2 }, 2]
    ]);
  });

  it("lists files that could not be read", () => {
    const [report] = buildReport(charts, read);
    expect(report.missing).toEqual(["missing.R"]);
  });

  it("adds combinations and computed columns", () => {
    const [report] = buildReport(charts, read, {
      combinations: ["Code+Data"],
      columns: [
        { title: "Share", expression: "1/(1+2)" },
        { title: "", expression: "3-1" }
      ]
    });
    expect(report.combinations).toEqual(["Code+Data"]);
    expect(report.columns).toEqual(["Share", "Calc(3-1)"]);

    const [plot, page, notes] = report.rows;
    expect(plot.combinations.get("Code+Data")).toBe(3);
    expect(plot.computed.get("Share")).toBeCloseTo(2 / 3);
    expect(plot.computed.get("Calc(3-1)")).toBe(1);
    expect(page.computed.get("Share")).toBe(0.5);
    expect(notes.combinations.get("Code+Data")).toBeNull();
    expect(notes.computed.get("Share")).toBeNull();
  });

  it("refuses a combination of undeclared categories", () => {
    expect(() => buildReport(charts, read, { combinations: ["Code+Legend"] })).toThrow(
      'combination "Code+Legend" uses "Legend", which no file in "bars" declares'
    );
  });

  it("refuses a column past the last data column, naming the chart", () => {
    expect(() => buildReport(charts, read, { columns: [{ title: "", expression: "3" }] })).toThrow(
      'column "Calc(3)" refers to column 3, but there are only 2 data columns (chart "bars")'
    );
    expect(() => buildReport(charts, read, { columns: [{ title: "", expression: "3" }] })).toThrow(ConfigError);
  });

  it("hands every classified file to onClassified", () => {
    const seen: string[] = [];
    buildReport(charts, read, { onClassified: (path, lines) => seen.push(`${path}:${lines.length}`) });
    expect(seen).toEqual(["bars/plot.R:4", "bars/page.html:3", "bars/notes.txt:3"]);
  });

  it("counts the checked-in fixtures", () => {
    const fromDisk: SourceReader = path => {
      const full = join(fixtures, path);
      return existsSync(full) ? readFileSync(full, "utf-8") : undefined;
    };
    const fixtureCharts = parseStats(readFileSync(join(fixtures, "stats.txt"), "utf-8"));
    const [report] = buildReport(fixtureCharts, fromDisk);

    expect(report.chartType).toBe("simple-barchart");
    expect(report.categories).toEqual(["Code", "Data", "Annotation"]);
    expect(report.rows).toHaveLength(1);
    expect(Object.fromEntries(report.rows[0].counts)).toEqual({ Code: 5, Data: 4, Annotation: 1 });
    expect(report.rows[0].total).toBe(9);
    expect(report.missing).toEqual(["missing.R"]);
  });
});

describe("sourcePath", () => {
  it("joins chart type and filename with a forward slash", () => {
    expect(sourcePath({ chartType: "bars", filename: "plot.R", categories: new Map() })).toBe("bars/plot.R");
  });
});
