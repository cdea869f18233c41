import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { generateAnnotatedHtml, generateReportHtml } from "../src/html.js";
import { parseRangeSpec, type RangeSpec } from "../src/ranges.js";
import type { ChartReport } from "../src/report.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const report: ChartReport = {
  chartType: "bars",
  categories: ["Code", "Data"],
  combinations: [],
  columns: [],
  rows: [
    {
      filename: "plot.R",
      counts: new Map([
        ["Code", 7],
        ["Data", 3]
      ]),
      combinations: new Map<string, number | null>(),
      computed: new Map(),
      total: 10
    }
  ],
  missing: ["gone.R"]
};

describe("report html", () => {
  it("renders the markdown tables inside a page", async () => {
    const html = await generateReportHtml([report]);
    expect(html).toContain("<title>linetally report</title>");
    expect(html).toContain("<h2>bars</h2>");
    expect(html).toContain("<th>File</th>");
    expect(html).toContain("<td>plot.R</td>");
    expect(html).toContain("<td>7</td>");
    expect(html).toContain("missing: gone.R");
  });

  it("links an external stylesheet instead of inlining one", async () => {
    const html = await generateReportHtml([report], { cssFile: "site.css", title: "Charts" });
    expect(html).toContain('<link rel="stylesheet" href="site.css">');
    expect(html).not.toContain("<style>");
    expect(html).toContain("<h1>Charts</h1>");
  });
});

describe("annotated html", () => {
  it("marks each line with its kind and categories", async () => {
    const categories = new Map<string, RangeSpec>([["Code", parseRangeSpec("1")]]);
    const html = await generateAnnotatedHtml("notes.txt", "hello <b>\n\n# hi\n", categories);

    expect(html).toContain(
      '<div class="line code" data-line="1"><span class="ln">1</span>' +
        '<span class="tags"><span class="tag tag-Code">Code</span></span>' +
        "<code>hello &lt;b&gt;</code></div>"
    );
    expect(html).toContain(
      '<div class="line blank" data-line="2"><span class="ln">2</span><span class="tags"></span><code></code></div>'
    );
    expect(html).toContain(
      '<div class="summary">2 meaningful of 3 lines · <span class="tag tag-Code">Code</span>1</div>'
    );
    expect(html).toContain("<h1>notes.txt</h1>");
  });

  it("highlights a known language and dims its comments", async () => {
    const source = readFileSync(join(__dirname, "fixtures/simple-barchart/ggplot2.R"), "utf-8");
    const categories = new Map<string, RangeSpec>([
      ["Code", parseRangeSpec("1-2,9-13")],
      ["Data", parseRangeSpec("4-7")]
    ]);
    const html = await generateAnnotatedHtml("simple-barchart/ggplot2.R", source, categories);

    expect(html).toContain('<div class="line comment" data-line="1">');
    expect(html).toContain('<div class="line blank" data-line="3">');
    expect(html).toContain('<div class="line code" data-line="4"><span class="ln">4</span><span class="tags"><span class="tag tag-Data">Data</span></span>');
    expect(html).toContain('<span style="color:');
    expect(html).toContain("9 meaningful of 13 lines");
  });
});
