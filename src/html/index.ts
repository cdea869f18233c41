/// # html generation: main entry point
///
/// this ties the html pieces together:
///
/// - **markdown rendering** (`prose.ts`) for the report tables
/// - **syntax highlighting** (`tokens.ts`) for the annotated listing
/// - **line rendering** (`render.ts`) for the per-line rows and badges
/// - **styles** (`styles.ts`)
///
/// two entry points:
///
/// - `generateReportHtml`: the report tables as one page.
/// - `generateAnnotatedHtml`: one file, every line marked with its kind
///   and categories.

import { basename } from "path";
import { classifyLines, detectFormat } from "../classify.js";
import { tallyFile } from "../count.js";
import { renderReportMarkdown } from "../format.js";
import { resolveRange, type RangeSpec } from "../ranges.js";
import type { ChartReport } from "../report.js";
import { renderProse } from "./prose.js";
import { renderAnnotatedBlock, renderCategoryBadge } from "./render.js";
import { defaultCss } from "./styles.js";
import { escapeHtml, highlightLines, initHighlighter } from "./tokens.js";
import type { AnnotatedLine, HtmlOptions } from "./types.js";

export type { AnnotatedLine, HtmlOptions } from "./types.js";

/// ## generateReportHtml
///
/// the markdown report, through marked, inside a page. nothing here knows
/// what a table looks like.

export async function generateReportHtml(reports: readonly ChartReport[], options: HtmlOptions = {}): Promise<string> {
  const title = options.title ?? "linetally report";
  const body = `<h1>${escapeHtml(title)}</h1>\n` + (await renderProse(renderReportMarkdown(reports)));
  return wrapHtml(body, title, options);
}

/// ## generateAnnotatedHtml
///
/// classify the file, resolve each category's ranges, highlight the
/// source, and zip the three together line by line. a summary above the
/// listing shows the same counts the report would.

export async function generateAnnotatedHtml(
  filename: string,
  source: string,
  categories: ReadonlyMap<string, RangeSpec> = new Map(),
  options: HtmlOptions = {}
): Promise<string> {
  await initHighlighter();

  const lines = classifyLines(source, detectFormat(filename));
  const membership = [...categories].map(([name, spec]) => [name, resolveRange(spec, lines.length)] as const);
  const highlighted = highlightLines(lines.map(line => line.text), filename);

  const annotated: AnnotatedLine[] = lines.map((line, i) => ({
    number: line.number,
    kind: line.kind,
    categories: membership.filter(([, member]) => member.has(line.number)).map(([name]) => name),
    html: highlighted[i]
  }));

  const { counts, total } = tallyFile(lines, categories);
  let summary = `<div class="summary">${total} meaningful of ${lines.length} lines`;
  for (const [name, count] of counts) {
    summary += ` · ${renderCategoryBadge(name)}${count}`;
  }
  summary += `</div>`;

  const title = options.title ?? basename(filename);
  const body = `<h1>${escapeHtml(title)}</h1>\n${summary}\n${renderAnnotatedBlock(annotated)}`;
  return wrapHtml(body, title, options);
}

/// styles are either inlined (the default, so each page stands alone) or
/// linked from an external file.
function wrapHtml(body: string, title: string, options: HtmlOptions): string {
  const css = options.cssFile
    ? `<link rel="stylesheet" href="${escapeHtml(options.cssFile)}">`
    : `<style>${defaultCss}</style>`;

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(title)}</title>
  ${css}
</head>
<body>
<header class="watermark">linetally</header>
<div class="page">
${body}
</div>
</body>
</html>`;
}
