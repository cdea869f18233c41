/// # markdown rendering
///
/// the html report isn't built tag by tag. it's the markdown report
/// (`renderReportMarkdown`) fed through [marked](https://github.com/markedjs/marked),
/// so the two formats can never disagree about what's in a table.

import { Marked } from "marked";

let marked: Marked | null = null;

export function initMarked(): Marked {
  if (!marked) {
    /// gfm is on by default in marked, and gfm is what gives us tables.
    marked = new Marked({ gfm: true });
  }
  return marked;
}

/// the `prose` wrapper scopes the table styles so they don't leak into
/// anything else on the page.
export async function renderProse(content: string): Promise<string> {
  const html = await initMarked().parse(content);
  return `<div class="prose">${html}</div>`;
}
