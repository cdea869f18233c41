/// # syntax highlighting
///
/// the annotated view colours every line with
/// [shiki](https://shiki.matsu.io/), using the same github-light theme as
/// the rest of the page. shiki gives us tokens per line, which is exactly
/// the granularity we need: each physical line becomes its own row.

import { extname } from "path";
import type { BundledLanguage, BundledTheme, HighlighterGeneric } from "shiki";

/// if you forget to escape `<` in html, you get invisible content and
/// broken rendering. an html file being annotated is *all* `<`.
export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/// category names end up in class names, which can't contain spaces or
/// most punctuation.
export function sanitizeId(s: string): string {
  return s.replace(/[^a-zA-Z0-9]/g, "-");
}

const languages: Record<string, BundledLanguage> = {
  ".html": "html",
  ".htm": "html",
  ".xml": "xml",
  ".svg": "xml",
  ".json": "json",
  ".jsonc": "jsonc",
  ".py": "python",
  ".r": "r"
};

export function languageFor(filename: string): BundledLanguage | undefined {
  return languages[extname(filename).toLowerCase()];
}

let highlighter: HighlighterGeneric<BundledLanguage, BundledTheme> | null = null;

/// loading grammars is the expensive part, so it happens once and only
/// for the handful of languages linetally understands.
export async function initHighlighter(): Promise<void> {
  if (highlighter) return;
  const { createHighlighter } = await import("shiki");
  highlighter = await createHighlighter({
    themes: ["github-light"],
    langs: [...new Set(Object.values(languages))]
  });
}

/// one html string per input line. files shiki has no grammar for, or a
/// highlighter that was never initialised, get plain escaped text. we drop
/// the theme's default foreground (#24292e) so the page's own colour shows.
export function highlightLines(lines: readonly string[], filename: string): string[] {
  const lang = languageFor(filename);
  if (!highlighter || !lang) {
    return lines.map(escapeHtml);
  }

  const { tokens } = highlighter.codeToTokens(lines.join("\n"), {
    lang,
    theme: "github-light"
  });

  return lines.map((text, i) => {
    const lineTokens = tokens[i];
    if (!lineTokens) return escapeHtml(text);
    let html = "";
    for (const token of lineTokens) {
      if (token.color && token.color.toLowerCase() !== "#24292e") {
        html += `<span style="color:${token.color}">${escapeHtml(token.content)}</span>`;
      } else {
        html += escapeHtml(token.content);
      }
    }
    return html;
  });
}
