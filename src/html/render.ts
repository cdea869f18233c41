/// # annotated line rendering
///
/// the annotated view is a code listing where every physical line carries
/// its verdict. blank and comment lines are dimmed, meaningful lines stay
/// at full strength, and each line gets a badge per category whose ranges
/// contain it. when a count looks wrong, this is where you find out which
/// line the classifier disagreed with you about.

import type { AnnotatedLine } from "./types.js";
import { escapeHtml, sanitizeId } from "./tokens.js";

export function renderCategoryBadge(category: string): string {
  return `<span class="tag tag-${sanitizeId(category)}">${escapeHtml(category)}</span>`;
}

/// line numbers and badges are separate spans from the code, so selecting
/// text in the browser copies just the source.
export function renderAnnotatedLine(line: AnnotatedLine): string {
  const badges = line.categories.map(renderCategoryBadge).join("");
  return (
    `<div class="line ${line.kind}" data-line="${line.number}">` +
    `<span class="ln">${line.number}</span>` +
    `<span class="tags">${badges}</span>` +
    `<code>${line.html}</code>` +
    `</div>`
  );
}

export function renderAnnotatedBlock(lines: readonly AnnotatedLine[]): string {
  return `<div class="annotated">\n${lines.map(renderAnnotatedLine).join("\n")}\n</div>`;
}
