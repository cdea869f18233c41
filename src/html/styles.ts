/// # CSS
///
/// the styles are a template literal inlined into every page (unless you
/// pass `cssFile`), so a report or annotated view is a single
/// self-contained file you can mail around.
///
/// colours follow github-light, which is also the shiki theme the code
/// is highlighted with.

export const defaultCss = `
body {
  font-family: system-ui, sans-serif;
  margin: 0;
  padding: 2rem 1rem;
  line-height: 1.6;
  color: #24292e;
}

.watermark {
  position: absolute;
  top: 0;
  left: 0;
  right: 0;
  display: flex;
  justify-content: flex-end;
  padding: 0.5rem 1rem;
  font-size: 12px;
  color: #ccc;
  font-style: italic;
  pointer-events: none;
}

.page {
  font-size: 15px;
  max-width: 100ch;
  margin: 0 auto;
}

h1 {
  font-size: 1.6rem;
  border-bottom: 1px solid #eee;
  padding-bottom: 0.3rem;
}

.prose h2 {
  font-size: 1.3rem;
  margin: 1.5rem 0 0.75rem;
}

.prose table {
  border-collapse: collapse;
  margin: 1rem 0;
  width: 100%;
}

.prose th, .prose td {
  border: 1px solid #dfe2e5;
  padding: 0.4rem 0.75rem;
  text-align: right;
}

.prose th:first-child, .prose td:first-child {
  text-align: left;
}

.prose th {
  background: #f6f8fa;
  font-weight: 600;
}

.prose tr:nth-child(even) {
  background: #f6f8fa;
}

.prose blockquote {
  margin: 1rem 0;
  padding: 0.5rem 1rem;
  border-left: 4px solid #dfe2e5;
  color: #6a737d;
  background: #f6f8fa;
}

.summary {
  margin: 1rem 0;
  color: #586069;
}

.summary .tag {
  margin-right: 0.25rem;
}

.annotated {
  font-family: 'SF Mono', 'Fira Code', 'Consolas', monospace;
  font-size: 13px;
  line-height: 1.5;
  background: #f6f8fa;
  padding: 1rem 0;
  border-radius: 6px;
  overflow-x: auto;
}

.line {
  display: flex;
  white-space: pre;
  padding: 0 1rem;
}

.line .ln {
  width: 4ch;
  text-align: right;
  color: #959da5;
  margin-right: 1rem;
  user-select: none;
  flex-shrink: 0;
}

.line .tags {
  width: 16ch;
  flex-shrink: 0;
  user-select: none;
}

.line.comment code,
.line.blank code {
  opacity: 0.45;
}

.line.code {
  border-left: 3px solid #2ea44f;
}

.line.comment {
  border-left: 3px solid #d1d5da;
}

.line.blank {
  border-left: 3px solid transparent;
}

.tag {
  display: inline-block;
  font-family: system-ui, sans-serif;
  font-size: 10px;
  padding: 0 0.35rem;
  margin-right: 0.2rem;
  border-radius: 3px;
  background: #e1e4e8;
  color: #24292e;
}

.tag-Code { background: #dbedff; color: #032f62; }
.tag-Data { background: #dcffe4; color: #165c26; }
.tag-Annotation { background: #fff5b1; color: #735c0f; }
`;
