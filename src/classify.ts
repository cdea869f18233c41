/// # line classification
///
/// this is the comment stripper. we scan a file line by line and decide,
/// for each physical line, whether it's **blank**, **comment** (nothing
/// left once comments are removed) or **code** (something meaningful
/// remains). every downstream number (category counts, diff totals) is
/// built on this one pass.
///
/// it's a heuristic, not a lexer. we know a handful of comment syntaxes
/// per format and a tiny bit about string literals, enough that
/// `"https://example.com"` inside an attribute isn't mistaken for a `//`
/// comment.

import { extname } from "path";

export type SourceFormat = "markup" | "data" | "script" | "plain";

export type LineKind = "blank" | "comment" | "code";

export interface ClassifiedLine {
  /// 1-based, always against the original file. filtering never renumbers.
  number: number;
  text: string;
  kind: LineKind;
  meaningful: boolean;
  /// the line with comment spans cut out and trailing whitespace trimmed.
  /// this is what the diff engine compares.
  stripped: string;
}

interface BlockDelimiter {
  open: string;
  close: string;
}

/// blocks that only count between an opening and a closing tag, like
/// `/* */` inside `<script>` or `<style>`.
interface EmbeddedSyntax {
  tags: string[];
  blocks: BlockDelimiter[];
}

interface CommentSyntax {
  line: string[];
  blocks: BlockDelimiter[];
  quotes: string[];
  embedded?: EmbeddedSyntax;
}

/// ## syntax table
///
/// markup files (html, svg, xml) know `<!-- -->` and `//`. inline
/// javascript and css add `/* */`, but only between `<script>` or
/// `<style>` and the matching closing tag: in page text a glob like
/// `src/*.js` is just text.
/// json has no comments at all, but `//` shows up in hand-written
/// config files often enough to tolerate it. python and r share `#`; the
/// triple quotes are python's docstrings and behave like a block.
///
/// block openers are checked before quotes, which matters for `"""`.
const syntaxes: Record<Exclude<SourceFormat, "plain">, CommentSyntax> = {
  markup: {
    line: ["//"],
    blocks: [{ open: "<!--", close: "-->" }],
    quotes: ['"'],
    embedded: { tags: ["script", "style"], blocks: [{ open: "/*", close: "*/" }] }
  },
  data: {
    line: ["//"],
    blocks: [],
    quotes: ['"']
  },
  script: {
    line: ["#"],
    blocks: [{ open: '"""', close: '"""' }, { open: ", close: " }],
    quotes: ['"', "'"]
  }
};

const extensionFormats: Record<string, SourceFormat> = {
  ".html": "markup",
  ".htm": "markup",
  ".xml": "markup",
  ".svg": "markup",
  ".json": "data",
  ".jsonc": "data",
  ".py": "script",
  ".r": "script"
};

/// unknown extensions fall through to `plain`, which strips nothing.
export function detectFormat(path: string): SourceFormat {
  return extensionFormats[extname(path).toLowerCase()] ?? "plain";
}

/// `split("\n")` on `"a\nb\n"` gives three elements, the last one empty.
/// that phantom line would shift `all` ranges by one, so we drop it.
export function splitLines(source: string): string[] {
  if (source === "") return [];
  const lines = source.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/// ## the scan
///
/// the only state that survives from one line to the next is the open
/// block delimiter, if any. it lives in this function's frame, so two
/// files never see each other's half-open comments.

export function classifyLines(source: string, format: SourceFormat): ClassifiedLine[] {
  const syntax = format === "plain" ? null : syntaxes[format];
  const result: ClassifiedLine[] = [];
  let state: ScanState = { block: null, tag: null };

  const lines = splitLines(source);
  for (let i = 0; i < lines.length; i++) {
    const text = lines[i];
    let stripped: string;

    if (text.trim() === "") {
      /// blank is blank, even in the middle of a block comment. and the
      /// block stays open: there's nothing on this line that could close it.
      stripped = "";
    } else if (syntax === null) {
      stripped = text.trimEnd();
    } else {
      const scanned = scanLine(text, syntax, state);
      state = scanned.state;
      stripped = scanned.kept.trimEnd();
    }

    const kind: LineKind = text.trim() === "" ? "blank" : stripped.trim() === "" ? "comment" : "code";
    result.push({ number: i + 1, text, kind, meaningful: kind === "code", stripped });
  }

  return result;
}

interface ScanState {
  /// the block comment we're inside, if any.
  block: BlockDelimiter | null;
  /// the embedded tag (`script`, `style`) whose content we're in.
  tag: string | null;
}

/// `<script` followed by `>`, whitespace or `/`, in any case. `<scripts`
/// isn't a script tag.
function tagAt(line: string, i: number, prefix: string, names: readonly string[]): string | undefined {
  return names.find(name => {
    const open = prefix + name;
    if (line.slice(i, i + open.length).toLowerCase() !== open) return false;
    const next = line.charAt(i + open.length);
    return next === "" || next === ">" || next === "/" || /\s/.test(next);
  });
}

/// walk the line left to right. at each position we're in one of three
/// places: inside a block comment (skip to its closer), inside a string
/// (copy until the matching quote), or in plain code (look for an opener,
/// a line comment, or a quote). a line like `a <!-- x --> b <!-- y` ends
/// with `a  b ` kept and the second block still open.
///
/// strings never span lines. a quote still open at the end of the line
/// was a stray character (`12" wide`), so we take it literally and scan
/// the rest of the line again from just after it.
function scanLine(line: string, syntax: CommentSyntax, initial: ScanState): { kept: string; state: ScanState } {
  let { block, tag } = initial;
  let quote: { char: string; at: number; keptLength: number; tag: string | null } | null = null;
  let kept = "";
  let i = 0;

  while (i < line.length || quote) {
    if (i >= line.length && quote) {
      kept = kept.slice(0, quote.keptLength) + quote.char;
      tag = quote.tag;
      i = quote.at + 1;
      quote = null;
      continue;
    }

    if (block) {
      const end = line.indexOf(block.close, i);
      if (end === -1) break;
      i = end + block.close.length;
      block = null;
      continue;
    }

    const ch = line[i];

    if (quote) {
      kept += ch;
      if (ch === "\\" && i + 1 < line.length) {
        kept += line[i + 1];
        i += 2;
        continue;
      }
      if (ch === quote.char) quote = null;
      i++;
      continue;
    }

    const embedded = syntax.embedded;
    if (embedded && ch === "<") {
      if (tag !== null && tagAt(line, i, "</", [tag])) {
        tag = null;
      } else if (tag === null) {
        tag = tagAt(line, i, "<", embedded.tags) ?? null;
      }
    }

    const blocks = embedded && tag !== null ? [...syntax.blocks, ...embedded.blocks] : syntax.blocks;
    const opened = blocks.find(b => line.startsWith(b.open, i));
    if (opened) {
      block = opened;
      i += opened.open.length;
      continue;
    }

    if (syntax.line.some(marker => line.startsWith(marker, i))) break;

    if (syntax.quotes.includes(ch)) {
      quote = { char: ch, at: i, keptLength: kept.length, tag };
    }
    kept += ch;
    i++;
  }

  return { kept, state: { block, tag } };
}

/// the diff engine doesn't care about line numbers, just the sequence of
/// meaningful texts.
export function stripComments(source: string, format: SourceFormat): string[] {
  return classifyLines(source, format)
    .filter(line => line.meaningful)
    .map(line => line.stripped);
}
