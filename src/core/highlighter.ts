/**
 * Streaming lexical highlighter for decompiled source.
 *
 * Pass one walks the text once with a four-state lexer (normal, string, line comment,
 * block comment) and emits a span each time the state changes. Pass two scans the whole
 * text for identifier-like runs and promotes keyword runs to `keyword`, but only where the
 * run lies entirely inside a `default` span.
 *
 * This is not a parser: escapes inside string literals are not recognised, so `"a\"b"`
 * closes at the escaped quote.
 */

import { loadKeywordSet } from "./keywords.js";

// =============================================================================
// TYPES
// =============================================================================

export type SpanKind = "default" | "string" | "line-comment" | "block-comment" | "keyword";

export type Span = {
  kind: SpanKind;
  /** UTF-16 offset, inclusive. */
  start: number;
  /** UTF-16 offset, exclusive. */
  end: number;
  text: string;
};

export type HighlightOptions = {
  keywords?: ReadonlySet<string>;
};

type LexState =
  | { mode: "normal" }
  | { mode: "string"; delimiter: string }
  | { mode: "line-comment" }
  | { mode: "block-comment" };

const NORMAL: LexState = { mode: "normal" };
const LINE_COMMENT: LexState = { mode: "line-comment" };
const BLOCK_COMMENT: LexState = { mode: "block-comment" };

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

// =============================================================================
// PUBLIC API
// =============================================================================

export function highlight(text: string, options: HighlightOptions = {}): Span[] {
  const keywords = options.keywords ?? loadKeywordSet();
  return promoteKeywords(text, scanLexicalSpans(text), keywords);
}

export function scanLexicalSpans(text: string): Span[] {
  const spans: Span[] = [];
  let state: LexState = NORMAL;
  let start = 0;

  const flush = (end: number, kind: SpanKind): void => {
    if (end > start) {
      spans.push(makeSpan(text, kind, start, end));
    }
    start = end;
  };

  let i = 0;
  while (i < text.length) {
    const c = text.charAt(i);
    const next = text.charAt(i + 1);

    switch (state.mode) {
      case "normal":
        if (c === "/" && next === "*") {
          flush(i, "default");
          state = BLOCK_COMMENT;
          i += 2;
        } else if (c === "/" && next === "/") {
          flush(i, "default");
          state = LINE_COMMENT;
          i += 2;
        } else if (c === '"' || c === "'") {
          flush(i, "default");
          state = { mode: "string", delimiter: c };
          i += 1;
        } else {
          i += 1;
        }
        break;

      case "string":
        if (c === state.delimiter) {
          flush(i + 1, "string");
          state = NORMAL;
        }
        i += 1;
        break;

      case "line-comment":
        if (c === "\n") {
          flush(i + 1, "line-comment");
          state = NORMAL;
        }
        i += 1;
        break;

      case "block-comment":
        if (c === "*" && next === "/") {
          flush(i + 2, "block-comment");
          state = NORMAL;
          i += 2;
        } else {
          i += 1;
        }
        break;
    }
  }

  // Unterminated strings and comments run to end of text.
  flush(text.length, kindForState(state));
  return spans;
}

// =============================================================================
// KEYWORDS
// =============================================================================

function promoteKeywords(text: string, spans: Span[], keywords: ReadonlySet<string>): Span[] {
  const ranges: Array<[number, number]> = [];
  for (const match of text.matchAll(WORD_PATTERN)) {
    const word = match[0];
    if (!keywords.has(word)) continue;
    const start = match.index ?? 0;
    ranges.push([start, start + word.length]);
  }

  if (ranges.length === 0) return spans;

  const result: Span[] = [];
  let r = 0;

  for (const span of spans) {
    if (span.kind !== "default") {
      result.push(span);
      continue;
    }

    let cursor = span.start;
    while (r < ranges.length && ranges[r][0] < span.end) {
      const [start, end] = ranges[r];
      r += 1;
      // Runs that begin in an earlier string/comment, or spill past this span, stay as they are.
      if (start < span.start || end > span.end) continue;

      if (start > cursor) result.push(makeSpan(text, "default", cursor, start));
      result.push(makeSpan(text, "keyword", start, end));
      cursor = end;
    }

    if (cursor < span.end) result.push(makeSpan(text, "default", cursor, span.end));
  }

  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

function kindForState(state: LexState): SpanKind {
  switch (state.mode) {
    case "normal":
      return "default";
    case "string":
      return "string";
    case "line-comment":
      return "line-comment";
    case "block-comment":
      return "block-comment";
  }
}

function makeSpan(text: string, kind: SpanKind, start: number, end: number): Span {
  return { kind, start, end, text: text.slice(start, end) };
}
