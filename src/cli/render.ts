/*
 * Terminal rendering for the namespace tree and highlighted source.
 * Colors follow the classic IDE palette: keywords bold purple, strings blue, comments italic green.
 */

import type { AnsiFormatter, AnsiStyle } from "../core/error-format.js";
import type { SpanKind, Span } from "../core/highlighter.js";
import { flattenTree, type PackageNode } from "../core/namespace-tree.js";

const SPAN_STYLES: Record<SpanKind, AnsiStyle[]> = {
  default: [],
  keyword: ["bold", "magenta"],
  string: ["blue"],
  "line-comment": ["italic", "green"],
  "block-comment": ["italic", "green"],
};

export function renderTree(root: PackageNode, format: AnsiFormatter): string[] {
  return flattenTree(root).map(({ depth, node }) => {
    const pad = "  ".repeat(depth);
    if (node.kind === "package") {
      return `${pad}${format(`${node.segment}/`, ["bold"])}`;
    }
    return `${pad}${node.displayName}`;
  });
}

export function renderSpans(spans: Span[], format: AnsiFormatter): string {
  return spans
    .map((span) => {
      const styles = SPAN_STYLES[span.kind];
      if (styles.length === 0) return span.text;
      // Style line by line so a reset never has to cross a newline.
      return span.text
        .split("\n")
        .map((part) => (part ? format(part, styles) : part))
        .join("\n");
    })
    .join("");
}
