/*
Purpose: render user-facing errors for CLI output with optional color.
Assumptions: stderr is the default stream; non-TTY output disables color.
Usage: console.error(renderCliError(err, { debug: isDebugEnabled }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });

  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

const LINE_LABELS: Partial<Record<ErrorFormatLine["kind"], string>> = {
  code: "Code:",
  name: "Name:",
  cause: "Cause:",
};

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indent(line.text, 2), ["dim"])}`;
    default: {
      const label = LINE_LABELS[line.kind] ?? "";
      return `${format(label, ["dim"])} ${format(line.text, ["dim"])}`;
    }
  }
}

function indent(value: string, spaces: number): string {
  const prefix = " ".repeat(Math.max(0, spaces));
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
