/*
Purpose: turn thrown values into ordered, typed lines that CLI output and logs can render.
Assumptions: UserFacingError carries its own title/hint; other errors get a title from their class.
Usage: formatErrorLines(err, { mode: "debug" }), createAnsiFormatter(useColor).
*/

import {
  ConfigError,
  EngineError,
  ExportError,
  JarscopeError,
  TaskError,
  UserFacingError,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "italic" | "red" | "green" | "yellow" | "blue" | "magenta" | "cyan";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
    if (options.mode === "debug") {
      lines.push({ kind: "code", text: error.code });
    }
  } else {
    lines.push({ kind: "title", text: resolveTitle(error) });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (options.mode !== "debug") {
    return lines;
  }

  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });

    const cause = resolveCause(error);
    if (cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(cause) });
    }

    if (error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

// =============================================================================
// ANSI
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  bold: [1, 22],
  dim: [2, 22],
  italic: [3, 23],
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  blue: [34, 39],
  magenta: [35, 39],
  cyan: [36, 39],
};

export function createAnsiFormatter(useColor: boolean): AnsiFormatter {
  if (!useColor) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
  env?: NodeJS.ProcessEnv;
}): boolean {
  const env = options.env ?? process.env;
  if (!options.stream?.isTTY) return false;
  if (options.useColor === false) return false;
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") return false;
  return true;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveTitle(error: unknown): string {
  if (error instanceof ConfigError) return "Config error";
  if (error instanceof EngineError) return "Decompiler failed";
  if (error instanceof ExportError) return "Export failed";
  if (error instanceof TaskError) return "Task failed";
  if (error instanceof JarscopeError) return "Viewer error";
  return "Unexpected error";
}

function resolveCause(error: Error): unknown {
  if (!("cause" in error)) return undefined;
  const cause: unknown = error.cause;
  if (cause === undefined || cause === null) return undefined;
  return cause;
}
