/*
Purpose: turn any thrown value into ordered, labelled lines for CLI and log output.
Assumptions: callers decide how lines are rendered (colour, prefixes).
Usage: formatErrorLines(err, { mode: "debug" }).
*/

import { toUserFacingError } from "./errors.js";

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

export type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";

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
  const userError = toUserFacingError(error);
  const lines: ErrorFormatLine[] = [
    { kind: "title", text: userError.title },
    { kind: "message", text: userError.message },
  ];

  if (userError.hint) lines.push({ kind: "hint", text: userError.hint });
  if (userError.next) lines.push({ kind: "next", text: userError.next });

  if (options.mode === "short") {
    return lines;
  }

  const source = error instanceof Error ? error : userError;
  lines.push({ kind: "code", text: userError.code });
  lines.push({ kind: "name", text: source.name });

  const cause = resolveCause(source);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }
  if (source.stack) {
    lines.push({ kind: "stack", text: source.stack });
  }

  return lines;
}

function resolveCause(error: Error): unknown {
  return "cause" in error ? error.cause : undefined;
}

// =============================================================================
// COLOUR
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

export function resolveColorEnabled(input: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (input.useColor === false) return false;
  if (!input.stream.isTTY) return false;
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== "") return false;
  return true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}
