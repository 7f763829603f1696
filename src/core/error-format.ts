/*
Purpose: turn any thrown value into ordered, kind-tagged lines for CLI and log output.
Assumptions: UserFacingError carries the display text; everything else falls back to its message.
Usage: formatErrorLines(err, { mode: "debug" }) then render each line per kind.
*/

import { isUserFacingError } from "./errors.js";

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

export type AnsiStyle = "bold" | "dim" | "red" | "green" | "yellow" | "blue" | "cyan" | "magenta";

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

  if (isUserFacingError(error)) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: formatErrorMessage(error) });
  }

  if (options.mode !== "debug") {
    return lines;
  }

  if (isUserFacingError(error)) {
    lines.push({ kind: "code", text: error.code });
  }
  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
  }

  const cause = resolveCause(error);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

function resolveCause(error: unknown): unknown {
  if (!error || typeof error !== "object" || !("cause" in error)) {
    return undefined;
  }
  return error.cause ?? undefined;
}

// =============================================================================
// COLOR
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  bold: [1, 22],
  dim: [2, 22],
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  blue: [34, 39],
  magenta: [35, 39],
  cyan: [36, 39],
};

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (options.useColor === false) return false;
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== "") return false;
  return options.stream?.isTTY === true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
}
