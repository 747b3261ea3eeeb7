/*
Purpose: shared error formatting helpers for logs and CLI output.
Assumptions: callers only need string representations; color is opt-in.
Usage: formatErrorMessage(err), formatErrorLines(err, { mode: "debug" }).
*/

import { UserFacingError } from "./errors.js";

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

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
    if (mode === "debug") {
      lines.push({ kind: "code", text: error.code });
    }
  } else {
    lines.push({ kind: "title", text: resolveTitle(error) });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (mode !== "debug") {
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
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!options.stream?.isTTY) return false;
  if (options.useColor !== undefined) return options.useColor;
  return process.env.NO_COLOR === undefined;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (text, styles) => {
    if (!enabled || styles.length === 0) return text;

    return styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveTitle(error: unknown): string {
  if (error instanceof Error && error.name !== "Error") {
    return error.name;
  }
  return "Unexpected error";
}

function resolveCause(error: Error): unknown {
  if (!("cause" in error)) return undefined;
  return error.cause;
}
