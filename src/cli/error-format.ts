/*
Purpose: turn pipeline failures into user-facing errors and render them for the terminal.
Assumptions: stderr is the default stream; non-TTY output disables color.
Usage: console.error(renderCliError(toUserFacingError(err), { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";
import {
  ConfigError,
  FatalPipelineError,
  GraphValidationError,
  LedgerError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

// =============================================================================
// NORMALIZATION
// =============================================================================

/** Maps known pipeline errors to a titled error with a hint; anything else passes through. */
export function toUserFacingError(error: unknown): unknown {
  if (error instanceof UserFacingError) return error;

  if (error instanceof GraphValidationError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.validation,
      title: "Job graph invalid.",
      message: error.errors.map((item) => `- ${item.message}`).join("\n"),
      hint: "Declare every dependency as a job, before the jobs that depend on it.",
      next: "Run `batchwright validate` to check the graph without running anything.",
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Migration config invalid.",
      message: error.message,
      hint: "Fix the config file and rerun `batchwright validate`.",
      cause: error,
    });
  }

  if (error instanceof LedgerError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.ledger,
      title: "Ledger unreadable.",
      message: error.message,
      hint: "Remove or repair the ledger file, then rerun the job that writes it.",
      cause: error,
    });
  }

  if (error instanceof FatalPipelineError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.job,
      title: "Run aborted.",
      message: error.message,
      hint: "Check the run log for the job that stopped the run.",
      cause: error,
    });
  }

  return error;
}

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const lines = formatErrorLines(toUserFacingError(error), { mode });

  const stream = options.stream ?? process.stderr;
  const useColor = resolveColorEnabled({ stream, useColor: options.useColor });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

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
    case "code":
    case "name":
    case "cause":
      return `${format(`${capitalize(line.kind)}:`, ["dim"])} ${format(line.text, ["dim"])}`;
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function indent(value: string, spaces: number): string {
  const prefix = " ".repeat(spaces);
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
