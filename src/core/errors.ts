export class BatchwrightError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "BatchwrightError";
  }
}

export class ConfigError extends BatchwrightError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class LedgerError extends BatchwrightError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LedgerError";
  }
}

// =============================================================================
// GRAPH VALIDATION
// =============================================================================

export type ValidationErrorKind = "circular" | "unknown_dependency" | "order_violation" | "duplicate";

export abstract class ValidationError extends BatchwrightError {
  abstract readonly kind: ValidationErrorKind;
  /** Jobs implicated by the violation; they are excluded from the execution plan. */
  abstract get jobs(): readonly string[];
}

export class CircularDependencyError extends ValidationError {
  readonly kind = "circular";

  constructor(public readonly cycle: readonly string[]) {
    super(`Circular dependency: ${cycle.join(" -> ")}`);
    this.name = "CircularDependencyError";
  }

  get jobs(): readonly string[] {
    return Array.from(new Set(this.cycle));
  }
}

export class UnknownDependencyError extends ValidationError {
  readonly kind = "unknown_dependency";

  constructor(
    public readonly job: string,
    public readonly dependency: string,
  ) {
    super(`Dependency '${dependency}' required by '${job}' does not exist`);
    this.name = "UnknownDependencyError";
  }

  get jobs(): readonly string[] {
    return [this.job];
  }
}

export class OrderViolationError extends ValidationError {
  readonly kind = "order_violation";

  constructor(
    public readonly job: string,
    public readonly dependency: string,
  ) {
    super(`Job '${job}' depends on '${dependency}' but is declared before it`);
    this.name = "OrderViolationError";
  }

  get jobs(): readonly string[] {
    return [this.job];
  }
}

export class DuplicateJobError extends ValidationError {
  readonly kind = "duplicate";

  constructor(public readonly job: string) {
    super(`Job '${job}' is declared more than once`);
    this.name = "DuplicateJobError";
  }

  get jobs(): readonly string[] {
    return [this.job];
  }
}

export class GraphValidationError extends BatchwrightError {
  constructor(public readonly errors: readonly ValidationError[]) {
    super(
      `Job graph validation failed with ${errors.length} error(s):\n` +
        errors.map((error) => `  - ${error.message}`).join("\n"),
    );
    this.name = "GraphValidationError";
  }
}

// =============================================================================
// EXECUTION
// =============================================================================

export class UnknownAdapterError extends BatchwrightError {
  constructor(
    public readonly kind: string,
    public readonly type: string,
    public readonly location: string,
  ) {
    super(`Unknown ${kind} type "${type}" at ${location}`);
    this.name = "UnknownAdapterError";
  }
}

/** A destination was unavailable or rejected a write in a way worth logging as a warning. */
export class RecoverableWriteError extends BatchwrightError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RecoverableWriteError";
  }
}

export class MissingDependencyDataError extends BatchwrightError {
  constructor(
    public readonly job: string,
    public readonly dependency: string,
  ) {
    super(`Job '${job}' requires ledger data from '${dependency}' but none was found`);
    this.name = "MissingDependencyDataError";
  }
}

/** Aborts the whole run instead of failing a single job. */
export class FatalPipelineError extends BatchwrightError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "FatalPipelineError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  validation: "VALIDATION_ERROR",
  job: "JOB_ERROR",
  ledger: "LEDGER_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends BatchwrightError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
