import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  level: LogLevel;
  run_id: string;
  job?: string;
  payload?: JsonObject;
};

export type LogEventInput = JsonObject & {
  type: string;
  level?: LogLevel;
  runId?: string;
  job?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  runId?: string;
  job?: string;
};

/** The logging port every pipeline component writes through. */
export interface EventLogger {
  log(event: LogEventInput): void;
}

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

/**
 * Pins a job name onto every event written through the wrapped logger.
 */
export class ScopedLogger implements EventLogger {
  constructor(
    private readonly inner: EventLogger,
    private readonly scope: { job: string },
  ) {}

  log(event: LogEventInput): void {
    this.inner.log({ ...event, job: event.job ?? this.scope.job });
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId: providedRunId, job, level, payload, ts, type, ...rest } = event;

  const runId = providedRunId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const resolvedJob = job ?? defaults.job;

  const result: LogEvent = {
    ...rest,
    ts: normalizedTs,
    type,
    level: level ?? "info",
    run_id: runId,
  };

  if (resolvedJob) {
    result.job = resolvedJob;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logPipelineEvent(
  logger: EventLogger,
  type: string,
  fields: JsonObject & { job?: string; level?: LogLevel; ts?: string } = {},
): void {
  const { job, level, ts, ...rest } = fields;
  const event: LogEventInput = { type, ...rest };

  if (job !== undefined) {
    event.job = job;
  }
  if (level !== undefined) {
    event.level = level;
  }
  if (ts !== undefined) {
    event.ts = ts;
  }

  logger.log(event);
}

export function logPipelineError(
  logger: EventLogger,
  type: string,
  error: unknown,
  fields: JsonObject & { job?: string; level?: LogLevel } = {},
): void {
  const errorName = error instanceof Error ? error.name : "Error";
  logPipelineEvent(logger, type, {
    level: "error",
    ...fields,
    error: formatErrorMessage(error),
    error_name: errorName,
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = resolveDebugStack(error);
  if (!stack) {
    return message;
  }

  return `${message}\n${stack}`;
}

function resolveDebugStack(error: unknown): string | undefined {
  const lines = formatErrorLines(error, { mode: "debug" });
  const stackLine = lines.find((line) => line.kind === "stack");
  return stackLine?.text;
}

function resolveLoggerDebugEnabled(): boolean {
  const argvFlag = resolveDebugFlagFromArgv(process.argv);
  return argvFlag ?? false;
}

export function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }

    if (arg === "--no-debug") {
      debugFlag = false;
    }
  }

  return debugFlag;
}
