import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { AdapterEnvironment } from "../adapters.js";
import {
  JobConfigSchema,
  MigrationConfigSchema,
  type JobConfig,
  type MigrationConfig,
} from "../config.js";
import { Ledger, type LedgerValue } from "../ledger.js";
import { LedgerRegistry } from "../ledger-registry.js";
import { LedgerStore } from "../ledger-store.js";
import type { LoadContext, Loader } from "../loader.js";
import type { EventLogger, LogEventInput } from "../logger.js";
import type { PhaseContext } from "../phases.js";
import { silentProgress } from "../progress.js";
import type { Batch, MutatedRows, Row, RowRecord } from "../row.js";

// =============================================================================
// TEMP DIRECTORIES
// =============================================================================

const temporaryDirectories: string[] = [];

export function makeTemporaryDirectory(prefix = "batchwright-test-"): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  temporaryDirectories.push(dir);
  return dir;
}

export function cleanupTemporaryDirectories(): void {
  for (const dir of temporaryDirectories) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  temporaryDirectories.length = 0;
}

// =============================================================================
// LOGGER
// =============================================================================

export class MemoryLogger implements EventLogger {
  readonly events: LogEventInput[] = [];

  log(event: LogEventInput): void {
    this.events.push(event);
  }

  ofType(type: string): LogEventInput[] {
    return this.events.filter((event) => event.type === type);
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}

// =============================================================================
// CONFIG
// =============================================================================

export function buildJob(input: Record<string, unknown> & { name: string }): JobConfig {
  return JobConfigSchema.parse(input);
}

export function buildConfig(
  root: string,
  jobs: Array<Record<string, unknown>>,
  overrides: Record<string, unknown> = {},
): MigrationConfig {
  return MigrationConfigSchema.parse({
    ledger: { path: path.join(root, "ledgers") },
    sources: { path: path.join(root, "sources") },
    logs: { path: path.join(root, "logs") },
    output: { path: path.join(root, "output") },
    migration: jobs,
    ...overrides,
  });
}

export function buildContext(
  config: MigrationConfig,
  job: JobConfig,
  overrides: Partial<LoadContext> = {},
): LoadContext {
  const logger = overrides.logger ?? new MemoryLogger();
  const store = new LedgerStore({ root: config.ledger.path, format: config.ledger.format });
  const context: PhaseContext = {
    job,
    config,
    runId: "run-test",
    logger,
    registry: new LedgerRegistry({ jobs: config.migration, store, logger }),
    progress: silentProgress,
    dryRun: false,
  };
  return { ...context, batchIndex: 0, ...overrides };
}

export function buildEnvironment(
  config: MigrationConfig,
  job: JobConfig,
  location = `${job.name}.step`,
): AdapterEnvironment {
  return { config, job, location };
}

// =============================================================================
// LOADERS
// =============================================================================

export type ScriptedLoaderOptions = {
  /** Replacement fields per row; rows it returns null for are left alone. */
  mutate?: (row: Row) => RowRecord | null;
  /** Ledger fields per row; enables the ledger when given. */
  record?: (row: Row) => Record<string, LedgerValue> | null;
  /** Throw for this row (after any mutation of earlier rows). */
  failOn?: (row: Row) => Error | null;
  /** Throw from `load` before touching any row. */
  failBatch?: Error;
};

/**
 * A loader driven by callbacks that remembers every batch it was handed.
 * Unlike BaseLoader a row failure aborts the rest of the batch.
 */
export class ScriptedLoader implements Loader {
  readonly seen: Row[][] = [];
  private readonly ledger: Ledger | null;
  private pending = new Map<string, Row>();

  constructor(
    readonly name: string,
    private readonly options: ScriptedLoaderOptions = {},
  ) {
    this.ledger = options.record ? new Ledger(name) : null;
  }

  async load(batch: Batch): Promise<void> {
    this.seen.push([...batch]);
    if (this.options.failBatch) throw this.options.failBatch;

    for (const row of batch) {
      const failure = this.options.failOn?.(row);
      if (failure) throw failure;

      const changes = this.options.mutate?.(row);
      if (changes) this.pending.set(row.uid, row.with(changes));

      const fields = this.options.record?.(row);
      if (fields && this.ledger) this.ledger.record(row, fields);
    }
  }

  hasMutatedRows(): boolean {
    return this.pending.size > 0;
  }

  collectMutatedRows(): MutatedRows {
    const collected = this.pending;
    this.pending = new Map();
    return collected;
  }

  discardMutatedRows(): void {
    this.pending = new Map();
  }

  hasLedger(): boolean {
    return this.ledger !== null && !this.ledger.isEmpty();
  }

  getLedger(): Ledger | null {
    return this.ledger;
  }
}
