import { ledgerOptionsFor, type LoadStep } from "./config.js";
import { FatalPipelineError, RecoverableWriteError } from "./errors.js";
import { Ledger, type LedgerValue } from "./ledger.js";
import { logPipelineError } from "./logger.js";
import type { PhaseContext } from "./phases.js";
import type { Batch, MutatedRows, Row, RowRecord } from "./row.js";

// =============================================================================
// CONTRACT
// =============================================================================

export type LoadContext = PhaseContext & {
  batchIndex: number;
};

/**
 * A destination writer. Only `load` is required; the rest lets the chain see
 * row mutations and the ledger manager see side-effect records.
 */
export interface Loader {
  readonly name: string;
  load(batch: Batch, context: LoadContext): Promise<void>;
  hasMutatedRows?(): boolean;
  /** Hands back the rows changed since the last call, keyed by uid, and forgets them. */
  collectMutatedRows?(): MutatedRows;
  discardMutatedRows?(): void;
  hasLedger?(): boolean;
  getLedger?(): Ledger | null;
  /** Called once after the last batch of the job. */
  finish?(context: PhaseContext): Promise<void>;
}

/** A loader as configured on one job: its declared primary flag and entity. */
export type LoaderSlot = {
  loader: Loader;
  primary: boolean;
  entity?: string;
};

/** Returns the loader's ledger when it recorded at least one entry. */
export function producedLedger(loader: Loader): Ledger | null {
  if (!loader.hasLedger || !loader.getLedger || !loader.hasLedger()) {
    return null;
  }
  const ledger = loader.getLedger();
  return ledger && !ledger.isEmpty() ? ledger : null;
}

// =============================================================================
// BASE LOADER
// =============================================================================

export type LedgerFields = Record<string, LedgerValue>;

/**
 * Row-at-a-time loader. A row whose write throws is logged and skipped: it
 * gets no ledger entry and any mutation made for it is dropped, while the
 * remaining rows of the batch still load.
 */
export abstract class BaseLoader implements Loader {
  readonly name: string;
  protected readonly ledger: Ledger | null;
  private readonly mutated = new Map<string, Row>();

  constructor(protected readonly step: LoadStep) {
    this.name = step.name;
    const options = ledgerOptionsFor(step);
    this.ledger = options.enabled ? new Ledger(step.name, [], options.schema) : null;
  }

  /**
   * Writes one row. The returned fields become the row's ledger entry when
   * the ledger is enabled; return nothing to record no entry.
   */
  protected abstract loadRow(row: Row, context: LoadContext): Promise<LedgerFields | void>;

  async load(batch: Batch, context: LoadContext): Promise<void> {
    for (const row of batch) {
      try {
        const fields = await this.loadRow(row, context);
        if (fields && this.ledger) {
          this.ledger.record(this.mutated.get(row.uid) ?? row, fields);
        }
      } catch (error) {
        if (error instanceof FatalPipelineError) throw error;
        this.mutated.delete(row.uid);
        logPipelineError(context.logger, "load.row.failed", error, {
          level: error instanceof RecoverableWriteError ? "warn" : "error",
          job: context.job.name,
          loader: this.name,
          uid: row.uid,
          batch: context.batchIndex,
        });
      }
    }
  }

  /** Records a replacement for `row`; later loaders in the chain see it. */
  protected mutateRow(row: Row, changes: RowRecord): Row {
    const current = this.mutated.get(row.uid) ?? row;
    const next = current.with(changes);
    this.mutated.set(row.uid, next);
    return next;
  }

  hasMutatedRows(): boolean {
    return this.mutated.size > 0;
  }

  collectMutatedRows(): MutatedRows {
    const collected = new Map(this.mutated);
    this.mutated.clear();
    return collected;
  }

  discardMutatedRows(): void {
    this.mutated.clear();
  }

  hasLedger(): boolean {
    return this.ledger !== null && !this.ledger.isEmpty();
  }

  getLedger(): Ledger | null {
    return this.ledger;
  }

  async finish(_context: PhaseContext): Promise<void> {}
}
