import type { JobConfig } from "./config.js";
import { Ledger, applyLedgerSchema } from "./ledger.js";
import { leftJoinLedgers } from "./ledger-join.js";
import type { LedgerRegistry } from "./ledger-registry.js";
import type { LedgerStore } from "./ledger-store.js";
import { producedLedger, type LoaderSlot } from "./loader.js";
import { logPipelineEvent, type EventLogger } from "./logger.js";
import { compactTimestamp } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type FinalizedLedger = {
  /** The job's ledger: the sole loader ledger, or the joined one. */
  ledger: Ledger;
  primary: string;
  /** Every file written, per-loader files first and the job's file last. */
  files: string[];
  unmatched: Record<string, number>;
};

export type LedgerManagerOptions = {
  store: LedgerStore;
  registry: Pick<LedgerRegistry, "unload">;
  logger: EventLogger;
  clock?: () => Date;
};

type ProducedLedger = {
  slot: LoaderSlot;
  ledger: Ledger;
};

// =============================================================================
// MANAGER
// =============================================================================

export class LedgerManager {
  private readonly clock: () => Date;

  constructor(private readonly options: LedgerManagerOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Persists what the job's loaders recorded. Returns null when no loader
   * recorded anything. One ledger is written as the job's ledger; several are
   * each written under their loader's name and then joined onto the primary
   * as the job's ledger.
   */
  async finalize(job: JobConfig, loaders: readonly LoaderSlot[]): Promise<FinalizedLedger | null> {
    const produced = loaders
      .map((slot) => ({ slot, ledger: producedLedger(slot.loader) }))
      .filter((item): item is ProducedLedger => item.ledger !== null);

    if (produced.length === 0) {
      logPipelineEvent(this.options.logger, "ledger.none", { job: job.name, level: "debug" });
      return null;
    }

    const directory = this.options.store.directoryFor(job.ledger.path);
    const timestamp = compactTimestamp(this.clock());

    if (produced.length === 1) {
      const [only] = produced;
      const ledger = only.ledger.rename(job.name);
      const filePath = await this.persist(job, directory, ledger, timestamp);
      this.options.registry.unload(job.name);
      return { ledger, primary: only.slot.loader.name, files: [filePath], unmatched: {} };
    }

    const files: string[] = [];
    for (const item of produced) {
      files.push(await this.persist(job, directory, item.ledger, timestamp));
    }

    const primary = selectPrimary(job, produced);
    const secondaries = produced.filter((item) => item !== primary).map((item) => typed(item.ledger));
    const { ledger, unmatched } = leftJoinLedgers(job.name, typed(primary.ledger), secondaries);

    const dropped = Object.values(unmatched).reduce((sum, count) => sum + count, 0);
    if (dropped > 0) {
      logPipelineEvent(this.options.logger, "ledger.join.unmatched", {
        job: job.name,
        level: "warn",
        primary: primary.slot.loader.name,
        dropped,
        by_loader: unmatched,
      });
    }

    files.push(await this.persist(job, directory, ledger, timestamp));
    this.options.registry.unload(job.name);

    return { ledger, primary: primary.slot.loader.name, files, unmatched };
  }

  private async persist(
    job: JobConfig,
    directory: string,
    ledger: Ledger,
    timestamp: string,
  ): Promise<string> {
    const { filePath, issues } = await this.options.store.write(directory, ledger, timestamp);

    if (issues.length > 0) {
      logPipelineEvent(this.options.logger, "ledger.schema.issues", {
        job: job.name,
        level: "warn",
        ledger: ledger.name,
        issues: issues.slice(0, 20).map((issue) => ({ ...issue })),
        count: issues.length,
      });
    }

    logPipelineEvent(this.options.logger, "ledger.persisted", {
      job: job.name,
      ledger: ledger.name,
      file: filePath,
      entries: ledger.size,
    });
    return filePath;
  }
}

// =============================================================================
// PRIMARY SELECTION
// =============================================================================

/**
 * Explicit `primary: true` first, then the loader whose entity matches the
 * job's entity, then the first loader in declared order.
 */
function selectPrimary(job: JobConfig, produced: readonly ProducedLedger[]): ProducedLedger {
  const explicit = produced.find((item) => item.slot.primary);
  if (explicit) return explicit;

  if (job.entity) {
    const entity = job.entity;
    const byEntity = produced.find((item) => item.slot.entity === entity);
    if (byEntity) return byEntity;
  }

  return produced[0];
}

// Joined values follow the same declared types as the per-loader files.
function typed(ledger: Ledger): Ledger {
  if (!ledger.schema) return ledger;
  return new Ledger(ledger.name, applyLedgerSchema(ledger.entries(), ledger.schema).entries, ledger.schema);
}
