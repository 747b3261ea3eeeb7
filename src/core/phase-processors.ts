import type { AdapterEnvironment, Adapters } from "./adapters.js";
import type { JobConfig, MigrationConfig } from "./config.js";
import { FatalPipelineError, RecoverableWriteError } from "./errors.js";
import { LoaderChain } from "./loader-chain.js";
import type { LoadContext, LoaderSlot } from "./loader.js";
import type { LedgerManager } from "./ledger-manager.js";
import { logPipelineError, logPipelineEvent } from "./logger.js";
import type { JobState, PhaseContext, PhaseFactoryMap, PhaseProcessor } from "./phases.js";
import { chunkRows, type Row } from "./row.js";

// =============================================================================
// EXTRACT
// =============================================================================

/** Runs every extract step and concatenates their rows in step order. */
export class ExtractPhase implements PhaseProcessor {
  readonly phase = "extract";

  constructor(
    private readonly job: JobConfig,
    private readonly adapters: Adapters,
    private readonly config: MigrationConfig,
  ) {}

  async process(state: JobState, context: PhaseContext): Promise<JobState> {
    const rows: Row[] = [];

    for (const [index, step] of this.job.extract.entries()) {
      const location = `${this.job.name}.extract[${index}]`;
      const factory = this.adapters.extractors.resolve(step.adapter, location);
      const extractor = factory(step, environment(this.config, this.job, location));
      const extracted = await extractor.extract(context);

      logPipelineEvent(context.logger, "extract.step.complete", {
        job: this.job.name,
        adapter: step.adapter,
        step: index,
        rows: extracted.length,
      });
      rows.push(...extracted);
    }

    return { ...state, rows };
  }
}

// =============================================================================
// TRANSFORM
// =============================================================================

export class TransformPhase implements PhaseProcessor {
  readonly phase = "transform";

  constructor(
    private readonly job: JobConfig,
    private readonly adapters: Adapters,
    private readonly config: MigrationConfig,
  ) {}

  async process(state: JobState, context: PhaseContext): Promise<JobState> {
    let rows: Row[] = state.rows;

    for (const [index, step] of this.job.transform.entries()) {
      const location = `${this.job.name}.transform[${index}]`;
      const factory = this.adapters.transformers.resolve(step.transformer, location);
      const transformer = factory(step, environment(this.config, this.job, location));
      rows = await transformer.transform(rows, context);

      logPipelineEvent(context.logger, "transform.step.complete", {
        job: this.job.name,
        level: "debug",
        transformer: step.transformer,
        step: index,
        rows: rows.length,
      });
    }

    return { ...state, rows };
  }
}

// =============================================================================
// LOAD
// =============================================================================

export type LoadPhaseOptions = {
  ledgers: LedgerManager;
  reclaim?: () => void;
};

/**
 * Splits the rows into batches and pushes each through the job's loader
 * chain, then lets each loader finish and hands their ledgers to the ledger
 * manager. Loaders are built fresh for every run so their ledgers start empty.
 */
export class LoadPhase implements PhaseProcessor {
  readonly phase = "load";

  constructor(
    private readonly job: JobConfig,
    private readonly adapters: Adapters,
    private readonly config: MigrationConfig,
    private readonly options: LoadPhaseOptions,
  ) {}

  async process(state: JobState, context: PhaseContext): Promise<JobState> {
    const slots = this.buildLoaders();
    const chain = new LoaderChain(
      slots.map((slot) => slot.loader),
      { logger: context.logger, progress: context.progress, reclaim: this.options.reclaim },
    );

    const batchSize = this.job.batch_size ?? this.config.batch_size;
    const batches = chunkRows(state.rows, batchSize);
    const loaded: Row[] = [];

    for (const [batchIndex, batch] of batches.entries()) {
      const batchContext: LoadContext = { ...context, batchIndex };
      const result = await chain.run(batch, batchContext);
      loaded.push(...result.batch);

      logPipelineEvent(context.logger, "load.batch.complete", {
        job: this.job.name,
        batch: batchIndex,
        rows: result.batch.length,
        failed_loaders: result.outcomes
          .filter((outcome) => outcome.status !== "ok")
          .map((outcome) => outcome.loader),
      });
    }

    for (const slot of slots) {
      await this.finishLoader(slot, context);
    }

    const ledger = await this.options.ledgers.finalize(this.job, slots);
    return { rows: loaded, ledger };
  }

  private buildLoaders(): LoaderSlot[] {
    return this.job.load.map((step, index) => {
      const location = `${this.job.name}.load[${index}]`;
      const factory = this.adapters.loaders.resolve(step.loader, location);
      return {
        loader: factory(step, environment(this.config, this.job, location)),
        primary: step.primary,
        entity: this.adapters.loaders.entityOf(step.loader),
      };
    });
  }

  private async finishLoader(slot: LoaderSlot, context: PhaseContext): Promise<void> {
    if (!slot.loader.finish) return;
    try {
      await slot.loader.finish(context);
    } catch (error) {
      if (error instanceof FatalPipelineError) throw error;
      logPipelineError(context.logger, "load.finish.failed", error, {
        level: error instanceof RecoverableWriteError ? "warn" : "error",
        job: this.job.name,
        loader: slot.loader.name,
      });
    }
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

export function createPhaseFactories(
  adapters: Adapters,
  config: MigrationConfig,
  options: LoadPhaseOptions,
): PhaseFactoryMap {
  return {
    extract: (job) => new ExtractPhase(job, adapters, config),
    transform: (job) => new TransformPhase(job, adapters, config),
    load: (job) => new LoadPhase(job, adapters, config, options),
  };
}

function environment(config: MigrationConfig, job: JobConfig, location: string): AdapterEnvironment {
  return { config, job, location };
}
