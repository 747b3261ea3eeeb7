import { FatalPipelineError, RecoverableWriteError } from "./errors.js";
import type { Loader, LoadContext } from "./loader.js";
import { logPipelineError, logPipelineEvent, type EventLogger } from "./logger.js";
import type { ProgressReporter } from "./progress.js";
import { applyMutations, type Batch, type Row } from "./row.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoaderOutcomeStatus = "ok" | "recoverable_error" | "error";

export type LoaderOutcome = {
  loader: string;
  status: LoaderOutcomeStatus;
  /** Rows this loader replaced for the rest of the chain. */
  mutated: number;
  error?: string;
};

export type LoaderChainResult = {
  batch: Row[];
  outcomes: LoaderOutcome[];
};

export type LoaderChainOptions = {
  logger: EventLogger;
  progress: ProgressReporter;
  /** Runs after every batch; defaults to a forced GC when the runtime exposes one. */
  reclaim?: () => void;
};

// =============================================================================
// CHAIN
// =============================================================================

/**
 * Runs loaders in declared order against one batch. Each loader sees the
 * batch as the previous successful loader left it: rows a loader mutated are
 * swapped in by uid, every other row flows through untouched.
 */
export class LoaderChain {
  private readonly reclaim: () => void;

  constructor(
    private readonly loaders: readonly Loader[],
    private readonly options: LoaderChainOptions,
  ) {
    this.reclaim = options.reclaim ?? requestGarbageCollection;
  }

  get size(): number {
    return this.loaders.length;
  }

  async run(batch: Batch, context: LoadContext): Promise<LoaderChainResult> {
    let current: Row[] = [...batch];
    const outcomes: LoaderOutcome[] = [];

    for (const loader of this.loaders) {
      const result = await this.runLoader(loader, current, context);
      current = result.batch;
      outcomes.push(result.outcome);
      this.options.progress.rowsProcessed(loader.name, current.length);
    }

    this.reclaim();
    return { batch: current, outcomes };
  }

  private async runLoader(
    loader: Loader,
    batch: Row[],
    context: LoadContext,
  ): Promise<{ batch: Row[]; outcome: LoaderOutcome }> {
    try {
      await loader.load(batch, context);

      if (!loader.hasMutatedRows?.() || !loader.collectMutatedRows) {
        return { batch, outcome: { loader: loader.name, status: "ok", mutated: 0 } };
      }

      const mutations = loader.collectMutatedRows();
      const next = applyMutations(batch, mutations);
      logPipelineEvent(this.options.logger, "load.rows.mutated", {
        job: context.job.name,
        level: "debug",
        loader: loader.name,
        batch: context.batchIndex,
        rows: mutations.size,
      });
      return { batch: next, outcome: { loader: loader.name, status: "ok", mutated: mutations.size } };
    } catch (error) {
      if (error instanceof FatalPipelineError) throw error;

      // The batch stays as the last successful loader left it.
      loader.discardMutatedRows?.();

      const recoverable = error instanceof RecoverableWriteError;
      logPipelineError(this.options.logger, recoverable ? "load.loader.warning" : "load.loader.failed", error, {
        level: recoverable ? "warn" : "error",
        job: context.job.name,
        loader: loader.name,
        batch: context.batchIndex,
      });

      return {
        batch,
        outcome: {
          loader: loader.name,
          status: recoverable ? "recoverable_error" : "error",
          mutated: 0,
          error: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }
}

export function requestGarbageCollection(): void {
  const gc: unknown = Reflect.get(globalThis, "gc");
  if (typeof gc === "function") {
    gc();
  }
}
