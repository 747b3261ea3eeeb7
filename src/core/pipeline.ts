import { checkAdapterTypes } from "./adapter-registry.js";
import type { Adapters } from "./adapters.js";
import { findJobConfig, type JobConfig, type MigrationConfig } from "./config.js";
import {
  ConfigError,
  FatalPipelineError,
  GraphValidationError,
  UnknownAdapterError,
} from "./errors.js";
import { validateJobGraph, type ExecutionPlan, type JobGraphValidation } from "./job-graph.js";
import { JobRunner } from "./job-runner.js";
import { LedgerManager } from "./ledger-manager.js";
import { LedgerRegistry } from "./ledger-registry.js";
import { LedgerStore } from "./ledger-store.js";
import { logPipelineError, logPipelineEvent, type EventLogger } from "./logger.js";
import { createPhaseFactories } from "./phase-processors.js";
import type { PhaseType } from "./phases.js";
import type { Row } from "./row.js";
import { defaultRunId } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineOptions = {
  config: MigrationConfig;
  adapters: Adapters;
  logger: EventLogger;
  runId?: string;
  store?: LedgerStore;
  clock?: () => Date;
  reclaim?: () => void;
};

export type RunSelection = {
  /** Run only these jobs (their dependencies still have to be valid). */
  jobs?: string[];
  /** Treat these jobs as skipped for this run. */
  skip?: string[];
  phase?: PhaseType;
  /** Extract and transform only; nothing is loaded and no ledger is written. */
  dryRun?: boolean;
};

export type PipelineValidation = {
  ok: boolean;
  graph: JobGraphValidation;
  adapterErrors: UnknownAdapterError[];
};

export type PreviewPhase = "extract" | "transform";

export type JobRunStatus = "done" | "partial" | "failed" | "skipped";

export type JobRunSummary = {
  job: string;
  status: JobRunStatus;
  rows: number;
  ledgerFiles: string[];
  error?: string;
};

export type PipelineResult = {
  runId: string;
  ok: boolean;
  jobs: JobRunSummary[];
};

// =============================================================================
// PIPELINE
// =============================================================================

/**
 * Validates the migration and runs its jobs one at a time in configuration
 * order. A failing job is logged and the run moves on; validation errors and
 * `FatalPipelineError` stop the whole run.
 */
export class Pipeline {
  readonly runId: string;
  readonly store: LedgerStore;
  readonly registry: LedgerRegistry;
  private readonly ledgers: LedgerManager;

  constructor(private readonly options: PipelineOptions) {
    const { config, logger } = options;
    this.runId = options.runId ?? defaultRunId();
    this.store = options.store ?? new LedgerStore({ root: config.ledger.path, format: config.ledger.format });
    this.registry = new LedgerRegistry({ jobs: config.migration, store: this.store, logger });
    this.ledgers = new LedgerManager({
      store: this.store,
      registry: this.registry,
      logger,
      clock: options.clock,
    });
  }

  validate(): PipelineValidation {
    const graph = validateJobGraph(this.options.config.migration);
    const adapterErrors = checkAdapterTypes(this.options.config, this.options.adapters);
    return { ok: graph.ok && adapterErrors.length === 0, graph, adapterErrors };
  }

  async run(selection: RunSelection = {}): Promise<PipelineResult> {
    const { config, logger } = this.options;
    const validation = this.assertValid();

    const selected = this.selectJobs(selection, validation.graph.plan);
    logPipelineEvent(logger, "run.start", {
      jobs: selected.run,
      skipped: selected.skipped,
      dry_run: selection.dryRun ?? false,
    });

    const summaries = selected.skipped.map((job): JobRunSummary => ({
      job,
      status: "skipped",
      rows: 0,
      ledgerFiles: [],
    }));

    for (const name of selected.run) {
      const job = findJobConfig(config, name);
      if (!job) continue;

      let runner: JobRunner | null = null;
      try {
        runner = this.createRunner(job, selection.dryRun ?? false);
        if (selection.dryRun) {
          const phases: PhaseType[] = selection.phase ? [selection.phase] : ["extract", "transform"];
          for (const phase of phases) {
            await runner.process(phase);
          }
        } else {
          await runner.process(selection.phase);
        }

        summaries.push({
          job: name,
          status: runner.status === "done" ? "done" : "partial",
          rows: runner.state.rows.length,
          ledgerFiles: runner.state.ledger?.files ?? [],
        });
      } catch (error) {
        if (error instanceof FatalPipelineError) {
          logPipelineError(logger, "run.aborted", error, { job: name });
          throw error;
        }

        logPipelineError(logger, "job.failed", error, { job: name });
        summaries.push({
          job: name,
          status: "failed",
          rows: runner?.state.rows.length ?? 0,
          ledgerFiles: [],
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const ok = summaries.every((summary) => summary.status !== "failed");
    logPipelineEvent(logger, "run.complete", {
      level: ok ? "info" : "warn",
      done: summaries.filter((summary) => summary.status === "done").length,
      failed: summaries.filter((summary) => summary.status === "failed").length,
    });

    return { runId: this.runId, ok, jobs: summaries };
  }

  /**
   * Runs extract, and transform when asked, for one job and hands back the
   * rows it ends with. Nothing is loaded and no ledger is written.
   */
  async preview(name: string, until: PreviewPhase): Promise<Row[]> {
    const { config } = this.options;
    this.assertValid();

    const job = findJobConfig(config, name);
    if (!job) {
      throw new ConfigError(`Unknown job(s): ${name}`);
    }
    if (job.extract.length === 0) {
      throw new ConfigError(`Job '${name}' has no extract steps`);
    }

    const runner = this.createRunner(job, true);
    await runner.process("extract");
    if (until === "transform") {
      await runner.process("transform");
    }
    return [...runner.state.rows];
  }

  private assertValid(): PipelineValidation {
    const { logger } = this.options;
    const validation = this.validate();

    for (const error of [...validation.graph.errors, ...validation.adapterErrors]) {
      logPipelineError(logger, "validation.error", error);
    }
    if (validation.graph.errors.length > 0) {
      throw new GraphValidationError(validation.graph.errors);
    }
    if (validation.adapterErrors.length > 0) {
      throw new ConfigError(
        validation.adapterErrors.map((error) => error.message).join("\n"),
        validation.adapterErrors,
      );
    }
    return validation;
  }

  private createRunner(job: JobConfig, dryRun: boolean): JobRunner {
    const { config, logger } = this.options;
    return new JobRunner({
      job,
      config,
      phases: createPhaseFactories(this.options.adapters, config, {
        ledgers: this.ledgers,
        reclaim: this.options.reclaim,
      }),
      registry: this.registry,
      logger,
      runId: this.runId,
      dryRun,
    }).build();
  }

  private selectJobs(
    selection: RunSelection,
    plan: ExecutionPlan,
  ): { run: string[]; skipped: string[] } {
    const { config } = this.options;
    if (selection.dryRun && selection.phase === "load") {
      throw new ConfigError("A dry run never loads: --phase load cannot be combined with --dry-run");
    }
    const known = new Set(config.migration.map((job) => job.name));
    const requested = [...(selection.jobs ?? []), ...(selection.skip ?? [])];
    const unknown = requested.filter((name) => !known.has(name));
    if (unknown.length > 0) {
      throw new ConfigError(`Unknown job(s): ${unknown.join(", ")}`);
    }

    const only = selection.jobs && selection.jobs.length > 0 ? new Set(selection.jobs) : null;
    const skip = new Set(selection.skip ?? []);

    const run: string[] = [];
    const skipped: string[] = [...plan.skipped];
    for (const name of plan.order) {
      if (only && !only.has(name)) continue;
      if (skip.has(name)) {
        skipped.push(name);
        continue;
      }
      run.push(name);
    }

    return { run, skipped };
  }
}
