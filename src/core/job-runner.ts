import type { JobConfig, MigrationConfig } from "./config.js";
import { BatchwrightError, MissingDependencyDataError } from "./errors.js";
import type { LedgerRegistry } from "./ledger-registry.js";
import { ScopedLogger, logPipelineError, logPipelineEvent, type EventLogger } from "./logger.js";
import {
  PHASE_ORDER,
  emptyJobState,
  type JobState,
  type PhaseContext,
  type PhaseFactoryMap,
  type PhaseProcessor,
  type PhaseType,
} from "./phases.js";
import { LoadProgress, type ProgressReporter } from "./progress.js";

// =============================================================================
// TYPES
// =============================================================================

export type JobStatus =
  | "created"
  | "built"
  | "extract_running"
  | "transform_running"
  | "load_running"
  | "done"
  | "failed";

export type JobRunnerOptions = {
  job: JobConfig;
  config: MigrationConfig;
  phases: PhaseFactoryMap;
  registry: LedgerRegistry;
  logger: EventLogger;
  runId: string;
  dryRun?: boolean;
  progress?: ProgressReporter;
};

const RUNNING_STATUS: Record<PhaseType, JobStatus> = {
  extract: "extract_running",
  transform: "transform_running",
  load: "load_running",
};

// =============================================================================
// RUNNER
// =============================================================================

/**
 * Drives one job through extract, transform and load. Around every phase the
 * ledgers of the job's dependencies are loaded into the registry and unloaded
 * again, also when the phase fails.
 */
export class JobRunner {
  private currentStatus: JobStatus = "created";
  private currentState: JobState = emptyJobState();
  private processors: Partial<Record<PhaseType, PhaseProcessor>> = {};
  private readonly completed = new Set<PhaseType>();
  private readonly logger: EventLogger;
  private readonly progress: ProgressReporter;

  constructor(private readonly options: JobRunnerOptions) {
    this.logger = new ScopedLogger(options.logger, { job: options.job.name });
    this.progress = options.progress ?? new LoadProgress(this.logger, options.job.name);
  }

  get job(): JobConfig {
    return this.options.job;
  }

  get status(): JobStatus {
    return this.currentStatus;
  }

  get state(): JobState {
    return this.currentState;
  }

  build(): this {
    if (this.currentStatus !== "created") {
      throw new BatchwrightError(`Job '${this.job.name}' is already built`);
    }

    const processors: Partial<Record<PhaseType, PhaseProcessor>> = {};
    for (const phase of PHASE_ORDER) {
      processors[phase] = this.options.phases[phase](this.job);
    }
    this.processors = processors;
    this.currentStatus = "built";

    logPipelineEvent(this.logger, "job.built", { phases: [...PHASE_ORDER] });
    return this;
  }

  /**
   * Runs one phase, or all three in order. A partial run leaves the job in
   * `built`; it reaches `done` once every phase has completed.
   */
  async process(phase?: PhaseType): Promise<JobState> {
    if (this.currentStatus !== "built") {
      throw new BatchwrightError(
        `Job '${this.job.name}' cannot run phases while ${this.currentStatus}`,
      );
    }

    const phases = phase ? [phase] : [...PHASE_ORDER];
    for (const next of phases) {
      await this.runPhase(next);
    }

    this.currentStatus = PHASE_ORDER.every((item) => this.completed.has(item)) ? "done" : "built";
    if (this.currentStatus === "done") {
      logPipelineEvent(this.logger, "job.done", { rows: this.currentState.rows.length });
    }
    return this.currentState;
  }

  private async runPhase(phase: PhaseType): Promise<void> {
    const processor = this.processors[phase];
    if (!processor) {
      throw new BatchwrightError(`Job '${this.job.name}' has no processor for phase ${phase}`);
    }

    this.currentStatus = RUNNING_STATUS[phase];
    logPipelineEvent(this.logger, "phase.start", { phase });

    const loaded: string[] = [];
    try {
      await this.loadDependencies(loaded);
      this.currentState = await processor.process(this.currentState, this.context());
      this.completed.add(phase);
      logPipelineEvent(this.logger, "phase.complete", {
        phase,
        rows: this.currentState.rows.length,
      });
    } catch (error) {
      this.currentStatus = "failed";
      logPipelineError(this.logger, "phase.failed", error, { phase });
      throw error;
    } finally {
      for (const name of loaded) {
        this.options.registry.unload(name);
      }
    }
  }

  private async loadDependencies(loaded: string[]): Promise<void> {
    for (const dependency of this.job.depends_on) {
      const ledger = await this.options.registry.get(dependency);
      if (ledger) {
        loaded.push(dependency);
        continue;
      }

      if (this.job.strict_dependencies) {
        throw new MissingDependencyDataError(this.job.name, dependency);
      }
      logPipelineEvent(this.logger, "dependency.missing", { level: "warn", dependency });
    }
  }

  private context(): PhaseContext {
    return {
      job: this.job,
      config: this.options.config,
      runId: this.options.runId,
      logger: this.logger,
      registry: this.options.registry,
      progress: this.progress,
      dryRun: this.options.dryRun ?? false,
    };
  }
}
