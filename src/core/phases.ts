import type { JobConfig, MigrationConfig } from "./config.js";
import type { LedgerRegistry } from "./ledger-registry.js";
import type { EventLogger } from "./logger.js";
import type { ProgressReporter } from "./progress.js";
import type { Row } from "./row.js";
import type { FinalizedLedger } from "./ledger-manager.js";

// =============================================================================
// PHASES
// =============================================================================

export const PHASE_ORDER = ["extract", "transform", "load"] as const;

export type PhaseType = (typeof PHASE_ORDER)[number];

export function isPhaseType(value: string): value is PhaseType {
  return PHASE_ORDER.some((phase) => phase === value);
}

// =============================================================================
// STATE & CONTEXT
// =============================================================================

/** The tabular state threaded through a job's phases. */
export type JobState = {
  rows: Row[];
  /** Set by the load phase once the job's ledgers are persisted. */
  ledger?: FinalizedLedger | null;
};

export type PhaseContext = {
  job: JobConfig;
  config: MigrationConfig;
  runId: string;
  logger: EventLogger;
  registry: LedgerRegistry;
  progress: ProgressReporter;
  dryRun: boolean;
};

export interface PhaseProcessor {
  readonly phase: PhaseType;
  process(state: JobState, context: PhaseContext): Promise<JobState>;
}

export type PhaseFactory = (job: JobConfig) => PhaseProcessor;

export type PhaseFactoryMap = Record<PhaseType, PhaseFactory>;

export function emptyJobState(): JobState {
  return { rows: [] };
}
