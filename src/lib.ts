export * from "./core/errors.js";
export { Row, ROW_UID_FIELD, applyMutations, chunkRows, createRows } from "./core/row.js";
export type { Batch, MutatedRows, RowRecord, RowValue } from "./core/row.js";
export { Ledger, LEDGER_UID_FIELD, applyLedgerSchema } from "./core/ledger.js";
export type { LedgerEntry, LedgerSchema, LedgerValue } from "./core/ledger.js";
export { LedgerStore, ledgerFileName } from "./core/ledger-store.js";
export type { LedgerFormat } from "./core/ledger-store.js";
export { LedgerRegistry } from "./core/ledger-registry.js";
export { LedgerManager } from "./core/ledger-manager.js";
export type { FinalizedLedger } from "./core/ledger-manager.js";
export { leftJoinLedgers } from "./core/ledger-join.js";
export { validateJobGraph } from "./core/job-graph.js";
export type { ExecutionPlan, JobGraphValidation, JobNode } from "./core/job-graph.js";
export { JobRunner } from "./core/job-runner.js";
export type { JobStatus } from "./core/job-runner.js";
export { PHASE_ORDER } from "./core/phases.js";
export type { JobState, PhaseContext, PhaseProcessor, PhaseType } from "./core/phases.js";
export { BaseLoader } from "./core/loader.js";
export type { LedgerFields, LoadContext, Loader, LoaderSlot } from "./core/loader.js";
export { LoaderChain } from "./core/loader-chain.js";
export type { LoaderChainResult, LoaderOutcome } from "./core/loader-chain.js";
export { LoadProgress } from "./core/progress.js";
export type { ProgressReporter } from "./core/progress.js";
export { Pipeline } from "./core/pipeline.js";
export type { PipelineResult, PreviewPhase, RunSelection } from "./core/pipeline.js";
export { AdapterRegistry } from "./core/adapter-registry.js";
export { createAdapterRegistries, parseStepOptions, requireDependency } from "./core/adapters.js";
export type { AdapterEnvironment, Adapters, Extractor, Transformer } from "./core/adapters.js";
export { createDefaultAdapters } from "./adapters/index.js";
export { MigrationConfigSchema } from "./core/config.js";
export type { JobConfig, MigrationConfig } from "./core/config.js";
export { loadMigrationConfig, parseMigrationConfig } from "./core/config-loader.js";
export { JsonlLogger } from "./core/logger.js";
export type { EventLogger, LogEventInput } from "./core/logger.js";
