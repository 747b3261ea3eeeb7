import type { ZodType, ZodTypeDef } from "zod";

import { AdapterRegistry } from "./adapter-registry.js";
import type { ExtractStep, JobConfig, LoadStep, MigrationConfig, TransformStep } from "./config.js";
import { formatConfigIssues } from "./config-loader.js";
import { ConfigError } from "./errors.js";
import type { Loader } from "./loader.js";
import type { PhaseContext } from "./phases.js";
import type { Row } from "./row.js";

// =============================================================================
// CONTRACTS
// =============================================================================

export interface Extractor {
  extract(context: PhaseContext): Promise<Row[]>;
}

export interface Transformer {
  transform(rows: readonly Row[], context: PhaseContext): Promise<Row[]>;
}

/** What an adapter factory gets besides its own step. */
export type AdapterEnvironment = {
  config: MigrationConfig;
  job: JobConfig;
  /** Config path of the step, e.g. `posts.load[1]`. */
  location: string;
};

export type ExtractorFactory = (step: ExtractStep, env: AdapterEnvironment) => Extractor;
export type TransformerFactory = (step: TransformStep, env: AdapterEnvironment) => Transformer;
export type LoaderFactory = (step: LoadStep, env: AdapterEnvironment) => Loader;

export type Adapters = {
  extractors: AdapterRegistry<ExtractorFactory>;
  transformers: AdapterRegistry<TransformerFactory>;
  loaders: AdapterRegistry<LoaderFactory>;
};

export function createAdapterRegistries(): Adapters {
  return {
    extractors: new AdapterRegistry<ExtractorFactory>("extractor"),
    transformers: new AdapterRegistry<TransformerFactory>("transformer"),
    loaders: new AdapterRegistry<LoaderFactory>("loader"),
  };
}

// =============================================================================
// STEP OPTIONS
// =============================================================================

/** Validates the adapter-specific fields of a step record. */
export function parseStepOptions<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  step: unknown,
  env: AdapterEnvironment,
): T {
  const parsed = schema.safeParse(step);
  if (!parsed.success) {
    throw new ConfigError(`Invalid options at ${env.location}:\n${formatConfigIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

/**
 * Ledgers of other jobs are only loaded and unloaded around the phases of the
 * jobs that declare them, so an adapter may read only a declared dependency.
 */
export function requireDependency(source: string, env: AdapterEnvironment): void {
  if (!env.job.depends_on.includes(source)) {
    throw new ConfigError(
      `Invalid options at ${env.location}: job "${source}" must be listed in depends_on of job "${env.job.name}"`,
    );
  }
}
