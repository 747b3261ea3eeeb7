import path from "node:path";

import { z, type RefinementCtx } from "zod";

import { LedgerFieldTypeSchema, type LedgerSchema } from "./ledger.js";

// =============================================================================
// STEP SCHEMAS
// =============================================================================

// Step records are open: each adapter reads its own options from the step.
export const ExtractStepSchema = z
  .object({
    adapter: z.string().min(1),
    name: z.string().min(1).optional(),
  })
  .passthrough();

export const TransformStepSchema = z
  .object({
    transformer: z.string().min(1),
  })
  .passthrough();

const LedgerOptionSchema = z.union([
  z.boolean(),
  z.object({ fields: z.record(LedgerFieldTypeSchema).optional() }).strict(),
]);

export const LoadStepSchema = z
  .object({
    name: z.string().min(1),
    loader: z.string().min(1),
    primary: z.boolean().default(false),
    ledger: LedgerOptionSchema.default(false),
  })
  .passthrough();

export type ExtractStep = z.infer<typeof ExtractStepSchema>;
export type TransformStep = z.infer<typeof TransformStepSchema>;
export type LoadStep = z.infer<typeof LoadStepSchema>;

// =============================================================================
// JOB SCHEMA
// =============================================================================

const JobConfigBaseSchema = z
  .object({
    name: z.string().min(1),
    depends_on: z.union([z.string().min(1), z.array(z.string().min(1))]).default([]),
    skip: z.boolean().default(false),
    entity: z.string().min(1).optional(),
    batch_size: z.number().int().positive().optional(),
    strict_dependencies: z.boolean().default(false),
    ledger: z.object({ path: z.string().default("") }).default({ path: "" }),
    extract: z.array(ExtractStepSchema).default([]),
    transform: z.array(TransformStepSchema).default([]),
    load: z.array(LoadStepSchema).default([]),
  })
  .transform((job) => ({
    ...job,
    depends_on: typeof job.depends_on === "string" ? [job.depends_on] : job.depends_on,
  }));

type JobConfigBase = z.output<typeof JobConfigBaseSchema>;

function checkLoadSteps(job: JobConfigBase, ctx: RefinementCtx): void {
  const seen = new Set<string>();
  let primaryCount = 0;

  job.load.forEach((step, index) => {
    if (seen.has(step.name)) {
      ctx.addIssue({
        code: "custom",
        path: ["load", index, "name"],
        message: `loader name "${step.name}" is used more than once in job "${job.name}"`,
      });
    }
    seen.add(step.name);

    if (step.name === job.name) {
      ctx.addIssue({
        code: "custom",
        path: ["load", index, "name"],
        message: `loader name "${step.name}" collides with its job's ledger name`,
      });
    }

    if (step.primary) primaryCount += 1;
  });

  if (primaryCount > 1) {
    ctx.addIssue({
      code: "custom",
      path: ["load"],
      message: `only one loader may set primary: true (found ${primaryCount})`,
    });
  }
}

export const JobConfigSchema = JobConfigBaseSchema.superRefine(checkLoadSteps);

export type JobConfig = z.output<typeof JobConfigSchema>;

// =============================================================================
// MIGRATION CONFIG
// =============================================================================

export const MigrationConfigSchema = z
  .object({
    ledger: z
      .object({
        path: z.string().min(1).default("ledgers"),
        format: z.enum(["json", "jsonl"]).default("json"),
      })
      .default({}),
    sources: z.object({ path: z.string().min(1).default(".") }).default({}),
    logs: z.object({ path: z.string().min(1).default("logs") }).default({}),
    output: z.object({ path: z.string().min(1).default("output") }).default({}),
    batch_size: z.number().int().positive().default(100),
    migration: z.array(JobConfigSchema).default([]),
  })
  .strict()
  .superRefine(checkLedgerNames);

export type MigrationConfig = z.output<typeof MigrationConfigSchema>;

function ledgerDirectoryKey(job: JobConfig): string {
  return path.normalize(job.ledger.path || ".");
}

// Per-loader ledger files share a directory with job ledgers: `{loader}-ledger-*`
// must never be read back as another job's `{job}-ledger-*`.
function checkLedgerNames(config: { migration: JobConfig[] }, ctx: RefinementCtx): void {
  config.migration.forEach((job, jobIndex) => {
    job.load.forEach((step, stepIndex) => {
      const other = config.migration.find(
        (candidate) =>
          candidate !== job &&
          candidate.name === step.name &&
          ledgerDirectoryKey(candidate) === ledgerDirectoryKey(job),
      );
      if (other) {
        ctx.addIssue({
          code: "custom",
          path: ["migration", jobIndex, "load", stepIndex, "name"],
          message: `loader name "${step.name}" collides with the ledger of job "${other.name}"`,
        });
      }
    });
  });
}

export function ledgerOptionsFor(step: LoadStep): { enabled: boolean; schema: LedgerSchema | null } {
  if (typeof step.ledger === "boolean") {
    return { enabled: step.ledger, schema: null };
  }
  return { enabled: true, schema: step.ledger.fields ?? null };
}

export function findJobConfig(config: MigrationConfig, name: string): JobConfig | undefined {
  return config.migration.find((job) => job.name === name);
}
