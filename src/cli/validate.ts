import type { Adapters } from "../core/adapters.js";
import type { MigrationConfig } from "../core/config.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import type { EventLogger } from "../core/logger.js";
import { Pipeline } from "../core/pipeline.js";

const noopLogger: EventLogger = { log: () => undefined };

export type ValidateReport = {
  lines: string[];
};

/**
 * Checks the job graph and every step's adapter type. Throws a user-facing
 * error listing all problems when anything is wrong.
 */
export function validateMigration(config: MigrationConfig, adapters: Adapters): ValidateReport {
  const pipeline = new Pipeline({ config, adapters, logger: noopLogger });
  const { ok, graph, adapterErrors } = pipeline.validate();

  if (!ok) {
    const problems = [...graph.errors, ...adapterErrors].map((error) => `- ${error.message}`);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.validation,
      title: "Migration invalid.",
      message: `${problems.length} problem(s) found:\n${problems.join("\n")}`,
      hint: "Jobs must be declared after their dependencies, and every step type must be a registered adapter.",
    });
  }

  const lines = [
    `${config.migration.length} job(s) valid.`,
    `Execution order: ${graph.plan.order.join(", ") || "(none)"}`,
  ];
  if (graph.plan.skipped.length > 0) {
    lines.push(`Skipped: ${graph.plan.skipped.join(", ")}`);
  }
  return { lines };
}

export function validateCommand(config: MigrationConfig, adapters: Adapters): void {
  for (const line of validateMigration(config, adapters).lines) {
    console.log(line);
  }
}
