import { findJobConfig, type MigrationConfig } from "../core/config.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { LedgerRegistry } from "../core/ledger-registry.js";
import { LedgerStore } from "../core/ledger-store.js";
import type { EventLogger } from "../core/logger.js";

const noopLogger: EventLogger = { log: () => undefined };

export type LedgerCommandOptions = {
  limit?: number;
};

/** Prints the latest persisted ledger of a job, one JSON entry per line. */
export async function ledgerCommand(
  config: MigrationConfig,
  jobName: string,
  opts: LedgerCommandOptions = {},
): Promise<string[]> {
  if (!findJobConfig(config, jobName)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.ledger,
      title: "Unknown job.",
      message: `No job named "${jobName}" in the migration config.`,
    });
  }

  const store = new LedgerStore({ root: config.ledger.path, format: config.ledger.format });
  const registry = new LedgerRegistry({ jobs: config.migration, store, logger: noopLogger });
  const ledger = await registry.get(jobName);
  if (!ledger) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.ledger,
      title: "Ledger not found.",
      message: `Job "${jobName}" has no persisted ledger yet.`,
      next: `Run \`batchwright run --job ${jobName}\` first.`,
    });
  }

  const entries = opts.limit !== undefined ? ledger.entries().slice(0, opts.limit) : ledger.entries();
  const lines = entries.map((entry) => JSON.stringify(entry));
  lines.push(`${entries.length} of ${ledger.size} entries`);

  for (const line of lines) {
    console.log(line);
  }
  return lines;
}
