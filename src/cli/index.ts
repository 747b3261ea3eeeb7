import { Command, InvalidArgumentError } from "commander";

import { createDefaultAdapters } from "../adapters/index.js";
import type { Adapters } from "../core/adapters.js";
import { DEFAULT_CONFIG_FILE } from "../core/paths.js";
import { loadConfigForCli } from "./config.js";
import { ledgerCommand } from "./ledger.js";
import { previewCommand, type PreviewCommandOptions } from "./preview.js";
import { runCommand } from "./run.js";
import { validateCommand } from "./validate.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

export function buildCli(adapters: Adapters = createDefaultAdapters()): Command {
  const program = new Command();

  const resolveConfig = () => {
    const globals = program.opts<GlobalOptions>();
    return loadConfigForCli({ explicitConfigPath: globals.config }).config;
  };

  program
    .name("batchwright")
    .description("Run declarative batch migrations with dependency-ordered jobs and cross-loader ledgers")
    .version("0.1.0")
    .option("--config <path>", `Migration config path (default: ./${DEFAULT_CONFIG_FILE})`)
    .option("--debug", "Show error details and stack traces", false);

  program
    .command("validate")
    .description("Check the job graph and step types without running anything")
    .action(() => {
      validateCommand(resolveConfig(), adapters);
    });

  program
    .command("run")
    .description("Run the migration's jobs in dependency order")
    .option("--job <names>", "Comma-separated jobs to run (default: all)")
    .option("--skip <names>", "Comma-separated jobs to skip")
    .option("--phase <phase>", "Run a single phase: extract, transform or load")
    .option("--dry-run", "Extract and transform only; load nothing and write no ledgers", false)
    .option("--run-id <id>", "Run id used for log and output file names (default: timestamp)")
    .action(
      async (opts: { job?: string; skip?: string; phase?: string; dryRun?: boolean; runId?: string }) => {
        await runCommand(resolveConfig(), adapters, opts);
      },
    );

  program
    .command("extract")
    .description("Extract one job's rows and write them to a file")
    .argument("<job>", "Job name")
    .requiredOption("--file <path>", "Output file (overwritten)")
    .option("--mode <mode>", "Output format: json or csv", "json")
    .option("--run-id <id>", "Run id used for the log file name (default: timestamp)")
    .action(async (job: string, opts: PreviewCommandOptions) => {
      await previewCommand(resolveConfig(), adapters, job, "extract", opts);
    });

  program
    .command("transform")
    .description("Extract and transform one job's rows and write them to a file")
    .argument("<job>", "Job name")
    .requiredOption("--file <path>", "Output file (overwritten)")
    .option("--mode <mode>", "Output format: json or csv", "json")
    .option("--run-id <id>", "Run id used for the log file name (default: timestamp)")
    .action(async (job: string, opts: PreviewCommandOptions) => {
      await previewCommand(resolveConfig(), adapters, job, "transform", opts);
    });

  program
    .command("ledger")
    .description("Print the latest persisted ledger of a job")
    .argument("<job>", "Job name")
    .option("--limit <n>", "Print at most n entries", parsePositiveInt)
    .action(async (job: string, opts: { limit?: number }) => {
      await ledgerCommand(resolveConfig(), job, { limit: opts.limit });
    });

  return program;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
