import type { Adapters } from "../core/adapters.js";
import type { MigrationConfig } from "../core/config.js";
import { BatchwrightError } from "../core/errors.js";
import { JsonlLogger } from "../core/logger.js";
import { runLogPath } from "../core/paths.js";
import { isPhaseType, type PhaseType } from "../core/phases.js";
import { Pipeline, type PipelineResult } from "../core/pipeline.js";
import { defaultRunId, splitList } from "../core/utils.js";

export type RunCommandOptions = {
  runId?: string;
  job?: string;
  skip?: string;
  phase?: string;
  dryRun?: boolean;
};

export async function runCommand(
  config: MigrationConfig,
  adapters: Adapters,
  opts: RunCommandOptions,
): Promise<PipelineResult> {
  const runId = opts.runId ?? defaultRunId();
  const phase = parsePhase(opts.phase);
  const logPath = runLogPath(config, runId);
  const logger = new JsonlLogger(logPath, { runId });

  try {
    const pipeline = new Pipeline({ config, adapters, logger, runId });
    const result = await pipeline.run({
      jobs: splitList(opts.job),
      skip: splitList(opts.skip),
      phase,
      dryRun: opts.dryRun,
    });

    for (const line of formatRunSummary(result)) {
      console.log(line);
    }
    console.log(`Log: ${logPath}`);

    if (!result.ok) {
      process.exitCode = 1;
    }
    return result;
  } finally {
    logger.close();
  }
}

export function formatRunSummary(result: PipelineResult): string[] {
  const lines = [`Run ${result.runId}: ${result.ok ? "ok" : "finished with failures"}`];
  const width = Math.max(0, ...result.jobs.map((job) => job.job.length));

  for (const job of result.jobs) {
    const detail = job.error ? ` (${job.error})` : job.status === "skipped" ? "" : ` ${job.rows} row(s)`;
    lines.push(`  ${job.job.padEnd(width)}  ${job.status}${detail}`);
    for (const file of job.ledgerFiles) {
      lines.push(`    ledger: ${file}`);
    }
  }

  return lines;
}

function parsePhase(value: string | undefined): PhaseType | undefined {
  if (value === undefined) return undefined;
  if (!isPhaseType(value)) {
    throw new BatchwrightError(`Unknown phase "${value}" (expected extract, transform or load)`);
  }
  return value;
}
