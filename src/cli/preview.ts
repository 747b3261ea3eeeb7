import path from "node:path";

import type { Adapters } from "../core/adapters.js";
import type { MigrationConfig } from "../core/config.js";
import { BatchwrightError } from "../core/errors.js";
import { JsonlLogger } from "../core/logger.js";
import { runLogPath } from "../core/paths.js";
import { Pipeline, type PreviewPhase } from "../core/pipeline.js";
import { ROW_FILE_FORMATS, isRowFileFormat, writeRowsFile, type RowFileFormat } from "../core/row-files.js";
import { defaultRunId } from "../core/utils.js";

export type PreviewCommandOptions = {
  file: string;
  mode?: string;
  runId?: string;
};

/**
 * Runs one job up to `until` and writes the rows it holds at that point to a
 * file, overwriting it. Dependencies' ledgers are read; nothing is loaded.
 */
export async function previewCommand(
  config: MigrationConfig,
  adapters: Adapters,
  jobName: string,
  until: PreviewPhase,
  opts: PreviewCommandOptions,
): Promise<string> {
  const mode = parseMode(opts.mode);
  const runId = opts.runId ?? defaultRunId();
  const logger = new JsonlLogger(runLogPath(config, runId), { runId });

  try {
    const pipeline = new Pipeline({ config, adapters, logger, runId });
    const rows = await pipeline.preview(jobName, until);

    const filePath = path.resolve(opts.file);
    await writeRowsFile(
      filePath,
      rows.map((row) => row.toRecord()),
      mode,
    );

    const verb = until === "extract" ? "Extracted" : "Transformed";
    console.log(`${verb} ${rows.length} row(s) to ${filePath}`);
    return filePath;
  } finally {
    logger.close();
  }
}

function parseMode(value: string | undefined): RowFileFormat {
  if (value === undefined) return "json";
  if (!isRowFileFormat(value)) {
    throw new BatchwrightError(`Unknown mode "${value}" (expected ${ROW_FILE_FORMATS.join(" or ")})`);
  }
  return value;
}
