import path from "node:path";

import type { MigrationConfig } from "./config.js";

export const DEFAULT_CONFIG_FILE = "batchwright.yaml";

// =============================================================================
// PATH HELPERS
// =============================================================================

export function resolveConfigPath(configPath?: string, cwd: string = process.cwd()): string {
  if (configPath) {
    return path.resolve(cwd, configPath);
  }

  if (process.env.BATCHWRIGHT_CONFIG) {
    return path.resolve(cwd, process.env.BATCHWRIGHT_CONFIG);
  }

  return path.join(cwd, DEFAULT_CONFIG_FILE);
}

export function runLogPath(config: MigrationConfig, runId: string): string {
  return path.join(config.logs.path, `${runId}.jsonl`);
}

/** Resolves a path from a step record against the sources directory. */
export function sourcePath(config: MigrationConfig, file: string): string {
  return path.resolve(config.sources.path, file);
}
