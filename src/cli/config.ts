import type { MigrationConfig } from "../core/config.js";
import { loadMigrationConfig } from "../core/config-loader.js";
import { resolveConfigPath } from "../core/paths.js";

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export function loadConfigForCli(args: LoadConfigForCliArgs = {}): {
  config: MigrationConfig;
  configPath: string;
} {
  const configPath = resolveConfigPath(args.explicitConfigPath, args.cwd);
  return { config: loadMigrationConfig(configPath), configPath };
}
