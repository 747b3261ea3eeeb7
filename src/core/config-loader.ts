import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { MigrationConfigSchema, type MigrationConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// IMPORTS
// =============================================================================

type RawConfig = Record<string, unknown>;

/**
 * Reads `filePath` and every file it lists under `imports`, depth first.
 * Imported documents merge before the importing one; `migration` lists are
 * concatenated in import order. A file already visited is not read again.
 */
function readWithImports(filePath: string, visited: Set<string>): RawConfig {
  if (visited.has(filePath)) {
    return {};
  }
  visited.add(filePath);

  const doc = readYamlDocument(filePath);
  const expanded = expandEnv(doc, { file: filePath, trail: [] });
  if (expanded === undefined || expanded === null) {
    return {};
  }
  if (!isPlainObject(expanded)) {
    throw new ConfigError(`Config file ${filePath} must contain a YAML mapping.`);
  }

  const { imports, ...own } = expanded;
  const importList = normalizeImports(imports, filePath);
  const baseDir = path.dirname(filePath);

  let merged: RawConfig = {};
  for (const importPath of importList) {
    const resolved = path.resolve(baseDir, importPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Imported config ${importPath} not found (from ${filePath}).`);
    }
    merged = mergeConfigs(merged, resolveRelativePaths(readWithImports(resolved, visited), resolved));
  }

  return mergeConfigs(merged, own);
}

function normalizeImports(value: unknown, filePath: string): string[] {
  if (value === undefined || value === null) return [];
  if (typeof value === "string") return [value];
  if (Array.isArray(value) && value.every((item): item is string => typeof item === "string")) {
    return value;
  }
  throw new ConfigError(`"imports" in ${filePath} must be a path or a list of paths.`);
}

function mergeConfigs(base: RawConfig, next: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };

  for (const [key, value] of Object.entries(next)) {
    const current = merged[key];
    if (key === "migration" && Array.isArray(current) && Array.isArray(value)) {
      merged[key] = [...current, ...value];
    } else if (isPlainObject(current) && isPlainObject(value)) {
      merged[key] = { ...current, ...value };
    } else {
      merged[key] = value;
    }
  }

  return merged;
}

// Path-valued settings of an imported file are relative to that file.
function resolveRelativePaths(config: RawConfig, filePath: string): RawConfig {
  const baseDir = path.dirname(filePath);
  const resolved: RawConfig = { ...config };

  for (const key of PATH_SECTIONS) {
    const section = resolved[key];
    if (isPlainObject(section) && typeof section.path === "string") {
      resolved[key] = { ...section, path: path.resolve(baseDir, section.path) };
    }
  }

  return resolved;
}

const PATH_SECTIONS = ["ledger", "sources", "logs", "output"] as const;

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Pass --config <path> or create batchwright.yaml in the working directory.";
const INVALID_CONFIG_HINT = "Fix the config file and rerun `batchwright validate`.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function readYamlDocument(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${filePath}`, err);
  }

  try {
    return yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    const location = resolveYamlErrorLocation(err);
    const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw new ConfigError(`Failed to parse YAML config at ${filePath}${locationDetail}: ${detail}`, err);
  }
}

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!error || typeof error !== "object" || !("mark" in error)) {
    return null;
  }

  const mark = error.mark;
  if (!mark || typeof mark !== "object" || !("line" in mark) || !("column" in mark)) {
    return null;
  }

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatConfigIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Migration config missing.",
    message: `Migration config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Migration config invalid.",
    message: `Migration config at ${configPath} is invalid.\n${cause.message}`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseMigrationConfig(doc: unknown, source = "<inline>"): MigrationConfig {
  const parsed = MigrationConfigSchema.safeParse(doc);
  if (!parsed.success) {
    const details = formatConfigIssues(parsed.error.issues);
    throw new ConfigError(`Invalid migration config at ${source}:\n${details}`, parsed.error);
  }
  return parsed.data;
}

export function loadMigrationConfig(configPath: string): MigrationConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    const merged = readWithImports(absolutePath, new Set());
    const cfg = parseMigrationConfig(merged, absolutePath);
    const configDir = path.dirname(absolutePath);

    // Normalize relative paths against the config directory for portability.
    return {
      ...cfg,
      ledger: { ...cfg.ledger, path: path.resolve(configDir, cfg.ledger.path) },
      sources: { ...cfg.sources, path: path.resolve(configDir, cfg.sources.path) },
      logs: { ...cfg.logs, path: path.resolve(configDir, cfg.logs.path) },
      output: { ...cfg.output, path: path.resolve(configDir, cfg.output.path) },
    };
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
