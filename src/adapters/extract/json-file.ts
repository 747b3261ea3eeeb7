import fse from "fs-extra";
import { z } from "zod";

import { parseStepOptions, type AdapterEnvironment, type Extractor } from "../../core/adapters.js";
import type { ExtractStep } from "../../core/config.js";
import { ConfigError } from "../../core/errors.js";
import { sourcePath } from "../../core/paths.js";
import { Row, type RowRecord, type RowValue } from "../../core/row.js";
import { toSnakeCase } from "../../core/utils.js";

const JsonExtractOptionsSchema = z.object({
  file: z.string().min(1),
  /** Dotted path to the array inside the document; the document itself when absent. */
  root: z.string().min(1).optional(),
  prefix: z.string().min(1).optional(),
  /** Row field (after normalization) whose value becomes the row uid. */
  uid: z.string().min(1).optional(),
});

export type JsonExtractOptions = z.infer<typeof JsonExtractOptionsSchema>;

/**
 * Reads an array of objects from a JSON file below `sources.path`. Nested
 * objects are flattened into dotted field names in snake_case.
 */
export class JsonFileExtractor implements Extractor {
  constructor(
    private readonly filePath: string,
    private readonly options: JsonExtractOptions,
  ) {}

  async extract(): Promise<Row[]> {
    const document: unknown = await fse.readJson(this.filePath);
    const items = this.options.root ? pickPath(document, this.options.root) : document;
    if (!Array.isArray(items)) {
      throw new ConfigError(`Expected a JSON array in ${this.filePath}${this.options.root ? ` at ${this.options.root}` : ""}`);
    }

    return items.map((item, index) => {
      if (!isRecord(item)) {
        throw new ConfigError(`Item #${index + 1} in ${this.filePath} is not an object`);
      }
      const record = normalizeRecord(item, this.options.prefix);
      return Row.from(record, uidFrom(record, this.options.uid));
    });
  }
}

export function createJsonFileExtractor(step: ExtractStep, env: AdapterEnvironment): Extractor {
  const options = parseStepOptions(JsonExtractOptionsSchema, step, env);
  return new JsonFileExtractor(sourcePath(env.config, options.file), options);
}

// =============================================================================
// NORMALIZATION
// =============================================================================

/** Flattens nested objects to dotted snake_case names, prefixed when asked. */
export function normalizeRecord(item: Record<string, unknown>, prefix?: string): RowRecord {
  const out: RowRecord = {};

  const visit = (value: unknown, name: string): void => {
    if (isRecord(value)) {
      for (const [key, nested] of Object.entries(value)) {
        visit(nested, `${name}.${toSnakeCase(key)}`);
      }
      return;
    }
    out[name] = toRowValue(value);
  };

  for (const [key, value] of Object.entries(item)) {
    visit(value, prefix ? `${prefix}.${toSnakeCase(key)}` : toSnakeCase(key));
  }

  return out;
}

/** The value of `field` as a row uid; none when the field is unset or empty. */
export function uidFrom(record: RowRecord, field?: string): string | undefined {
  if (!field) return undefined;
  const value = record[field];
  return value === undefined || value === null || value === "" ? undefined : String(value);
}

function toRowValue(value: unknown): RowValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => (isRecord(item) ? JSON.stringify(item) : toRowValue(item)));
  }
  return JSON.stringify(value);
}

function pickPath(document: unknown, dotted: string): unknown {
  let current: unknown = document;
  for (const key of dotted.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
