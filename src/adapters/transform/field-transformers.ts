import { minimatch } from "minimatch";
import { z } from "zod";

import { parseStepOptions, type AdapterEnvironment, type Transformer } from "../../core/adapters.js";
import type { TransformStep } from "../../core/config.js";
import { ROW_UID_FIELD, type Row, type RowValue } from "../../core/row.js";
import { slugify } from "../../core/utils.js";

// Row-by-row transformers; none of them looks beyond the row it is given.

export class RowMapTransformer implements Transformer {
  constructor(private readonly map: (row: Row) => Row) {}

  async transform(rows: readonly Row[]): Promise<Row[]> {
    return rows.map((row) => this.map(row));
  }
}

function matchesAny(name: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(name, pattern, { dot: true }));
}

// =============================================================================
// RENAME
// =============================================================================

const RenameOptionsSchema = z.object({
  fields: z.record(z.string().min(1)),
});

export function renameFields(row: Row, fields: Record<string, string>): Row {
  const changes: Record<string, RowValue> = {};
  const removed: string[] = [];

  for (const [from, to] of Object.entries(fields)) {
    const value = row.get(from);
    if (value === undefined || from === ROW_UID_FIELD) continue;
    changes[to] = value;
    removed.push(from);
  }

  return row.without(...removed.filter((name) => !(name in changes))).with(changes);
}

export function createRenameTransformer(step: TransformStep, env: AdapterEnvironment): Transformer {
  const { fields } = parseStepOptions(RenameOptionsSchema, step, env);
  return new RowMapTransformer((row) => renameFields(row, fields));
}

// =============================================================================
// SELECT
// =============================================================================

const SelectOptionsSchema = z.object({
  include: z.array(z.string().min(1)).default(["**"]),
  exclude: z.array(z.string().min(1)).default([]),
});

/** Keeps fields matching an `include` pattern and no `exclude` pattern; the uid always stays. */
export function selectFields(row: Row, include: readonly string[], exclude: readonly string[]): Row {
  const dropped = row
    .names()
    .filter((name) => name !== ROW_UID_FIELD)
    .filter((name) => !matchesAny(name, include) || matchesAny(name, exclude));
  return dropped.length > 0 ? row.without(...dropped) : row;
}

export function createSelectTransformer(step: TransformStep, env: AdapterEnvironment): Transformer {
  const { include, exclude } = parseStepOptions(SelectOptionsSchema, step, env);
  return new RowMapTransformer((row) => selectFields(row, include, exclude));
}

// =============================================================================
// TO SLUG
// =============================================================================

const ToSlugOptionsSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1).optional(),
});

export function createToSlugTransformer(step: TransformStep, env: AdapterEnvironment): Transformer {
  const { from, to } = parseStepOptions(ToSlugOptionsSchema, step, env);
  return new RowMapTransformer((row) => {
    const value = row.get(from);
    if (typeof value !== "string") return row;
    return row.with({ [to ?? from]: slugify(value) });
  });
}

// =============================================================================
// STRING TO NULL
// =============================================================================

const StringToNullOptionsSchema = z.object({
  value: z.string().default(""),
  fields: z.array(z.string().min(1)).default(["**"]),
});

/** Sets every matching field whose value equals `value` to null. */
export function stringToNull(row: Row, value: string, fields: readonly string[]): Row {
  const changes: Record<string, RowValue> = {};
  for (const [name, current] of row.entries()) {
    if (current === value && matchesAny(name, fields)) {
      changes[name] = null;
    }
  }
  return Object.keys(changes).length > 0 ? row.with(changes) : row;
}

export function createStringToNullTransformer(
  step: TransformStep,
  env: AdapterEnvironment,
): Transformer {
  const { value, fields } = parseStepOptions(StringToNullOptionsSchema, step, env);
  return new RowMapTransformer((row) => stringToNull(row, value, fields));
}

// =============================================================================
// EXPLODE
// =============================================================================

const ExplodeOptionsSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1).optional(),
  delimiter: z.string().min(1).default(","),
});

export function createExplodeTransformer(step: TransformStep, env: AdapterEnvironment): Transformer {
  const { from, to, delimiter } = parseStepOptions(ExplodeOptionsSchema, step, env);
  return new RowMapTransformer((row) => {
    const value = row.get(from);
    if (typeof value !== "string") return row;
    const parts = value
      .split(delimiter)
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    return row.with({ [to ?? from]: parts });
  });
}
