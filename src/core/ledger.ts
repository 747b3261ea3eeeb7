import { z } from "zod";

import type { Row } from "./row.js";

// =============================================================================
// TYPES
// =============================================================================

export type LedgerScalar = string | number | boolean | null;
export type LedgerValue = LedgerScalar | LedgerValue[];

/** Field carrying the uid of the row that produced a ledger entry. */
export const LEDGER_UID_FIELD = "uid";

export type LedgerEntry = { [LEDGER_UID_FIELD]: string } & Record<string, LedgerValue>;

export const LedgerFieldTypeSchema = z.enum(["string", "integer", "number", "boolean", "array"]);
export type LedgerFieldType = z.infer<typeof LedgerFieldTypeSchema>;

/** Declared field types, applied when the ledger is persisted. */
export type LedgerSchema = Record<string, LedgerFieldType>;

export const LedgerValueSchema: z.ZodType<LedgerValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(LedgerValueSchema)]),
);

export const LedgerEntrySchema = z
  .object({ [LEDGER_UID_FIELD]: z.string().min(1) })
  .catchall(LedgerValueSchema);

// =============================================================================
// LEDGER
// =============================================================================

/**
 * Append-only record of the side effects one loader (or one job) produced.
 */
export class Ledger {
  private readonly items: LedgerEntry[] = [];

  constructor(
    public readonly name: string,
    entries: Iterable<LedgerEntry> = [],
    public readonly schema: LedgerSchema | null = null,
  ) {
    for (const entry of entries) {
      this.items.push(entry);
    }
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  entries(): readonly LedgerEntry[] {
    return this.items;
  }

  append(entry: LedgerEntry): void {
    this.items.push({ ...entry });
  }

  /** Records an entry for `row`, stamping the row's uid onto it. */
  record(row: Row, fields: Record<string, LedgerValue>): LedgerEntry {
    const entry: LedgerEntry = { ...fields, [LEDGER_UID_FIELD]: row.uid };
    this.items.push(entry);
    return entry;
  }

  /** Forgets every entry recorded after the first `size`. */
  truncate(size: number): void {
    this.items.splice(Math.max(size, 0));
  }

  findByUid(uid: string): LedgerEntry[] {
    return this.items.filter((entry) => entry[LEDGER_UID_FIELD] === uid);
  }

  /** Index of entries by uid, preserving per-uid insertion order. */
  indexByUid(): Map<string, LedgerEntry[]> {
    const index = new Map<string, LedgerEntry[]>();
    for (const entry of this.items) {
      const bucket = index.get(entry[LEDGER_UID_FIELD]);
      if (bucket) {
        bucket.push(entry);
      } else {
        index.set(entry[LEDGER_UID_FIELD], [entry]);
      }
    }
    return index;
  }

  rename(name: string): Ledger {
    return new Ledger(name, this.items, this.schema);
  }
}

// =============================================================================
// SCHEMA COERCION
// =============================================================================

export type LedgerCoercionIssue = {
  uid: string;
  field: string;
  message: string;
};

/**
 * Coerces entry fields to their declared types. A field that cannot be
 * coerced keeps its recorded value and is reported in `issues`.
 */
export function applyLedgerSchema(
  entries: readonly LedgerEntry[],
  schema: LedgerSchema,
): { entries: LedgerEntry[]; issues: LedgerCoercionIssue[] } {
  const validators = Object.entries(schema).map(
    ([field, type]) => [field, fieldValidator(type)] as const,
  );
  const issues: LedgerCoercionIssue[] = [];
  const coerced: LedgerEntry[] = [];

  for (const entry of entries) {
    const next: LedgerEntry = { ...entry };

    for (const [field, validator] of validators) {
      if (!(field in entry) || field === LEDGER_UID_FIELD) continue;

      const parsed = validator.safeParse(entry[field]);
      if (parsed.success) {
        next[field] = parsed.data;
        continue;
      }

      issues.push({
        uid: entry[LEDGER_UID_FIELD],
        field,
        message: parsed.error.issues.map((issue) => issue.message).join("; "),
      });
    }

    coerced.push(next);
  }

  return { entries: coerced, issues };
}

function fieldValidator(type: LedgerFieldType): z.ZodType<LedgerValue, z.ZodTypeDef, unknown> {
  switch (type) {
    case "string":
      return z.union([z.null(), z.coerce.string()]);
    case "integer":
      return z.union([z.null(), z.coerce.number().int()]);
    case "number":
      return z.union([z.null(), z.coerce.number()]);
    case "boolean":
      return z.union([
        z.null(),
        z.boolean(),
        z.enum(["true", "false"]).transform((value) => value === "true"),
      ]);
    case "array":
      return z.union([
        z.null(),
        z.array(LedgerValueSchema),
        LedgerValueSchema.transform((value) => [value]),
      ]);
  }
}
