import { randomUUID } from "node:crypto";

// =============================================================================
// TYPES
// =============================================================================

export type RowScalar = string | number | boolean | null;
export type RowValue = RowScalar | RowValue[];
export type RowRecord = Record<string, RowValue>;

/** Field every row carries; ledgers and mutations correlate on it. */
export const ROW_UID_FIELD = "etl.uid";

export type Batch = readonly Row[];

/** Replacement rows keyed by row uid, as handed back by a mutating loader. */
export type MutatedRows = ReadonlyMap<string, Row>;

// =============================================================================
// ROW
// =============================================================================

/**
 * An immutable, ordered set of named fields. Every change returns a new Row,
 * so a batch handed to one loader is never edited under another's feet.
 */
export class Row {
  private readonly fields: ReadonlyMap<string, RowValue>;

  private constructor(fields: Map<string, RowValue>) {
    this.fields = fields;
  }

  static from(record: RowRecord, uid?: string): Row {
    const fields = new Map<string, RowValue>();
    const existingUid = record[ROW_UID_FIELD];
    const resolvedUid =
      uid ?? (typeof existingUid === "string" && existingUid.length > 0 ? existingUid : randomUUID());

    fields.set(ROW_UID_FIELD, resolvedUid);
    for (const [name, value] of Object.entries(record)) {
      if (name === ROW_UID_FIELD) continue;
      fields.set(name, value);
    }

    return new Row(fields);
  }

  get uid(): string {
    const value = this.fields.get(ROW_UID_FIELD);
    return typeof value === "string" ? value : String(value);
  }

  get size(): number {
    return this.fields.size;
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  get(name: string): RowValue | undefined {
    return this.fields.get(name);
  }

  names(): string[] {
    return [...this.fields.keys()];
  }

  entries(): Array<[string, RowValue]> {
    return [...this.fields.entries()];
  }

  with(changes: RowRecord): Row {
    const fields = new Map(this.fields);
    for (const [name, value] of Object.entries(changes)) {
      if (name === ROW_UID_FIELD) continue;
      fields.set(name, value);
    }
    return new Row(fields);
  }

  without(...names: string[]): Row {
    const fields = new Map(this.fields);
    for (const name of names) {
      if (name === ROW_UID_FIELD) continue;
      fields.delete(name);
    }
    return new Row(fields);
  }

  /** Fields whose name starts with `<prefix>.`, with the prefix stripped. */
  selectPrefix(prefix: string): RowRecord {
    const normalized = prefix.endsWith(".") ? prefix : `${prefix}.`;
    const out: RowRecord = {};
    for (const [name, value] of this.fields) {
      if (name.startsWith(normalized)) {
        out[name.slice(normalized.length)] = value;
      }
    }
    return out;
  }

  toRecord(): RowRecord {
    return Object.fromEntries(this.fields);
  }
}

// =============================================================================
// BATCH HELPERS
// =============================================================================

export function createRows(records: RowRecord[]): Row[] {
  return records.map((record) => Row.from(record));
}

export function chunkRows(rows: readonly Row[], size: number): Row[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`Batch size must be a positive integer (received ${size})`);
  }

  const chunks: Row[][] = [];
  for (let index = 0; index < rows.length; index += size) {
    chunks.push(rows.slice(index, index + size));
  }
  return chunks;
}

/**
 * Swaps in the replacement for every row whose uid appears in `mutations`;
 * all other rows pass through as the same instances.
 */
export function applyMutations(batch: Batch, mutations: MutatedRows): Row[] {
  if (mutations.size === 0) return [...batch];
  return batch.map((row) => mutations.get(row.uid) ?? row);
}
