import { z } from "zod";

import {
  parseStepOptions,
  requireDependency,
  type AdapterEnvironment,
  type Transformer,
} from "../../core/adapters.js";
import type { TransformStep } from "../../core/config.js";
import { MissingDependencyDataError } from "../../core/errors.js";
import type { LedgerEntry } from "../../core/ledger.js";
import { logPipelineEvent } from "../../core/logger.js";
import type { PhaseContext } from "../../core/phases.js";
import type { Row, RowValue } from "../../core/row.js";

const LookupOptionsSchema = z.object({
  /** Job whose persisted ledger is searched. */
  job: z.string().min(1),
  /** Row field holding the value to look up. */
  key: z.string().min(1),
  /** Ledger field compared against the row's key. */
  match: z.string().min(1),
  /** Ledger field → row field to copy from the matching entry. */
  fields: z.record(z.string().min(1)),
  required: z.boolean().default(false),
});

export type LookupOptions = z.infer<typeof LookupOptionsSchema>;

/**
 * Enriches rows from a dependency's ledger: the first entry whose `match`
 * field equals the row's `key` field supplies the mapped fields. Rows without
 * a match get null in those fields. A row whose key holds several values
 * gets one value per key, in key order.
 */
export class LookupTransformer implements Transformer {
  constructor(private readonly options: LookupOptions) {}

  async transform(rows: readonly Row[], context: PhaseContext): Promise<Row[]> {
    const ledger = await context.registry.get(this.options.job);
    if (!ledger) {
      if (this.options.required) {
        throw new MissingDependencyDataError(context.job.name, this.options.job);
      }
      logPipelineEvent(context.logger, "transform.lookup.unavailable", {
        job: context.job.name,
        level: "warn",
        source: this.options.job,
      });
      return [...rows];
    }

    const index = new Map<string, LedgerEntry>();
    for (const entry of ledger.entries()) {
      const value = entry[this.options.match];
      if (value === undefined || value === null || Array.isArray(value)) continue;
      const key = String(value);
      if (!index.has(key)) index.set(key, entry);
    }

    let misses = 0;
    const enriched = rows.map((row) => {
      const key = row.get(this.options.key);
      const keys: Array<RowValue | undefined> = Array.isArray(key) ? key : [key];
      const entries = keys.map((item) =>
        item === undefined || item === null || Array.isArray(item) ? undefined : index.get(String(item)),
      );
      misses += entries.filter((entry) => entry === undefined).length;
      return row.with(this.pick(entries, Array.isArray(key)));
    });

    if (misses > 0) {
      logPipelineEvent(context.logger, "transform.lookup.misses", {
        job: context.job.name,
        level: "debug",
        source: this.options.job,
        misses,
      });
    }

    return enriched;
  }

  private pick(entries: Array<LedgerEntry | undefined>, many: boolean): Record<string, RowValue> {
    const out: Record<string, RowValue> = {};
    for (const [ledgerField, rowField] of Object.entries(this.options.fields)) {
      const values = entries.map((entry) => entry?.[ledgerField] ?? null);
      out[rowField] = many ? values : values[0] ?? null;
    }
    return out;
  }
}

export function createLookupTransformer(step: TransformStep, env: AdapterEnvironment): Transformer {
  const options = parseStepOptions(LookupOptionsSchema, step, env);
  requireDependency(options.job, env);
  return new LookupTransformer(options);
}
