import { z } from "zod";

import {
  parseStepOptions,
  requireDependency,
  type AdapterEnvironment,
  type Extractor,
} from "../../core/adapters.js";
import type { ExtractStep } from "../../core/config.js";
import { MissingDependencyDataError } from "../../core/errors.js";
import { logPipelineEvent } from "../../core/logger.js";
import type { PhaseContext } from "../../core/phases.js";
import { Row, type RowRecord } from "../../core/row.js";

const LedgerExtractOptionsSchema = z.object({
  job: z.string().min(1),
  prefix: z.string().min(1).optional(),
  required: z.boolean().default(false),
});

export type LedgerExtractOptions = z.infer<typeof LedgerExtractOptionsSchema>;

/**
 * Turns another job's persisted ledger into rows, one per entry. Fields are
 * prefixed with `prefix` (default: the source job's name); the entry's uid is
 * kept as `<prefix>.uid` and each row gets a fresh uid.
 */
export class LedgerExtractor implements Extractor {
  constructor(private readonly options: LedgerExtractOptions) {}

  async extract(context: PhaseContext): Promise<Row[]> {
    const ledger = await context.registry.get(this.options.job);
    if (!ledger) {
      if (this.options.required) {
        throw new MissingDependencyDataError(context.job.name, this.options.job);
      }
      logPipelineEvent(context.logger, "extract.ledger.empty", {
        job: context.job.name,
        level: "warn",
        source: this.options.job,
      });
      return [];
    }

    const prefix = this.options.prefix ?? this.options.job;
    return ledger.entries().map((entry) => {
      const record: RowRecord = {};
      for (const [field, value] of Object.entries(entry)) {
        record[`${prefix}.${field}`] = value;
      }
      return Row.from(record);
    });
  }
}

export function createLedgerExtractor(step: ExtractStep, env: AdapterEnvironment): Extractor {
  const options = parseStepOptions(LedgerExtractOptionsSchema, step, env);
  requireDependency(options.job, env);
  return new LedgerExtractor(options);
}
