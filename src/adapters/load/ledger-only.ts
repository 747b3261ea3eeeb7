import { z } from "zod";

import { parseStepOptions, type AdapterEnvironment } from "../../core/adapters.js";
import type { LoadStep } from "../../core/config.js";
import { BaseLoader, type LedgerFields, type Loader } from "../../core/loader.js";
import type { Row } from "../../core/row.js";

const LedgerLoadOptionsSchema = z.object({
  prefix: z.string().min(1).default("ledger"),
});

/**
 * Writes nothing anywhere; records every `<prefix>.*` field of a row (the
 * prefix stripped) as that row's ledger entry. Rows without such fields
 * record nothing.
 */
export class LedgerOnlyLoader extends BaseLoader {
  constructor(
    step: LoadStep,
    private readonly prefix: string,
  ) {
    // Recording is the whole point of this loader, so its ledger is always on.
    super(step.ledger === false ? { ...step, ledger: true } : step);
  }

  protected async loadRow(row: Row): Promise<LedgerFields | void> {
    const fields = row.selectPrefix(this.prefix);
    return Object.keys(fields).length > 0 ? fields : undefined;
  }
}

export function createLedgerOnlyLoader(step: LoadStep, env: AdapterEnvironment): Loader {
  const { prefix } = parseStepOptions(LedgerLoadOptionsSchema, step, env);
  return new LedgerOnlyLoader(step, prefix);
}
