import { parse } from "csv-parse/sync";
import fse from "fs-extra";
import { z } from "zod";

import { parseStepOptions, type AdapterEnvironment, type Extractor } from "../../core/adapters.js";
import type { ExtractStep } from "../../core/config.js";
import { ConfigError } from "../../core/errors.js";
import { sourcePath } from "../../core/paths.js";
import { Row } from "../../core/row.js";

import { normalizeRecord, uidFrom } from "./json-file.js";

const CsvExtractOptionsSchema = z.object({
  file: z.string().min(1),
  delimiter: z.string().min(1).default(","),
  prefix: z.string().min(1).optional(),
  /** Column (after normalization) whose value becomes the row uid. */
  uid: z.string().min(1).optional(),
});

export type CsvExtractOptions = z.infer<typeof CsvExtractOptionsSchema>;

const CsvRecordsSchema = z.array(z.record(z.string()));

/**
 * Reads a CSV file with a header line below `sources.path`. Column titles are
 * normalized like JSON keys; every value stays a string.
 */
export class CsvFileExtractor implements Extractor {
  constructor(
    private readonly filePath: string,
    private readonly options: CsvExtractOptions,
  ) {}

  async extract(): Promise<Row[]> {
    const text = await fse.readFile(this.filePath, "utf8");

    let parsed: unknown;
    try {
      parsed = parse(text, {
        columns: true,
        trim: true,
        skip_empty_lines: true,
        delimiter: this.options.delimiter,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Invalid CSV in ${this.filePath}: ${reason}`, error);
    }

    const records = CsvRecordsSchema.parse(parsed);
    return records.map((item) => {
      const record = normalizeRecord(item, this.options.prefix);
      return Row.from(record, uidFrom(record, this.options.uid));
    });
  }
}

export function createCsvFileExtractor(step: ExtractStep, env: AdapterEnvironment): Extractor {
  const options = parseStepOptions(CsvExtractOptionsSchema, step, env);
  return new CsvFileExtractor(sourcePath(env.config, options.file), options);
}
