import path from "node:path";

import { z } from "zod";

import { parseStepOptions, type AdapterEnvironment } from "../../core/adapters.js";
import type { LoadStep } from "../../core/config.js";
import { RecoverableWriteError } from "../../core/errors.js";
import { BaseLoader, type LedgerFields, type LoadContext, type Loader } from "../../core/loader.js";
import { logPipelineEvent } from "../../core/logger.js";
import type { PhaseContext } from "../../core/phases.js";
import type { Batch, Row, RowRecord } from "../../core/row.js";
import { writeRowsFile, type RowFileFormat } from "../../core/row-files.js";

const FileLoadOptionsSchema = z.object({
  destination: z.object({
    path: z.string().min(1),
    file: z.string().min(1),
  }),
  /** Write only fields under this prefix, with the prefix stripped. */
  prefix: z.string().min(1).optional(),
  /** Keep the configured file name instead of suffixing it with the run id. */
  overwrite: z.boolean().default(false),
  /** Row field that receives `<file>#<position>` for loaders later in the chain. */
  emit_id: z.string().min(1).optional(),
});

export type FileLoadOptions = z.infer<typeof FileLoadOptionsSchema>;

/**
 * Keeps the job's rows in one JSON or CSV file, rewritten after every batch.
 * Each row's ledger entry names the file and its 1-based position there; a
 * batch whose write fails leaves no entries, no rows and no mutations behind.
 */
export class FileLoader extends BaseLoader {
  private readonly records: RowRecord[] = [];
  private fileName: string | null = null;

  constructor(
    step: LoadStep,
    private readonly options: FileLoadOptions,
    private readonly outputDir: string,
    private readonly format: RowFileFormat,
  ) {
    super(step);
  }

  protected async loadRow(row: Row, context: LoadContext): Promise<LedgerFields> {
    const fileName = this.resolveFileName(context.runId);
    const position = this.records.length + 1;
    const id = `${fileName}#${position}`;

    const written = this.options.emit_id ? this.mutateRow(row, { [this.options.emit_id]: id }) : row;
    this.records.push(this.options.prefix ? written.selectPrefix(this.options.prefix) : written.toRecord());

    return { file: fileName, position, id };
  }

  async load(batch: Batch, context: LoadContext): Promise<void> {
    const buffered = this.records.length;
    const recorded = this.ledger?.size ?? 0;

    await super.load(batch, context);
    if (this.records.length === buffered) return;

    const filePath = this.filePath(context.runId);
    try {
      await writeRowsFile(filePath, this.records, this.format);
    } catch (error) {
      this.records.splice(buffered);
      this.ledger?.truncate(recorded);
      this.discardMutatedRows();
      throw new RecoverableWriteError(`Failed to write ${filePath}`, error);
    }
  }

  async finish(context: PhaseContext): Promise<void> {
    if (this.records.length === 0) return;

    logPipelineEvent(context.logger, "load.file.written", {
      job: context.job.name,
      loader: this.name,
      file: this.filePath(context.runId),
      rows: this.records.length,
    });
  }

  private filePath(runId: string): string {
    return path.join(this.outputDir, this.resolveFileName(runId));
  }

  private resolveFileName(runId: string): string {
    if (!this.fileName) {
      const { file } = this.options.destination;
      const extension = path.extname(file) || `.${this.format}`;
      const base = path.basename(file, path.extname(file));
      this.fileName = this.options.overwrite ? `${base}${extension}` : `${base}-${runId}${extension}`;
    }
    return this.fileName;
  }
}

function createFileLoader(format: RowFileFormat) {
  return (step: LoadStep, env: AdapterEnvironment): Loader => {
    const options = parseStepOptions(FileLoadOptionsSchema, step, env);
    const outputDir = path.resolve(env.config.output.path, options.destination.path);
    return new FileLoader(step, options, outputDir, format);
  };
}

export const createJsonFileLoader = createFileLoader("json");
export const createCsvFileLoader = createFileLoader("csv");
