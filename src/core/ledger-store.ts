import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

import fg from "fast-glob";
import fse from "fs-extra";

import { LedgerError } from "./errors.js";
import { Ledger, LedgerEntrySchema, applyLedgerSchema, type LedgerEntry } from "./ledger.js";
import { formatErrorMessage } from "./error-format.js";
import { isMissingFile } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type LedgerFormat = "json" | "jsonl";

export type LedgerStoreOptions = {
  root: string;
  format?: LedgerFormat;
};

export type LedgerWriteResult = {
  filePath: string;
  issues: ReturnType<typeof applyLedgerSchema>["issues"];
};

const LEDGER_MARKER = "-ledger-";
const TIMESTAMP_PATTERN = /^\d{8}-\d{6}-\d{3}$/;

// =============================================================================
// FILE NAMES
// =============================================================================

export function ledgerFileName(name: string, timestamp: string, format: LedgerFormat): string {
  return `${name}${LEDGER_MARKER}${timestamp}.${format}`;
}

/** Returns the timestamp segment when `fileName` is a ledger file for `name`. */
export function parseLedgerTimestamp(
  fileName: string,
  name: string,
  format: LedgerFormat,
): string | null {
  const prefix = `${name}${LEDGER_MARKER}`;
  const suffix = `.${format}`;
  if (!fileName.startsWith(prefix) || !fileName.endsWith(suffix)) {
    return null;
  }

  const timestamp = fileName.slice(prefix.length, fileName.length - suffix.length);
  // `posts-ledger-ledger-{ts}` belongs to a loader named `posts-ledger`, not to `posts`.
  return TIMESTAMP_PATTERN.test(timestamp) ? timestamp : null;
}

// =============================================================================
// STORE
// =============================================================================

/**
 * Reads and writes ledger files below a root directory:
 * `{root}/{subdir}/{name}-ledger-{timestamp}.{format}`.
 */
export class LedgerStore {
  readonly root: string;
  readonly format: LedgerFormat;

  constructor(options: LedgerStoreOptions) {
    this.root = path.resolve(options.root);
    this.format = options.format ?? "json";
  }

  directoryFor(subdir?: string): string {
    return subdir ? path.resolve(this.root, subdir) : this.root;
  }

  async write(directory: string, ledger: Ledger, timestamp: string): Promise<LedgerWriteResult> {
    const filePath = path.join(directory, ledgerFileName(ledger.name, timestamp, this.format));
    const { entries, issues } = ledger.schema
      ? applyLedgerSchema(ledger.entries(), ledger.schema)
      : { entries: [...ledger.entries()], issues: [] };

    await writeFileAtomic(filePath, serializeEntries(entries, this.format));
    return { filePath, issues };
  }

  async listFiles(directory: string, name: string): Promise<string[]> {
    const exists = await fse.pathExists(directory);
    if (!exists) return [];

    const pattern = `${fg.escapePath(name)}${LEDGER_MARKER}*.${this.format}`;
    const matches = await fg(pattern, { cwd: directory, onlyFiles: true });

    return matches
      .map((fileName) => ({
        fileName,
        timestamp: parseLedgerTimestamp(fileName, name, this.format),
      }))
      .filter((match): match is { fileName: string; timestamp: string } => match.timestamp !== null)
      .sort((a, b) => a.timestamp.localeCompare(b.timestamp))
      .map((match) => path.join(directory, match.fileName));
  }

  async findLatest(directory: string, name: string): Promise<string | null> {
    const files = await this.listFiles(directory, name);
    return files.length > 0 ? files[files.length - 1] : null;
  }

  async read(filePath: string, name: string): Promise<Ledger | null> {
    const raw = await fs.readFile(filePath, "utf8").catch((error: unknown) => {
      if (isMissingFile(error)) return null;
      throw error;
    });

    if (raw === null) {
      return null;
    }

    return new Ledger(name, parseEntries(raw, filePath, this.format));
  }
}

// =============================================================================
// SERIALIZATION
// =============================================================================

function serializeEntries(entries: readonly LedgerEntry[], format: LedgerFormat): string {
  if (format === "jsonl") {
    return entries.map((entry) => JSON.stringify(entry)).join("\n") + (entries.length ? "\n" : "");
  }
  return `${JSON.stringify(entries, null, 2)}\n`;
}

function parseEntries(raw: string, filePath: string, format: LedgerFormat): LedgerEntry[] {
  const records: unknown[] = [];

  if (format === "jsonl") {
    const lines = raw.split("\n").filter((line) => line.trim().length > 0);
    lines.forEach((line, index) => {
      records.push(parseJson(line, `${filePath}:${index + 1}`));
    });
  } else {
    const parsed = parseJson(raw, filePath);
    if (!Array.isArray(parsed)) {
      throw new LedgerError(`Ledger file ${filePath} must contain a JSON array of entries`);
    }
    records.push(...parsed);
  }

  return records.map((record, index) => {
    const parsed = LedgerEntrySchema.safeParse(record);
    if (!parsed.success) {
      throw new LedgerError(
        `Invalid ledger entry #${index + 1} in ${filePath}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
          .join(", ")}`,
        parsed.error,
      );
    }
    return parsed.data;
  });
}

function parseJson(raw: string, location: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new LedgerError(`Invalid JSON in ledger ${location}: ${formatErrorMessage(error)}`, error);
  }
}

// =============================================================================
// IO HELPERS
// =============================================================================

async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));

  const temporaryPath = `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(temporaryPath, "w");

  try {
    await handle.writeFile(content, "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(temporaryPath, filePath);
  } catch (error) {
    await handle.close().catch(() => undefined);
    await fse.remove(temporaryPath).catch(() => undefined);
    throw error;
  }
}
