import path from "node:path";

import { stringify } from "csv-stringify/sync";
import fse from "fs-extra";

import type { RowRecord } from "./row.js";
import { writeJsonFile } from "./utils.js";

export type RowFileFormat = "json" | "csv";

export const ROW_FILE_FORMATS: readonly RowFileFormat[] = ["json", "csv"];

export function isRowFileFormat(value: string): value is RowFileFormat {
  return value === "json" || value === "csv";
}

/** Every field name in order of first appearance. */
export function csvColumns(records: readonly RowRecord[]): string[] {
  const columns = new Set<string>();
  for (const record of records) {
    for (const name of Object.keys(record)) {
      columns.add(name);
    }
  }
  return [...columns];
}

// Rows go in as arrays: dotted field names are column titles, not paths.
// Nulls become empty cells, lists a JSON array.
export function toCsv(records: readonly RowRecord[]): string {
  const columns = csvColumns(records);
  const lines = records.map((record) => columns.map((column) => record[column] ?? null));
  return stringify([columns, ...lines], {
    cast: { boolean: (value) => String(value) },
  });
}

export async function writeRowsFile(
  filePath: string,
  records: readonly RowRecord[],
  format: RowFileFormat,
): Promise<void> {
  if (format === "json") {
    await writeJsonFile(filePath, records);
    return;
  }
  await fse.ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, toCsv(records), "utf8");
}
