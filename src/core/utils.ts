import path from "node:path";

import fse from "fs-extra";

export function slugify(input: string): string {
  return input
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 80);
}

export function toSnakeCase(input: string): string {
  return input
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[^A-Za-z0-9.]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
}

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultRunId(date: Date = new Date()): string {
  // YYYYMMDD-HHMMSS
  return compactTimestamp(date).slice(0, 15);
}

/** YYYYMMDD-HHMMSS-mmm in UTC; sorts lexicographically in time order. */
export function compactTimestamp(date: Date): string {
  const yyyy = date.getUTCFullYear();
  const mm = pad(date.getUTCMonth() + 1, 2);
  const dd = pad(date.getUTCDate(), 2);
  const hh = pad(date.getUTCHours(), 2);
  const mi = pad(date.getUTCMinutes(), 2);
  const ss = pad(date.getUTCSeconds(), 2);
  const ms = pad(date.getUTCMilliseconds(), 3);
  return `${yyyy}${mm}${dd}-${hh}${mi}${ss}-${ms}`;
}

export function splitList(value?: string): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf8");
}

export function isMissingFile(err: unknown): boolean {
  if (!err || typeof err !== "object") return false;
  if (!("code" in err)) return false;
  return err.code === "ENOENT";
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}
