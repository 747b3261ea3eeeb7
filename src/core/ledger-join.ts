import { LEDGER_UID_FIELD, Ledger, type LedgerEntry, type LedgerValue } from "./ledger.js";

export type LedgerJoinResult = {
  ledger: Ledger;
  /** Secondary entries with no primary entry for their uid, per secondary ledger. */
  unmatched: Record<string, number>;
};

/**
 * Left-joins `secondaries` onto `primary` by uid.
 *
 * Every primary entry yields exactly one output entry. Secondary fields are
 * added as `<secondary name>.<field>`; when several secondary entries share a
 * uid their values are collected into an array, one slot per entry, with
 * `null` where an entry lacks the field. Secondary entries whose uid is not in
 * the primary are dropped and counted in `unmatched`.
 */
export function leftJoinLedgers(
  name: string,
  primary: Ledger,
  secondaries: readonly Ledger[],
): LedgerJoinResult {
  const primaryUids = new Set(primary.entries().map((entry) => entry[LEDGER_UID_FIELD]));
  const indexes = secondaries.map((secondary) => ({
    name: secondary.name,
    byUid: secondary.indexByUid(),
  }));

  const unmatched: Record<string, number> = {};
  for (const secondary of secondaries) {
    unmatched[secondary.name] = secondary
      .entries()
      .filter((entry) => !primaryUids.has(entry[LEDGER_UID_FIELD])).length;
  }

  const joined = new Ledger(name, [], primary.schema);
  for (const entry of primary.entries()) {
    const output: LedgerEntry = { ...entry };

    for (const index of indexes) {
      const matches = index.byUid.get(entry[LEDGER_UID_FIELD]);
      if (!matches) continue;
      Object.assign(output, namespaceMatches(index.name, matches));
    }

    joined.append(output);
  }

  return { ledger: joined, unmatched };
}

function namespaceMatches(
  prefix: string,
  matches: readonly LedgerEntry[],
): Record<string, LedgerValue> {
  const fields: string[] = [];
  for (const match of matches) {
    for (const field of Object.keys(match)) {
      if (field !== LEDGER_UID_FIELD && !fields.includes(field)) {
        fields.push(field);
      }
    }
  }

  const out: Record<string, LedgerValue> = {};
  for (const field of fields) {
    const key = `${prefix}.${field}`;
    out[key] =
      matches.length === 1
        ? matches[0][field]
        : matches.map((match) => (field in match ? match[field] : null));
  }
  return out;
}
