import { describe, expect, it } from "vitest";

import { Ledger, applyLedgerSchema } from "./ledger.js";
import { Row } from "./row.js";

describe("Ledger", () => {
  it("records entries stamped with the row uid", () => {
    const ledger = new Ledger("posts");
    const row = Row.from({ title: "Hello" }, "row-1");

    const entry = ledger.record(row, { id: 10, uid: "ignored" });

    expect(entry).toEqual({ id: 10, uid: "row-1" });
    expect(ledger.size).toBe(1);
    expect(ledger.isEmpty()).toBe(false);
  });

  it("indexes entries by uid in insertion order", () => {
    const ledger = new Ledger("terms", [
      { uid: "a", id: 1 },
      { uid: "b", id: 2 },
      { uid: "a", id: 3 },
    ]);

    expect(ledger.findByUid("a").map((entry) => entry.id)).toEqual([1, 3]);
    expect([...ledger.indexByUid().keys()]).toEqual(["a", "b"]);
  });

  it("truncates back to an earlier size", () => {
    const ledger = new Ledger("posts", [{ uid: "a" }, { uid: "b" }, { uid: "c" }]);

    ledger.truncate(1);

    expect(ledger.entries()).toEqual([{ uid: "a" }]);
  });

  it("renames without losing entries or schema", () => {
    const ledger = new Ledger("loader", [{ uid: "a" }], { id: "integer" });
    const renamed = ledger.rename("job");

    expect(renamed.name).toBe("job");
    expect(renamed.entries()).toEqual([{ uid: "a" }]);
    expect(renamed.schema).toEqual({ id: "integer" });
  });
});

describe("applyLedgerSchema", () => {
  it("coerces declared fields and leaves the others alone", () => {
    const { entries, issues } = applyLedgerSchema(
      [{ uid: "a", id: "42", published: "true", tags: "news", note: 5 }],
      { id: "integer", published: "boolean", tags: "array", label: "string" },
    );

    expect(issues).toEqual([]);
    expect(entries).toEqual([{ uid: "a", id: 42, published: true, tags: ["news"], note: 5 }]);
  });

  it("keeps values that cannot be coerced and reports them", () => {
    const { entries, issues } = applyLedgerSchema([{ uid: "a", id: "forty" }], { id: "integer" });

    expect(entries).toEqual([{ uid: "a", id: "forty" }]);
    expect(issues).toHaveLength(1);
    expect(issues[0].uid).toBe("a");
    expect(issues[0].field).toBe("id");
  });

  it("lets null through for every declared type", () => {
    const { entries, issues } = applyLedgerSchema([{ uid: "a", id: null, title: null }], {
      id: "number",
      title: "string",
    });

    expect(issues).toEqual([]);
    expect(entries).toEqual([{ uid: "a", id: null, title: null }]);
  });
});
