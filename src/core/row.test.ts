import { describe, expect, it } from "vitest";

import { ROW_UID_FIELD, Row, applyMutations, chunkRows, createRows } from "./row.js";

describe("Row", () => {
  it("always carries a uid field first", () => {
    const row = Row.from({ title: "Hello" }, "uid-1");

    expect(row.uid).toBe("uid-1");
    expect(row.names()).toEqual([ROW_UID_FIELD, "title"]);
  });

  it("keeps a uid already present in the record", () => {
    const row = Row.from({ [ROW_UID_FIELD]: "kept", title: "Hello" });

    expect(row.uid).toBe("kept");
  });

  it("generates distinct uids when none is given", () => {
    const [first, second] = createRows([{ n: 1 }, { n: 2 }]);

    expect(first.uid).not.toBe(second.uid);
    expect(first.uid.length).toBeGreaterThan(0);
  });

  it("returns a new row on change and leaves the original untouched", () => {
    const original = Row.from({ title: "Hello" }, "uid-1");
    const changed = original.with({ title: "Bye", slug: "bye" });

    expect(original.get("title")).toBe("Hello");
    expect(original.has("slug")).toBe(false);
    expect(changed.toRecord()).toEqual({ [ROW_UID_FIELD]: "uid-1", title: "Bye", slug: "bye" });
  });

  it("never lets the uid be changed or removed", () => {
    const row = Row.from({ title: "Hello" }, "uid-1");

    expect(row.with({ [ROW_UID_FIELD]: "other" }).uid).toBe("uid-1");
    expect(row.without(ROW_UID_FIELD, "title").toRecord()).toEqual({ [ROW_UID_FIELD]: "uid-1" });
  });

  it("selects prefixed fields with the prefix stripped", () => {
    const row = Row.from({ "post.title": "T", "post.meta.views": 3, "term.name": "N" }, "uid-1");

    expect(row.selectPrefix("post")).toEqual({ title: "T", "meta.views": 3 });
    expect(row.selectPrefix("term.")).toEqual({ name: "N" });
  });
});

describe("batch helpers", () => {
  it("chunks rows into batches of the given size", () => {
    const rows = createRows([{ n: 1 }, { n: 2 }, { n: 3 }]);

    expect(chunkRows(rows, 2).map((batch) => batch.length)).toEqual([2, 1]);
    expect(chunkRows([], 2)).toEqual([]);
  });

  it("rejects a batch size that is not a positive integer", () => {
    expect(() => chunkRows([], 0)).toThrow("Batch size must be a positive integer (received 0)");
  });

  it("swaps in mutated rows by uid and keeps the rest as the same instances", () => {
    const first = Row.from({ n: 1 }, "a");
    const second = Row.from({ n: 2 }, "b");
    const replacement = second.with({ id: "dest-2" });

    const result = applyMutations(
      [first, second],
      new Map([
        ["b", replacement],
        ["not-in-batch", Row.from({ n: 9 }, "not-in-batch")],
      ]),
    );

    expect(result).toHaveLength(2);
    expect(result[0]).toBe(first);
    expect(result[1]).toBe(replacement);
  });
});
