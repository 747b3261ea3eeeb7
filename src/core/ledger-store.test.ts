import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { makeTemporaryDirectory } from "./__tests__/fakes.js";
import { LedgerError } from "./errors.js";
import { Ledger, type LedgerEntry } from "./ledger.js";
import { LedgerStore, ledgerFileName, parseLedgerTimestamp } from "./ledger-store.js";

const ENTRIES: LedgerEntry[] = [
  { uid: "r1", id: 1, title: "First" },
  { uid: "r2", id: 2, title: "Second", tags: ["a", "b"] },
];

describe("ledger file names", () => {
  it("embeds the name and timestamp", () => {
    expect(ledgerFileName("posts", "20240301-101500-000", "json")).toBe(
      "posts-ledger-20240301-101500-000.json",
    );
  });

  it("parses the timestamp back only for the matching name", () => {
    const fileName = "posts-ledger-20240301-101500-000.json";

    expect(parseLedgerTimestamp(fileName, "posts", "json")).toBe("20240301-101500-000");
    expect(parseLedgerTimestamp(fileName, "post", "json")).toBeNull();
    expect(parseLedgerTimestamp(fileName, "posts", "jsonl")).toBeNull();
  });

  it("does not mistake a loader's ledger for its job's", () => {
    const fileName = "posts-ledger-ledger-20240301-101500-000.json";

    expect(parseLedgerTimestamp(fileName, "posts", "json")).toBeNull();
    expect(parseLedgerTimestamp(fileName, "posts-ledger", "json")).toBe("20240301-101500-000");
  });
});

describe("LedgerStore", () => {
  it("round trips entries in order as a JSON array", async () => {
    const root = makeTemporaryDirectory("ledger-store-");
    const store = new LedgerStore({ root });

    const { filePath } = await store.write(root, new Ledger("posts", ENTRIES), "20240301-101500-000");
    const loaded = await store.read(filePath, "posts");

    expect(JSON.parse(fs.readFileSync(filePath, "utf8"))).toEqual(ENTRIES);
    expect(loaded?.entries()).toEqual(ENTRIES);
  });

  it("round trips entries in order as JSON lines", async () => {
    const root = makeTemporaryDirectory("ledger-store-");
    const store = new LedgerStore({ root, format: "jsonl" });

    const { filePath } = await store.write(root, new Ledger("posts", ENTRIES), "20240301-101500-000");
    const lines = fs.readFileSync(filePath, "utf8").trim().split("\n");
    const loaded = await store.read(filePath, "posts");

    expect(path.extname(filePath)).toBe(".jsonl");
    expect(lines).toHaveLength(2);
    expect(loaded?.entries()).toEqual(ENTRIES);
  });

  it("applies the ledger schema when writing", async () => {
    const root = makeTemporaryDirectory("ledger-store-");
    const store = new LedgerStore({ root });
    const ledger = new Ledger("posts", [{ uid: "r1", id: "7" }, { uid: "r2", id: "x" }], { id: "integer" });

    const { filePath, issues } = await store.write(root, ledger, "20240301-101500-000");

    expect(JSON.parse(fs.readFileSync(filePath, "utf8"))).toEqual([
      { uid: "r1", id: 7 },
      { uid: "r2", id: "x" },
    ]);
    expect(issues.map((issue) => issue.uid)).toEqual(["r2"]);
  });

  it("lists only the named ledger's files, oldest first", async () => {
    const root = makeTemporaryDirectory("ledger-store-");
    const store = new LedgerStore({ root });
    for (const name of [
      "posts-ledger-20240302-000000-000.json",
      "posts-ledger-20240301-000000-000.json",
      "posts-file-ledger-20240303-000000-000.json",
      "posts-ledger-20240304-000000-000.jsonl",
    ]) {
      fs.writeFileSync(path.join(root, name), "[]");
    }

    const files = await store.listFiles(root, "posts");

    expect(files.map((file) => path.basename(file))).toEqual([
      "posts-ledger-20240301-000000-000.json",
      "posts-ledger-20240302-000000-000.json",
    ]);
    expect(path.basename((await store.findLatest(root, "posts")) ?? "")).toBe(
      "posts-ledger-20240302-000000-000.json",
    );
  });

  it("returns nothing for a missing directory or file", async () => {
    const root = makeTemporaryDirectory("ledger-store-");
    const store = new LedgerStore({ root });

    expect(await store.findLatest(path.join(root, "absent"), "posts")).toBeNull();
    expect(await store.read(path.join(root, "absent.json"), "posts")).toBeNull();
  });

  it("rejects files that are not ledgers", async () => {
    const root = makeTemporaryDirectory("ledger-store-");
    const store = new LedgerStore({ root });
    const notArray = path.join(root, "a-ledger-1.json");
    const missingUid = path.join(root, "b-ledger-1.json");
    fs.writeFileSync(notArray, JSON.stringify({ uid: "r1" }));
    fs.writeFileSync(missingUid, JSON.stringify([{ id: 1 }]));

    await expect(store.read(notArray, "a")).rejects.toThrow(LedgerError);
    await expect(store.read(missingUid, "b")).rejects.toThrow(/Invalid ledger entry #1/);
  });

  it("resolves sub-directories below the root", () => {
    const store = new LedgerStore({ root: "/data/ledgers" });

    expect(store.directoryFor("cms")).toBe(path.resolve("/data/ledgers", "cms"));
    expect(store.directoryFor("")).toBe(path.resolve("/data/ledgers"));
  });
});
