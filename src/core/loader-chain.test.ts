import { afterEach, describe, expect, it, vi } from "vitest";

import {
  MemoryLogger,
  ScriptedLoader,
  buildConfig,
  buildContext,
  makeTemporaryDirectory,
} from "./__tests__/fakes.js";
import { FatalPipelineError, RecoverableWriteError } from "./errors.js";
import { LoaderChain, requestGarbageCollection } from "./loader-chain.js";
import type { LoadContext } from "./loader.js";
import type { ProgressReporter } from "./progress.js";
import { Row } from "./row.js";

function rows(): Row[] {
  return [Row.from({ n: 1 }, "r1"), Row.from({ n: 2 }, "r2"), Row.from({ n: 3 }, "r3")];
}

function context(logger = new MemoryLogger()): LoadContext {
  const config = buildConfig(makeTemporaryDirectory("loader-chain-"), [{ name: "posts" }]);
  return buildContext(config, config.migration[0], { logger });
}

class RecordingProgress implements ProgressReporter {
  readonly calls: Array<[string, number]> = [];

  rowsProcessed(loader: string, count: number): void {
    this.calls.push([loader, count]);
  }
}

function chain(loaders: ScriptedLoader[], logger = new MemoryLogger(), progress = new RecordingProgress()) {
  return new LoaderChain(loaders, { logger, progress, reclaim: () => undefined });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("LoaderChain", () => {
  it("shows later loaders the rows a loader mutated and the originals for the rest", async () => {
    const input = rows();
    const a = new ScriptedLoader("A");
    const b = new ScriptedLoader("B", {
      mutate: (row) => (row.uid === "r2" ? { dest_id: "b-2" } : null),
    });
    const c = new ScriptedLoader("C");

    const result = await chain([a, b, c]).run(input, context());

    const seenByC = c.seen[0];
    expect(seenByC[0]).toBe(input[0]);
    expect(seenByC[2]).toBe(input[2]);
    expect(seenByC[1].uid).toBe("r2");
    expect(seenByC[1].get("dest_id")).toBe("b-2");
    expect(seenByC[1].get("n")).toBe(2);
    expect(result.batch).toEqual(seenByC);
    expect(result.outcomes.map((outcome) => outcome.mutated)).toEqual([0, 1, 0]);
  });

  it("stacks mutations from several loaders in chain order", async () => {
    const a = new ScriptedLoader("A", { mutate: () => ({ a: true }) });
    const b = new ScriptedLoader("B", {
      mutate: (row) => (row.uid === "r1" ? { b: row.get("a") === true } : null),
    });
    const c = new ScriptedLoader("C");

    await chain([a, b, c]).run(rows(), context());

    expect(b.seen[0].every((row) => row.get("a") === true)).toBe(true);
    expect(c.seen[0].map((row) => row.toRecord())).toEqual([
      { "etl.uid": "r1", n: 1, a: true, b: true },
      { "etl.uid": "r2", n: 2, a: true },
      { "etl.uid": "r3", n: 3, a: true },
    ]);
  });

  it("continues past a recoverable write error with the last good batch", async () => {
    const logger = new MemoryLogger();
    const input = rows();
    const b = new ScriptedLoader("B", {
      mutate: () => ({ touched: true }),
      failOn: (row) => (row.uid === "r2" ? new RecoverableWriteError("destination busy") : null),
    });
    const c = new ScriptedLoader("C");

    const result = await chain([new ScriptedLoader("A"), b, c], logger).run(input, context(logger));

    expect(c.seen[0]).toEqual(input);
    expect(result.outcomes.map((outcome) => outcome.status)).toEqual(["ok", "recoverable_error", "ok"]);
    expect(logger.ofType("load.loader.warning")).toEqual([
      {
        type: "load.loader.warning",
        level: "warn",
        job: "posts",
        loader: "B",
        batch: 0,
        error: "destination busy",
        error_name: "RecoverableWriteError",
      },
    ]);
  });

  it("logs any other loader error and still runs the rest of the chain", async () => {
    const logger = new MemoryLogger();
    const failing = new ScriptedLoader("B", { failBatch: new Error("boom") });
    const c = new ScriptedLoader("C");

    const result = await chain([failing, c], logger).run(rows(), context(logger));

    expect(c.seen).toHaveLength(1);
    expect(result.outcomes[0]).toEqual({ loader: "B", status: "error", mutated: 0, error: "boom" });
    const [event] = logger.ofType("load.loader.failed");
    expect(event.level).toBe("error");
    expect(event.loader).toBe("B");
  });

  it("lets a fatal error stop the chain", async () => {
    const c = new ScriptedLoader("C");
    const fatal = new ScriptedLoader("B", { failBatch: new FatalPipelineError("stop") });

    await expect(chain([fatal, c]).run(rows(), context())).rejects.toThrow("stop");
    expect(c.seen).toHaveLength(0);
  });

  it("reports rows processed after every loader", async () => {
    const progress = new RecordingProgress();

    await chain([new ScriptedLoader("A"), new ScriptedLoader("B")], new MemoryLogger(), progress).run(
      rows(),
      context(),
    );

    expect(progress.calls).toEqual([
      ["A", 3],
      ["B", 3],
    ]);
  });

  it("reclaims resources once per batch", async () => {
    const reclaim = vi.fn();
    const loaderChain = new LoaderChain([new ScriptedLoader("A")], {
      logger: new MemoryLogger(),
      progress: new RecordingProgress(),
      reclaim,
    });

    await loaderChain.run(rows(), context());
    await loaderChain.run(rows(), context());

    expect(reclaim).toHaveBeenCalledTimes(2);
  });
});

describe("requestGarbageCollection", () => {
  it("calls the runtime's collector when one is exposed", () => {
    const gc = vi.fn();
    vi.stubGlobal("gc", gc);

    requestGarbageCollection();

    expect(gc).toHaveBeenCalledTimes(1);
  });

  it("does nothing when no collector is exposed", () => {
    vi.stubGlobal("gc", undefined);

    expect(() => requestGarbageCollection()).not.toThrow();
  });
});
