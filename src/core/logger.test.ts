import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { MemoryLogger, makeTemporaryDirectory } from "./__tests__/fakes.js";
import {
  JsonlLogger,
  ScopedLogger,
  eventWithTs,
  logPipelineError,
  logPipelineEvent,
  resolveDebugFlagFromArgv,
} from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function readEvents(logPath: string): unknown[] {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line): unknown => JSON.parse(line));
}

describe("JsonlLogger", () => {
  it("writes events with run and job metadata", () => {
    const logPath = path.join(makeTemporaryDirectory("jsonl-logger-"), "nested", "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-1", job: "posts" });

    logger.log({ type: "job.built", payload: { message: "hello" } });
    logger.close();

    const events = readEvents(logPath);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: "job.built",
      level: "info",
      run_id: "run-1",
      job: "posts",
      payload: { message: "hello" },
    });
    expect(events[0]).toHaveProperty("ts", expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/));
  });

  it("appends events without clobbering previous lines", () => {
    const logPath = path.join(makeTemporaryDirectory("jsonl-logger-"), "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-2" });

    logger.log({ type: "first", payload: { order: 1 } });
    logger.log({ type: "second", payload: { order: 2 } });
    logger.close();

    expect(readEvents(logPath)).toMatchObject([
      { type: "first", payload: { order: 1 } },
      { type: "second", payload: { order: 2 } },
    ]);
  });

  it("keeps pipeline helper fields at the top level", () => {
    const logPath = path.join(makeTemporaryDirectory("jsonl-logger-"), "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-3" });

    logPipelineEvent(logger, "load.batch.complete", {
      job: "posts",
      level: "debug",
      batch: 1,
      failed_loaders: ["db"],
    });
    logger.close();

    expect(readEvents(logPath)[0]).toMatchObject({
      type: "load.batch.complete",
      run_id: "run-3",
      job: "posts",
      level: "debug",
      batch: 1,
      failed_loaders: ["db"],
    });
  });

  it("ignores events logged after close", () => {
    const logPath = path.join(makeTemporaryDirectory("jsonl-logger-"), "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-4" });

    logger.log({ type: "kept" });
    logger.close();
    logger.log({ type: "dropped" });
    logger.close();

    expect(readEvents(logPath)).toMatchObject([{ type: "kept" }]);
  });

  it("warns on write failures with formatted messages", () => {
    const logPath = path.join(makeTemporaryDirectory("jsonl-logger-"), "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-5" });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "job.built" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
  });
});

describe("ScopedLogger", () => {
  it("fills in the job unless the event names one", () => {
    const inner = new MemoryLogger();
    const logger = new ScopedLogger(inner, { job: "posts" });

    logger.log({ type: "phase.start" });
    logger.log({ type: "dependency.missing", job: "terms" });

    expect(inner.events).toEqual([
      { type: "phase.start", job: "posts" },
      { type: "dependency.missing", job: "terms" },
    ]);
  });
});

describe("logPipelineError", () => {
  it("logs the error message and name at error level", () => {
    const logger = new MemoryLogger();

    logPipelineError(logger, "job.failed", new TypeError("bad row"), { job: "posts" });

    expect(logger.events).toEqual([
      { type: "job.failed", level: "error", job: "posts", error: "bad row", error_name: "TypeError" },
    ]);
  });

  it("lets callers lower the level and handles non-error values", () => {
    const logger = new MemoryLogger();

    logPipelineError(logger, "load.loader.warning", "timeout", { level: "warn" });

    expect(logger.events).toEqual([
      { type: "load.loader.warning", level: "warn", error: "timeout", error_name: "Error" },
    ]);
  });
});

describe("eventWithTs", () => {
  it("merges defaults and payload", () => {
    const event = eventWithTs({ type: "sample", payload: { key: "value" } }, { runId: "run-x", job: "posts" });

    expect(event.run_id).toBe("run-x");
    expect(event.job).toBe("posts");
    expect(event.type).toBe("sample");
    expect(event.level).toBe("info");
    expect(event.payload).toEqual({ key: "value" });
    expect(new Date(event.ts).toString()).not.toBe("Invalid Date");
  });

  it("normalizes Date timestamps", () => {
    const event = eventWithTs({ type: "sample", ts: new Date(Date.UTC(2024, 0, 2)) }, { runId: "run-x" });

    expect(event.ts).toBe("2024-01-02T00:00:00.000Z");
  });

  it("throws when runId is missing", () => {
    expect(() => eventWithTs({ type: "missing-run" })).toThrow(/run_id is required/i);
  });
});

describe("resolveDebugFlagFromArgv", () => {
  it("takes the last debug flag before the argument separator", () => {
    expect(resolveDebugFlagFromArgv(["node", "cli", "--debug", "--no-debug"])).toBe(false);
    expect(resolveDebugFlagFromArgv(["node", "cli", "--debug", "--", "--no-debug"])).toBe(true);
    expect(resolveDebugFlagFromArgv(["node", "cli"])).toBeUndefined();
  });
});
