import { describe, expect, it } from "vitest";

import {
  CircularDependencyError,
  DuplicateJobError,
  OrderViolationError,
  UnknownDependencyError,
} from "./errors.js";
import { buildJobGraph, validateJobGraph, type JobNode } from "./job-graph.js";

function job(name: string, depends_on: string[] = [], skip = false): JobNode {
  return { name, depends_on, skip };
}

// Deterministic generator so the property checks are reproducible.
function seeded(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

describe("buildJobGraph", () => {
  it("records dependencies and declaration order", () => {
    const graph = buildJobGraph([job("terms"), job("posts", ["terms", " terms "])]);

    expect(graph.get("terms")).toEqual({ dependencies: [], index: 0 });
    expect(graph.get("posts")).toEqual({ dependencies: ["terms"], index: 1 });
  });
});

describe("validateJobGraph", () => {
  it("accepts a linear chain and keeps configuration order", () => {
    const result = validateJobGraph([job("a"), job("b", ["a"]), job("c", ["b"])]);

    expect(result.ok).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.plan).toEqual({ order: ["a", "b", "c"], skipped: [], excluded: [] });
  });

  it("reports a two-job cycle with its full path", () => {
    const result = validateJobGraph([job("a", ["b"]), job("b", ["a"])]);

    const cycles = result.errors.filter((error) => error instanceof CircularDependencyError);
    expect(result.ok).toBe(false);
    expect(cycles).toHaveLength(1);
    expect(cycles[0].message).toBe("Circular dependency: a -> b -> a");
    expect(cycles[0].jobs).toEqual(["a", "b"]);
    expect(result.plan.order).toEqual([]);
    expect(result.plan.excluded).toEqual(["a", "b"]);
  });

  it("names every job on a longer cycle once", () => {
    const result = validateJobGraph([job("a", ["c"]), job("b", ["a"]), job("c", ["b"])]);

    const cycles = result.errors.filter((error) => error instanceof CircularDependencyError);
    expect(cycles).toHaveLength(1);
    expect(cycles[0].message).toBe("Circular dependency: a -> c -> b -> a");
  });

  it("reports each distinct cycle", () => {
    const result = validateJobGraph([
      job("a", ["b"]),
      job("b", ["a"]),
      job("c", ["d"]),
      job("d", ["c"]),
      job("e"),
    ]);

    const messages = result.errors
      .filter((error) => error instanceof CircularDependencyError)
      .map((error) => error.message);
    expect(messages).toEqual([
      "Circular dependency: a -> b -> a",
      "Circular dependency: c -> d -> c",
    ]);
    expect(result.plan.order).toEqual(["e"]);
  });

  it("treats a self dependency as a cycle", () => {
    const result = validateJobGraph([job("a", ["a"])]);

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].message).toBe("Circular dependency: a -> a");
  });

  it("reports the exact missing dependency name", () => {
    const result = validateJobGraph([job("a", ["ghost"])]);

    expect(result.errors).toHaveLength(1);
    const [error] = result.errors;
    expect(error).toBeInstanceOf(UnknownDependencyError);
    if (!(error instanceof UnknownDependencyError)) return;
    expect(error.dependency).toBe("ghost");
    expect(error.job).toBe("a");
    expect(error.message).toBe("Dependency 'ghost' required by 'a' does not exist");
  });

  it("rejects a dependency declared after its dependent", () => {
    const result = validateJobGraph([job("b", ["a"]), job("a")]);

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(OrderViolationError);
    expect(result.errors[0].message).toBe("Job 'b' depends on 'a' but is declared before it");
    expect(result.plan).toEqual({ order: ["a"], skipped: [], excluded: ["b"] });
  });

  it("collects every violation instead of stopping at the first", () => {
    const result = validateJobGraph([job("a", ["missing"]), job("b", ["c"]), job("c")]);

    expect(result.errors.map((error) => error.kind)).toEqual([
      "unknown_dependency",
      "order_violation",
    ]);
  });

  it("excludes jobs downstream of an invalid job", () => {
    const result = validateJobGraph([job("a", ["x"]), job("b", ["a"]), job("c")]);

    expect(result.plan.excluded).toEqual(["a", "b"]);
    expect(result.plan.order).toEqual(["c"]);
  });

  it("flags duplicate job names", () => {
    const result = validateJobGraph([job("a"), job("a")]);

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(DuplicateJobError);
    expect(result.plan.excluded).toEqual(["a"]);
  });

  it("lists skipped jobs apart while still accepting them as dependencies", () => {
    const result = validateJobGraph([job("a", [], true), job("b", ["a"])]);

    expect(result.ok).toBe(true);
    expect(result.plan).toEqual({ order: ["b"], skipped: ["a"], excluded: [] });
  });

  it("accepts any acyclic graph whose dependencies come first", () => {
    const random = seeded(7);

    for (let round = 0; round < 25; round += 1) {
      const size = 1 + Math.floor(random() * 10);
      const jobs: JobNode[] = [];
      for (let index = 0; index < size; index += 1) {
        const deps = jobs.filter(() => random() < 0.3).map((earlier) => earlier.name);
        jobs.push(job(`job-${index}`, deps));
      }

      const result = validateJobGraph(jobs);
      expect(result.ok).toBe(true);
      expect(result.plan.order).toEqual(jobs.map((item) => item.name));
    }
  });

  it("finds a cycle in any graph that contains one", () => {
    const random = seeded(11);

    for (let round = 0; round < 25; round += 1) {
      const size = 2 + Math.floor(random() * 8);
      const names = Array.from({ length: size }, (_, index) => `job-${index}`);
      const cycleLength = 1 + Math.floor(random() * size);
      const jobs = names.map((name, index) => {
        if (index < cycleLength) {
          return job(name, [names[(index + 1) % cycleLength]]);
        }
        return job(name, [names[index - 1]]);
      });

      const cycles = validateJobGraph(jobs).errors.filter(
        (error) => error instanceof CircularDependencyError,
      );
      expect(cycles).toHaveLength(1);
      expect(new Set(cycles[0].jobs)).toEqual(new Set(names.slice(0, cycleLength)));
    }
  });
});
