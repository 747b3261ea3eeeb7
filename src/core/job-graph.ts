import {
  CircularDependencyError,
  DuplicateJobError,
  OrderViolationError,
  UnknownDependencyError,
  type ValidationError,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

/** The slice of a job definition the graph cares about. */
export type JobNode = {
  name: string;
  depends_on: readonly string[];
  skip?: boolean;
};

export type JobGraphEntry = {
  dependencies: string[];
  index: number;
};

export type JobGraph = Map<string, JobGraphEntry>;

export type ExecutionPlan = {
  /** Runnable jobs in configuration order. */
  order: string[];
  /** Jobs marked `skip`; still valid dependency targets. */
  skipped: string[];
  /** Jobs removed because of a violation on them or on something they depend on. */
  excluded: string[];
};

export type JobGraphValidation = {
  ok: boolean;
  errors: ValidationError[];
  plan: ExecutionPlan;
};

// =============================================================================
// GRAPH
// =============================================================================

export function buildJobGraph(jobs: readonly JobNode[]): JobGraph {
  const graph: JobGraph = new Map();

  jobs.forEach((job, index) => {
    if (graph.has(job.name)) return;
    graph.set(job.name, { dependencies: normalizeDependencies(job.depends_on), index });
  });

  return graph;
}

/**
 * Checks the whole graph and collects every violation: duplicate names,
 * cycles, unknown dependencies and dependencies declared after their
 * dependents.
 */
export function validateJobGraph(jobs: readonly JobNode[]): JobGraphValidation {
  const graph = buildJobGraph(jobs);
  const errors: ValidationError[] = [];

  errors.push(...findDuplicateJobs(jobs));
  errors.push(...findCycles(graph));

  for (const [name, entry] of graph) {
    for (const dependency of entry.dependencies) {
      const target = graph.get(dependency);
      if (!target) {
        errors.push(new UnknownDependencyError(name, dependency));
        continue;
      }
      if (target.index > entry.index) {
        errors.push(new OrderViolationError(name, dependency));
      }
    }
  }

  return {
    ok: errors.length === 0,
    errors,
    plan: buildExecutionPlan(jobs, graph, errors),
  };
}

// =============================================================================
// CYCLES
// =============================================================================

/**
 * Depth-first search with an explicit active path. Each distinct cycle is
 * reported once, as the path from its first node back to itself.
 */
export function findCycles(graph: JobGraph): CircularDependencyError[] {
  const finished = new Set<string>();
  const path: string[] = [];
  const onPath = new Set<string>();
  const seenCycles = new Set<string>();
  const cycles: CircularDependencyError[] = [];

  const visit = (node: string): void => {
    if (onPath.has(node)) {
      const cycle = [...path.slice(path.indexOf(node)), node];
      const key = canonicalCycleKey(cycle);
      if (!seenCycles.has(key)) {
        seenCycles.add(key);
        cycles.push(new CircularDependencyError(cycle));
      }
      return;
    }

    if (finished.has(node)) return;

    const entry = graph.get(node);
    if (!entry) return;

    path.push(node);
    onPath.add(node);

    for (const dependency of entry.dependencies) {
      visit(dependency);
    }

    path.pop();
    onPath.delete(node);
    finished.add(node);
  };

  for (const node of graph.keys()) {
    visit(node);
  }

  return cycles;
}

// Rotations of one cycle share a key: start from the smallest name.
function canonicalCycleKey(cycle: readonly string[]): string {
  const ring = cycle.slice(0, -1);
  let start = 0;
  ring.forEach((name, index) => {
    if (name < ring[start]) start = index;
  });
  return [...ring.slice(start), ...ring.slice(0, start)].join("\u0000");
}

// =============================================================================
// PLAN
// =============================================================================

function buildExecutionPlan(
  jobs: readonly JobNode[],
  graph: JobGraph,
  errors: readonly ValidationError[],
): ExecutionPlan {
  const invalid = new Set<string>();
  for (const error of errors) {
    for (const job of error.jobs) invalid.add(job);
  }

  // Anything downstream of an invalid job cannot run either.
  let changed = true;
  while (changed) {
    changed = false;
    for (const [name, entry] of graph) {
      if (invalid.has(name)) continue;
      if (entry.dependencies.some((dependency) => invalid.has(dependency))) {
        invalid.add(name);
        changed = true;
      }
    }
  }

  const plan: ExecutionPlan = { order: [], skipped: [], excluded: [] };
  const placed = new Set<string>();

  for (const job of jobs) {
    if (placed.has(job.name)) continue;
    placed.add(job.name);

    if (invalid.has(job.name)) {
      plan.excluded.push(job.name);
    } else if (job.skip) {
      plan.skipped.push(job.name);
    } else {
      plan.order.push(job.name);
    }
  }

  return plan;
}

function findDuplicateJobs(jobs: readonly JobNode[]): DuplicateJobError[] {
  const seen = new Set<string>();
  const reported = new Set<string>();
  const errors: DuplicateJobError[] = [];

  for (const job of jobs) {
    if (seen.has(job.name) && !reported.has(job.name)) {
      reported.add(job.name);
      errors.push(new DuplicateJobError(job.name));
    }
    seen.add(job.name);
  }

  return errors;
}

function normalizeDependencies(values: readonly string[]): string[] {
  return Array.from(new Set(values.map((value) => value.trim()).filter((value) => value.length > 0)));
}
