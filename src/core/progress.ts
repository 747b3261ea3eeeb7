import { logPipelineEvent, type EventLogger } from "./logger.js";

/** Receives "rows processed" notifications from the loader chain. */
export interface ProgressReporter {
  rowsProcessed(loader: string, count: number): void;
}

/**
 * Per-loader row totals for one job run. Each notification is also logged as
 * a `load.progress` event.
 */
export class LoadProgress implements ProgressReporter {
  private readonly counts = new Map<string, number>();

  constructor(
    private readonly logger: EventLogger,
    private readonly job: string,
  ) {}

  rowsProcessed(loader: string, count: number): void {
    const total = (this.counts.get(loader) ?? 0) + count;
    this.counts.set(loader, total);
    logPipelineEvent(this.logger, "load.progress", {
      job: this.job,
      level: "debug",
      loader,
      rows: count,
      total,
    });
  }

  total(loader: string): number {
    return this.counts.get(loader) ?? 0;
  }

  totals(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}

export const silentProgress: ProgressReporter = {
  rowsProcessed: () => undefined,
};
