import type { JobConfig } from "./config.js";
import type { Ledger } from "./ledger.js";
import type { LedgerStore } from "./ledger-store.js";
import { logPipelineEvent, type EventLogger } from "./logger.js";

export type LedgerRegistryOptions = {
  jobs: readonly JobConfig[];
  store: LedgerStore;
  logger: EventLogger;
};

/**
 * Cache of other jobs' persisted ledgers, keyed by job name. A miss loads the
 * latest `{job}-ledger-*` file from the job's ledger directory; entries stay
 * until `unload` drops them.
 */
export class LedgerRegistry {
  private readonly cache = new Map<string, Ledger>();
  private readonly jobs: ReadonlyMap<string, JobConfig>;

  constructor(private readonly options: LedgerRegistryOptions) {
    this.jobs = new Map(options.jobs.map((job) => [job.name, job]));
  }

  /** Returns null, with a warning, when the job or its ledger file does not exist. */
  async get(name: string): Promise<Ledger | null> {
    const cached = this.cache.get(name);
    if (cached) return cached;

    const job = this.jobs.get(name);
    if (!job) {
      logPipelineEvent(this.options.logger, "registry.job.missing", {
        level: "warn",
        ledger: name,
      });
      return null;
    }

    const { store } = this.options;
    const directory = store.directoryFor(job.ledger.path);
    const filePath = await store.findLatest(directory, name);
    if (!filePath) {
      logPipelineEvent(this.options.logger, "registry.ledger.missing", {
        level: "warn",
        ledger: name,
        directory,
      });
      return null;
    }

    const ledger = await store.read(filePath, name);
    if (!ledger) return null;

    this.cache.set(name, ledger);
    logPipelineEvent(this.options.logger, "registry.ledger.loaded", {
      level: "debug",
      ledger: name,
      file: filePath,
      entries: ledger.size,
    });
    return ledger;
  }

  isLoaded(name: string): boolean {
    return this.cache.has(name);
  }

  loadedNames(): string[] {
    return [...this.cache.keys()];
  }

  unload(name: string): boolean {
    return this.cache.delete(name);
  }

  clear(): void {
    this.cache.clear();
  }
}
