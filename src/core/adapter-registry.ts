import type { MigrationConfig } from "./config.js";
import { UnknownAdapterError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type AdapterKind = "extractor" | "transformer" | "loader";

export type AdapterRegistration<TFactory> = {
  factory: TFactory;
  /** Destination entity type a loader creates; used to pick a job's primary ledger. */
  entity?: string;
};

// =============================================================================
// REGISTRY
// =============================================================================

/**
 * Maps a type tag from the config (`adapter`, `transformer`, `loader`) to the
 * factory that builds it. Tags are case-insensitive.
 */
export class AdapterRegistry<TFactory> {
  private readonly entries = new Map<string, AdapterRegistration<TFactory>>();

  constructor(public readonly kind: AdapterKind) {}

  register(type: string, factory: TFactory, options: { entity?: string } = {}): this {
    this.entries.set(normalizeType(type), { factory, entity: options.entity });
    return this;
  }

  has(type: string): boolean {
    return this.entries.has(normalizeType(type));
  }

  types(): string[] {
    return [...this.entries.keys()].sort();
  }

  entityOf(type: string): string | undefined {
    return this.entries.get(normalizeType(type))?.entity;
  }

  resolve(type: string, location: string): TFactory {
    const entry = this.entries.get(normalizeType(type));
    if (!entry) {
      throw new UnknownAdapterError(this.kind, type, location);
    }
    return entry.factory;
  }
}

function normalizeType(type: string): string {
  return type.trim().toLowerCase();
}

// =============================================================================
// CONFIG CHECK
// =============================================================================

export type AdapterRegistries = {
  extractors: Pick<AdapterRegistry<unknown>, "has">;
  transformers: Pick<AdapterRegistry<unknown>, "has">;
  loaders: Pick<AdapterRegistry<unknown>, "has">;
};

/**
 * Every step type in the config must resolve to a registered adapter.
 * Returns one error per unknown tag so the caller can report them together.
 */
export function checkAdapterTypes(
  config: MigrationConfig,
  registries: AdapterRegistries,
): UnknownAdapterError[] {
  const errors: UnknownAdapterError[] = [];

  for (const job of config.migration) {
    job.extract.forEach((step, index) => {
      if (!registries.extractors.has(step.adapter)) {
        errors.push(new UnknownAdapterError("extractor", step.adapter, `${job.name}.extract[${index}]`));
      }
    });
    job.transform.forEach((step, index) => {
      if (!registries.transformers.has(step.transformer)) {
        errors.push(
          new UnknownAdapterError("transformer", step.transformer, `${job.name}.transform[${index}]`),
        );
      }
    });
    job.load.forEach((step, index) => {
      if (!registries.loaders.has(step.loader)) {
        errors.push(new UnknownAdapterError("loader", step.loader, `${job.name}.load[${index}]`));
      }
    });
  }

  return errors;
}
