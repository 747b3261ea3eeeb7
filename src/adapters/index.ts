import { createAdapterRegistries, type Adapters } from "../core/adapters.js";

import { createCsvFileExtractor } from "./extract/csv-file.js";
import { createJsonFileExtractor } from "./extract/json-file.js";
import { createLedgerExtractor } from "./extract/ledger-source.js";
import { createCsvFileLoader, createJsonFileLoader } from "./load/file.js";
import { createLedgerOnlyLoader } from "./load/ledger-only.js";
import {
  createExplodeTransformer,
  createRenameTransformer,
  createSelectTransformer,
  createStringToNullTransformer,
  createToSlugTransformer,
} from "./transform/field-transformers.js";
import { createLookupTransformer } from "./transform/lookup.js";

/** Registries preloaded with the built-in adapters; callers may register more. */
export function createDefaultAdapters(): Adapters {
  const adapters = createAdapterRegistries();

  adapters.extractors
    .register("json", createJsonFileExtractor)
    .register("csv", createCsvFileExtractor)
    .register("ledger", createLedgerExtractor);

  adapters.transformers
    .register("rename", createRenameTransformer)
    .register("select", createSelectTransformer)
    .register("to_slug", createToSlugTransformer)
    .register("string_to_null", createStringToNullTransformer)
    .register("explode", createExplodeTransformer)
    .register("lookup", createLookupTransformer);

  adapters.loaders
    .register("json", createJsonFileLoader, { entity: "json_document" })
    .register("csv", createCsvFileLoader, { entity: "csv_document" })
    .register("ledger", createLedgerOnlyLoader);

  return adapters;
}
