/**
 * Open the record store a CLI command runs against
 */

import { requiresStore } from "../lib/rules/builder.js";
import type { RulesDocument } from "../lib/rules/types.js";
import { MongoConnector } from "../lib/store/connector.js";
import { MemoryRecordStore } from "../lib/store/memory-store.js";
import type { RecordStore } from "../lib/store/types.js";
import { loadStoreConfig } from "../utils/config-loader.js";
import { parseFixturesFile } from "./config/parser.js";
import type { RulesCommandOptions } from "./config/types.js";

export interface OpenedStore {
  store?: RecordStore;
  close(): Promise<void>;
}

/**
 * Fixtures win over MongoDB; no store is opened when no rule needs one
 */
export async function openStore(
  options: RulesCommandOptions,
  document: RulesDocument,
): Promise<OpenedStore> {
  const formats = document.store?.formats;

  if (options.fixtures) {
    const store = new MemoryRecordStore(parseFixturesFile(options.fixtures), {
      formats,
    });
    return { store, close: async () => {} };
  }

  if (!requiresStore(document)) {
    return { close: async () => {} };
  }

  const config = loadStoreConfig(
    { uri: options.uri, database: options.database, idField: options.idField },
    document.store,
  );
  const connector = new MongoConnector();
  await connector.connect(config);
  return {
    store: connector.createStore({ idField: config.idField, formats }),
    close: () => connector.close(),
  };
}
