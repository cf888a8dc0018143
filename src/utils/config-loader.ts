/**
 * Store configuration loader
 */

import type { StoreSection } from "../lib/rules/types.js";
import type {
  MongoConnection,
  MongoStoreOptions,
} from "../lib/store/types.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

export const ENV_MONGO_URI = "FIELDCHECK_MONGO_URI";
export const ENV_MONGO_DATABASE = "FIELDCHECK_MONGO_DATABASE";

/**
 * CLI options for the record store
 */
export interface StoreCliOptions {
  uri?: string;
  database?: string;
  idField?: string;
}

export type StoreConfig = MongoConnection & MongoStoreOptions;

export const DEFAULT_STORE_CONFIG = {
  idField: "_id",
} as const;

/**
 * Load store configuration from CLI options, the rules document and the
 * environment
 *
 * @param cliOptions - CLI flags
 * @param configFile - `store` section of the rules document
 * @param env - Environment variables
 * @returns Merged configuration with defaults applied
 *
 * @example
 * const config = loadStoreConfig(
 *   { database: "staging" },
 *   { uri: "mongodb://localhost:27017", database: "app" },
 * );
 * // Returns: database "staging" (CLI takes precedence)
 */
export function loadStoreConfig(
  cliOptions: StoreCliOptions = {},
  configFile: StoreSection = {},
  env: NodeJS.ProcessEnv = process.env,
): StoreConfig {
  // Build config with precedence: CLI > config file > environment > defaults
  const config: StoreConfig = {
    uri: cliOptions.uri ?? configFile.uri ?? env[ENV_MONGO_URI] ?? "",
    database:
      cliOptions.database ?? configFile.database ?? env[ENV_MONGO_DATABASE] ?? "",
    idField:
      cliOptions.idField ?? configFile.idField ?? DEFAULT_STORE_CONFIG.idField,
    formats: configFile.formats ?? {},
  };

  validateStoreConfig(config);

  logger.debug("Store config loaded", {
    database: config.database,
    idField: config.idField,
    formats: Object.keys(config.formats ?? {}),
  });

  return config;
}

/**
 * Validate store configuration
 *
 * @throws ConfigError if a required setting is missing or malformed
 */
export function validateStoreConfig(config: StoreConfig): void {
  if (config.uri === "") {
    throw new ConfigError(
      `MongoDB URI is required (--uri, store.uri or ${ENV_MONGO_URI})`,
    );
  }

  if (!/^mongodb(\+srv)?:\/\//.test(config.uri)) {
    throw new ConfigError("MongoDB URI must start with mongodb:// or mongodb+srv://");
  }

  if (config.database === "") {
    throw new ConfigError(
      `Database name is required (--database, store.database or ${ENV_MONGO_DATABASE})`,
    );
  }

  if (config.idField === "") {
    throw new ConfigError("idField must not be empty");
  }
}
