/**
 * Rules and fixture file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { Ajv } from "ajv";
import { parse as parseYaml } from "yaml";
import { parseRulesDocument } from "../../lib/rules/document.js";
import type { RulesDocument } from "../../lib/rules/types.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { FixtureTables } from "./types.js";

/**
 * Read and decode a JSON or YAML file by extension
 */
function readStructuredFile(filePath: string, description: string): unknown {
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported ${description} format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read ${description}: ${filePath}`, undefined, {
      cause: error,
    });
  }

  try {
    const parsed: unknown = isYaml ? parseYaml(content) : JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new ConfigError(`Failed to parse ${description}: ${filePath}`, undefined, {
      cause: error,
    });
  }
}

/**
 * Parse and validate a rules file
 */
export function parseRulesFile(filePath: string): RulesDocument {
  logger.info("Parsing rules file", { filePath });

  const document = parseRulesDocument(readStructuredFile(filePath, "rules file"));

  logger.info("Rules file parsed successfully", {
    fields: Object.keys(document.fields).length,
    hasStoreConfig: document.store !== undefined,
  });
  return document;
}

const fixtureSchema = {
  type: "object",
  additionalProperties: {
    type: "array",
    items: {
      type: "object",
      properties: { id: { type: ["string", "number"] } },
      required: ["id"],
    },
  },
};

const validateFixtures = new Ajv({ strict: false }).compile<FixtureTables>(
  fixtureSchema,
);

/**
 * Parse a fixtures file: `{ "<table>": [{ "id": ..., ... }] }`
 */
export function parseFixturesFile(filePath: string): FixtureTables {
  const raw = readStructuredFile(filePath, "fixtures file");
  if (!validateFixtures(raw)) {
    throw new ConfigError(`Invalid fixtures file: ${filePath}`, {
      errors: (validateFixtures.errors ?? []).map(
        (error) => `${error.instancePath || "/"} ${error.message ?? "invalid"}`,
      ),
    });
  }

  logger.info("Fixtures loaded", {
    filePath,
    tables: Object.keys(raw),
  });
  return raw;
}
