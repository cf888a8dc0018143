/**
 * Rules document validation using Ajv
 */

import { Ajv } from "ajv";
import type { ErrorObject } from "ajv";
import { ConfigError } from "../../utils/errors.js";
import { rulesDocumentSchema } from "./schema.js";
import type { RulesDocument } from "./types.js";

const ajv = new Ajv({
  strict: false, // Subschemas of oneOf carry no type of their own
  allErrors: true, // Collect all validation errors
});

const validateDocument = ajv.compile<RulesDocument>(rulesDocumentSchema);

export interface DocumentIssue {
  path: string;
  message: string;
}

function toIssue(error: ErrorObject): DocumentIssue {
  // For missing required properties, Ajv includes the field name in params
  const missing: unknown = error.params["missingProperty"];
  const path =
    error.keyword === "required" && typeof missing === "string"
      ? `${error.instancePath}/${missing}`
      : error.instancePath || "/";
  return {
    path,
    message: `${error.message ?? "invalid"} (keyword: ${error.keyword})`,
  };
}

/**
 * Check a parsed rules document against the schema
 *
 * @throws ConfigError listing every schema violation
 */
export function parseRulesDocument(raw: unknown): RulesDocument {
  if (validateDocument(raw)) {
    return raw;
  }
  const issues = (validateDocument.errors ?? []).map(toIssue);
  throw new ConfigError("Invalid rules document", { issues });
}
