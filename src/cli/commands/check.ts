/**
 * Check CLI command
 */

import { Command } from "commander";
import { buildRuleSet } from "../../lib/rules/builder.js";
import type { CompiledRule } from "../../lib/rules/rule-set.js";
import { ConfigError, ErrorCode, toFieldCheckError } from "../../utils/errors.js";
import { parseRulesFile } from "../config/parser.js";
import type { CheckCommandOptions } from "../config/types.js";
import { openStore } from "../store.js";

export interface CheckReport {
  status: "success";
  field: string;
  value: unknown;
  error: string | null;
  passed: boolean;
}

const NUMERIC = /^-?\d+(\.\d+)?$/;

/**
 * Turn --value into the checked value. Without --json, numeric text is read
 * as a number for fields with a range rule.
 */
function parseValue(
  raw: string,
  asJson: boolean | undefined,
  rules: readonly CompiledRule[],
): unknown {
  if (!asJson) {
    const ranged = rules.some((rule) => rule.kind === "range");
    return ranged && NUMERIC.test(raw) ? Number(raw) : raw;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new ConfigError(`--value is not valid JSON: ${raw}`, undefined, {
      cause: error,
    });
  }
}

/**
 * Validate one value against a field's rules
 */
export async function runCheck(options: CheckCommandOptions): Promise<CheckReport> {
  const document = parseRulesFile(options.rules);
  const opened = await openStore(options, document);

  try {
    const rules = buildRuleSet(document, opened.store);
    const value = parseValue(options.value, options.json, rules.rulesFor(options.field));
    const result = await rules.validate(options.field, value, {
      editingRecordId: options.editingId ?? null,
    });
    return {
      status: "success",
      field: options.field,
      value: result.value,
      error: result.error,
      passed: result.error === null,
    };
  } finally {
    await opened.close();
  }
}

/**
 * Exit code for a failed command
 */
export function exitCodeFor(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.FILE_IO_ERROR:
      return 4;
    case ErrorCode.STORE_CONNECTION_ERROR:
      return 3;
    case ErrorCode.CONFIG_ERROR:
    case ErrorCode.RULE_ERROR:
      return 2;
    default:
      return 1;
  }
}

export function createCheckCommand(): Command {
  return new Command("check")
    .description("Validate a value against the rules of one field")
    .requiredOption("--rules <path>", "Path to rules file (.yaml, .yml or .json)")
    .requiredOption("--field <name>", "Field whose rules apply")
    .requiredOption("--value <value>", "Value to validate")
    .option("--json", "Parse --value as JSON (numeric text is already read as a number for range fields)")
    .option("--editing-id <id>", "Id of the record being edited")
    .option("--fixtures <path>", "Rows to check against instead of MongoDB")
    .option("--uri <uri>", "MongoDB connection URI")
    .option("--database <name>", "MongoDB database name")
    .option("--id-field <name>", "Document field used as the row id")
    .action(async (options: CheckCommandOptions) => {
      try {
        const report = await runCheck(options);
        console.log(JSON.stringify(report, null, 2));
        process.exit(report.passed ? 0 : 1);
      } catch (error) {
        const checkError = toFieldCheckError(error);
        console.error(JSON.stringify(checkError.toResponse("check"), null, 2));
        process.exit(exitCodeFor(checkError.code));
      }
    });
}
