/**
 * Options CLI command
 */

import { Command } from "commander";
import { buildRuleSet } from "../../lib/rules/builder.js";
import type { Option } from "../../types/data-model.js";
import { toFieldCheckError } from "../../utils/errors.js";
import { parseRulesFile } from "../config/parser.js";
import type { OptionsCommandOptions } from "../config/types.js";
import { openStore } from "../store.js";
import { exitCodeFor } from "./check.js";

/**
 * List the values a field accepts
 */
export async function runOptions(
  options: OptionsCommandOptions,
): Promise<Option<string | number>[]> {
  const document = parseRulesFile(options.rules);
  const opened = await openStore(options, document);
  try {
    return await buildRuleSet(document, opened.store).options(
      options.field,
      options.zero ?? true,
    );
  } finally {
    await opened.close();
  }
}

export function createOptionsCommand(): Command {
  return new Command("options")
    .description("List the values a field accepts as [key, label] pairs")
    .requiredOption("--rules <path>", "Path to rules file (.yaml, .yml or .json)")
    .requiredOption("--field <name>", "Field to list")
    .option("--no-zero", "Omit the empty option")
    .option("--fixtures <path>", "Rows to list instead of MongoDB")
    .option("--uri <uri>", "MongoDB connection URI")
    .option("--database <name>", "MongoDB database name")
    .option("--id-field <name>", "Document field used as the row id")
    .action(async (options: OptionsCommandOptions) => {
      try {
        const items = await runOptions(options);
        console.log(JSON.stringify({ status: "success", field: options.field, options: items }, null, 2));
      } catch (error) {
        const optionsError = toFieldCheckError(error);
        console.error(JSON.stringify(optionsError.toResponse("options"), null, 2));
        process.exit(exitCodeFor(optionsError.code));
      }
    });
}
