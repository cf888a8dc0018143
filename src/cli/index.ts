#!/usr/bin/env node

/**
 * fieldcheck CLI - validate values against range, set and record rules
 */

import { Command } from "commander";
import { createCheckCommand } from "./commands/check.js";
import { createOptionsCommand } from "./commands/options.js";
import { isLogLevel, logger } from "../utils/logger.js";

const pkg = {
  name: "fieldcheck",
  version: "0.1.0",
  description: "Validate values against range, set and record-store rules",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug", "warn")
    .hook("preAction", (command) => {
      const level: unknown = command.opts()["logLevel"];
      if (typeof level === "string" && isLogLevel(level)) {
        logger.setLevel(level);
      }
    });

  program.addCommand(createCheckCommand());
  program.addCommand(createOptionsCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(JSON.stringify({
    status: "error",
    error: {
      code: "UNEXPECTED_ERROR",
      message,
    },
  }, null, 2));
  process.exit(1);
});
