#!/usr/bin/env node
/**
 * qnn-ctx: inspect and verify QNN context models.
 */

import { fileURLToPath } from "node:url";
import { existsSync, realpathSync } from "node:fs";
import { Command } from "commander";
import { registerConfigCommands } from "./commands/config-commands.js";
import { registerContextCommands } from "./commands/context-commands.js";
import { DEFAULT_CONFIG_FILE } from "./options.js";

export function createProgram(): Command {
  const program = new Command();
  program
    .name("qnn-ctx")
    .description("Inspect, extract and verify QNN context models")
    .option("--config <file>", "Config file", DEFAULT_CONFIG_FILE);

  registerContextCommands(program);
  registerConfigCommands(program);
  return program;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined || !existsSync(entry)) return false;
  return realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
}
