/**
 * Configuration commands.
 */

import type { Command } from "commander";
import { getConfigValue, setConfigValue } from "../../config/manager.js";
import { errorMessage } from "../../errors/index.js";
import { configPathOf } from "../options.js";

/**
 * Register configuration management commands.
 */
export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Configuration management");

  config
    .command("get <key>")
    .description("Get config value (dot-notation, defaults applied)")
    .action(async (key: string) => {
      const value = await getConfigValue(configPathOf(program), key);
      if (value === undefined) {
        console.log(`Key '${key}' not found`);
        process.exitCode = 1;
      } else {
        console.log(typeof value === "object" ? JSON.stringify(value, null, 2) : String(value));
      }
    });

  config
    .command("set <key> <value>")
    .description("Set config value (validates + atomic write)")
    .option("--dry-run", "Preview change without applying", false)
    .action(async (key: string, value: string, opts: { dryRun: boolean }) => {
      const fmt = (v: unknown) => v === undefined ? "undefined" : typeof v === "object" ? JSON.stringify(v) : String(v);
      try {
        const change = await setConfigValue(configPathOf(program), key, value, opts.dryRun);
        console.log(opts.dryRun ? `[DRY RUN] Would update ${key}:` : `✅ Config updated: ${key}`);
        console.log(`  ${key}: ${fmt(change.oldValue)} → ${fmt(change.newValue)}`);
      } catch (err) {
        console.error(`❌ Config change rejected: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    });
}
