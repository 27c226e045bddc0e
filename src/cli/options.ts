import { dirname, resolve } from "node:path";
import type { Command } from "commander";
import { DEFAULT_CONFIG_FILE, eventLoggerFromConfig, loadConfig } from "../config/manager.js";
import type { EventLogger } from "../events/logger.js";

export interface GlobalOptions {
  config: string;
}

export function configPathOf(program: Command): string {
  return resolve(program.opts<GlobalOptions>().config);
}

/** Event logger configured by the global --config file, if enabled. */
export async function eventLoggerOf(program: Command): Promise<EventLogger | undefined> {
  const configPath = configPathOf(program);
  const config = await loadConfig(configPath);
  return eventLoggerFromConfig(config, dirname(configPath));
}

export { DEFAULT_CONFIG_FILE };
