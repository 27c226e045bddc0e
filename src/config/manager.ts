/**
 * Config manager: load, read and update qnn-context.yaml.
 *
 * Every change is validated against the schema before it is written.
 * Writes are atomic (write-tmp-then-rename).
 */

import { readFile } from "node:fs/promises";
import { isAbsolute, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import type { EncodeSessionOptions } from "../context/encoder.js";
import { EventLogger } from "../events/logger.js";
import { ContextCacheConfig } from "../schemas/config.js";

export const DEFAULT_CONFIG_FILE = "qnn-context.yaml";

export interface ConfigChange {
  key: string;
  oldValue: unknown;
  newValue: unknown;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readRaw(configPath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }
  const raw: unknown = parseYaml(content);
  if (raw === null || raw === undefined) return {};
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error(`Config ${configPath} must be a YAML mapping`);
  }
  return Object.fromEntries(Object.entries(raw));
}

function validate(configPath: string, raw: unknown): ContextCacheConfig {
  const result = ContextCacheConfig.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map(i => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid config ${configPath}: ${details}`);
  }
  return result.data;
}

/**
 * Load and validate the config. A missing file yields the defaults.
 */
export async function loadConfig(configPath: string): Promise<ContextCacheConfig> {
  return validate(configPath, await readRaw(configPath));
}

/**
 * Get a value from the effective config (defaults applied) using a
 * dot-notation key, e.g. "encode.embedMode".
 */
export async function getConfigValue(configPath: string, key: string): Promise<unknown> {
  const config = await loadConfig(configPath);
  return resolveKeyPath(config, key);
}

/**
 * Set a value using a dot-notation key. The modified config is validated
 * before anything is written; an invalid change throws and leaves the
 * file untouched.
 */
export async function setConfigValue(
  configPath: string,
  key: string,
  value: string,
  dryRun: boolean = false,
): Promise<ConfigChange> {
  const raw = await readRaw(configPath);
  const oldValue = resolveKeyPath(validate(configPath, raw), key);
  const newValue = parseValue(value);

  setKeyPath(raw, key, newValue);
  validate(configPath, raw);

  if (!dryRun) {
    await writeFileAtomic(configPath, stringifyYaml(raw, { lineWidth: 120 }), "utf-8");
  }
  return { key, oldValue, newValue };
}

/**
 * Event logger for a config, or undefined when event logging is off.
 * A relative events dir resolves against `baseDir`.
 */
export function eventLoggerFromConfig(config: ContextCacheConfig, baseDir: string): EventLogger | undefined {
  if (!config.events.enabled) return undefined;
  const dir = isAbsolute(config.events.dir) ? config.events.dir : resolve(baseDir, config.events.dir);
  return new EventLogger(dir);
}

/** Per-call inputs that the config cannot supply. */
export interface EncodeTarget {
  outputModelPath: string;
  isLastSharingSession?: boolean;
  maxSpillFillSize?: number;
}

/**
 * Options for `encodeSession` with the configured encode defaults
 * (storage mode, sharing, SDK version, source tag) applied.
 */
export function encodeOptionsFromConfig(config: ContextCacheConfig, target: EncodeTarget): EncodeSessionOptions {
  const { embedMode, shareBinaries, sdkVersion, sourceTag } = config.encode;
  return {
    embedMode,
    shareBinaries,
    sdkVersion,
    sourceTag,
    outputModelPath: target.outputModelPath,
    isLastSharingSession: target.isLastSharingSession ?? false,
    maxSpillFillSize: target.maxSpillFillSize,
  };
}

// --- Helpers ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolveKeyPath(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

function setKeyPath(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  const lastKey = parts.pop();
  if (lastKey === undefined || lastKey === "") {
    throw new Error(`Invalid config key: ${path}`);
  }

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastKey] = value;
}

/** Parse a string value into the appropriate type. */
function parseValue(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value);
  // Remove surrounding quotes
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}
