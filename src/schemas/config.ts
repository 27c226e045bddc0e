/**
 * Context cache configuration schema.
 *
 * Stored as a single YAML file (qnn-context.yaml). Every field has a default,
 * so an empty or missing file yields a usable configuration.
 */

import { z } from "zod";
import { DEFAULT_SOURCE_TAG } from "./context-node.js";

/** Defaults applied when a context model is written. */
export const EncodeConfig = z.object({
  /** Store the blob inline in the main node instead of a sibling .bin file. */
  embedMode: z.boolean().default(true),
  /** Point every session's model at one shared .bin file. */
  shareBinaries: z.boolean().default(false),
  /** Build/version tag of the compiling toolchain. */
  sdkVersion: z.string().default(""),
  /** Backend family identifier written to source_tag. */
  sourceTag: z.string().min(1).default(DEFAULT_SOURCE_TAG),
});
export type EncodeConfig = z.infer<typeof EncodeConfig>;

/** Event log configuration. */
export const EventsConfig = z.object({
  enabled: z.boolean().default(false),
  /** Directory receiving <date>.jsonl files. */
  dir: z.string().min(1).default(".qnn-context/events"),
});
export type EventsConfig = z.infer<typeof EventsConfig>;

/** Top-level configuration. */
export const ContextCacheConfig = z.object({
  schemaVersion: z.literal(1).default(1),
  encode: EncodeConfig.default({}),
  events: EventsConfig.default({}),
});
export type ContextCacheConfig = z.infer<typeof ContextCacheConfig>;
