/**
 * Cache-load pass over every partition of a context model.
 */

import { dirname } from "node:path";
import { ContextCacheError, errorMessage, isContextCacheError } from "../errors/index.js";
import type { EventLogger } from "../events/logger.js";
import type { FusedPartition } from "../graph/types.js";
import { findMainPartitions } from "../partition/scanner.js";
import { selectMaxSpillFill } from "../partition/spill-fill.js";
import type { ContextBinaryLoader } from "./backend.js";
import { decodePartition } from "./decoder.js";

export interface LoadContextOptions {
  backend: ContextBinaryLoader;
  logger?: EventLogger;
}

export interface LoadContextResult {
  /** Main positions in load order (largest scratch consumer first). */
  mainIndices: number[];
  maxSpillFillSize: number;
  /** Names of the loaded context nodes, in load order. */
  loaded: string[];
}

/**
 * Load every session recorded in a context model.
 *
 * Mains are loaded largest-scratch-first, each with the session-wide
 * maximum. A failed decode is re-signaled as InvalidGraph.
 *
 * @param modelPath - Path of the context model; blob references resolve against its directory
 */
export async function loadContextPartitions(
  partitions: readonly FusedPartition[],
  modelPath: string,
  options: LoadContextOptions,
): Promise<LoadContextResult> {
  const { backend, logger } = options;
  const modelBaseDir = dirname(modelPath);

  const found = findMainPartitions(partitions);
  if (found.length > 1) {
    await logger?.log("context.main.multiple", "loader", {
      modelPath,
      mainIndices: found,
    });
  }
  const { maxSpillFillSize, mainIndices } = selectMaxSpillFill(partitions, found);

  const loaded: string[] = [];
  for (const index of mainIndices) {
    const partition = partitions[index];
    if (partition === undefined) continue;

    try {
      await decodePartition(partition, modelBaseDir, { backend, maxSpillFillSize, logger });
    } catch (err) {
      await logger?.log("context.load.failed", "loader", {
        modelPath,
        partition: partition.name,
        code: isContextCacheError(err) ? err.code : "Unknown",
        error: errorMessage(err),
      });
      if (isContextCacheError(err, "InvalidGraph")) throw err;
      throw new ContextCacheError("InvalidGraph", `Failed to load from context model. ${errorMessage(err)}`, {
        cause: err,
      });
    }
    loaded.push(partition.name);
  }

  return { mainIndices, maxSpillFillSize, loaded };
}
