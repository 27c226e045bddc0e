/**
 * Spill-fill size selection across compilation sessions.
 *
 * Loading allocates one shared scratch region sized to the worst case of
 * every session recorded in the graph. The session declaring that worst
 * case is loaded first so the region exists before the others attach.
 */

import { ContextCacheError } from "../errors/index.js";
import { AttributeReader } from "../graph/attributes.js";
import type { FusedPartition } from "../graph/types.js";
import { ContextAttr } from "../schemas/context-node.js";
import { soleContextNode } from "./scanner.js";

export interface SpillFillSelection {
  /** Largest declared scratch size; 0 when no session declares one. */
  maxSpillFillSize: number;
  /** Main positions with the largest consumer moved to the front. */
  mainIndices: number[];
}

/**
 * Declared scratch size of a partition's context node (0 when absent).
 */
export function declaredSpillFillSize(partition: FusedPartition): number {
  return new AttributeReader(soleContextNode(partition)).getInt(ContextAttr.MAX_SCRATCH_SIZE, 0);
}

/**
 * Find the largest declared scratch size among the main partitions and
 * swap its entry to the front of the main list. Ties keep the first
 * encountered entry. The input list is not modified.
 *
 * @throws ContextCacheError MalformedPartition for an out-of-range index or malformed partition
 */
export function selectMaxSpillFill(
  partitions: readonly FusedPartition[],
  mainIndices: readonly number[],
): SpillFillSelection {
  let maxSpillFillSize = 0;
  let maxPosition = 0;

  mainIndices.forEach((index, position) => {
    const partition = partitions[index];
    if (partition === undefined) {
      throw new ContextCacheError(
        "MalformedPartition",
        `Main partition index ${index} is out of range (${partitions.length} partitions)`,
      );
    }
    const size = declaredSpillFillSize(partition);
    if (size > maxSpillFillSize) {
      maxSpillFillSize = size;
      maxPosition = position;
    }
  });

  const reordered = [...mainIndices];
  if (maxPosition !== 0) {
    const first = reordered[0];
    const largest = reordered[maxPosition];
    if (first !== undefined && largest !== undefined) {
      reordered[0] = largest;
      reordered[maxPosition] = first;
    }
  }

  return { maxSpillFillSize, mainIndices: reordered };
}
