/**
 * Partition scanner: finds context nodes and the partitions that carry a
 * session's main context.
 */

import { ContextCacheError } from "../errors/index.js";
import { AttributeReader } from "../graph/attributes.js";
import type { FusedPartition, GraphNode } from "../graph/types.js";
import {
  CONTEXT_OP_TYPE,
  ContextAttr,
  isAcceptedSourceTag,
} from "../schemas/context-node.js";

/**
 * True when a node is a context node produced by this backend family.
 */
export function isContextNode(node: GraphNode): boolean {
  if (node.opType !== CONTEXT_OP_TYPE) return false;
  const source = new AttributeReader(node).getString(ContextAttr.SOURCE_TAG, "");
  return isAcceptedSourceTag(source);
}

export function hasContextNode(partition: FusedPartition): boolean {
  return partition.nodes.some(isContextNode);
}

/**
 * Fast pre-check before a full cache-load pass.
 */
export function anyHasContextNode(partitions: readonly FusedPartition[]): boolean {
  return partitions.some(hasContextNode);
}

/**
 * The single context node of a partition.
 *
 * @throws ContextCacheError MalformedPartition unless the partition holds exactly one EPContext node
 */
export function soleContextNode(partition: FusedPartition): GraphNode {
  if (partition.nodes.length !== 1) {
    throw new ContextCacheError(
      "MalformedPartition",
      `Partition ${partition.index} (${partition.name}) must hold exactly one context node, found ${partition.nodes.length} nodes`,
    );
  }
  const [node] = partition.nodes;
  if (node === undefined || node.opType !== CONTEXT_OP_TYPE) {
    throw new ContextCacheError(
      "MalformedPartition",
      `Partition ${partition.index} (${partition.name}) holds a ${node?.opType ?? "missing"} node, expected ${CONTEXT_OP_TYPE}`,
    );
  }
  return node;
}

/**
 * Whether a context node is its session's main node. An absent flag reads
 * as main, the operator's declared default.
 */
export function isMainContextNode(node: GraphNode): boolean {
  return new AttributeReader(node).getBool(ContextAttr.IS_MAIN, true);
}

/**
 * Positions (into `partitions`) of every main context node, in scan order.
 *
 * Several mains may accumulate, one per compilation session that shares
 * this graph.
 *
 * @throws ContextCacheError MalformedPartition for any partition that is not a single context node
 * @throws ContextCacheError NoMainContext when no main node exists
 */
export function findMainPartitions(partitions: readonly FusedPartition[]): number[] {
  const mains: number[] = [];
  partitions.forEach((partition, position) => {
    if (isMainContextNode(soleContextNode(partition))) {
      mains.push(position);
    }
  });

  if (mains.length === 0) {
    throw new ContextCacheError(
      "NoMainContext",
      `Failed to find a context node with ${ContextAttr.IS_MAIN}=1 among ${partitions.length} partitions`,
    );
  }
  return mains;
}
