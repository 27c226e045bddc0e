/**
 * In-memory IR types for context models.
 */

import type { TensorInfo } from "../schemas/graph.js";

export type AttributeValue =
  | { type: "int"; value: number }
  | { type: "float"; value: number }
  | { type: "string"; value: string }
  | { type: "bytes"; value: Uint8Array };

export interface GraphNode {
  name: string;
  opType: string;
  domain: string;
  description: string;
  inputs: string[];
  outputs: string[];
  attributes: Record<string, AttributeValue>;
}

/** A named tensor declaration. */
export interface ValueInfo {
  name: string;
  info: TensorInfo;
}

/**
 * A disjoint subgraph produced by fusion.
 *
 * `name` is the owning fused node's identifier; `nodes` is the filtered
 * subgraph, which for a context model holds exactly one context node.
 */
export interface FusedPartition {
  index: number;
  name: string;
  inputs: string[];
  outputs: string[];
  nodes: GraphNode[];
}
