/**
 * ModelGraph: the mutable graph a context model is assembled in.
 *
 * Holds nodes in insertion order and one declaration per tensor name.
 */

import type { TensorInfo } from "../schemas/graph.js";
import type { AttributeValue, GraphNode, ValueInfo } from "./types.js";

export interface AddNodeInput {
  name: string;
  opType: string;
  domain?: string;
  description?: string;
  inputs?: string[];
  outputs?: string[];
  attributes?: Record<string, AttributeValue>;
}

export class ModelGraph {
  private readonly nodeList: GraphNode[] = [];
  private readonly values = new Map<string, TensorInfo>();

  get nodes(): readonly GraphNode[] {
    return this.nodeList;
  }

  get valueInfo(): ValueInfo[] {
    return Array.from(this.values, ([name, info]) => ({ name, info }));
  }

  /**
   * Declare a tensor, or return the existing declaration.
   * The first declaration of a name wins.
   */
  getOrCreateValueInfo(name: string, info: TensorInfo): ValueInfo {
    const existing = this.values.get(name);
    if (existing) return { name, info: existing };

    const copy: TensorInfo = { elemType: info.elemType, shape: [...info.shape] };
    this.values.set(name, copy);
    return { name, info: copy };
  }

  getValueInfo(name: string): TensorInfo | undefined {
    return this.values.get(name);
  }

  addNode(input: AddNodeInput): GraphNode {
    const node: GraphNode = {
      name: input.name,
      opType: input.opType,
      domain: input.domain ?? "",
      description: input.description ?? "",
      inputs: input.inputs ?? [],
      outputs: input.outputs ?? [],
      attributes: input.attributes ?? {},
    };
    this.nodeList.push(node);
    return node;
  }

  nodesOfType(opType: string): GraphNode[] {
    return this.nodeList.filter(n => n.opType === opType);
  }
}
