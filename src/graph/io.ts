/**
 * Context model file I/O.
 *
 * A context model is stored as JSON (see ContextModelFile). Writes are
 * atomic (write-tmp-then-rename); reads are schema-validated.
 */

import { readFile } from "node:fs/promises";
import writeFileAtomic from "write-file-atomic";
import { ContextCacheError, errorMessage } from "../errors/index.js";
import {
  CONTEXT_MODEL_FORMAT,
  ContextModelFile,
  type SerializedAttribute,
  type SerializedNode,
} from "../schemas/graph.js";
import { CONTEXT_OP_TYPE } from "../schemas/context-node.js";
import { ModelGraph } from "./model-graph.js";
import type { AttributeValue, FusedPartition, GraphNode } from "./types.js";

function encodeAttribute(attr: AttributeValue): SerializedAttribute {
  if (attr.type === "bytes") {
    return { type: "bytes", value: Buffer.from(attr.value).toString("base64") };
  }
  return attr;
}

function decodeAttribute(attr: SerializedAttribute): AttributeValue {
  if (attr.type === "bytes") {
    return { type: "bytes", value: new Uint8Array(Buffer.from(attr.value, "base64")) };
  }
  return attr;
}

/**
 * Convert a graph to its serializable document.
 */
export function toContextModelFile(graph: ModelGraph): ContextModelFile {
  const nodes: SerializedNode[] = graph.nodes.map(node => ({
    name: node.name,
    opType: node.opType,
    domain: node.domain,
    description: node.description,
    inputs: [...node.inputs],
    outputs: [...node.outputs],
    attributes: Object.fromEntries(
      Object.entries(node.attributes).map(([key, attr]) => [key, encodeAttribute(attr)]),
    ),
  }));

  return {
    format: CONTEXT_MODEL_FORMAT,
    version: 1,
    valueInfo: graph.valueInfo.map(v => ({
      name: v.name,
      elemType: v.info.elemType,
      shape: [...v.info.shape],
    })),
    nodes,
  };
}

/**
 * Rebuild a graph from an untrusted document.
 *
 * @throws ContextCacheError InvalidModelFile when the document does not match the schema
 */
export function fromContextModelFile(raw: unknown): ModelGraph {
  const parsed = ContextModelFile.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(i => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new ContextCacheError("InvalidModelFile", `Invalid context model: ${details}`);
  }

  const graph = new ModelGraph();
  for (const v of parsed.data.valueInfo) {
    graph.getOrCreateValueInfo(v.name, { elemType: v.elemType, shape: v.shape });
  }
  for (const node of parsed.data.nodes) {
    graph.addNode({
      ...node,
      attributes: Object.fromEntries(
        Object.entries(node.attributes).map(([key, attr]) => [key, decodeAttribute(attr)]),
      ),
    });
  }
  return graph;
}

export async function readContextModel(modelPath: string): Promise<ModelGraph> {
  let content: string;
  try {
    content = await readFile(modelPath, "utf-8");
  } catch (err) {
    throw new ContextCacheError("IoError", `Failed to read context model: ${modelPath}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ContextCacheError(
      "InvalidModelFile",
      `Context model is not valid JSON: ${modelPath} (${errorMessage(err)})`,
      { cause: err },
    );
  }
  return fromContextModelFile(raw);
}

export async function writeContextModel(modelPath: string, graph: ModelGraph): Promise<void> {
  const content = JSON.stringify(toContextModelFile(graph), null, 2) + "\n";
  try {
    await writeFileAtomic(modelPath, content, "utf-8");
  } catch (err) {
    throw new ContextCacheError("IoError", `Failed to write context model: ${modelPath}`, { cause: err });
  }
}

/**
 * Give every context node of a loaded context model its own partition.
 *
 * This is the capability step for an already-compiled model, not the
 * fusion algorithm: one single-node partition per context node, in graph
 * order, with the node's own inputs and outputs.
 */
export function partitionContextModel(graph: ModelGraph): FusedPartition[] {
  const contextNodes: GraphNode[] = graph.nodesOfType(CONTEXT_OP_TYPE);
  return contextNodes.map((node, index) => ({
    index,
    name: node.name,
    inputs: [...node.inputs],
    outputs: [...node.outputs],
    nodes: [node],
  }));
}
