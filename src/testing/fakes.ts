/**
 * Test helpers: in-process stand-ins for the backend and partition builders.
 */

import type {
  CompiledModelRecord,
  CompiledModelTable,
  ContextBinaryLoader,
  LoadContextRequest,
} from "../context/backend.js";
import { intAttr, stringAttr, bytesAttr } from "../graph/attributes.js";
import type { AttributeValue, FusedPartition, GraphNode } from "../graph/types.js";
import { CONTEXT_OP_DOMAIN, CONTEXT_OP_TYPE, ContextAttr, DEFAULT_SOURCE_TAG } from "../schemas/context-node.js";
import type { TensorInfo } from "../schemas/graph.js";

/** Compiled-model table backed by a Map. */
export class FakeModelTable implements CompiledModelTable {
  private readonly records = new Map<string, CompiledModelRecord>();

  /** Register a partition with one float32 input and one float32 output. */
  addSimple(partitionName: string, shape: number[] = [1, 4]): this {
    const info: TensorInfo = { elemType: "float32", shape };
    const input = `${partitionName}_in`;
    const output = `${partitionName}_out`;
    this.records.set(partitionName, {
      inputNames: [input],
      outputNames: [output],
      inputsInfo: new Map([[input, info]]),
      outputsInfo: new Map([[output, info]]),
    });
    return this;
  }

  set(partitionName: string, record: CompiledModelRecord): this {
    this.records.set(partitionName, record);
    return this;
  }

  get(partitionName: string): CompiledModelRecord | undefined {
    return this.records.get(partitionName);
  }
}

/** Loader that keeps a latin1 copy of each blob it accepts. */
export class RecordingLoader implements ContextBinaryLoader {
  readonly loads: Array<{ name: string; payload: string; maxSpillFillSize: number }> = [];

  async loadContextBinary(request: LoadContextRequest): Promise<void> {
    this.loads.push({
      name: request.name,
      payload: Buffer.from(request.blob.take()).toString("latin1"),
      maxSpillFillSize: request.maxSpillFillSize,
    });
  }
}

/** Loader that rejects every blob, like a backend handed a stale cache. */
export class RejectingLoader implements ContextBinaryLoader {
  async loadContextBinary(request: LoadContextRequest): Promise<void> {
    throw new Error(`incompatible context binary for ${request.name}`);
  }
}

/** Partition that has not been compiled yet (encoder input). */
export function fusedPartition(index: number, name: string): FusedPartition {
  return { index, name, inputs: [`${name}_in`], outputs: [`${name}_out`], nodes: [] };
}

export interface ContextNodeOptions {
  name: string;
  main?: boolean;
  embed?: boolean;
  /** Inline payload (embed) or file reference (external). */
  payload?: string;
  scratch?: number;
  sourceTag?: string;
}

/** Context node as a loaded context model would hold it. */
export function contextNode(options: ContextNodeOptions): GraphNode {
  const embed = options.embed ?? true;
  const attributes: Record<string, AttributeValue> = {
    [ContextAttr.EMBED_MODE]: intAttr(embed ? 1 : 0),
    [ContextAttr.SOURCE_TAG]: stringAttr(options.sourceTag ?? DEFAULT_SOURCE_TAG),
    [ContextAttr.PARTITION_NAME]: stringAttr(options.name),
  };
  if (options.main !== undefined) attributes[ContextAttr.IS_MAIN] = intAttr(options.main ? 1 : 0);
  if (options.scratch !== undefined) attributes[ContextAttr.MAX_SCRATCH_SIZE] = intAttr(options.scratch);
  if (options.payload !== undefined) {
    attributes[ContextAttr.CACHE_PAYLOAD] = embed
      ? bytesAttr(new Uint8Array(Buffer.from(options.payload, "latin1")))
      : stringAttr(options.payload);
  }
  return {
    name: options.name,
    opType: CONTEXT_OP_TYPE,
    domain: CONTEXT_OP_DOMAIN,
    description: "",
    inputs: [],
    outputs: [],
    attributes,
  };
}

/** Single-node partition wrapping a context node. */
export function contextPartition(index: number, options: ContextNodeOptions): FusedPartition {
  return { index, name: options.name, inputs: [], outputs: [], nodes: [contextNode(options)] };
}
