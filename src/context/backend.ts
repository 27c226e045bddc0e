/**
 * Interfaces to the accelerator backend.
 *
 * The backend compiles and loads context binaries; this package only moves
 * them in and out of graph nodes.
 */

import type { TensorInfo } from "../schemas/graph.js";
import type { ContextBlob } from "./blob.js";

export interface LoadContextRequest {
  /** The decoded blob. The loader owns it from here on. */
  blob: ContextBlob;
  /** Identifying name of the context node the blob came from. */
  name: string;
  /** Scratch/overlap size the backend must provide. */
  maxSpillFillSize: number;
}

/**
 * Backend "load blob" entry point. Rejecting signals the blob is stale or
 * incompatible.
 */
export interface ContextBinaryLoader {
  loadContextBinary(request: LoadContextRequest): Promise<void>;
}

/**
 * Compiled-model record: the tensor interface of one compiled partition.
 */
export interface CompiledModelRecord {
  inputNames: string[];
  outputNames: string[];
  inputsInfo: ReadonlyMap<string, TensorInfo>;
  outputsInfo: ReadonlyMap<string, TensorInfo>;
}

/**
 * Lookup of compiled-model records by partition name.
 */
export interface CompiledModelTable {
  get(partitionName: string): CompiledModelRecord | undefined;
}
