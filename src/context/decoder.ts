/**
 * Context decoder: rebuilds a compiled blob from a context node and hands
 * it to the backend loader.
 */

import { readFile } from "node:fs/promises";
import { ContextCacheError, errorMessage } from "../errors/index.js";
import type { EventLogger } from "../events/logger.js";
import { AttributeReader } from "../graph/attributes.js";
import type { FusedPartition, GraphNode } from "../graph/types.js";
import { resolveBlobPath, statRegularFile } from "../paths/resolver.js";
import { CONTEXT_OP_TYPE, ContextAttr } from "../schemas/context-node.js";
import type { ContextBinaryLoader } from "./backend.js";
import { ContextBlob } from "./blob.js";

export interface DecodeOptions {
  backend: ContextBinaryLoader;
  /**
   * Scratch size handed to the loader. Defaults to the node's declared
   * size; the load pass passes the session-wide maximum instead.
   */
  maxSpillFillSize?: number;
  logger?: EventLogger;
}

export type BlobSource =
  | { kind: "embedded" }
  | { kind: "file"; path: string };

export interface ReadBlobResult {
  blob: ContextBlob;
  source: BlobSource;
}

/**
 * Read a context node's blob without loading it.
 *
 * Embedded payloads are copied out of the node. External references are
 * resolved against `modelBaseDir`, must name a non-empty regular file, and
 * are read whole.
 */
export async function readContextBlob(node: GraphNode, modelBaseDir: string): Promise<ReadBlobResult> {
  const attrs = new AttributeReader(node);

  if (attrs.getBool(ContextAttr.EMBED_MODE, true)) {
    const payload = attrs.getBytes(ContextAttr.CACHE_PAYLOAD);
    if (payload === undefined) {
      throw new ContextCacheError(
        "MissingCachePayload",
        `Context node ${node.name} has no ${ContextAttr.CACHE_PAYLOAD} attribute`,
      );
    }
    return { blob: new ContextBlob(Uint8Array.from(payload)), source: { kind: "embedded" } };
  }

  const ref = attrs.getString(ContextAttr.CACHE_PAYLOAD, "");
  if (ref.length === 0) {
    throw new ContextCacheError(
      "MissingCachePayload",
      `The file path in ${ContextAttr.CACHE_PAYLOAD} of context node ${node.name} should not be empty`,
    );
  }

  const path = resolveBlobPath(modelBaseDir, ref);
  const size = await statRegularFile(path);
  if (size === 0) {
    throw new ContextCacheError("EmptyCacheFile", `Empty cache file encountered: ${path}`);
  }

  let contents: Buffer;
  try {
    contents = await readFile(path);
  } catch (err) {
    throw new ContextCacheError("IoError", `Failed to read contents from cached context file: ${path}`, {
      cause: err,
    });
  }
  if (contents.byteLength === 0) {
    throw new ContextCacheError("EmptyCacheFile", `Empty cache file encountered: ${path}`);
  }

  return {
    blob: new ContextBlob(new Uint8Array(contents.buffer, contents.byteOffset, contents.byteLength)),
    source: { kind: "file", path },
  };
}

/**
 * Decode one context node and load its blob into the backend.
 *
 * The loader receives its own copy of the blob.
 *
 * @returns The decoded blob, owned by the caller
 * @throws ContextCacheError InvalidGraph when the loader rejects the blob
 */
export async function decodeOne(
  node: GraphNode,
  modelBaseDir: string,
  options: DecodeOptions,
): Promise<ContextBlob> {
  if (node.opType !== CONTEXT_OP_TYPE) {
    throw new ContextCacheError(
      "MalformedPartition",
      `Node ${node.name} is a ${node.opType} node, expected ${CONTEXT_OP_TYPE}`,
    );
  }

  const { blob, source } = await readContextBlob(node, modelBaseDir);
  const byteLength = blob.byteLength;
  const maxSpillFillSize =
    options.maxSpillFillSize ?? new AttributeReader(node).getInt(ContextAttr.MAX_SCRATCH_SIZE, 0);

  try {
    await options.backend.loadContextBinary({ blob: blob.copy(), name: node.name, maxSpillFillSize });
  } catch (err) {
    const rejected = new ContextCacheError(
      "BackendLoadFailed",
      `Backend rejected context binary of ${node.name}: ${errorMessage(err)}`,
      { cause: err },
    );
    throw new ContextCacheError(
      "InvalidGraph",
      `Failed to load from context model. ${rejected.message}`,
      { cause: rejected },
    );
  }

  await options.logger?.log("context.decoded", "decoder", {
    node: node.name,
    source: source.kind,
    ...(source.kind === "file" ? { path: source.path } : {}),
    byteLength,
    maxSpillFillSize,
  });
  return blob;
}

/**
 * Decode the single context node of a partition.
 *
 * @throws ContextCacheError MalformedPartition unless the partition holds exactly one node
 */
export async function decodePartition(
  partition: FusedPartition,
  modelBaseDir: string,
  options: DecodeOptions,
): Promise<ContextBlob> {
  const [node] = partition.nodes;
  if (partition.nodes.length !== 1 || node === undefined) {
    throw new ContextCacheError(
      "MalformedPartition",
      `Partition ${partition.index} (${partition.name}) must hold exactly one context node, found ${partition.nodes.length} nodes`,
    );
  }
  return decodeOne(node, modelBaseDir, options);
}
