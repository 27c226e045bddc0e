/**
 * Context encoder: attaches one compiled blob to the context nodes of
 * every partition compiled in the same session.
 *
 * All partitions of a session share one physical blob, so only the main
 * node (the first target partition) carries it. Every other node is marked
 * "not main" and carries identification only.
 */

import { dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { ContextCacheError } from "../errors/index.js";
import type { EventLogger } from "../events/logger.js";
import { bytesAttr, intAttr, stringAttr } from "../graph/attributes.js";
import type { ModelGraph } from "../graph/model-graph.js";
import { resolveBlobPath } from "../paths/resolver.js";
import type { AttributeValue, FusedPartition, GraphNode } from "../graph/types.js";
import {
  CONTEXT_OP_DOMAIN,
  CONTEXT_OP_TYPE,
  ContextAttr,
  DEFAULT_SOURCE_TAG,
} from "../schemas/context-node.js";
import type { TensorInfo } from "../schemas/graph.js";
import type { CompiledModelRecord, CompiledModelTable } from "./backend.js";
import type { ContextBlob } from "./blob.js";
import { deriveBlobFileName } from "./naming.js";
import type { SharingSession } from "./sharing.js";

export interface EncodeSessionOptions {
  /** Store the blob inline (true) or in a sibling .bin file (false). */
  embedMode: boolean;
  /** Path of the context model being written; blob files go beside it. */
  outputModelPath: string;
  sdkVersion: string;
  /** Reuse one .bin file across the encode calls of a sharing run. */
  shareBinaries: boolean;
  /** This call is the sharing run's last contributor. */
  isLastSharingSession: boolean;
  /** Session-wide worst-case scratch size, recorded on the main node. */
  maxSpillFillSize?: number;
  sourceTag?: string;
}

export interface EncodeSessionContext {
  /** Graph receiving the context nodes. */
  graph: ModelGraph;
  models: CompiledModelTable;
  /** Required when shareBinaries is set. */
  sharing?: SharingSession;
  logger?: EventLogger;
}

export interface EncodeSessionResult {
  /** Created nodes; the first is the session's main node. */
  nodes: GraphNode[];
  /** Blob file referenced by the main node (external mode only). */
  blobFileName?: string;
  /** Whether this call wrote the blob file. */
  blobWritten: boolean;
}

interface PreparedPartition {
  partition: FusedPartition;
  inputs: Array<[string, TensorInfo]>;
  outputs: Array<[string, TensorInfo]>;
}

function tensorDeclarations(
  names: readonly string[],
  table: ReadonlyMap<string, TensorInfo>,
  partitionName: string,
): Array<[string, TensorInfo]> {
  return names.map(name => {
    const info = table.get(name);
    if (info === undefined) {
      throw new ContextCacheError(
        "MissingTensorInfo",
        `Tensor ${name} of ${partitionName} not found in its tensor info table`,
      );
    }
    return [name, info];
  });
}

function prepare(partition: FusedPartition, models: CompiledModelTable): PreparedPartition {
  const record: CompiledModelRecord | undefined = models.get(partition.name);
  if (record === undefined) {
    throw new ContextCacheError("MissingQnnModel", `${partition.name} does not exist in the compiled model table`);
  }
  return {
    partition,
    inputs: tensorDeclarations(record.inputNames, record.inputsInfo, partition.name),
    outputs: tensorDeclarations(record.outputNames, record.outputsInfo, partition.name),
  };
}

async function writeBlob(path: string, bytes: Uint8Array): Promise<void> {
  try {
    await writeFileAtomic(path, Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  } catch (err) {
    throw new ContextCacheError("IoError", `Failed to write context cache file: ${path}`, { cause: err });
  }
}

/**
 * Encode one compiled session into context nodes.
 *
 * The blob is consumed: on return it is spent whether it was embedded,
 * written, or left for the sharing run's last contributor to write.
 *
 * The last contributor of a sharing run clears `sharing` even when its write
 * fails. The models encoded earlier in that run then reference a file that
 * does not exist; the whole run has to be encoded again.
 *
 * @throws ContextCacheError MissingQnnModel / MissingTensorInfo before any I/O
 * @throws ContextCacheError PathNotRelative / PathTraversal when the blob file name would leave the model directory
 * @throws ContextCacheError IoError when the blob file cannot be written
 */
export async function encodeSession(
  blob: ContextBlob,
  partitions: readonly FusedPartition[],
  options: EncodeSessionOptions,
  context: EncodeSessionContext,
): Promise<EncodeSessionResult> {
  const { graph, models, sharing, logger } = context;
  const sourceTag = options.sourceTag ?? DEFAULT_SOURCE_TAG;
  const maxSpillFillSize = options.maxSpillFillSize ?? 0;

  if (partitions.length === 0) {
    throw new ContextCacheError("InvalidOptions", "encodeSession needs at least one target partition");
  }
  if (!options.embedMode && options.shareBinaries && sharing === undefined) {
    throw new ContextCacheError("InvalidOptions", "shareBinaries requires a SharingSession");
  }

  const prepared = partitions.map(p => prepare(p, models));

  let blobFileName: string | undefined;
  let blobWritten = false;
  const nodes: GraphNode[] = [];

  for (const [position, { partition, inputs, outputs }] of prepared.entries()) {
    const attributes: Record<string, AttributeValue> = {
      [ContextAttr.EMBED_MODE]: intAttr(options.embedMode ? 1 : 0),
    };

    if (position === 0) {
      if (options.embedMode) {
        attributes[ContextAttr.CACHE_PAYLOAD] = bytesAttr(blob.take());
      } else {
        const modelDir = dirname(options.outputModelPath);
        let fileName = deriveBlobFileName(options.outputModelPath, partition.name, sourceTag);
        resolveBlobPath(modelDir, fileName);

        if (options.shareBinaries && sharing !== undefined) {
          const claim = sharing.claim(fileName);
          fileName = claim.fileName;
          await logger?.log(claim.registered ? "context.share.registered" : "context.share.reused", "encoder", {
            fileName,
            partition: partition.name,
          });
        }

        const path = resolveBlobPath(modelDir, fileName);
        const bytes = blob.take();
        const endsSharingRun = options.shareBinaries && options.isLastSharingSession;

        if (!options.shareBinaries || options.isLastSharingSession) {
          try {
            await writeBlob(path, bytes);
          } finally {
            if (endsSharingRun) sharing?.clear();
          }
          blobWritten = true;
          await logger?.log("context.blob.written", "encoder", { path, byteLength: bytes.byteLength });
        }

        attributes[ContextAttr.CACHE_PAYLOAD] = stringAttr(fileName);
        blobFileName = fileName;

        if (endsSharingRun) {
          await logger?.log("context.share.cleared", "encoder", { fileName });
        }
      }
      attributes[ContextAttr.IS_MAIN] = intAttr(1);
      attributes[ContextAttr.MAX_SCRATCH_SIZE] = intAttr(maxSpillFillSize);
    } else {
      attributes[ContextAttr.IS_MAIN] = intAttr(0);
    }

    attributes[ContextAttr.SDK_VERSION] = stringAttr(options.sdkVersion);
    attributes[ContextAttr.PARTITION_NAME] = stringAttr(partition.name);
    attributes[ContextAttr.SOURCE_TAG] = stringAttr(sourceTag);

    for (const [name, info] of [...inputs, ...outputs]) {
      graph.getOrCreateValueInfo(name, info);
    }

    nodes.push(
      graph.addNode({
        name: partition.name,
        opType: CONTEXT_OP_TYPE,
        domain: CONTEXT_OP_DOMAIN,
        description: `QNN context binary cache for graph partition: ${partition.name}`,
        inputs: inputs.map(([name]) => name),
        outputs: outputs.map(([name]) => name),
        attributes,
      }),
    );
  }

  await logger?.log("context.encoded", "encoder", {
    outputModelPath: options.outputModelPath,
    partitions: nodes.map(n => n.name),
    embedMode: options.embedMode,
    ...(blobFileName !== undefined ? { blobFileName } : {}),
    blobWritten,
  });

  return { nodes, ...(blobFileName !== undefined ? { blobFileName } : {}), blobWritten };
}
