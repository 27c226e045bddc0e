/**
 * Context node wire vocabulary.
 *
 * A context node is an ordinary graph node of type EPContext whose
 * attributes describe one partition's compiled blob.
 */

/** Operator type that marks a node as a context node. */
export const CONTEXT_OP_TYPE = "EPContext";
export const CONTEXT_OP_DOMAIN = "com.microsoft";

/** Attribute keys. */
export const ContextAttr = {
  /** int 0/1: payload inline (1) or external file reference (0). */
  EMBED_MODE: "embed_mode",
  /** bytes (inline blob) or string (external file name). */
  CACHE_PAYLOAD: "cache_payload",
  /** int 0/1: the session's primary node. */
  IS_MAIN: "is_main",
  /** int: worst-case scratch/overlap memory for the session. */
  MAX_SCRATCH_SIZE: "max_scratch_size",
  SDK_VERSION: "sdk_version",
  PARTITION_NAME: "partition_name",
  /** Backend family identifier, compared case-insensitively. */
  SOURCE_TAG: "source_tag",
} as const;
export type ContextAttrKey = (typeof ContextAttr)[keyof typeof ContextAttr];

export const DEFAULT_SOURCE_TAG = "QNNExecutionProvider";

/** Lowercased source tags recognised as this backend family. */
export const ACCEPTED_SOURCE_TAGS: readonly string[] = ["qnnexecutionprovider", "qnn"];

export function isAcceptedSourceTag(tag: string): boolean {
  return ACCEPTED_SOURCE_TAGS.includes(tag.toLowerCase());
}
