/**
 * Context cache errors.
 *
 * Every failure raised by this package is a ContextCacheError carrying a
 * machine-readable code. Callers branch on the code, never on the message.
 */

export type ContextCacheErrorCode =
  /** Wrong node count or wrong node type in a partition. */
  | "MalformedPartition"
  /** No partition carries a main context node. */
  | "NoMainContext"
  | "PathNotRelative"
  | "PathTraversal"
  | "FileNotFound"
  | "EmptyCacheFile"
  | "IoError"
  /** A target partition has no compiled-model record. */
  | "MissingQnnModel"
  /** A compiled-model record names a tensor its info table lacks. */
  | "MissingTensorInfo"
  /** An external-mode node has an empty file reference. */
  | "MissingCachePayload"
  | "InvalidOptions"
  /** The backend loader rejected the blob. Always surfaced as InvalidGraph. */
  | "BackendLoadFailed"
  | "InvalidGraph"
  | "InvalidModelFile";

export class ContextCacheError extends Error {
  override name = "ContextCacheError";
  readonly code: ContextCacheErrorCode;

  constructor(code: ContextCacheErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

/**
 * Narrow an unknown thrown value, optionally to one code.
 */
export function isContextCacheError(
  err: unknown,
  code?: ContextCacheErrorCode,
): err is ContextCacheError {
  if (!(err instanceof ContextCacheError)) return false;
  return code === undefined || err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
