/**
 * Blob path resolution.
 *
 * External context blobs are referenced by a path relative to the directory
 * holding the context model. A reference is checked once, as a list of
 * logical segments, with "/" and "\" both treated as separators, so the
 * same string is accepted or rejected identically on every platform.
 * A resolved path never lies outside the base directory.
 */

import { stat } from "node:fs/promises";
import { isAbsolute, relative, resolve, sep } from "node:path";
import { ContextCacheError } from "../errors/index.js";

const SEPARATORS = /[\\/]+/;
const DRIVE_PREFIX = /^[A-Za-z]:/;

/**
 * Whether a reference is absolute in any platform's syntax: a leading
 * separator (POSIX root, UNC share, Windows rooted path) or a drive letter.
 */
export function isAbsoluteRef(ref: string): boolean {
  return ref.startsWith("/") || ref.startsWith("\\") || DRIVE_PREFIX.test(ref);
}

/**
 * Split a reference into normalized segments ("" and "." removed).
 * ".." segments are kept so callers can reject them.
 */
export function splitSegments(ref: string): string[] {
  return ref.split(SEPARATORS).filter(s => s !== "" && s !== ".");
}

/**
 * Resolve `ref` against `baseDir`.
 *
 * @throws ContextCacheError PathNotRelative for empty or absolute references
 * @throws ContextCacheError PathTraversal for any ".." segment
 */
export function resolveBlobPath(baseDir: string, ref: string): string {
  if (ref.length === 0) {
    throw new ContextCacheError("PathNotRelative", "Blob reference is empty");
  }
  if (isAbsoluteRef(ref)) {
    throw new ContextCacheError(
      "PathNotRelative",
      `Blob reference must be a relative path, but it is absolute: ${ref}`,
    );
  }

  const segments = splitSegments(ref);
  if (segments.includes("..")) {
    throw new ContextCacheError(
      "PathTraversal",
      `Blob reference contains '..' and may not point outside the model directory: ${ref}`,
    );
  }

  const root = resolve(baseDir);
  const full = resolve(root, ...segments);
  const rel = relative(root, full);
  if (rel.startsWith(`..${sep}`) || rel === ".." || isAbsolute(rel)) {
    throw new ContextCacheError("PathTraversal", `Blob reference escapes the model directory: ${ref}`);
  }
  return full;
}

/**
 * Existence check performed before a blob file is opened.
 *
 * @returns File size in bytes
 * @throws ContextCacheError FileNotFound when the path is missing or not a regular file
 */
export async function statRegularFile(path: string): Promise<number> {
  try {
    const info = await stat(path);
    if (info.isFile()) return info.size;
  } catch (err) {
    throw new ContextCacheError(
      "FileNotFound",
      `Blob file does not exist or is not accessible: ${path}`,
      { cause: err },
    );
  }
  throw new ContextCacheError("FileNotFound", `Blob path is not a regular file: ${path}`);
}
