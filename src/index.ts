/**
 * qnn-ep-context: QNN context binaries inside portable model graphs.
 *
 * A compiled session's blob is encoded into EPContext nodes (inline or as a
 * sibling .bin file) so a later load skips recompilation. Loading finds each
 * session's main node, sizes the shared scratch region for the largest
 * session, and hands every blob to the backend.
 */

export * from "./errors/index.js";
export * from "./schemas/index.js";
export * from "./graph/index.js";
export * from "./paths/index.js";
export * from "./partition/index.js";
export * from "./context/index.js";
export * from "./events/index.js";
export * from "./config/index.js";
