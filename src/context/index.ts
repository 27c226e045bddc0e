/**
 * Context module: encode compiled blobs into context nodes and load them back.
 */

export * from "./blob.js";
export * from "./backend.js";
export * from "./sharing.js";
export * from "./naming.js";
export * from "./decoder.js";
export * from "./encoder.js";
export * from "./loader.js";
export * from "./collecting-loader.js";
