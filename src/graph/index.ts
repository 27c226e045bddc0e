/**
 * Graph module: in-memory IR and context model files.
 */

export * from "./types.js";
export * from "./attributes.js";
export * from "./model-graph.js";
export * from "./io.js";
