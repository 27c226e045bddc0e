export * from "./config.js";
export * from "./context-node.js";
export * from "./graph.js";
