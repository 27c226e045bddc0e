/**
 * Partition module: context node discovery and session ordering.
 */

export * from "./scanner.js";
export * from "./spill-fill.js";
