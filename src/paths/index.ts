export * from "./resolver.js";
