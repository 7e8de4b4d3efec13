export * from "./types/index.js";
export * from "./diagnostics/index.js";
export * from "./definitions.js";
export * from "./index-space.js";
export * from "./scope.js";
export * from "./subtyping.js";
export * from "./alias.js";
export * from "./instantiate.js";
export * from "./validate-module.js";
export * from "./core/index.js";
export * from "./decode/index.js";
export * from "./perf.js";
