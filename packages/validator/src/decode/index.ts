export * from "./types.js";
export * from "./decode-definitions.js";
export * from "./document.js";
export * from "./encode.js";
export * from "./fs-host.js";
export * from "./memory-host.js";
