export * from "./def-type.js";
export * from "./format.js";
