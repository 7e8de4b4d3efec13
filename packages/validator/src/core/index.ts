export * from "./core-module-type.js";
