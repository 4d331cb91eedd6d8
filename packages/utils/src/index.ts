export * from "./buffers/index.js";
export * from "./compression/index.js";
