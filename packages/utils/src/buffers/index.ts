export * from "./growable-buffer.js";
