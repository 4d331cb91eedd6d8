export * from "./boxed-extension.js";
export * from "./deflate/index.js";
export * from "./errors.js";
export * from "./param.js";
export * from "./types.js";
