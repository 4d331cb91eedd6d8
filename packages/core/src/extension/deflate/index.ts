export * from "./constants.js";
export * from "./deflate-extension.js";
