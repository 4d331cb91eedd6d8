export * from "./extension/index.js";
export * from "./frame/index.js";
export * from "./handshake/index.js";
