export * from "./access-control.js";
export * from "./extension-header.js";
export * from "./negotiation.js";
