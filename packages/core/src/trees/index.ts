export * from "./tree-entry.js";
export * from "./tree-entry-format.js";
export * from "./tree-entry-mode.js";
export * from "./tree-entry-type.js";
