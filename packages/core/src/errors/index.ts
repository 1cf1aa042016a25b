export * from "./tree-entry-errors.js";
