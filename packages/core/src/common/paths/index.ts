export * from "./path-component.js";
