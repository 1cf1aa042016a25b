export * from "./hex-format-error.js";
