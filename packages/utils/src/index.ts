export * from "./encoding/index.js";
export * from "./errors/index.js";
export * from "./hash/index.js";
export * from "./logging/index.js";
