export * from "./platform-capabilities.js";
