export * from "./posix-mode.js";
