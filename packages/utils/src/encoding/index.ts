export * from "./byte-appender.js";
export * from "./byte-cursor.js";
