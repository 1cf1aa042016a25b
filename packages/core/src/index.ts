/**
 * Tree entry model: entry types, POSIX mode mapping, the entry value and
 * its binary codec.
 *
 * @packageDocumentation
 */

// File modes
export * from "./common/files/index.js";
// Object ids and checksums
export * from "./common/id/index.js";
// Entry names
export * from "./common/paths/index.js";
export * from "./errors/index.js";
export * from "./platform/index.js";
export * from "./trees/index.js";
