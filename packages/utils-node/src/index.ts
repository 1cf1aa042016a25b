/**
 * Node.js-specific utilities
 *
 * Nothing here is registered automatically; applications opt in:
 *
 * @example
 * ```ts
 * import { setPlatformCapabilities } from "@treekit/core";
 * import { setLogger } from "@treekit/utils";
 * import { createConsoleLogger, detectPlatformCapabilities } from "@treekit/utils-node";
 *
 * setPlatformCapabilities(detectPlatformCapabilities());
 * setLogger(createConsoleLogger());
 * ```
 *
 * @packageDocumentation
 */

export * from "./logging/index.js";
export * from "./platform/index.js";
