/**
 * Logging hooks
 *
 * Library code never writes to the console by itself. Applications opt in
 * by registering a logger, in the same way platform-specific
 * implementations are registered elsewhere:
 *
 * @example
 * ```ts
 * import { setLogger } from "@treekit/utils";
 * import { createConsoleLogger } from "@treekit/utils-node";
 *
 * setLogger(createConsoleLogger({ level: "warn" }));
 * ```
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug?: (...args: unknown[]) => void;
  info?: (...args: unknown[]) => void;
  warn?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}

/** Options accepted by operations that report diagnostics */
export interface LoggingOptions {
  /** Overrides the registered logger for a single call */
  logger?: Logger;
}

const silentLogger: Logger = {};

let _logger: Logger = silentLogger;

/**
 * Register the logger used when an operation is not given one explicitly
 *
 * Pass `undefined` to restore the silent default.
 */
export function setLogger(logger: Logger | undefined): void {
  _logger = logger ?? silentLogger;
}

export function getLogger(): Logger {
  return _logger;
}

/**
 * Pick the logger for a call: the explicit one if given, else the registered one
 */
export function resolveLogger(options?: LoggingOptions): Logger {
  return options?.logger ?? _logger;
}
