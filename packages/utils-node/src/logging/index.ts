/**
 * Console-backed logger for Node.js applications
 *
 * @example
 * ```ts
 * import { setLogger } from "@treekit/utils";
 * import { createConsoleLogger } from "@treekit/utils-node/logging";
 *
 * setLogger(createConsoleLogger({ level: "warn", prefix: "[treekit]" }));
 * ```
 */
import type { Logger, LogLevel } from "@treekit/utils";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type ConsoleOutput = Pick<Console, LogLevel>;

export interface ConsoleLoggerOptions {
  /** Lowest level that is written, "info" by default */
  level?: LogLevel;
  /** Text written before every message */
  prefix?: string;
  /** Target, the global console by default */
  output?: ConsoleOutput;
}

/**
 * Create a logger writing to the console
 *
 * Methods below the configured level are left undefined, so
 * `logger.debug?.(...)` costs nothing when debug output is off.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const output = options.output ?? console;
  const prefix = options.prefix;

  const method = (level: LogLevel): ((...args: unknown[]) => void) | undefined => {
    if (LEVEL_ORDER[level] < threshold) return undefined;
    return prefix === undefined
      ? (...args: unknown[]) => output[level](...args)
      : (...args: unknown[]) => output[level](prefix, ...args);
  };

  return {
    debug: method("debug"),
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
  };
}
