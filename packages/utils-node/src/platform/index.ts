/**
 * Node.js platform capability detection
 *
 * @example
 * ```ts
 * import { setPlatformCapabilities } from "@treekit/core";
 * import { detectPlatformCapabilities } from "@treekit/utils-node/platform";
 *
 * setPlatformCapabilities(detectPlatformCapabilities());
 * ```
 */
import type { PlatformCapabilities } from "@treekit/core";

/**
 * Environment variable forcing symlink support on or off
 */
export const SUPPORTS_SYMLINKS_ENV = "TREEKIT_SUPPORTS_SYMLINKS";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export interface DetectPlatformOptions {
  /** Defaults to `process.platform` */
  platform?: NodeJS.Platform;
  /** Defaults to `process.env` */
  env?: NodeJS.ProcessEnv;
}

/**
 * Parse a boolean flag from an environment value
 *
 * @returns undefined when the value is missing or not recognized
 */
export function parseBooleanFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return undefined;
}

/**
 * Detect capabilities of the host running this process
 *
 * Windows has no symlink file type in `st_mode`; every other platform
 * Node.js runs on does. The environment variable overrides detection.
 */
export function detectPlatformCapabilities(
  options: DetectPlatformOptions = {},
): PlatformCapabilities {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;

  const override = parseBooleanFlag(env[SUPPORTS_SYMLINKS_ENV]);
  return {
    supportsSymlinks: override ?? platform !== "win32",
  };
}
