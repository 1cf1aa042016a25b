/**
 * Platform capabilities
 *
 * Behaviour that depends on the host filesystem is selected by these
 * flags rather than by checks scattered through the code. Defaults
 * describe a POSIX host; Node.js applications can register detected
 * values:
 *
 * @example
 * ```ts
 * import { setPlatformCapabilities } from "@treekit/core";
 * import { detectPlatformCapabilities } from "@treekit/utils-node";
 *
 * setPlatformCapabilities(detectPlatformCapabilities());
 * ```
 */
export interface PlatformCapabilities {
  /**
   * Whether the filesystem has symbolic links as a distinct file type.
   * When false, symlinks are reported as executable regular files.
   */
  supportsSymlinks: boolean;
}

export const DEFAULT_PLATFORM_CAPABILITIES: Readonly<PlatformCapabilities> = Object.freeze({
  supportsSymlinks: true,
});

let _capabilities: Readonly<PlatformCapabilities> = DEFAULT_PLATFORM_CAPABILITIES;

/**
 * Override some or all of the registered capabilities
 */
export function setPlatformCapabilities(capabilities: Partial<PlatformCapabilities>): void {
  _capabilities = Object.freeze({ ..._capabilities, ...capabilities });
}

export function getPlatformCapabilities(): Readonly<PlatformCapabilities> {
  return _capabilities;
}

/**
 * Restore the default capabilities
 */
export function resetPlatformCapabilities(): void {
  _capabilities = DEFAULT_PLATFORM_CAPABILITIES;
}
