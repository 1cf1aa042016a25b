/**
 * Conversion between tree entry types and POSIX mode bits
 *
 * Two tables exist: one for hosts with native symlinks and one for hosts
 * without them, where a symlink is reported as an executable regular file
 * and executable/symlink cannot be recovered from mode bits. The table in
 * use is chosen by {@link PlatformCapabilities.supportsSymlinks}.
 */

import { isDirectoryMode, isRegularFileMode, isSymlinkMode, PosixMode } from "../common/files/posix-mode.js";
import {
  getPlatformCapabilities,
  type PlatformCapabilities,
} from "../platform/platform-capabilities.js";
import { TreeEntryType, type TreeEntryTypeValue, unreachableTreeEntryType } from "./tree-entry-type.js";

const DIRECTORY_MODE = PosixMode.S_IFDIR | 0o755;
const REGULAR_FILE_MODE = PosixMode.S_IFREG | 0o644;
const EXECUTABLE_FILE_MODE = PosixMode.S_IFREG | 0o755;
const SYMLINK_MODE = PosixMode.S_IFLNK | 0o755;

export interface ModeMapping {
  modeFromType(type: TreeEntryTypeValue): number;
  typeFromMode(mode: number): TreeEntryTypeValue | undefined;
}

export function modeFromTypeWithSymlinks(type: TreeEntryTypeValue): number {
  switch (type) {
    case TreeEntryType.TREE:
      return DIRECTORY_MODE;
    case TreeEntryType.REGULAR_FILE:
      return REGULAR_FILE_MODE;
    case TreeEntryType.EXECUTABLE_FILE:
      return EXECUTABLE_FILE_MODE;
    case TreeEntryType.SYMLINK:
      return SYMLINK_MODE;
    default:
      return unreachableTreeEntryType(type, "modeFromTypeWithSymlinks");
  }
}

export function modeFromTypeWithoutSymlinks(type: TreeEntryTypeValue): number {
  switch (type) {
    case TreeEntryType.TREE:
      return DIRECTORY_MODE;
    case TreeEntryType.REGULAR_FILE:
      return REGULAR_FILE_MODE;
    case TreeEntryType.EXECUTABLE_FILE:
      return EXECUTABLE_FILE_MODE;
    case TreeEntryType.SYMLINK:
      // Reported as a file, same as executables.
      return EXECUTABLE_FILE_MODE;
    default:
      return unreachableTreeEntryType(type, "modeFromTypeWithoutSymlinks");
  }
}

/**
 * Classify mode bits on a host with native symlinks
 *
 * @returns undefined for devices, sockets, FIFOs and unknown file types
 */
export function typeFromModeWithSymlinks(mode: number): TreeEntryTypeValue | undefined {
  if (isRegularFileMode(mode)) {
    return mode & PosixMode.S_IXUSR ? TreeEntryType.EXECUTABLE_FILE : TreeEntryType.REGULAR_FILE;
  }
  if (isSymlinkMode(mode)) {
    return TreeEntryType.SYMLINK;
  }
  if (isDirectoryMode(mode)) {
    return TreeEntryType.TREE;
  }
  return undefined;
}

/**
 * Classify mode bits on a host without native symlinks
 *
 * Every regular file is a REGULAR_FILE here; the execute bit carries no
 * meaning and symlink modes are not representable.
 */
export function typeFromModeWithoutSymlinks(mode: number): TreeEntryTypeValue | undefined {
  if (isRegularFileMode(mode)) {
    return TreeEntryType.REGULAR_FILE;
  }
  if (isDirectoryMode(mode)) {
    return TreeEntryType.TREE;
  }
  return undefined;
}

const WITH_SYMLINKS: ModeMapping = Object.freeze({
  modeFromType: modeFromTypeWithSymlinks,
  typeFromMode: typeFromModeWithSymlinks,
});

const WITHOUT_SYMLINKS: ModeMapping = Object.freeze({
  modeFromType: modeFromTypeWithoutSymlinks,
  typeFromMode: typeFromModeWithoutSymlinks,
});

export function getModeMapping(
  capabilities: PlatformCapabilities = getPlatformCapabilities(),
): ModeMapping {
  return capabilities.supportsSymlinks ? WITH_SYMLINKS : WITHOUT_SYMLINKS;
}

/**
 * Mode bits for an entry type on the given (or registered) platform
 */
export function modeFromTreeEntryType(
  type: TreeEntryTypeValue,
  capabilities?: PlatformCapabilities,
): number {
  return getModeMapping(capabilities).modeFromType(type);
}

/**
 * Entry type for mode bits on the given (or registered) platform
 *
 * @returns undefined when the mode has no tree entry representation
 */
export function treeEntryTypeFromMode(
  mode: number,
  capabilities?: PlatformCapabilities,
): TreeEntryTypeValue | undefined {
  return getModeMapping(capabilities).typeFromMode(mode);
}
