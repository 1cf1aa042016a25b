import { getLogger } from "@treekit/utils";
import { TreeEntryInvariantError } from "../errors/tree-entry-errors.js";

/**
 * Tree entry type
 *
 * The numeric values are the type tags written by the entry codec and
 * must never be renumbered.
 */
export const TreeEntryType = {
  /** Directory */
  TREE: 0,
  /** Regular file (non-executable) */
  REGULAR_FILE: 1,
  /** Executable file */
  EXECUTABLE_FILE: 2,
  /** Symbolic link */
  SYMLINK: 3,
} as const;

export type TreeEntryTypeValue = (typeof TreeEntryType)[keyof typeof TreeEntryType];

export type TreeEntryTypeName = keyof typeof TreeEntryType;

export function isTreeEntryType(value: number): value is TreeEntryTypeValue {
  return (
    value === TreeEntryType.TREE ||
    value === TreeEntryType.REGULAR_FILE ||
    value === TreeEntryType.EXECUTABLE_FILE ||
    value === TreeEntryType.SYMLINK
  );
}

/**
 * Fail on a type value that escaped exhaustive handling.
 *
 * Every `switch` over {@link TreeEntryTypeValue} ends in a call to this
 * function, so adding a variant breaks compilation at each switch that
 * does not handle it.
 */
export function unreachableTreeEntryType(value: never, context: string): never {
  const message = `illegal tree entry type ${String(value)} in ${context}`;
  getLogger().error?.(message);
  throw new TreeEntryInvariantError(message, value);
}

export function treeEntryTypeName(type: TreeEntryTypeValue): TreeEntryTypeName {
  switch (type) {
    case TreeEntryType.TREE:
      return "TREE";
    case TreeEntryType.REGULAR_FILE:
      return "REGULAR_FILE";
    case TreeEntryType.EXECUTABLE_FILE:
      return "EXECUTABLE_FILE";
    case TreeEntryType.SYMLINK:
      return "SYMLINK";
    default:
      return unreachableTreeEntryType(type, "treeEntryTypeName");
  }
}

/**
 * Single-character tag used in log output: d, f, x or l
 */
export function treeEntryTypeChar(type: TreeEntryTypeValue): string {
  switch (type) {
    case TreeEntryType.TREE:
      return "d";
    case TreeEntryType.REGULAR_FILE:
      return "f";
    case TreeEntryType.EXECUTABLE_FILE:
      return "x";
    case TreeEntryType.SYMLINK:
      return "l";
    default:
      return unreachableTreeEntryType(type, "treeEntryTypeChar");
  }
}
