/**
 * Error classes for tree entry construction and decoding
 */

/**
 * Base error for invalid tree entries.
 *
 * Thrown when an entry cannot be constructed or cannot be encoded
 * without losing information.
 */
export class TreeEntryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TreeEntryError";
  }
}

/**
 * Entry name is not a single path component.
 */
export class PathComponentError extends TreeEntryError {
  readonly component: string;

  constructor(message: string, component: string) {
    super(message);
    this.name = "PathComponentError";
    this.component = component;
  }
}

/**
 * Internal consistency violation: a value outside the closed set of entry
 * types reached code that must handle every type. Indicates a code defect,
 * never bad input data.
 */
export class TreeEntryInvariantError extends Error {
  readonly value: unknown;

  constructor(message: string, value: unknown) {
    super(message);
    this.name = "TreeEntryInvariantError";
    this.value = value;
  }
}

/**
 * A sequence of encoded entries could not be decoded.
 */
export class TreeEntryFormatError extends Error {
  /** Field that failed to decode */
  readonly field: string;
  /** Offset of the start of the failing entry */
  readonly offset: number;

  constructor(message: string, field: string, offset: number) {
    super(message);
    this.name = "TreeEntryFormatError";
    this.field = field;
    this.offset = offset;
  }
}
