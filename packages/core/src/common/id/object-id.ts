/**
 * Object identifier (content hash in lowercase hex format)
 *
 * The identifier is opaque to this package: any byte length from 0 to
 * 65535 is accepted, so SHA-1 (40 hex chars), SHA-256 (64 hex chars) and
 * composite ids with a prefix byte all fit.
 */
export type ObjectId = string;

/**
 * Secondary content checksum: 20 raw bytes as 40 lowercase hex characters
 */
export type Hash20 = string;

/**
 * Identifier format constants
 */
export const IdFormat = {
  /** Largest id or name that fits the 16-bit length prefix */
  MAX_FIELD_LENGTH: 0xffff,
  /** Raw size of a content checksum */
  HASH20_LENGTH: 20,
  /** Hex length of a content checksum */
  HASH20_STRING_LENGTH: 40,
} as const;

/**
 * All-zero checksum. Marks "checksum unknown" in encoded entries.
 */
export const ZERO_HASH20: Hash20 = "0".repeat(IdFormat.HASH20_STRING_LENGTH);
