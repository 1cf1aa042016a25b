/**
 * Utility functions for hash operations
 */

import { HexFormatError } from "../../errors/hex-format-error.js";

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

/**
 * Check whether a string is an even-length hexadecimal sequence
 */
export function isHex(value: string): boolean {
  return value.length % 2 === 0 && HEX_PATTERN.test(value);
}

/**
 * Convert hex string to Uint8Array
 *
 * @param hex Hexadecimal string (e.g., "deadbeef")
 * @returns Uint8Array of bytes
 * @throws HexFormatError if the string has odd length or non-hex characters
 */
export function hexToBytes(hex: string): Uint8Array {
  if (!isHex(hex)) {
    throw new HexFormatError(`Invalid hex string of length ${hex.length}`, hex);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Convert Uint8Array to hex string
 *
 * @param bytes Uint8Array of bytes
 * @returns Hexadecimal string (lowercase)
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

/**
 * Check that every byte of the array is zero
 */
export function isAllZero(bytes: Uint8Array): boolean {
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] !== 0) return false;
  }
  return true;
}
