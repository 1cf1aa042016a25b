/**
 * Binary format of a single tree entry
 *
 * Layout (all integers little-endian):
 *
 *   type     u8      entry type tag (TreeEntryType value)
 *   idLen    u16     length of the id in bytes
 *   id       idLen   raw id bytes
 *   nameLen  u16     length of the name in bytes
 *   name     nameLen UTF-8 name, not NUL-terminated
 *   size     u64     content size, 0xFFFFFFFFFFFFFFFF when unknown
 *   sha1     20      content SHA-1, all zero when unknown
 *
 * The layout is persisted; changing any field breaks existing data.
 */

import {
  ByteAppender,
  ByteCursor,
  bytesToHex,
  hexToBytes,
  isAllZero,
  type LoggingOptions,
  resolveLogger,
} from "@treekit/utils";
import { isPathComponent } from "../common/paths/path-component.js";
import { IdFormat, ZERO_HASH20 } from "../common/id/object-id.js";
import { TreeEntryError, TreeEntryFormatError } from "../errors/tree-entry-errors.js";
import { compareTreeEntries, createTreeEntry, NO_SIZE, type TreeEntry, utf8Length } from "./tree-entry.js";
import { isTreeEntryType } from "./tree-entry-type.js";

const TYPE_SIZE = 1;
const LENGTH_SIZE = 2;
const SIZE_FIELD_SIZE = 8;
const SHA1_SIZE = IdFormat.HASH20_LENGTH;

/** Bytes of an encoded entry that do not depend on id and name */
export const TREE_ENTRY_FIXED_SIZE = TYPE_SIZE + LENGTH_SIZE + LENGTH_SIZE + SIZE_FIELD_SIZE + SHA1_SIZE;

/**
 * Encoded fields, in the order they are read
 */
export type TreeEntryField =
  | "type"
  | "idLength"
  | "id"
  | "nameLength"
  | "name"
  | "size"
  | "contentSha1";

/**
 * Input ended before the field could be read
 */
export interface TreeEntryTruncated {
  ok: false;
  reason: "truncated";
  field: TreeEntryField;
  /** Bytes left in the input when the field was reached */
  available: number;
  /** Bytes the field needs */
  required: number;
}

/**
 * The field was read but holds a value the model cannot represent
 */
export interface TreeEntryInvalid {
  ok: false;
  reason: "invalid";
  field: "type" | "name";
  message: string;
}

export type TreeEntryReadFailure = TreeEntryTruncated | TreeEntryInvalid;

export type TreeEntryReadResult = { ok: true; entry: TreeEntry } | TreeEntryReadFailure;

const FIELD_LABELS: Record<TreeEntryField, string> = {
  type: "type",
  idLength: "id size",
  id: "id",
  nameLength: "name size",
  name: "name",
  size: "size",
  contentSha1: "sha1",
};

const nameEncoder = new TextEncoder();
const nameDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Number of bytes {@link encodeTreeEntry} writes for the entry
 */
export function computeTreeEntrySize(entry: TreeEntry): number {
  return TREE_ENTRY_FIXED_SIZE + entry.id.length / 2 + utf8Length(entry.name);
}

/**
 * Append the encoded entry to the buffer
 *
 * @throws TreeEntryError if the id or name does not fit its 16-bit
 * length prefix, or the size or checksum cannot be encoded
 */
export function encodeTreeEntry(entry: TreeEntry, out: ByteAppender): void {
  const id = hexToBytes(entry.id);
  if (id.length > IdFormat.MAX_FIELD_LENGTH) {
    throw new TreeEntryError(`Object id is ${id.length} bytes, limit is ${IdFormat.MAX_FIELD_LENGTH}`);
  }
  const name = nameEncoder.encode(entry.name);
  if (name.length > IdFormat.MAX_FIELD_LENGTH) {
    throw new TreeEntryError(
      `Tree entry name is ${name.length} bytes, limit is ${IdFormat.MAX_FIELD_LENGTH}`,
    );
  }
  if (entry.size !== undefined && (entry.size < 0n || entry.size >= NO_SIZE)) {
    throw new TreeEntryError(`Tree entry size ${entry.size} cannot be encoded`);
  }
  const sha1 = hexToBytes(entry.contentSha1 ?? ZERO_HASH20);
  if (sha1.length !== SHA1_SIZE) {
    throw new TreeEntryError(`Invalid content SHA-1: ${entry.contentSha1}`);
  }

  out.writeUint8(entry.type);
  out.writeUint16LE(id.length);
  out.push(id);
  out.writeUint16LE(name.length);
  out.push(name);
  out.writeBigUint64LE(entry.size ?? NO_SIZE);
  out.push(sha1);
}

/**
 * Encode one entry into a buffer of exactly {@link computeTreeEntrySize} bytes
 */
export function serializeTreeEntry(entry: TreeEntry): Uint8Array {
  const out = new ByteAppender(computeTreeEntrySize(entry));
  encodeTreeEntry(entry, out);
  return out.toBytes();
}

/**
 * Read one entry from the cursor
 *
 * Fields are checked in wire order and reading stops at the first field
 * that is short or invalid; on failure the cursor is left at that field.
 * Tag values outside the known entry types and names that are not valid
 * UTF-8 path components are rejected.
 */
export function readTreeEntry(cursor: ByteCursor): TreeEntryReadResult {
  if (cursor.remaining < TYPE_SIZE) return truncated("type", cursor, TYPE_SIZE);
  const type = cursor.readUint8();
  if (!isTreeEntryType(type)) {
    return { ok: false, reason: "invalid", field: "type", message: `unknown type tag ${type}` };
  }

  if (cursor.remaining < LENGTH_SIZE) return truncated("idLength", cursor, LENGTH_SIZE);
  const idLength = cursor.readUint16LE();
  if (cursor.remaining < idLength) return truncated("id", cursor, idLength);
  const id = bytesToHex(cursor.readBytes(idLength));

  if (cursor.remaining < LENGTH_SIZE) return truncated("nameLength", cursor, LENGTH_SIZE);
  const nameLength = cursor.readUint16LE();
  if (cursor.remaining < nameLength) return truncated("name", cursor, nameLength);
  const nameBytes = cursor.readBytes(nameLength);
  let name: string;
  try {
    name = nameDecoder.decode(nameBytes);
  } catch {
    return { ok: false, reason: "invalid", field: "name", message: "name is not valid UTF-8" };
  }
  if (!isPathComponent(name)) {
    return {
      ok: false,
      reason: "invalid",
      field: "name",
      message: `name ${JSON.stringify(name)} is not a path component`,
    };
  }

  if (cursor.remaining < SIZE_FIELD_SIZE) return truncated("size", cursor, SIZE_FIELD_SIZE);
  const rawSize = cursor.readBigUint64LE();

  if (cursor.remaining < SHA1_SIZE) return truncated("contentSha1", cursor, SHA1_SIZE);
  const sha1 = cursor.readBytes(SHA1_SIZE);

  const entry = createTreeEntry({
    name,
    id,
    type,
    size: rawSize === NO_SIZE ? undefined : rawSize,
    contentSha1: isAllZero(sha1) ? undefined : bytesToHex(sha1),
  });
  return { ok: true, entry };
}

/**
 * Read one entry, logging and returning undefined when it cannot be read
 */
export function decodeTreeEntry(
  cursor: ByteCursor,
  options?: LoggingOptions,
): TreeEntry | undefined {
  const result = readTreeEntry(cursor);
  if (result.ok) {
    return result.entry;
  }
  resolveLogger(options).error?.(describeReadFailure(result));
  return undefined;
}

/**
 * Decode a buffer that holds exactly one entry
 *
 * Trailing bytes after the entry are treated as corruption.
 */
export function parseTreeEntry(data: Uint8Array, options?: LoggingOptions): TreeEntry | undefined {
  const cursor = new ByteCursor(data);
  const entry = decodeTreeEntry(cursor, options);
  if (entry === undefined) {
    return undefined;
  }
  if (!cursor.done) {
    resolveLogger(options).error?.(
      `Unexpected ${cursor.remaining} bytes after tree entry ${entry.name}`,
    );
    return undefined;
  }
  return entry;
}

/**
 * Encode entries back to back, in canonical order
 *
 * @param entries Tree entries (any order)
 */
export function serializeTreeEntries(entries: Iterable<TreeEntry>): Uint8Array {
  const sorted = [...entries].sort(compareTreeEntries);

  let totalSize = 0;
  for (const entry of sorted) {
    totalSize += computeTreeEntrySize(entry);
  }

  const out = new ByteAppender(totalSize);
  for (const entry of sorted) {
    encodeTreeEntry(entry, out);
  }
  return out.toBytes();
}

/**
 * Parse back-to-back entries (generator)
 *
 * @param data Concatenated encoded entries
 * @yields Tree entries in stored order
 * @throws TreeEntryFormatError on a truncated or invalid entry
 */
export function* parseTreeEntries(data: Uint8Array, options?: LoggingOptions): Generator<TreeEntry> {
  const cursor = new ByteCursor(data);

  while (!cursor.done) {
    const start = cursor.offset;
    const result = readTreeEntry(cursor);
    if (!result.ok) {
      const message = `${describeReadFailure(result)} (entry at offset ${start})`;
      resolveLogger(options).error?.(message);
      throw new TreeEntryFormatError(message, result.field, start);
    }
    yield result.entry;
  }
}

/**
 * Parse back-to-back entries to an array
 */
export function parseTreeEntriesToArray(data: Uint8Array, options?: LoggingOptions): TreeEntry[] {
  return Array.from(parseTreeEntries(data, options));
}

/**
 * Human-readable description of a read failure
 */
export function describeReadFailure(failure: TreeEntryReadFailure): string {
  if (failure.reason === "truncated") {
    return `Can not read tree entry ${FIELD_LABELS[failure.field]}, bytes remaining ${failure.available} need ${failure.required}`;
  }
  return `Can not read tree entry ${FIELD_LABELS[failure.field]}: ${failure.message}`;
}

function truncated(field: TreeEntryField, cursor: ByteCursor, required: number): TreeEntryTruncated {
  return { ok: false, reason: "truncated", field, available: cursor.remaining, required };
}
