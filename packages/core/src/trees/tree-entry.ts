import { isHex } from "@treekit/utils";
import { validatePathComponent } from "../common/paths/path-component.js";
import { type Hash20, IdFormat, type ObjectId, ZERO_HASH20 } from "../common/id/object-id.js";
import { PathComponentError, TreeEntryError } from "../errors/tree-entry-errors.js";
import {
  isTreeEntryType,
  TreeEntryType,
  type TreeEntryTypeValue,
  treeEntryTypeChar,
} from "./tree-entry-type.js";

/**
 * Encoded size value meaning "size unknown". No real size may equal it.
 */
export const NO_SIZE = 0xffff_ffff_ffff_ffffn;

/**
 * Names up to this many UTF-8 bytes are assumed to be stored inline
 * by the runtime and hold no separate allocation.
 */
const INLINE_NAME_BYTES = 15;

const encoder = new TextEncoder();
// A leading U+FEFF is part of the name
const decoder = new TextDecoder("utf-8", { ignoreBOM: true });

/**
 * Immutable directory entry
 *
 * Identity is `(id, type, name)`; `size` and `contentSha1` are metadata
 * and do not take part in equality (see {@link treeEntriesEqual}).
 * Instances are frozen; use {@link createTreeEntry} or
 * {@link withTreeEntryMetadata} to obtain new ones.
 */
export interface TreeEntry {
  /** Single path component (UTF-8, no separators) */
  readonly name: string;
  /** Content identifier of the referenced blob or subtree */
  readonly id: ObjectId;
  readonly type: TreeEntryTypeValue;
  /** Content size in bytes, absent when not yet known */
  readonly size?: bigint;
  /** SHA-1 of the content, absent when not yet known */
  readonly contentSha1?: Hash20;
}

export interface TreeEntryInit {
  name: string;
  id: ObjectId;
  type: TreeEntryTypeValue;
  size?: number | bigint;
  contentSha1?: Hash20;
}

export interface TreeEntryMetadata {
  size?: number | bigint;
  contentSha1?: Hash20;
}

/**
 * Create a validated, frozen tree entry
 *
 * Hex ids and checksums are lowercased. An all-zero checksum is
 * indistinguishable from "unknown" once encoded, so it is stored as absent.
 *
 * @throws PathComponentError if the name is not a single path component
 * @throws TreeEntryError if the type, id, size or checksum cannot be encoded
 */
export function createTreeEntry(init: TreeEntryInit): TreeEntry {
  if (!isTreeEntryType(init.type)) {
    throw new TreeEntryError(`Invalid tree entry type: ${String(init.type)}`);
  }
  const name = normalizeName(init.name);
  const id = normalizeId(init.id);
  const size = normalizeSize(init.size);
  const contentSha1 = normalizeContentSha1(init.contentSha1);

  const entry: TreeEntry = {
    name,
    id,
    type: init.type,
    ...(size !== undefined ? { size } : {}),
    ...(contentSha1 !== undefined ? { contentSha1 } : {}),
  };
  return Object.freeze(entry);
}

/**
 * Return a copy of the entry with replaced size and checksum
 *
 * Omitted metadata fields become absent in the result.
 */
export function withTreeEntryMetadata(entry: TreeEntry, metadata: TreeEntryMetadata): TreeEntry {
  return createTreeEntry({
    name: entry.name,
    id: entry.id,
    type: entry.type,
    size: metadata.size,
    contentSha1: metadata.contentSha1,
  });
}

/**
 * Identity equality: same id, type and name
 */
export function treeEntriesEqual(a: TreeEntry, b: TreeEntry): boolean {
  return a.id === b.id && a.type === b.type && a.name === b.name;
}

/**
 * Compare tree entries for canonical ordering
 *
 * Names are compared byte-wise in UTF-8; directories compare as if
 * their name ended with '/'.
 */
export function compareTreeEntries(a: TreeEntry, b: TreeEntry): number {
  const aIsTree = a.type === TreeEntryType.TREE;
  const bIsTree = b.type === TreeEntryType.TREE;
  const aBytes = encoder.encode(a.name);
  const bBytes = encoder.encode(b.name);

  const len = Math.min(aBytes.length, bBytes.length);
  for (let i = 0; i < len; i++) {
    const diff = aBytes[i] - bBytes[i];
    if (diff !== 0) return diff;
  }

  const aChar = aBytes.length > len ? aBytes[len] : aIsTree ? 0x2f /* '/' */ : 0;
  const bChar = bBytes.length > len ? bBytes[len] : bIsTree ? 0x2f /* '/' */ : 0;
  return aChar - bChar;
}

/**
 * Render `(name, id, typeChar)` for diagnostics
 */
export function treeEntryToLogString(entry: TreeEntry): string {
  return `(${entry.name}, ${entry.id}, ${treeEntryTypeChar(entry.type)})`;
}

/**
 * Estimate memory held by the entry outside the value itself
 *
 * Only the name is counted; short names are treated as inline.
 */
export function getIndirectSizeBytes(entry: TreeEntry): number {
  const length = utf8Length(entry.name);
  return length > INLINE_NAME_BYTES ? length : 0;
}

export function utf8Length(value: string): number {
  return encoder.encode(value).length;
}

function normalizeName(name: string): string {
  validatePathComponent(name);
  const bytes = encoder.encode(name);
  if (decoder.decode(bytes) !== name) {
    throw new PathComponentError("Path component is not well-formed Unicode", name);
  }
  if (bytes.length > IdFormat.MAX_FIELD_LENGTH) {
    throw new TreeEntryError(
      `Tree entry name is ${bytes.length} bytes, limit is ${IdFormat.MAX_FIELD_LENGTH}`,
    );
  }
  return name;
}

function normalizeId(id: ObjectId): ObjectId {
  if (!isHex(id)) {
    throw new TreeEntryError(`Invalid object id: ${id}`);
  }
  const length = id.length / 2;
  if (length > IdFormat.MAX_FIELD_LENGTH) {
    throw new TreeEntryError(
      `Object id is ${length} bytes, limit is ${IdFormat.MAX_FIELD_LENGTH}`,
    );
  }
  return id.toLowerCase();
}

function normalizeSize(size: number | bigint | undefined): bigint | undefined {
  if (size === undefined) return undefined;
  if (typeof size === "number") {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new TreeEntryError(`Invalid tree entry size: ${size}`);
    }
    return BigInt(size);
  }
  if (size < 0n) {
    throw new TreeEntryError(`Invalid tree entry size: ${size}`);
  }
  if (size >= NO_SIZE) {
    throw new TreeEntryError(`Tree entry size ${size} collides with the unknown-size marker`);
  }
  return size;
}

function normalizeContentSha1(sha1: Hash20 | undefined): Hash20 | undefined {
  if (sha1 === undefined) return undefined;
  if (sha1.length !== IdFormat.HASH20_STRING_LENGTH || !isHex(sha1)) {
    throw new TreeEntryError(`Invalid content SHA-1: ${sha1}`);
  }
  const normalized = sha1.toLowerCase();
  return normalized === ZERO_HASH20 ? undefined : normalized;
}
