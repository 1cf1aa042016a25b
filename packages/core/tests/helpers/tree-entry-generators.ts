/**
 * Test data generators for tree entries
 */

import { ByteAppender, hexToBytes } from "@treekit/utils";
import { createTreeEntry, type TreeEntry } from "../../src/trees/tree-entry.js";
import { TreeEntryType, type TreeEntryTypeValue } from "../../src/trees/tree-entry-type.js";

export const ALL_TYPES: TreeEntryTypeValue[] = [
  TreeEntryType.TREE,
  TreeEntryType.REGULAR_FILE,
  TreeEntryType.EXECUTABLE_FILE,
  TreeEntryType.SYMLINK,
];

const NAME_CHARS = ["a", "b", "z", "0", "9", "-", "_", ".", " ", "é", "日"];

/**
 * Seeded random number generator for reproducible tests
 *
 * Uses a simple LCG (Linear Congruential Generator).
 */
export class TestRng {
  private seed: number;

  constructor(seed = 12345) {
    this.seed = seed;
  }

  /** Next random number in [0, 1) */
  next(): number {
    this.seed = (this.seed * 1103515245 + 12345) & 0x7fffffff;
    return this.seed / 0x7fffffff;
  }

  /** Random integer in [min, max] */
  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  pick<T>(items: readonly T[]): T {
    return items[this.int(0, items.length - 1)];
  }

  hex(byteLength: number): string {
    let result = "";
    for (let i = 0; i < byteLength; i++) {
      result += this.int(0, 255).toString(16).padStart(2, "0");
    }
    return result;
  }
}

/**
 * Random valid entry; names always start with a letter
 */
export function randomTreeEntry(rng: TestRng): TreeEntry {
  let name = "n";
  const nameLength = rng.int(0, 40);
  for (let i = 0; i < nameLength; i++) {
    name += rng.pick(NAME_CHARS);
  }
  const size = rng.next() < 0.5 ? undefined : BigInt(rng.int(0, 1_000_000));
  const contentSha1 = rng.next() < 0.5 ? undefined : `ff${rng.hex(19)}`;

  return createTreeEntry({
    name,
    id: rng.hex(rng.int(0, 40)),
    type: rng.pick(ALL_TYPES),
    size,
    contentSha1,
  });
}

export interface RawEntryFields {
  tag: number;
  id?: Uint8Array;
  name: Uint8Array;
  size?: bigint;
  sha1?: Uint8Array;
}

/**
 * Encode entry fields directly, bypassing model validation
 */
export function encodeRawEntry(fields: RawEntryFields): Uint8Array {
  const id = fields.id ?? hexToBytes("0102");
  const out = new ByteAppender();
  out.writeUint8(fields.tag);
  out.writeUint16LE(id.length);
  out.push(id);
  out.writeUint16LE(fields.name.length);
  out.push(fields.name);
  out.writeBigUint64LE(fields.size ?? 0xffff_ffff_ffff_ffffn);
  out.push(fields.sha1 ?? new Uint8Array(20));
  return out.toBytes();
}
