import { describe, expect, it } from "vitest";
import { ByteCursor } from "../../src/encoding/byte-cursor.js";

describe("ByteCursor", () => {
  it("reads integers in little-endian order", () => {
    const cursor = new ByteCursor(
      new Uint8Array([0x07, 0x34, 0x12, 0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x80]),
    );

    expect(cursor.readUint8()).toBe(7);
    expect(cursor.readUint16LE()).toBe(0x1234);
    expect(cursor.readBigUint64LE()).toBe(0x8000_0000_0000_0001n);
    expect(cursor.done).toBe(true);
  });

  it("tracks offset and remaining bytes", () => {
    const cursor = new ByteCursor(new Uint8Array([1, 2, 3, 4, 5]));
    expect(cursor.remaining).toBe(5);

    expect(cursor.readBytes(2)).toEqual(new Uint8Array([1, 2]));
    expect(cursor.offset).toBe(2);
    expect(cursor.remaining).toBe(3);
    expect(cursor.done).toBe(false);
  });

  it("reads zero bytes at the end of the buffer", () => {
    const cursor = new ByteCursor(new Uint8Array([9]));
    cursor.readUint8();
    expect(cursor.readBytes(0)).toEqual(new Uint8Array([]));
  });

  it("respects the byte offset of a subarray", () => {
    const backing = new Uint8Array([0xff, 0xff, 0x02, 0x01]);
    const cursor = new ByteCursor(backing.subarray(2));
    expect(cursor.readUint16LE()).toBe(0x0102);
  });

  it("throws instead of reading past the end", () => {
    const cursor = new ByteCursor(new Uint8Array([1, 2, 3]));
    cursor.readUint16LE();

    expect(() => cursor.readUint16LE()).toThrow(RangeError);
    expect(() => cursor.readBytes(2)).toThrow(
      "Read of 2 bytes at offset 2 exceeds buffer (1 remaining)",
    );
    expect(cursor.offset).toBe(2);
  });
});
