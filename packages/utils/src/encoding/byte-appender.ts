const DEFAULT_CAPACITY = 64;

/**
 * Growable byte buffer for building binary records.
 *
 * Multi-byte integers are written in little-endian order. Capacity doubles
 * when a write does not fit; pass the exact size up front to avoid copies.
 */
export class ByteAppender {
  private buffer: Uint8Array;
  private view: DataView;
  private size = 0;

  constructor(initialCapacity: number = DEFAULT_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 1));
    this.view = new DataView(this.buffer.buffer);
  }

  /** Number of bytes written so far */
  get length(): number {
    return this.size;
  }

  writeUint8(value: number): void {
    this.reserve(1);
    this.view.setUint8(this.size, value);
    this.size += 1;
  }

  writeUint16LE(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
      throw new RangeError(`Value ${value} does not fit in 16 bits`);
    }
    this.reserve(2);
    this.view.setUint16(this.size, value, true);
    this.size += 2;
  }

  writeBigUint64LE(value: bigint): void {
    if (value < 0n || value > 0xffff_ffff_ffff_ffffn) {
      throw new RangeError(`Value ${value} does not fit in 64 bits`);
    }
    this.reserve(8);
    this.view.setBigUint64(this.size, value, true);
    this.size += 8;
  }

  /** Append raw bytes */
  push(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.buffer.set(bytes, this.size);
    this.size += bytes.length;
  }

  /**
   * Return the written bytes
   *
   * When the buffer is exactly full the backing array is returned as is,
   * otherwise a trimmed copy.
   */
  toBytes(): Uint8Array {
    if (this.size === this.buffer.length) {
      return this.buffer;
    }
    return this.buffer.slice(0, this.size);
  }

  private reserve(extra: number): void {
    const required = this.size + extra;
    if (required <= this.buffer.length) return;

    let capacity = this.buffer.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.size));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }
}
