/**
 * Forward-only reader over a byte buffer.
 *
 * Multi-byte integers are read in little-endian order. Every read checks
 * the remaining length first and throws a RangeError instead of reading
 * past the end; callers that treat short input as a recoverable condition
 * should test `remaining` before reading.
 */
export class ByteCursor {
  private readonly data: Uint8Array;
  private readonly view: DataView;
  private position = 0;

  constructor(data: Uint8Array) {
    this.data = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  /** Current read offset from the start of the buffer */
  get offset(): number {
    return this.position;
  }

  /** Number of unread bytes */
  get remaining(): number {
    return this.data.length - this.position;
  }

  /** True when every byte has been consumed */
  get done(): boolean {
    return this.position >= this.data.length;
  }

  readUint8(): number {
    this.ensure(1);
    const value = this.view.getUint8(this.position);
    this.position += 1;
    return value;
  }

  readUint16LE(): number {
    this.ensure(2);
    const value = this.view.getUint16(this.position, true);
    this.position += 2;
    return value;
  }

  readBigUint64LE(): bigint {
    this.ensure(8);
    const value = this.view.getBigUint64(this.position, true);
    this.position += 8;
    return value;
  }

  /**
   * Read `length` bytes as a view into the underlying buffer
   *
   * The returned array shares memory with the source; copy it with
   * `slice()` if it must outlive the buffer.
   */
  readBytes(length: number): Uint8Array {
    this.ensure(length);
    const bytes = this.data.subarray(this.position, this.position + length);
    this.position += length;
    return bytes;
  }

  private ensure(length: number): void {
    if (length > this.remaining) {
      throw new RangeError(
        `Read of ${length} bytes at offset ${this.position} exceeds buffer (${this.remaining} remaining)`,
      );
    }
  }
}
