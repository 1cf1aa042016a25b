/**
 * Error thrown when a string is not a valid hexadecimal byte sequence
 */
export class HexFormatError extends Error {
  readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = "HexFormatError";
    this.input = input;
  }
}
