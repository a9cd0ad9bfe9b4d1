import { advance, beginDiff, type Bytes } from "./bytes";
import type { Coder } from "./coder";
import { BufferUnderflowError, DecodeError } from "./errors";
import type { SkipCoder } from "./skip";

/**
 * BufferReader decodes consecutive values from a buffer.
 *
 * Every read goes through the coder's bounds-checked path; a result the coder
 * reports as absent becomes a thrown {@link DecodeError}.
 */
export class BufferReader {
  private readonly data: Bytes;
  private rest: Bytes;

  constructor(data: Uint8Array) {
    this.data = data;
    this.rest = data;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return beginDiff(this.rest, this.data);
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.rest.length;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.rest.length > 0;
  }

  /**
   * Decodes the next value.
   * @throws DecodeError if the input ends before a complete value
   */
  read<T>(coder: Coder<T>): T {
    const result = coder.safe.decode(this.rest);
    if (result === undefined) {
      throw new DecodeError(
        `Cannot decode value at offset ${this.position}: input truncated or malformed`
      );
    }
    this.rest = result.rest;
    return result.value;
  }

  /**
   * Decodes a 64-bit value as a JavaScript number.
   *
   * WARNING: JavaScript numbers can only safely represent integers
   * up to Number.MAX_SAFE_INTEGER (2^53-1). Values beyond that range
   * lose precision; use read() for the full bigint.
   *
   * @param warnOnPrecisionLoss - If true (default), logs a warning when
   *                              precision loss occurs
   */
  readBigIntAsNumber(coder: Coder<bigint>, warnOnPrecisionLoss: boolean = true): number {
    const value = this.read(coder);
    if (warnOnPrecisionLoss) {
      if (value > BigInt(Number.MAX_SAFE_INTEGER) ||
          value < BigInt(Number.MIN_SAFE_INTEGER)) {
        console.warn(
          `spanwire: 64-bit value ${value} exceeds safe integer range ` +
          `(${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}), ` +
          `precision may be lost. Use read() for full precision.`
        );
      }
    }
    return Number(value);
  }

  /**
   * Advances past the next value without decoding it.
   *
   * @returns the number of bytes skipped
   * @throws DecodeError if the input ends before a complete value
   */
  skip<T>(coder: SkipCoder<T>): number {
    const rest = coder.safe.decodeSkip(this.rest);
    if (rest === undefined) {
      throw new DecodeError(
        `Cannot skip value at offset ${this.position}: input truncated or malformed`
      );
    }
    const skipped = beginDiff(rest, this.rest);
    this.rest = rest;
    return skipped;
  }

  /**
   * Reads raw bytes.
   * @throws BufferUnderflowError if fewer than `length` bytes remain
   */
  readBytes(length: number): Uint8Array {
    if (length > this.rest.length) {
      throw new BufferUnderflowError(length, this.rest.length);
    }
    const bytes = this.rest.subarray(0, length);
    this.rest = advance(this.rest, length);
    return bytes;
  }

  /**
   * Creates a sub-reader over the next `length` bytes and moves past them.
   */
  subReader(length: number): BufferReader {
    return new BufferReader(this.readBytes(length));
  }
}
