import { BufferOverflowError } from "./errors";
import type { Bytes } from "./bytes";
import type { SkipCoder } from "./skip";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

/**
 * Options for BufferWriter configuration.
 */
export interface BufferWriterOptions {
  /** Initial buffer capacity. Default: 256 */
  initialCapacity?: number;
  /**
   * Maximum buffer size in bytes. Writes that would grow past it throw
   * BufferOverflowError. Default: unbounded
   */
  maxCapacity?: number;
}

/**
 * BufferWriter appends encoded values to a growing buffer.
 *
 * The codecs never allocate; this adapter owns the allocation policy. Each
 * write asks the coder for its exact encoded length, grows the buffer if
 * needed, then runs the unchecked encode into space known to be sufficient.
 *
 * @example
 * ```typescript
 * const writer = new BufferWriter();
 * writer.write(uint32Varint, 300);
 * writer.write(stringCoder, "hello");
 * const data = writer.bytes();
 * ```
 */
export class BufferWriter {
  private buffer: Uint8Array;
  private pos: number;
  private readonly maxCapacity: number;

  constructor(options: BufferWriterOptions = {}) {
    this.buffer = new Uint8Array(options.initialCapacity ?? INITIAL_CAPACITY);
    this.pos = 0;
    this.maxCapacity = options.maxCapacity ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has at least the specified capacity.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }
    if (required > this.maxCapacity) {
      throw new BufferOverflowError(needed, this.maxCapacity - this.pos);
    }

    let newCapacity = Math.max(this.buffer.length, 1) * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(Math.min(newCapacity, this.maxCapacity));
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
  }

  /**
   * Encodes a value at the end of the buffer.
   *
   * @returns the number of bytes written
   */
  write<T>(coder: SkipCoder<T>, value: T): number {
    const length = coder.encodeSkip(value);
    this.ensureCapacity(length);
    coder.unsafe.encode(value, this.buffer.subarray(this.pos, this.pos + length));
    this.pos += length;
    return length;
  }

  /**
   * Appends bytes that are already encoded.
   */
  writeRaw(data: Bytes): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }
}
