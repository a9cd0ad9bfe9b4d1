/**
 * Streaming support.
 *
 * Provides classes for writing and reading length-delimited frames, so that
 * many independently encoded values can share one buffer and be read back
 * incrementally.
 *
 * Wire format: [length: varint][payload: bytes]
 *
 * A frame is byte-for-byte the encoding of `bytesCoder`, which is what the
 * writer uses for raw messages and what the reader uses to skip them.
 */

import { bytesCoder, lengthPrefixFits } from "./array";
import { beginDiff } from "./bytes";
import type { Coder } from "./coder";
import {
  DecodeError,
  EndOfStreamError,
  MessageSizeExceededError,
  StreamClosedError,
  TrailingBytesError,
} from "./errors";
import { BufferReader } from "./reader";
import type { SkipCoder } from "./skip";
import { uint32Varint } from "./varint";
import { BufferWriter } from "./writer";

/** Default initial buffer capacity for stream writer. */
const DEFAULT_STREAM_BUFFER_CAPACITY = 4096;

/** Default maximum message size (64 MB). */
const DEFAULT_MAX_MESSAGE_SIZE = 64 * 1024 * 1024;

/**
 * Options for StreamWriter configuration.
 */
export interface StreamWriterOptions {
  /** Initial buffer capacity. Default: 4096 */
  initialCapacity?: number;
}

/**
 * Options for StreamReader configuration.
 */
export interface StreamReaderOptions {
  /** Maximum allowed message size in bytes. Default: 64 MB */
  maxMessageSize?: number;
}

/**
 * StreamWriter writes length-delimited frames to a buffer.
 *
 * @example
 * ```typescript
 * const stream = new StreamWriter();
 * stream.writeValue(sint32, -42);
 * stream.writeValue(stringCoder, "hello");
 * const data = stream.bytes();
 * ```
 */
export class StreamWriter {
  private writer: BufferWriter;
  private closed: boolean;

  constructor(options: StreamWriterOptions = {}) {
    this.writer = new BufferWriter({
      initialCapacity: options.initialCapacity ?? DEFAULT_STREAM_BUFFER_CAPACITY,
    });
    this.closed = false;
  }

  /**
   * Returns the current position (bytes written).
   */
  get position(): number {
    return this.writer.position;
  }

  /**
   * Returns true if the writer is closed.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Writes raw message bytes as one frame.
   *
   * @throws StreamClosedError if the writer is closed
   */
  writeMessage(data: Uint8Array): void {
    if (this.closed) {
      throw new StreamClosedError();
    }
    this.writer.write(bytesCoder, data);
  }

  /**
   * Encodes a value as one frame, writing it in place after its length.
   *
   * @throws StreamClosedError if the writer is closed
   */
  writeValue<T>(coder: SkipCoder<T>, value: T): void {
    if (this.closed) {
      throw new StreamClosedError();
    }
    this.writer.write(uint32Varint, coder.encodeSkip(value));
    this.writer.write(coder, value);
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.writer.bytes();
  }

  /**
   * Resets the writer for reuse, clearing all written data.
   */
  reset(): void {
    this.writer.reset();
    this.closed = false;
  }

  /**
   * Closes the writer. No more messages can be written after closing.
   */
  close(): void {
    this.closed = true;
  }
}

/**
 * StreamReader reads length-delimited frames from a buffer.
 *
 * @example
 * ```typescript
 * const reader = new StreamReader(data);
 * const first = reader.readValue(sint32);
 * for (const frame of reader.messages()) {
 *   // ...
 * }
 * ```
 */
export class StreamReader {
  private reader: BufferReader;
  private readonly data: Uint8Array;
  private maxMessageSize: number;

  constructor(data: Uint8Array, options: StreamReaderOptions = {}) {
    this.data = data;
    this.reader = new BufferReader(data);
    this.maxMessageSize = options.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.reader.position;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.reader.remaining;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.reader.hasMore;
  }

  /**
   * Sets the maximum allowed message size.
   */
  setMaxMessageSize(size: number): void {
    this.maxMessageSize = size;
  }

  /**
   * Reads one frame's payload without copying it.
   *
   * @throws EndOfStreamError if the stream is empty or ends mid-frame
   * @throws DecodeError if the length prefix does not fit in 32 bits
   * @throws MessageSizeExceededError if the frame exceeds the max size
   */
  readMessage(): Uint8Array {
    if (!this.reader.hasMore) {
      throw new EndOfStreamError("No more messages");
    }

    const current = this.data.subarray(this.reader.position);
    const header = uint32Varint.safe.decode(current);
    if (header === undefined) {
      throw new EndOfStreamError("Incomplete varint at end of stream");
    }
    if (!lengthPrefixFits(current, header.rest)) {
      throw new DecodeError("Message length prefix exceeds 32 bits");
    }

    const length = header.value;
    if (length > this.maxMessageSize) {
      throw new MessageSizeExceededError(length, this.maxMessageSize);
    }
    if (length > header.rest.length) {
      throw new EndOfStreamError(
        `Message claims ${length} bytes but only ${header.rest.length} available`
      );
    }

    this.reader.readBytes(beginDiff(header.rest, current) + length);
    return header.rest.subarray(0, length);
  }

  /**
   * Reads one frame, returning null if at end of stream.
   *
   * @throws EndOfStreamError if the stream ends mid-frame
   * @throws MessageSizeExceededError if the frame exceeds the max size
   */
  tryReadMessage(): Uint8Array | null {
    if (!this.reader.hasMore) {
      return null;
    }
    return this.readMessage();
  }

  /**
   * Reads one frame and decodes it as a single value of `coder`.
   *
   * @throws DecodeError if the payload does not hold a complete value
   * @throws TrailingBytesError if the value does not fill the payload
   */
  readValue<T>(coder: Coder<T>): T {
    const payload = new BufferReader(this.readMessage());
    const value = payload.read(coder);
    if (payload.hasMore) {
      throw new TrailingBytesError(payload.remaining);
    }
    return value;
  }

  /**
   * Skips the next frame without reading its contents.
   *
   * @returns The number of bytes skipped (including length prefix)
   * @throws EndOfStreamError if no complete frame follows
   */
  skipMessage(): number {
    if (!this.reader.hasMore) {
      throw new EndOfStreamError("No message to skip");
    }
    const current = this.data.subarray(this.reader.position);
    const rest = bytesCoder.safe.decodeSkip(current);
    if (rest === undefined) {
      throw new EndOfStreamError("Cannot skip: frame is incomplete or its length prefix is malformed");
    }
    const skipped = beginDiff(rest, current);
    this.reader.readBytes(skipped);
    return skipped;
  }

  /**
   * Resets the reader to the beginning of the buffer.
   */
  reset(): void {
    this.reader = new BufferReader(this.data);
  }

  /**
   * Returns a synchronous iterator over all frame payloads.
   */
  *messages(): IterableIterator<Uint8Array> {
    while (this.hasMore) {
      yield this.readMessage();
    }
  }
}

/**
 * MessageIterator iterates over frames, decoding each with one coder.
 *
 * @example
 * ```typescript
 * const iterator = new MessageIterator(data, stringCoder);
 * for (const name of iterator) {
 *   console.log(name);
 * }
 * ```
 */
export class MessageIterator<T> implements Iterable<T> {
  private reader: StreamReader;
  private coder: Coder<T>;

  constructor(data: Uint8Array, coder: Coder<T>, options: StreamReaderOptions = {}) {
    this.reader = new StreamReader(data, options);
    this.coder = coder;
  }

  /**
   * Returns true if there are more messages to read.
   */
  get hasMore(): boolean {
    return this.reader.hasMore;
  }

  /**
   * Decodes the next frame, or returns null at end of stream.
   */
  next(): T | null {
    if (!this.reader.hasMore) {
      return null;
    }
    return this.reader.readValue(this.coder);
  }

  /**
   * Returns a synchronous iterator.
   */
  *[Symbol.iterator](): IterableIterator<T> {
    while (this.reader.hasMore) {
      yield this.reader.readValue(this.coder);
    }
  }

  /**
   * Collects all messages into an array.
   */
  toArray(): T[] {
    return Array.from(this);
  }

  /**
   * Resets the iterator to the beginning.
   */
  reset(): void {
    this.reader.reset();
  }
}
