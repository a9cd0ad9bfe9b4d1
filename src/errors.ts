/**
 * Base error class for the adapter layer.
 *
 * Codec operations themselves never throw for lack of space or truncated
 * input; they return `undefined` in safe mode. These errors are raised by
 * {@link BufferWriter}, {@link BufferReader}, the stream classes and the
 * `encodeToBytes`/`decodeFromBytes` helpers when they turn such a result into
 * a failure.
 */
export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CodecError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends CodecError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends CodecError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a fixed-size output cannot hold an encoding.
 */
export class BufferOverflowError extends EncodeError {
  constructor(needed: number, available: number) {
    super(`Buffer overflow: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferOverflowError";
  }
}

/**
 * Error thrown when input ends before a complete value.
 */
export class BufferUnderflowError extends DecodeError {
  constructor(needed: number, available: number) {
    super(`Buffer underflow: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferUnderflowError";
  }
}

/**
 * Error thrown when bytes remain after a value that should fill its input.
 */
export class TrailingBytesError extends DecodeError {
  constructor(count: number) {
    super(`${count} trailing bytes after decoded value`);
    this.name = "TrailingBytesError";
  }
}

/**
 * Error thrown when a stream has no further message.
 */
export class EndOfStreamError extends DecodeError {
  constructor(message: string = "End of stream") {
    super(message);
    this.name = "EndOfStreamError";
  }
}

/**
 * Error thrown when a framed message is larger than the reader allows.
 */
export class MessageSizeExceededError extends DecodeError {
  constructor(size: number, max: number) {
    super(`Message size ${size} exceeds maximum ${max}`);
    this.name = "MessageSizeExceededError";
  }
}

/**
 * Error thrown when writing to a closed stream.
 */
export class StreamClosedError extends CodecError {
  constructor() {
    super("Stream is closed");
    this.name = "StreamClosedError";
  }
}
