/**
 * spanwire - composable varint, zigzag and length-prefixed binary codecs
 *
 * Every coder writes into and reads from a caller-supplied `Uint8Array`,
 * through a bounds-checked `safe` path or an unchecked `unsafe` path, and
 * can report an encoded length or skip an encoded value without decoding it.
 *
 * @example
 * ```typescript
 * import { arrayCoder, uint32Varint } from 'spanwire';
 *
 * const coder = arrayCoder(uint32Varint);
 * const buffer = new Uint8Array(coder.encodeSkip([1, 300]));
 * coder.unsafe.encode([1, 300], buffer); // 03 01 ac 02
 *
 * const result = coder.safe.decode(buffer);
 * if (result !== undefined) {
 *   // result.value is [1, 300], result.rest is empty
 * }
 * ```
 */

import type { Coder } from "./coder";
import { DecodeError, TrailingBytesError } from "./errors";
import type { SkipCoder } from "./skip";

// Byte spans and the coder contract
export { beginDiff, advance, nativeLittleEndian } from "./bytes";
export type { Bytes } from "./bytes";
export { encode, decode } from "./coder";
export type {
  Mode,
  EncodeResult,
  DecodeValue,
  DecodeResult,
  CoderOps,
  Coder,
} from "./coder";
export { decodeSkip, fixedSkip, skipMany } from "./skip";
export type { DecodeSkipResult, SkipOps, SkipCoder, FixedSkip } from "./skip";
export { projectCoder } from "./project";

// Fixed-width codecs
export {
  fixedWidthCoder,
  int8,
  uint8,
  int16,
  uint16,
  int32,
  uint32,
  int64,
  uint64,
} from "./integer";
export type { Scratch } from "./integer";
export { float32, float64 } from "./float";
export { bool } from "./bool";

// Varint and zigzag codecs
export {
  varintLength,
  varintLength64,
  uint8Varint,
  uint16Varint,
  uint32Varint,
  uint64Varint,
  int8Varint,
  int16Varint,
  int32Varint,
  int64Varint,
} from "./varint";
export {
  MinInt64,
  MaxInt64,
  zigzagEncode,
  zigzagDecode,
  zigzagEncode64,
  zigzagDecode64,
  sint8,
  sint16,
  sint32,
  sint64,
} from "./zigzag";
export type { NumberWidth } from "./zigzag";
export { enumCoder } from "./enum";

// Length-prefixed sequences
export {
  MaxSequenceLength,
  lengthPrefixFits,
  decodeLengthPrefix,
  arraySequence,
  byteSequence,
  utf8Sequence,
  utf16Sequence,
  sequenceCoder,
  arrayCoder,
  bytesCoder,
  stringCoder,
  utf16StringCoder,
} from "./array";
export type { SequenceBuilder, SequenceType } from "./array";

// Errors
export {
  CodecError,
  EncodeError,
  DecodeError,
  BufferOverflowError,
  BufferUnderflowError,
  TrailingBytesError,
  EndOfStreamError,
  MessageSizeExceededError,
  StreamClosedError,
} from "./errors";

// Buffer adapters
export { BufferWriter } from "./writer";
export type { BufferWriterOptions } from "./writer";
export { BufferReader } from "./reader";

// Streaming support
export { StreamWriter, StreamReader, MessageIterator } from "./stream";
export type { StreamWriterOptions, StreamReaderOptions } from "./stream";

/**
 * Library version.
 */
export const VERSION = "0.1.0";

/**
 * Options for decodeFromBytes.
 */
export interface DecodeOptions {
  /** Accept bytes after the decoded value. Default: false */
  allowTrailing?: boolean;
}

/**
 * Encodes a value into a new buffer of exactly its encoded length.
 */
export function encodeToBytes<T>(coder: SkipCoder<T>, value: T): Uint8Array {
  const bytes = new Uint8Array(coder.encodeSkip(value));
  coder.unsafe.encode(value, bytes);
  return bytes;
}

/**
 * Decodes a single value that fills `data`.
 *
 * @throws DecodeError if `data` does not start with a complete value
 * @throws TrailingBytesError if bytes follow the value and `allowTrailing` is off
 */
export function decodeFromBytes<T>(coder: Coder<T>, data: Uint8Array, options: DecodeOptions = {}): T {
  const result = coder.safe.decode(data);
  if (result === undefined) {
    throw new DecodeError(`Cannot decode value from ${data.length} bytes: input truncated or malformed`);
  }
  if (result.rest.length > 0 && !options.allowTrailing) {
    throw new TrailingBytesError(result.rest.length);
  }
  return result.value;
}
