import type { Bytes } from "./bytes";
import type { DecodeValue } from "./coder";
import { fixedSkip, type SkipCoder } from "./skip";

/**
 * A one-element typed array used to convert between a value and its native
 * byte representation.
 */
export interface Scratch<T> {
  [index: number]: T;
  readonly buffer: ArrayBufferLike;
  readonly BYTES_PER_ELEMENT: number;
}

/**
 * Creates a coder that copies a value's fixed-width byte representation
 * verbatim, in the host's native byte order.
 *
 * Values outside the range of the scratch array's element type wrap the way
 * typed array stores do.
 */
export function fixedWidthCoder<T extends number | bigint>(scratch: Scratch<T>): SkipCoder<T> {
  const width = scratch.BYTES_PER_ELEMENT;
  const raw = new Uint8Array(scratch.buffer, 0, width);
  const skip = fixedSkip(width);

  const write = (value: T, bytes: Bytes): Bytes => {
    scratch[0] = value;
    bytes.set(raw);
    return bytes.subarray(width);
  };

  const read = (bytes: Bytes): DecodeValue<T> => {
    raw.set(bytes.subarray(0, width));
    return { value: scratch[0], rest: bytes.subarray(width) };
  };

  return {
    encodeSkip: () => width,
    safe: {
      encode: (value, bytes) => (bytes.length < width ? undefined : write(value, bytes)),
      decode: (bytes) => (bytes.length < width ? undefined : read(bytes)),
      decodeSkip: skip.safe.decodeSkip,
    },
    unsafe: {
      encode: write,
      decode: read,
      decodeSkip: skip.unsafe.decodeSkip,
    },
  };
}

export const int8 = fixedWidthCoder(new Int8Array(1));
export const uint8 = fixedWidthCoder(new Uint8Array(1));
export const int16 = fixedWidthCoder(new Int16Array(1));
export const uint16 = fixedWidthCoder(new Uint16Array(1));
export const int32 = fixedWidthCoder(new Int32Array(1));
export const uint32 = fixedWidthCoder(new Uint32Array(1));
export const int64 = fixedWidthCoder(new BigInt64Array(1));
export const uint64 = fixedWidthCoder(new BigUint64Array(1));
