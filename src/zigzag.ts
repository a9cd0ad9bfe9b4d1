import { projectCoder } from "./project";
import { uint16Varint, uint32Varint, uint64Varint, uint8Varint } from "./varint";

/**
 * Signed 64-bit integer bounds.
 */
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1

/**
 * Bit widths of signed integers held in a JavaScript number.
 */
export type NumberWidth = 8 | 16 | 32;

/**
 * Maps a signed integer of the given width onto an unsigned one so that small
 * magnitudes of either sign stay small: 0 -> 0, -1 -> 1, 1 -> 2, -2 -> 3.
 */
export function zigzagEncode(n: number, bits: NumberWidth = 32): number {
  const wire = (n << 1) ^ (n >> (bits - 1));
  return bits === 32 ? wire >>> 0 : wire & ((1 << bits) - 1);
}

/**
 * Inverse of {@link zigzagEncode}, for any width.
 */
export function zigzagDecode(n: number): number {
  return (n >>> 1) ^ -(n & 1);
}

/**
 * Encode a signed bigint using ZigZag encoding.
 * @throws RangeError if n is outside the valid 64-bit signed integer range
 */
export function zigzagEncode64(n: bigint): bigint {
  if (n < MinInt64 || n > MaxInt64) {
    throw new RangeError(
      `BigInt value ${n} is outside valid 64-bit signed integer range [${MinInt64}, ${MaxInt64}]`
    );
  }
  return (n << 1n) ^ (n >> 63n);
}

/**
 * Decode a ZigZag encoded bigint.
 */
export function zigzagDecode64(n: bigint): bigint {
  return (n >> 1n) ^ -(n & 1n);
}

/**
 * Zigzag varint coders. The signed value is mapped before the unsigned varint
 * of the same width encodes it, and mapped back after it decodes.
 */
export const sint8 = projectCoder<number, number>(
  uint8Varint,
  (value) => zigzagEncode(value, 8),
  zigzagDecode
);

export const sint16 = projectCoder<number, number>(
  uint16Varint,
  (value) => zigzagEncode(value, 16),
  zigzagDecode
);

export const sint32 = projectCoder<number, number>(
  uint32Varint,
  (value) => zigzagEncode(value, 32),
  zigzagDecode
);

export const sint64 = projectCoder<bigint, bigint>(uint64Varint, zigzagEncode64, zigzagDecode64);
