import type { Bytes } from "./bytes";
import type { DecodeValue } from "./coder";
import { projectCoder } from "./project";
import type { SkipCoder } from "./skip";

/**
 * Varint coders.
 *
 * Each byte carries 7 bits of the value, least significant group first. The
 * high bit of every byte except the last is set to mark that more bytes
 * follow. Encodings are minimal, so zero is the single byte 0x00.
 *
 * Signed coders write the raw two's complement bit pattern of their width:
 * -1 as an int32 is five bytes `ff ff ff ff 0f`. Use the zigzag coders for
 * signed values that are often small and negative.
 */

/**
 * Number of bytes the varint encoding of an unsigned 32-bit value occupies.
 */
export function varintLength(n: number): number {
  n >>>= 0;
  let length = 1;
  while (n > 0x7f) {
    n >>>= 7;
    length++;
  }
  return length;
}

/**
 * Number of bytes the varint encoding of an unsigned 64-bit value occupies.
 */
export function varintLength64(n: bigint): number {
  n = BigInt.asUintN(64, n);
  let length = 1;
  while (n > 0x7fn) {
    n >>= 7n;
    length++;
  }
  return length;
}

function writeVarint(n: number, bytes: Bytes): Bytes {
  n >>>= 0;
  let i = 0;
  while (n > 0x7f) {
    bytes[i++] = (n & 0x7f) | 0x80;
    n >>>= 7;
  }
  bytes[i++] = n;
  return bytes.subarray(i);
}

function writeVarint64(n: bigint, bytes: Bytes): Bytes {
  n = BigInt.asUintN(64, n);
  let i = 0;
  while (n > 0x7fn) {
    bytes[i++] = Number(n & 0x7fn) | 0x80;
    n >>= 7n;
  }
  bytes[i++] = Number(n);
  return bytes.subarray(i);
}

// Groups beyond bit 31 are consumed and dropped.
function readVarint(bytes: Bytes): DecodeValue<number> {
  let n = 0;
  let shift = 0;
  let i = 0;
  let b: number;
  do {
    b = bytes[i++];
    if (shift < 32) {
      n |= (b & 0x7f) << shift;
    }
    shift += 7;
  } while (b & 0x80);
  return { value: n >>> 0, rest: bytes.subarray(i) };
}

function readVarintChecked(bytes: Bytes): DecodeValue<number> | undefined {
  let n = 0;
  let shift = 0;
  let i = 0;
  let b: number;
  do {
    if (i >= bytes.length) {
      return undefined;
    }
    b = bytes[i++];
    if (shift < 32) {
      n |= (b & 0x7f) << shift;
    }
    shift += 7;
  } while (b & 0x80);
  return { value: n >>> 0, rest: bytes.subarray(i) };
}

function readVarint64(bytes: Bytes): DecodeValue<bigint> {
  let n = 0n;
  let shift = 0n;
  let i = 0;
  let b: number;
  do {
    b = bytes[i++];
    if (shift < 64n) {
      n |= BigInt(b & 0x7f) << shift;
    }
    shift += 7n;
  } while (b & 0x80);
  return { value: BigInt.asUintN(64, n), rest: bytes.subarray(i) };
}

function readVarint64Checked(bytes: Bytes): DecodeValue<bigint> | undefined {
  let n = 0n;
  let shift = 0n;
  let i = 0;
  let b: number;
  do {
    if (i >= bytes.length) {
      return undefined;
    }
    b = bytes[i++];
    if (shift < 64n) {
      n |= BigInt(b & 0x7f) << shift;
    }
    shift += 7n;
  } while (b & 0x80);
  return { value: BigInt.asUintN(64, n), rest: bytes.subarray(i) };
}

function skipVarint(bytes: Bytes): Bytes {
  let i = 0;
  while (bytes[i++] & 0x80) {
    continue;
  }
  return bytes.subarray(i);
}

function skipVarintChecked(bytes: Bytes): Bytes | undefined {
  for (let i = 0; i < bytes.length; i++) {
    if ((bytes[i] & 0x80) === 0) {
      return bytes.subarray(i + 1);
    }
  }
  return undefined;
}

/**
 * Unsigned 32-bit varint. Every narrower number varint projects onto it.
 */
export const uint32Varint: SkipCoder<number> = {
  encodeSkip: varintLength,
  safe: {
    encode: (value, bytes) => (bytes.length < varintLength(value) ? undefined : writeVarint(value, bytes)),
    decode: readVarintChecked,
    decodeSkip: skipVarintChecked,
  },
  unsafe: {
    encode: writeVarint,
    decode: readVarint,
    decodeSkip: skipVarint,
  },
};

/**
 * Unsigned 64-bit varint.
 */
export const uint64Varint: SkipCoder<bigint> = {
  encodeSkip: varintLength64,
  safe: {
    encode: (value, bytes) =>
      bytes.length < varintLength64(value) ? undefined : writeVarint64(value, bytes),
    decode: readVarint64Checked,
    decodeSkip: skipVarintChecked,
  },
  unsafe: {
    encode: writeVarint64,
    decode: readVarint64,
    decodeSkip: skipVarint,
  },
};

export const uint8Varint = projectCoder<number, number>(
  uint32Varint,
  (value) => value & 0xff,
  (wire) => wire & 0xff
);

export const uint16Varint = projectCoder<number, number>(
  uint32Varint,
  (value) => value & 0xffff,
  (wire) => wire & 0xffff
);

export const int8Varint = projectCoder<number, number>(
  uint32Varint,
  (value) => value & 0xff,
  (wire) => (wire << 24) >> 24
);

export const int16Varint = projectCoder<number, number>(
  uint32Varint,
  (value) => value & 0xffff,
  (wire) => (wire << 16) >> 16
);

export const int32Varint = projectCoder<number, number>(
  uint32Varint,
  (value) => value >>> 0,
  (wire) => wire | 0
);

export const int64Varint = projectCoder<bigint, bigint>(
  uint64Varint,
  (value) => BigInt.asUintN(64, value),
  (wire) => BigInt.asIntN(64, wire)
);
