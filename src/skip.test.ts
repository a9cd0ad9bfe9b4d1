import { describe, it, expect } from 'vitest';
import { arrayCoder, bytesCoder, stringCoder, utf16StringCoder } from './array';
import { bool } from './bool';
import { beginDiff } from './bytes';
import { enumCoder } from './enum';
import { float32, float64 } from './float';
import { int8, int16, int32, int64, uint8, uint16, uint32, uint64 } from './integer';
import { decode, encode } from './coder';
import { decodeSkip, fixedSkip, skipMany, type SkipCoder } from './skip';
import {
  int8Varint,
  int16Varint,
  int32Varint,
  int64Varint,
  uint8Varint,
  uint16Varint,
  uint32Varint,
  uint64Varint,
} from './varint';
import { sint8, sint16, sint32, sint64 } from './zigzag';
import { decodeOk, encodeExact, modes, skipOk } from './test-fixture';

enum Level {
  Low = 1,
  High = 1000,
}

interface SkipCase {
  name: string;
  encodeSkip(): number;
  encode(mode: 'safe' | 'unsafe'): Uint8Array;
  decodeLength(mode: 'safe' | 'unsafe', bytes: Uint8Array): number;
  skipLength(mode: 'safe' | 'unsafe', bytes: Uint8Array): number;
  safeEncodeShort(): Uint8Array | undefined;
  safeDecodeShort(bytes: Uint8Array): unknown;
  safeSkipShort(bytes: Uint8Array): Uint8Array | undefined;
}

function skipCase<T>(name: string, coder: SkipCoder<T>, value: T): SkipCase {
  return {
    name,
    encodeSkip: () => coder.encodeSkip(value),
    encode: (mode) => encodeExact(coder, mode, value),
    decodeLength: (mode, bytes) => beginDiff(decodeOk(coder, mode, bytes).rest, bytes),
    skipLength: (mode, bytes) => beginDiff(skipOk(coder, mode, bytes), bytes),
    safeEncodeShort: () => coder.safe.encode(value, new Uint8Array(coder.encodeSkip(value) - 1)),
    safeDecodeShort: (bytes) => coder.safe.decode(bytes.subarray(0, bytes.length - 1)),
    safeSkipShort: (bytes) => coder.safe.decodeSkip(bytes.subarray(0, bytes.length - 1)),
  };
}

const cases: SkipCase[] = [
  skipCase('int8', int8, -5),
  skipCase('uint8', uint8, 200),
  skipCase('int16', int16, -2),
  skipCase('uint16', uint16, 65535),
  skipCase('int32', int32, -100000),
  skipCase('uint32', uint32, 7),
  skipCase('int64', int64, -7n),
  skipCase('uint64', uint64, 1n << 63n),
  skipCase('float32', float32, 1.5),
  skipCase('float64', float64, -0.25),
  skipCase('bool', bool, true),
  skipCase('uint8Varint', uint8Varint, 200),
  skipCase('uint16Varint', uint16Varint, 40000),
  skipCase('int8Varint', int8Varint, -1),
  skipCase('int16Varint', int16Varint, -300),
  skipCase('uint32Varint', uint32Varint, 300),
  skipCase('uint32Varint max', uint32Varint, 0xffffffff),
  skipCase('int32Varint', int32Varint, -1),
  skipCase('uint64Varint', uint64Varint, 1n << 50n),
  skipCase('int64Varint', int64Varint, -2n),
  skipCase('sint8', sint8, -100),
  skipCase('sint16', sint16, -300),
  skipCase('sint32', sint32, 123456),
  skipCase('sint64', sint64, -(1n << 40n)),
  skipCase('enum', enumCoder<Level>(), Level.High),
  skipCase('empty array', arrayCoder(uint32Varint), []),
  skipCase('array', arrayCoder(sint32), [1, -1, 1000, -1000]),
  skipCase('nested array', arrayCoder(arrayCoder(uint8Varint)), [[1, 2], [], [255]]),
  skipCase('string', stringCoder, 'héllo'),
  skipCase('utf16 string', utf16StringCoder, 'hi there'),
  skipCase('bytes', bytesCoder, new Uint8Array([1, 2, 3])),
  skipCase('array of strings', arrayCoder(stringCoder), ['a', '', 'xyz']),
];

describe.each(modes)('length agreement (%s)', (mode) => {
  it.each(cases)('$name: encodeSkip matches bytes written, decoded and skipped', (c) => {
    const bytes = c.encode(mode);
    expect(bytes.length).toBe(c.encodeSkip());
    expect(c.decodeLength(mode, bytes)).toBe(bytes.length);
    expect(c.skipLength(mode, bytes)).toBe(bytes.length);
  });

  it.each(cases)('$name: skip stops at the value boundary', (c) => {
    const bytes = c.encode(mode);
    const padded = new Uint8Array(bytes.length + 3);
    padded.set(bytes);
    expect(c.skipLength(mode, padded)).toBe(bytes.length);
    expect(c.decodeLength(mode, padded)).toBe(bytes.length);
  });
});

describe('safe mode one byte short', () => {
  it.each(cases)('$name: encode, decode and skip report failure', (c) => {
    const bytes = c.encode('safe');
    expect(c.safeEncodeShort()).toBeUndefined();
    expect(c.safeDecodeShort(bytes)).toBeUndefined();
    expect(c.safeSkipShort(bytes)).toBeUndefined();
  });
});

describe('fixedSkip', () => {
  it('advances by the width', () => {
    const skip = fixedSkip(4);
    const a = new Uint8Array(6);
    expect(skip.width).toBe(4);
    expect(skip.safe.decodeSkip(a)?.length).toBe(2);
    expect(skip.unsafe.decodeSkip(a).length).toBe(2);
  });

  it('fails safe when fewer bytes remain than the width', () => {
    expect(fixedSkip(4).safe.decodeSkip(new Uint8Array(3))).toBeUndefined();
  });
});

describe('skipMany', () => {
  it('skips consecutive values', () => {
    const a = new Uint8Array([0x01, 0xac, 0x02, 0x05]);
    const rest = skipMany(uint32Varint, a, 2);
    expect(rest).toEqual(new Uint8Array([0x05]));
  });

  it('returns the input for a count of zero', () => {
    const a = new Uint8Array([0x01]);
    expect(skipMany(uint32Varint, a, 0)).toBe(a);
  });

  it('fails when the input holds fewer values', () => {
    expect(skipMany(uint32Varint, new Uint8Array([0x01, 0x02]), 3)).toBeUndefined();
  });
});

describe('mode-generic helpers', () => {
  it('return unchecked results for unsafe', () => {
    const a = new Uint8Array(2);
    const rest: Uint8Array = encode(uint32Varint, 'unsafe', 300, a);
    expect(rest.length).toBe(0);
    expect(decode(uint32Varint, 'unsafe', a).value).toBe(300);
    expect(decodeSkip(uint32Varint, 'unsafe', a).length).toBe(0);
  });

  it('report failure for safe', () => {
    expect(encode(uint32Varint, 'safe', 300, new Uint8Array(1))).toBeUndefined();
    expect(decode(uint32Varint, 'safe', new Uint8Array([0x80]))).toBeUndefined();
    expect(decodeSkip(uint32Varint, 'safe', new Uint8Array(0))).toBeUndefined();
  });
});
