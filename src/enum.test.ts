import { describe, it, expect } from 'vitest';
import { beginDiff } from './bytes';
import { enumCoder } from './enum';
import { uint8Varint } from './varint';
import { decodeOk, encodeOk, modes } from './test-fixture';

enum Color {
  Red,
  Green,
  Blue = 128,
}

enum Axis {
  X,
  Y,
  Z,
}

enum Direction {
  Backward = -1,
  Forward = 1,
}

const colorCoder = enumCoder<Color>();
const axisCoder = enumCoder<Axis>(uint8Varint);
const directionCoder = enumCoder<Direction>();

describe.each(modes)('enum coder (%s)', (mode) => {
  describe('encode', () => {
    it('writes the numeric value as a varint', () => {
      const a = new Uint8Array(10);

      let rest = encodeOk(colorCoder, mode, Color.Green, a);
      expect(beginDiff(rest, a)).toBe(1);
      expect(a[0]).toBe(0x01);

      rest = encodeOk(colorCoder, mode, Color.Blue, a);
      expect(beginDiff(rest, a)).toBe(2);
      expect(a[0]).toBe(0x80);
      expect(a[1]).toBe(0x01);
    });

    it('uses the chosen underlying varint', () => {
      const a = new Uint8Array(10);
      const rest = encodeOk(axisCoder, mode, Axis.Z, a);
      expect(beginDiff(rest, a)).toBe(1);
      expect(a[0]).toBe(0x02);
    });

    it('writes negative members as their raw 32-bit pattern', () => {
      const a = new Uint8Array(10);
      const rest = encodeOk(directionCoder, mode, Direction.Backward, a);
      expect(beginDiff(rest, a)).toBe(5);
      expect(a.subarray(0, 5)).toEqual(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0x0f]));
    });
  });

  describe('decode', () => {
    it('reads known members', () => {
      let result = decodeOk(colorCoder, mode, new Uint8Array([0x01]));
      expect(result.value).toBe(Color.Green);

      const a = new Uint8Array([0x80, 0x01]);
      result = decodeOk(colorCoder, mode, a);
      expect(beginDiff(result.rest, a)).toBe(2);
      expect(result.value).toBe(Color.Blue);

      expect(decodeOk(axisCoder, mode, new Uint8Array([0x02])).value).toBe(Axis.Z);
      expect(decodeOk(directionCoder, mode, new Uint8Array([0xff, 0xff, 0xff, 0xff, 0x0f])).value).toBe(
        Direction.Backward
      );
    });

    it('keeps values that name no member', () => {
      const { value, rest } = decodeOk(colorCoder, mode, new Uint8Array([0x05]));
      expect(value).toBe(5);
      expect(Color[value]).toBeUndefined();
      expect(rest.length).toBe(0);
    });
  });

  it('delegates skip to the underlying varint', () => {
    expect(colorCoder.encodeSkip(Color.Blue)).toBe(2);
    expect(colorCoder.encodeSkip(Color.Red)).toBe(1);
    const a = new Uint8Array([0x80, 0x01, 0x03]);
    const rest = colorCoder[mode].decodeSkip(a);
    expect(rest).toEqual(new Uint8Array([0x03]));
  });
});

describe('enum coder safe mode failures', () => {
  it('fails to encode into a short span', () => {
    expect(colorCoder.safe.encode(Color.Blue, new Uint8Array(1))).toBeUndefined();
  });

  it('fails to decode a truncated value', () => {
    expect(colorCoder.safe.decode(new Uint8Array([0x80]))).toBeUndefined();
    expect(colorCoder.safe.decode(new Uint8Array(0))).toBeUndefined();
  });
});
