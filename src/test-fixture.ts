import type { Bytes } from './bytes';
import { decode, encode, type DecodeValue, type Mode } from './coder';
import { decodeSkip, type SkipCoder } from './skip';

/**
 * Both execution modes, for `describe.each`.
 */
export const modes: readonly Mode[] = ['safe', 'unsafe'];

export function encodeOk<T>(coder: SkipCoder<T>, mode: Mode, value: T, bytes: Bytes): Bytes {
  const rest = encode(coder, mode, value, bytes);
  if (rest === undefined) {
    throw new Error(`${mode} encode failed`);
  }
  return rest;
}

export function decodeOk<T>(coder: SkipCoder<T>, mode: Mode, bytes: Bytes): DecodeValue<T> {
  const result = decode(coder, mode, bytes);
  if (result === undefined) {
    throw new Error(`${mode} decode failed`);
  }
  return result;
}

export function skipOk<T>(coder: SkipCoder<T>, mode: Mode, bytes: Bytes): Bytes {
  const rest = decodeSkip(coder, mode, bytes);
  if (rest === undefined) {
    throw new Error(`${mode} decode skip failed`);
  }
  return rest;
}

/**
 * Encodes `value` into a buffer sized by `encodeSkip` and returns that buffer.
 */
export function encodeExact<T>(coder: SkipCoder<T>, mode: Mode, value: T): Uint8Array {
  const bytes = new Uint8Array(coder.encodeSkip(value));
  const rest = encodeOk(coder, mode, value, bytes);
  if (rest.length !== 0) {
    throw new Error(`encodeSkip overstated the length by ${rest.length}`);
  }
  return bytes;
}
