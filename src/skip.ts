import type { Bytes } from "./bytes";
import type { Coder, CoderOps, Mode } from "./coder";

/**
 * Result of a decode skip: the input suffix after the skipped value.
 */
export type DecodeSkipResult<M extends Mode> = M extends "safe" ? Bytes | undefined : Bytes;

/**
 * Skip operation for one mode.
 */
export interface SkipOps<M extends Mode> {
  /**
   * Advances past one encoded value without building it. Consumes exactly
   * the bytes `decode` would consume for the same well-formed input.
   */
  decodeSkip(bytes: Bytes): DecodeSkipResult<M>;
}

/**
 * A coder with its skip companion.
 *
 * `encodeSkip` is the exact number of bytes `encode` writes for a value,
 * computed without writing. Sequence coders rely on it to size their length
 * prefix, and message layers use `decodeSkip` to pass over unwanted values.
 */
export interface SkipCoder<T> extends Coder<T> {
  readonly safe: CoderOps<T, "safe"> & SkipOps<"safe">;
  readonly unsafe: CoderOps<T, "unsafe"> & SkipOps<"unsafe">;
  encodeSkip(value: T): number;
}

/**
 * Skip operations for a value occupying a static number of bytes.
 */
export interface FixedSkip {
  readonly width: number;
  readonly safe: SkipOps<"safe">;
  readonly unsafe: SkipOps<"unsafe">;
}

export function fixedSkip(width: number): FixedSkip {
  return {
    width,
    safe: {
      decodeSkip(bytes) {
        if (bytes.length < width) {
          return undefined;
        }
        return bytes.subarray(width);
      },
    },
    unsafe: {
      decodeSkip: (bytes) => bytes.subarray(width),
    },
  };
}

/**
 * Skips one value through the operation set named by `mode`.
 */
export function decodeSkip<T>(coder: SkipCoder<T>, mode: "safe", bytes: Bytes): DecodeSkipResult<"safe">;
export function decodeSkip<T>(coder: SkipCoder<T>, mode: "unsafe", bytes: Bytes): DecodeSkipResult<"unsafe">;
export function decodeSkip<T>(coder: SkipCoder<T>, mode: Mode, bytes: Bytes): Bytes | undefined;
export function decodeSkip<T>(coder: SkipCoder<T>, mode: Mode, bytes: Bytes): Bytes | undefined {
  return coder[mode].decodeSkip(bytes);
}

/**
 * Advances past `count` consecutive values encoded with `coder`.
 */
export function skipMany<T>(coder: SkipCoder<T>, bytes: Bytes, count: number): Bytes | undefined {
  let rest: Bytes | undefined = bytes;
  for (let i = 0; i < count && rest !== undefined; i++) {
    rest = coder.safe.decodeSkip(rest);
  }
  return rest;
}
