import type { Bytes } from "./bytes";

/**
 * Execution mode of a codec operation.
 *
 * `safe` operations check bounds and report failure as `undefined`.
 * `unsafe` operations skip every bounds check; the caller guarantees the span
 * is large enough (usually by sizing it with `encodeSkip` first). Running an
 * unsafe operation on a span that is too small has no defined result.
 */
export type Mode = "safe" | "unsafe";

/**
 * Result of an encode: the unwritten suffix of the output span.
 */
export type EncodeResult<M extends Mode> = M extends "safe" ? Bytes | undefined : Bytes;

/**
 * A decoded value together with the undecoded suffix of the input span.
 */
export interface DecodeValue<T> {
  value: T;
  rest: Bytes;
}

/**
 * Result of a decode.
 */
export type DecodeResult<T, M extends Mode> = M extends "safe"
  ? DecodeValue<T> | undefined
  : DecodeValue<T>;

/**
 * The encode and decode operations of a coder for one mode.
 */
export interface CoderOps<T, M extends Mode> {
  /**
   * Writes `value` at the start of `bytes` and returns the rest of the span.
   * A failed safe encode may have written some bytes; they carry no meaning.
   */
  encode(value: T, bytes: Bytes): EncodeResult<M>;

  /**
   * Reads one complete value from the start of `bytes`.
   */
  decode(bytes: Bytes): DecodeResult<T, M>;
}

/**
 * A codec for values of type `T`, with one operation set per mode.
 *
 * The mode is picked by property access (`coder.safe.encode(...)`), so the
 * unsafe path never pays for a runtime mode branch.
 */
export interface Coder<T> {
  readonly safe: CoderOps<T, "safe">;
  readonly unsafe: CoderOps<T, "unsafe">;
}

/**
 * Encodes through the operation set named by `mode`.
 */
export function encode<T>(coder: Coder<T>, mode: "safe", value: T, bytes: Bytes): EncodeResult<"safe">;
export function encode<T>(coder: Coder<T>, mode: "unsafe", value: T, bytes: Bytes): EncodeResult<"unsafe">;
export function encode<T>(coder: Coder<T>, mode: Mode, value: T, bytes: Bytes): Bytes | undefined;
export function encode<T>(coder: Coder<T>, mode: Mode, value: T, bytes: Bytes): Bytes | undefined {
  return coder[mode].encode(value, bytes);
}

/**
 * Decodes through the operation set named by `mode`.
 */
export function decode<T>(coder: Coder<T>, mode: "safe", bytes: Bytes): DecodeResult<T, "safe">;
export function decode<T>(coder: Coder<T>, mode: "unsafe", bytes: Bytes): DecodeResult<T, "unsafe">;
export function decode<T>(coder: Coder<T>, mode: Mode, bytes: Bytes): DecodeValue<T> | undefined;
export function decode<T>(coder: Coder<T>, mode: Mode, bytes: Bytes): DecodeValue<T> | undefined {
  return coder[mode].decode(bytes);
}
