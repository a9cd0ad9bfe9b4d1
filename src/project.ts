import type { SkipCoder } from "./skip";

/**
 * Builds a coder for `T` that stores each value as its projection onto the
 * wire type `U` and delegates all byte-level work to `coder`.
 *
 * `fromWire` must accept every value `coder` can decode; nothing here checks
 * that a decoded wire value has a preimage.
 */
export function projectCoder<T, U>(
  coder: SkipCoder<U>,
  toWire: (value: T) => U,
  fromWire: (wire: U) => T
): SkipCoder<T> {
  return {
    encodeSkip: (value) => coder.encodeSkip(toWire(value)),
    safe: {
      encode: (value, bytes) => coder.safe.encode(toWire(value), bytes),
      decode(bytes) {
        const result = coder.safe.decode(bytes);
        if (result === undefined) {
          return undefined;
        }
        return { value: fromWire(result.value), rest: result.rest };
      },
      decodeSkip: coder.safe.decodeSkip,
    },
    unsafe: {
      encode: (value, bytes) => coder.unsafe.encode(toWire(value), bytes),
      decode(bytes) {
        const { value, rest } = coder.unsafe.decode(bytes);
        return { value: fromWire(value), rest };
      },
      decodeSkip: coder.unsafe.decodeSkip,
    },
  };
}
