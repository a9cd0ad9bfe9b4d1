/**
 * A non-owning view over a contiguous byte region.
 *
 * Spans are plain `Uint8Array` views: narrowing a span is `subarray`, so the
 * remainder returned by a codec shares storage with the span it was given.
 * The caller owns the underlying buffer and must not mutate it concurrently.
 */
export type Bytes = Uint8Array;

/**
 * True when the host stores multi-byte numbers least significant byte first.
 * Fixed-width codecs copy values in this native order.
 */
export const nativeLittleEndian = new Uint8Array(new Uint16Array([1]).buffer)[0] === 1;

/**
 * Returns how many bytes the start of `a` lies past the start of `b`.
 *
 * Both spans must view the same buffer. Used to measure how much of a span an
 * encode or decode consumed from its returned remainder.
 */
export function beginDiff(a: Bytes, b: Bytes): number {
  return a.byteOffset - b.byteOffset;
}

/**
 * Returns the suffix of `bytes` starting `count` bytes in.
 */
export function advance(bytes: Bytes, count: number): Bytes {
  return bytes.subarray(count);
}
