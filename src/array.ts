import { beginDiff, type Bytes } from "./bytes";
import type { DecodeValue } from "./coder";
import { uint16, uint8 } from "./integer";
import type { SkipCoder } from "./skip";
import { uint32Varint, varintLength } from "./varint";

// Module-level singletons to avoid repeated instantiation
const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/** Largest payload a 32-bit length prefix can describe. */
export const MaxSequenceLength = 0xffffffff;

/**
 * Reports whether the varint between `bytes` and `rest` fits in 32 bits.
 *
 * A varint decoder drops groups past its width, so an oversized length would
 * otherwise come back as a small one. Zero high groups are accepted.
 */
export function lengthPrefixFits(bytes: Bytes, rest: Bytes): boolean {
  const consumed = beginDiff(rest, bytes);
  for (let i = 4; i < consumed; i++) {
    // bits 32..34 sit in the fifth group
    const high = i === 4 ? bytes[i] & 0x70 : bytes[i] & 0x7f;
    if (high !== 0) {
      return false;
    }
  }
  return true;
}

/**
 * Decodes a sequence length prefix, failing on truncation or a length beyond
 * {@link MaxSequenceLength}.
 */
export function decodeLengthPrefix(bytes: Bytes): DecodeValue<number> | undefined {
  const prefix = uint32Varint.safe.decode(bytes);
  if (prefix === undefined || !lengthPrefixFits(bytes, prefix.rest)) {
    return undefined;
  }
  return prefix;
}

/**
 * Collects decoded elements, in order, into a container.
 */
export interface SequenceBuilder<E, R> {
  insert(element: E): void;
  finish(): R;
}

/**
 * How a container type `R` holding elements `E` is iterated and built.
 *
 * `elements` must yield in the order the container should be rebuilt in;
 * builders must keep insertion order and must not deduplicate.
 */
export interface SequenceType<E, R> {
  elements(container: R): Iterable<E>;
  /**
   * @param sizeHint - the declared payload length in bytes, an upper bound on
   *                   the number of elements that follow
   */
  builder(sizeHint: number): SequenceBuilder<E, R>;
}

/**
 * Plain arrays.
 */
export function arraySequence<E>(): SequenceType<E, E[]> {
  return {
    elements: (container) => container,
    builder() {
      const out: E[] = [];
      return {
        insert(element) {
          out.push(element);
        },
        finish: () => out,
      };
    },
  };
}

/**
 * Byte values collected into a fresh `Uint8Array`.
 */
export const byteSequence: SequenceType<number, Uint8Array> = {
  elements: (container) => container,
  builder(sizeHint) {
    const out = new Uint8Array(sizeHint);
    let count = 0;
    return {
      insert(element) {
        out[count++] = element;
      },
      finish: () => out.subarray(0, count),
    };
  },
};

/**
 * Strings as their UTF-8 code units.
 *
 * Only well-formed strings round trip: `TextEncoder` writes an unpaired
 * surrogate as U+FFFD. Use {@link utf16Sequence} to keep arbitrary strings.
 */
export const utf8Sequence: SequenceType<number, string> = {
  elements: (container) => textEncoder.encode(container),
  builder(sizeHint) {
    const bytes = byteSequence.builder(sizeHint);
    return {
      insert: (element) => bytes.insert(element),
      finish: () => textDecoder.decode(bytes.finish()),
    };
  },
};

const CHAR_CODE_CHUNK = 8192;

function* charCodes(value: string): Generator<number> {
  for (let i = 0; i < value.length; i++) {
    yield value.charCodeAt(i);
  }
}

/**
 * Strings as their UTF-16 code units. Unpaired surrogates survive.
 */
export const utf16Sequence: SequenceType<number, string> = {
  elements: charCodes,
  builder(sizeHint) {
    const units = new Uint16Array(sizeHint);
    let count = 0;
    return {
      insert(element) {
        units[count++] = element;
      },
      finish() {
        let out = "";
        for (let i = 0; i < count; i += CHAR_CODE_CHUNK) {
          out += String.fromCharCode(...units.subarray(i, Math.min(i + CHAR_CODE_CHUNK, count)));
        }
        return out;
      },
    };
  },
};

/**
 * Creates a length-prefixed sequence coder.
 *
 * Wire format: [payload_length: varint][element]...
 *
 * The prefix counts payload bytes, not elements, and is computed from the
 * element coder's `encodeSkip` before anything is written. Decoding reads
 * elements from exactly `payload_length` bytes; an element that would run
 * past that boundary fails the decode.
 */
export function sequenceCoder<E, R>(element: SkipCoder<E>, sequence: SequenceType<E, R>): SkipCoder<R> {
  const payloadLength = (container: R): number => {
    let length = 0;
    for (const e of sequence.elements(container)) {
      length += element.encodeSkip(e);
    }
    if (length > MaxSequenceLength) {
      throw new RangeError(`Sequence payload of ${length} bytes exceeds ${MaxSequenceLength}`);
    }
    return length;
  };

  return {
    encodeSkip(container) {
      const length = payloadLength(container);
      return varintLength(length) + length;
    },

    safe: {
      encode(container, bytes) {
        let rest = uint32Varint.safe.encode(payloadLength(container), bytes);
        if (rest === undefined) {
          return undefined;
        }
        for (const e of sequence.elements(container)) {
          rest = element.safe.encode(e, rest);
          if (rest === undefined) {
            return undefined;
          }
        }
        return rest;
      },

      decode(bytes) {
        const prefix = decodeLengthPrefix(bytes);
        if (prefix === undefined) {
          return undefined;
        }
        const { value: length, rest } = prefix;
        if (rest.length < length) {
          return undefined;
        }

        const builder = sequence.builder(length);
        let payload: Bytes = rest.subarray(0, length);
        while (payload.length > 0) {
          const next = element.safe.decode(payload);
          if (next === undefined) {
            return undefined;
          }
          builder.insert(next.value);
          payload = next.rest;
        }
        return { value: builder.finish(), rest: rest.subarray(length) };
      },

      decodeSkip(bytes) {
        const prefix = decodeLengthPrefix(bytes);
        if (prefix === undefined || prefix.rest.length < prefix.value) {
          return undefined;
        }
        return prefix.rest.subarray(prefix.value);
      },
    },

    unsafe: {
      encode(container, bytes) {
        let rest = uint32Varint.unsafe.encode(payloadLength(container), bytes);
        for (const e of sequence.elements(container)) {
          rest = element.unsafe.encode(e, rest);
        }
        return rest;
      },

      decode(bytes) {
        const { value: length, rest } = uint32Varint.unsafe.decode(bytes);
        const builder = sequence.builder(length);
        let payload = rest.subarray(0, length);
        while (payload.length > 0) {
          const next = element.unsafe.decode(payload);
          builder.insert(next.value);
          payload = next.rest;
        }
        return { value: builder.finish(), rest: rest.subarray(length) };
      },

      decodeSkip(bytes) {
        const { value: length, rest } = uint32Varint.unsafe.decode(bytes);
        return rest.subarray(length);
      },
    },
  };
}

/**
 * Length-prefixed array of `element` values.
 */
export function arrayCoder<E>(element: SkipCoder<E>): SkipCoder<E[]> {
  return sequenceCoder(element, arraySequence<E>());
}

/** Length-prefixed raw bytes. */
export const bytesCoder = sequenceCoder(uint8, byteSequence);

/**
 * Length-prefixed UTF-8 string. Unpaired surrogates decode as U+FFFD;
 * {@link utf16StringCoder} is lossless.
 */
export const stringCoder = sequenceCoder(uint8, utf8Sequence);

/** Length-prefixed string of native-order UTF-16 code units. */
export const utf16StringCoder = sequenceCoder(uint16, utf16Sequence);
