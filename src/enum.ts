import { projectCoder } from "./project";
import type { SkipCoder } from "./skip";
import { int32Varint } from "./varint";

/**
 * Creates a coder for a numeric enum, written as a varint of its numeric value.
 *
 * `underlying` selects the varint of the enum's representation; the default
 * is the signed 32-bit varint. Decoding does not check that the number names a
 * member: values unknown to this build come back as-is, typed as `E`.
 *
 * @example
 * ```typescript
 * enum Color { Red, Green, Blue = 128 }
 * const colorCoder = enumCoder<Color>();
 * ```
 */
export function enumCoder<E extends number>(underlying: SkipCoder<number> = int32Varint): SkipCoder<E> {
  return projectCoder<E, number>(
    underlying,
    (value) => value,
    (wire) => wire as E
  );
}
