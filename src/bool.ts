import { uint8 } from "./integer";
import { projectCoder } from "./project";

/**
 * Single-byte boolean: `true` is written as 0x01 and `false` as 0x00.
 * Any nonzero byte decodes as `true`.
 */
export const bool = projectCoder<boolean, number>(
  uint8,
  (value) => (value ? 1 : 0),
  (byte) => byte !== 0
);
