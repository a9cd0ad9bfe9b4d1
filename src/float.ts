import { fixedWidthCoder } from "./integer";

/** IEEE 754 single precision, native byte order. */
export const float32 = fixedWidthCoder(new Float32Array(1));

/** IEEE 754 double precision, native byte order. */
export const float64 = fixedWidthCoder(new Float64Array(1));
