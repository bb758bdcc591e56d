/**
 * Float24: a reduced-precision float packed into 3 bytes.
 *
 * Bit layout (MSB first):
 * ```
 * ┌──────┬──────────────┬──────────────────┐
 * │ sign │ exponent (7) │  mantissa (16)   │
 * └──────┴──────────────┴──────────────────┘
 * ```
 * Exponent bias is 63. Exponent 0 holds zero and subnormals
 * (mantissa * 2^-78); exponent 127 holds infinities (mantissa 0)
 * and NaN (mantissa 0x8000).
 *
 * Encoding rounds to nearest, ties away from zero, and saturates to
 * infinity past {@link FLOAT24_MAX}. Decoding a value and encoding it
 * again always yields the same bits.
 */

const EXPONENT_BIAS = 63;
const MANTISSA_BITS = 16;
const MANTISSA_SCALE = 1 << MANTISSA_BITS;
const EXPONENT_MAX = 0x7f;
const SIGN_BIT = 0x800000;
const NAN_BITS = (EXPONENT_MAX << MANTISSA_BITS) | 0x8000;
const INFINITY_BITS = EXPONENT_MAX << MANTISSA_BITS;

/** 2^-78: value of one subnormal mantissa step */
const SUBNORMAL_STEP = Math.pow(2, 1 - EXPONENT_BIAS - MANTISSA_BITS);
/** 2^-62: smallest normal magnitude */
const MIN_NORMAL = Math.pow(2, 1 - EXPONENT_BIAS);

/** Largest finite Float24 magnitude */
export const FLOAT24_MAX = (2 - 1 / MANTISSA_SCALE) * Math.pow(2, EXPONENT_MAX - 1 - EXPONENT_BIAS);

/**
 * Packs a number into the low 24 bits of the result.
 */
export function encodeFloat24(value: number): number {
  if (Number.isNaN(value)) return NAN_BITS;

  const sign = value < 0 || Object.is(value, -0) ? SIGN_BIT : 0;
  const magnitude = Math.abs(value);

  if (magnitude === Infinity) return sign | INFINITY_BITS;

  if (magnitude < MIN_NORMAL) {
    // Mantissa 0x10000 carries into exponent 1, which is the correct bit pattern
    return sign | Math.round(magnitude / SUBNORMAL_STEP);
  }

  let exponent = Math.floor(Math.log2(magnitude));
  if (Math.pow(2, exponent) > magnitude) exponent--;
  else if (Math.pow(2, exponent + 1) <= magnitude) exponent++;

  let biased = exponent + EXPONENT_BIAS;
  let mantissa = Math.round((magnitude / Math.pow(2, exponent) - 1) * MANTISSA_SCALE);
  if (mantissa === MANTISSA_SCALE) {
    mantissa = 0;
    biased++;
  }

  if (biased >= EXPONENT_MAX) return sign | INFINITY_BITS;

  return sign | (biased << MANTISSA_BITS) | mantissa;
}

/**
 * Expands the low 24 bits of `bits` into a number.
 */
export function decodeFloat24(bits: number): number {
  const negative = (bits & SIGN_BIT) !== 0;
  const biased = (bits >> MANTISSA_BITS) & EXPONENT_MAX;
  const mantissa = bits & (MANTISSA_SCALE - 1);

  let magnitude: number;
  if (biased === EXPONENT_MAX) {
    if (mantissa !== 0) return NaN;
    magnitude = Infinity;
  } else if (biased === 0) {
    magnitude = mantissa * SUBNORMAL_STEP;
  } else {
    magnitude = (1 + mantissa / MANTISSA_SCALE) * Math.pow(2, biased - EXPONENT_BIAS);
  }

  return negative ? -magnitude : magnitude;
}

/**
 * Rounds a number to the nearest Float24-representable value.
 */
export function toFloat24(value: number): number {
  return decodeFloat24(encodeFloat24(value));
}
