/**
 * Lexicographic float encoding.
 *
 * Non-negative doubles map bijectively onto 64-bit tape values whose
 * bytewise order tracks "simplicity":
 *
 * - tag bit clear: the low 56 bits are a non-negative integer, and the
 *   float is that integer. Small integers are therefore simplest.
 * - tag bit set: [exponent:11][mantissa:52] where exponents are permuted so
 *   that non-negative unbiased exponents come first in increasing order,
 *   then negative ones in decreasing order, with the all-ones exponent
 *   (infinities and NaN) last. The fractional mantissa bits are stored
 *   reversed, so lowering them removes the finest fractions first.
 *
 * The sign is a separate trailing bit; see drawFloat.
 */

const MAX_EXPONENT = 0x7ff;
const BIAS = 1023;
const MANTISSA_MASK = (1n << 52n) - 1n;
const TAG_BIT = 1n << 63n;
const SIMPLE_MASK = (1n << 56n) - 1n;

export const CANONICAL_NAN_BITS = 0x7ff8000000000000n;

function exponentKey(e: number): number {
  if (e === MAX_EXPONENT) return Number.POSITIVE_INFINITY;
  const unbiased = e - BIAS;
  return unbiased < 0 ? 10000 - unbiased : unbiased;
}

// Encoded exponent -> IEEE exponent, and its inverse
const ENCODING_TABLE: readonly number[] = Array.from(
  { length: MAX_EXPONENT + 1 },
  (_, i) => i
).sort((a, b) => exponentKey(a) - exponentKey(b));

const DECODING_TABLE: readonly number[] = (() => {
  const table = new Array<number>(MAX_EXPONENT + 1).fill(0);
  ENCODING_TABLE.forEach((ieee, encoded) => {
    table[ieee] = encoded;
  });
  return table;
})();

function decodeExponent(e: number): number {
  return ENCODING_TABLE[e] ?? MAX_EXPONENT;
}

function encodeExponent(e: number): number {
  return DECODING_TABLE[e] ?? MAX_EXPONENT;
}

function reverseBits(x: bigint, n: number): bigint {
  let out = 0n;
  let v = x;
  for (let i = 0; i < n; i++) {
    out = (out << 1n) | (v & 1n);
    v >>= 1n;
  }
  return out;
}

function updateMantissa(unbiasedExponent: number, mantissa: bigint): bigint {
  if (unbiasedExponent <= 0) {
    return reverseBits(mantissa, 52);
  }
  if (unbiasedExponent <= 51) {
    const fractionalBits = 52 - unbiasedExponent;
    const fractionalPart = mantissa & ((1n << BigInt(fractionalBits)) - 1n);
    return (mantissa ^ fractionalPart) | reverseBits(fractionalPart, fractionalBits);
  }
  return mantissa;
}

const scratch = new DataView(new ArrayBuffer(8));

/** IEEE-754 bits of f, with every NaN collapsed onto one pattern. */
export function floatToInt(f: number): bigint {
  if (Number.isNaN(f)) return CANONICAL_NAN_BITS;
  scratch.setFloat64(0, f);
  return scratch.getBigUint64(0);
}

export function intToFloat(bits: bigint): number {
  scratch.setBigUint64(0, BigInt.asUintN(64, bits));
  return scratch.getFloat64(0);
}

export function isNegative(f: number): boolean {
  return (floatToInt(f) >> 63n) === 1n;
}

/** Non-negative integral floats that fit in the untagged 56-bit form. */
export function isSimple(f: number): boolean {
  if (!Number.isFinite(f) || !Number.isInteger(f)) return false;
  const i = BigInt(Math.abs(f));
  return i <= SIMPLE_MASK;
}

export function lexToFloat(i: bigint): number {
  if ((i >> 63n) & 1n) {
    const exponent = decodeExponent(Number((i >> 52n) & 0x7ffn));
    const mantissa = updateMantissa(exponent - BIAS, i & MANTISSA_MASK);
    return intToFloat((BigInt(exponent) << 52n) | mantissa);
  }
  return Number(i & SIMPLE_MASK);
}

/** Encode a non-negative float (the sign bit is ignored). */
export function floatToLex(f: number): bigint {
  if (isSimple(f)) return BigInt(Math.abs(f));
  const bits = floatToInt(f) & ((1n << 63n) - 1n);
  const exponent = Number(bits >> 52n);
  const mantissa = updateMantissa(exponent - BIAS, bits & MANTISSA_MASK);
  return TAG_BIT | (BigInt(encodeExponent(exponent)) << 52n) | mantissa;
}

/** The smallest double greater than f. */
export function nextUp(f: number): number {
  if (Number.isNaN(f) || f === Number.POSITIVE_INFINITY) return f;
  if (f === 0) return Number.MIN_VALUE;
  const bits = floatToInt(f);
  return intToFloat(f > 0 ? bits + 1n : bits - 1n);
}

export function nextDown(f: number): number {
  return -nextUp(-f);
}

const NASTY_MAGNITUDES: readonly number[] = [
  0.0,
  0.5,
  1.1,
  1.5,
  1.9,
  1 / 3,
  10e6,
  10e-6,
  1.175494351e-38,
  2.2250738585072014e-308,
  1.7976931348623157e308,
  3.402823466e38,
  9007199254740992,
  1 - 10e-6,
  2 + 10e-6,
  1.192092896e-7,
  2.220446049250313e-16,
  Number.POSITIVE_INFINITY,
  Number.NaN,
];

/** Boundary values worth trying first, simplest first, then negated. */
export const NASTY_FLOATS: readonly number[] = (() => {
  const sorted = [...NASTY_MAGNITUDES].sort((a, b) => {
    const ka = floatToLex(a);
    const kb = floatToLex(b);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });
  return [...sorted, ...sorted.map((f) => -f)];
})();

export interface FloatConstraints {
  min: number;
  max: number;
  allowNan: boolean;
  smallestNonzeroMagnitude: number;
}

export const DEFAULT_FLOAT_CONSTRAINTS: FloatConstraints = {
  min: Number.NEGATIVE_INFINITY,
  max: Number.POSITIVE_INFINITY,
  allowNan: true,
  smallestNonzeroMagnitude: Number.MIN_VALUE,
};

/** Whether f satisfies the constraints exactly, -0.0 included. */
export function floatPermitted(f: number, c: FloatConstraints): boolean {
  if (Number.isNaN(f)) return c.allowNan;
  if (f !== 0 && Math.abs(f) < c.smallestNonzeroMagnitude) return false;
  if (f < c.min || f > c.max) return false;
  // -0.0 sits outside [0.0, x]; 0.0 outside [y, -0.0]
  if (f === 0 && c.min === 0 && !isNegative(c.min) && isNegative(f)) return false;
  if (f === 0 && c.max === 0 && isNegative(c.max) && !isNegative(f)) return false;
  return true;
}

/** The simplest value the constraints admit. */
export function simplestFloat(c: FloatConstraints): number {
  if (floatPermitted(0, c)) return 0;
  if (floatPermitted(-0, c)) return -0;
  if (c.min > 0) {
    return Math.max(c.min, c.smallestNonzeroMagnitude) <= c.max
      ? Math.max(c.min, c.smallestNonzeroMagnitude)
      : c.min;
  }
  return Math.min(c.max, -c.smallestNonzeroMagnitude) >= c.min
    ? Math.min(c.max, -c.smallestNonzeroMagnitude)
    : c.max;
}

/**
 * Map an arbitrary drawn float into the constrained range. Values already
 * permitted pass through unchanged so that forced and replayed values
 * survive.
 */
export function clampFloat(f: number, c: FloatConstraints): number {
  if (floatPermitted(f, c)) return f;
  if (Number.isNaN(f)) return simplestFloat(c);

  let result = f;
  if (result !== 0 && Math.abs(result) < c.smallestNonzeroMagnitude) {
    result = Math.sign(result) * c.smallestNonzeroMagnitude;
    if (floatPermitted(result, c)) return result;
  }
  if (result === Number.POSITIVE_INFINITY) return c.max;
  if (result === Number.NEGATIVE_INFINITY) return c.min;

  const width = c.max - c.min;
  if (Number.isFinite(width) && width > 0) {
    result = Math.min(c.max, c.min + (Math.abs(result) % width));
  } else {
    result = result > c.max ? c.max : c.min;
  }
  return floatPermitted(result, c) ? result : simplestFloat(c);
}
