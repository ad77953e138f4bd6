import { InvalidArgument, hexToBytes } from '@choicetape/core';

/**
 * Parse a hex argument into bytes. Accepts an optional `0x` prefix and
 * an empty string for the empty tape.
 */
export function parseHexArg(value: string, argument: string): Uint8Array {
  const digits = value.startsWith('0x') ? value.slice(2) : value;
  const bytes = hexToBytes(digits);
  if (!bytes) {
    throw new InvalidArgument({
      message: `Expected an even number of hex digits for ${argument}, got '${value}'`,
      context: { argument, valueExcerpt: value.slice(0, 40) },
    });
  }
  return bytes;
}

const NAMED_FLOATS: Record<string, number> = {
  nan: Number.NaN,
  inf: Number.POSITIVE_INFINITY,
  '+inf': Number.POSITIVE_INFINITY,
  '-inf': Number.NEGATIVE_INFINITY,
  infinity: Number.POSITIVE_INFINITY,
  '-infinity': Number.NEGATIVE_INFINITY,
};

export function parseFloatArg(value: string, argument: string): number {
  const named = NAMED_FLOATS[value.trim().toLowerCase()];
  if (named !== undefined) return named;
  const parsed = value.trim() === '' ? Number.NaN : Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgument({
      message: `Expected a number for ${argument}, got '${value}'`,
      context: { argument, valueExcerpt: value.slice(0, 40) },
    });
  }
  return parsed;
}
