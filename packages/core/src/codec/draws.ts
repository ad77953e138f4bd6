/**
 * Typed draws over a BitSource. Each is a pure function of the tape
 * position, its constraints and an optional forced value; forcing writes
 * exactly the bytes an unforced draw would have read for that value.
 */

import type { BitSource } from './bit-source.js';
import {
  clampFloat,
  floatPermitted,
  floatToLex,
  isNegative,
  lexToFloat,
  NASTY_FLOATS,
} from './floats.js';
import { Many } from './many.js';
import { biasedCoin, integerRange } from './primitives.js';
import { Sampler } from './sampler.js';
import type {
  BytesConstraints,
  FloatConstraints,
  IntegerConstraints,
  StringConstraints,
} from '../data/choices.js';
import { bitLength, intFromBytes, intToBytes } from '../util/bytes.js';
import { LABELS } from '../util/labels.js';

export const INT_SIZES = [8, 16, 32, 48] as const;
const INT_SIZES_SAMPLER = new Sampler([4, 8, 1, 1]);

/** Largest magnitude an unbounded draw can produce or be forced to. */
export const MAX_UNBOUNDED_MAGNITUDE = 2 ** 47 - 1;

export const NASTY_FLOAT_PROBABILITY = 0.125;

/** Sign in the low bit, magnitude above it; the size is sampled first. */
export function drawUnboundedInteger(source: BitSource, forced?: number): number {
  let forcedSize: number | undefined;
  let forcedBits: bigint | undefined;
  if (forced !== undefined) {
    forcedBits = (BigInt(Math.abs(forced)) << 1n) | (forced < 0 ? 1n : 0n);
    const bits = bitLength(forcedBits);
    forcedSize = INT_SIZES.findIndex((size) => bits <= size);
    if (forcedSize < 0) {
      throw new RangeError(`Cannot force unbounded integer ${forced}`);
    }
  }
  const size = INT_SIZES[INT_SIZES_SAMPLER.sample(source, forcedSize)] ?? 8;
  const r = source.drawBits(size, forcedBits);
  const magnitude = Number(r >> 1n);
  return (r & 1n) === 1n ? -magnitude : magnitude;
}

const weightSamplers = new WeakMap<ReadonlyMap<number, number>, Sampler>();

function samplerFor(weights: ReadonlyMap<number, number>): Sampler {
  let sampler = weightSamplers.get(weights);
  if (!sampler) {
    const probabilities = [...weights.values()];
    const rest = 1 - probabilities.reduce((a, b) => a + b, 0);
    sampler = new Sampler([Math.max(0, rest), ...probabilities]);
    weightSamplers.set(weights, sampler);
  }
  return sampler;
}

export function drawInteger(
  source: BitSource,
  c: IntegerConstraints,
  forced?: number
): number {
  if (c.weights !== null && c.weights.size > 0) {
    const keys = [...c.weights.keys()];
    const forcedIndex =
      forced === undefined ? undefined : keys.indexOf(forced) + 1;
    const idx = samplerFor(c.weights).sample(source, forcedIndex);
    const weighted = keys[idx - 1];
    if (idx > 0 && weighted !== undefined) return weighted;
  }

  const { min, max } = c;
  if (min !== null && max !== null) {
    return integerRange(source, min, max, c.shrinkTowards, forced);
  }
  let towards = c.shrinkTowards;
  if (min !== null) towards = Math.max(min, towards);
  if (max !== null) towards = Math.min(max, towards);
  const offset = forced === undefined ? undefined : forced - towards;

  if (min === null && max === null) {
    return towards + drawUnboundedInteger(source, offset);
  }
  for (;;) {
    source.startSpan(LABELS.UNBOUNDED_INTEGER);
    const probe = towards + drawUnboundedInteger(source, offset);
    const outside = (min !== null && probe < min) || (max !== null && probe > max);
    source.stopSpan(outside);
    if (!outside) return probe;
  }
}

export function drawFloat(
  source: BitSource,
  c: FloatConstraints,
  forced?: number
): number {
  const nasty = NASTY_FLOATS.filter((f) => floatPermitted(f, c));
  let target = forced;
  if (nasty.length > 0) {
    const useNasty = biasedCoin(
      source,
      NASTY_FLOAT_PROBABILITY,
      forced === undefined ? undefined : false
    );
    if (useNasty) {
      target = nasty[integerRange(source, 0, nasty.length - 1)];
    }
  }

  source.startSpan(LABELS.DRAW_FLOAT);
  const lex = source.drawBits(
    64,
    target === undefined ? undefined : floatToLex(Math.abs(target))
  );
  const sign = source.drawBits(
    1,
    target === undefined ? undefined : isNegative(target) ? 1n : 0n
  );
  source.stopSpan();

  const magnitude = lexToFloat(lex);
  return clampFloat(sign === 1n ? -magnitude : magnitude, c);
}

function averageSize(minSize: number, maxSize: number): number {
  return Math.min(Math.max(minSize * 2, minSize + 5), 0.5 * (minSize + maxSize));
}

export function drawString(
  source: BitSource,
  c: StringConstraints,
  forced?: string
): string {
  const chars = forced === undefined ? undefined : Array.from(forced);
  source.startSpan(LABELS.STRING);
  const elements = new Many(source, {
    minSize: c.minSize,
    maxSize: c.maxSize,
    averageSize: averageSize(c.minSize, c.maxSize),
    forcedSize: chars?.length,
  });
  const out: string[] = [];
  while (elements.more()) {
    const ch = chars?.[out.length];
    const forcedIndex =
      ch === undefined
        ? undefined
        : c.intervals.indexFromCharInShrinkOrder(ch.codePointAt(0) ?? 0);
    const i = integerRange(source, 0, c.intervals.size - 1, 0, forcedIndex);
    out.push(String.fromCodePoint(c.intervals.charInShrinkOrder(i)));
  }
  source.stopSpan();
  return out.join('');
}

export function drawBytes(
  source: BitSource,
  c: BytesConstraints,
  forced?: Uint8Array
): Uint8Array {
  if (c.minSize === c.maxSize) {
    // One block, so the minimizer sees the whole value at once
    const n = c.minSize;
    const value = source.drawBits(
      8 * n,
      forced === undefined ? undefined : intFromBytes(forced)
    );
    return intToBytes(value, n);
  }
  source.startSpan(LABELS.BYTES);
  const elements = new Many(source, {
    minSize: c.minSize,
    maxSize: c.maxSize,
    averageSize: averageSize(c.minSize, c.maxSize),
    forcedSize: forced?.length,
  });
  const out: number[] = [];
  while (elements.more()) {
    const b = forced?.[out.length];
    out.push(Number(source.drawBits(8, b === undefined ? undefined : BigInt(b))));
  }
  source.stopSpan();
  return Uint8Array.from(out);
}
