import type { BitSource } from './bit-source.js';
import { bitLength } from '../util/bytes.js';
import { LABELS } from '../util/labels.js';

const COIN_PARTS = 256;

/**
 * A coin that lands true with probability p, using one byte per attempt.
 *
 * The unit interval is split into 256 parts. Bytes 0 and 1 always mean
 * false and true, so shrinking any coin lands on a definite answer. When p
 * falls strictly inside one part, byte 255 is reserved for "retry with the
 * residual probability", so lowering that byte never changes tape length.
 */
export function biasedCoin(
  source: BitSource,
  p: number,
  forced?: boolean
): boolean {
  source.startSpan(LABELS.BIASED_COIN);
  try {
    let prob = p;
    for (;;) {
      if (prob <= 0) {
        source.drawBits(8, 0n);
        return false;
      }
      if (prob >= 1) {
        source.drawBits(8, 1n);
        return true;
      }
      const falsey = Math.floor(COIN_PARTS * (1 - prob));
      const truthy = Math.floor(COIN_PARTS * prob);
      const remainder = COIN_PARTS * prob - truthy;
      const partial = falsey + truthy !== COIN_PARTS;

      const forcedByte =
        forced === undefined ? undefined : forced ? 1n : 0n;
      const i = Number(source.drawBits(8, forcedByte));

      if (partial && i === COIN_PARTS - 1) {
        prob = remainder;
        continue;
      }
      if (falsey === 0) return true;
      if (truthy === 0) return false;
      if (i <= 1) return i === 1;
      return i > falsey;
    }
  } finally {
    source.stopSpan();
  }
}

/**
 * Uniform-ish integer in [lower, upper] that shrinks toward `center`.
 *
 * A one-bit "above" block chooses the side when the center is strictly
 * inside the range; the distance from the center is then rejection sampled
 * with just enough bits, each probe in its own span that is discarded when
 * it overshoots.
 */
export function integerRange(
  source: BitSource,
  lower: number,
  upper: number,
  center?: number,
  forced?: number
): number {
  if (lower > upper) {
    throw new RangeError(`integerRange(${lower}, ${upper}) is empty`);
  }
  if (lower === upper) {
    // Write a value even when trivial so the tape stays aligned as bounds move
    source.drawBits(1, 0n);
    return lower;
  }
  const lo = BigInt(lower);
  const hi = BigInt(upper);
  const c = BigInt(Math.min(Math.max(center ?? lower, lower), upper));
  const f = forced === undefined ? undefined : BigInt(forced);

  let above: boolean;
  if (c === hi) {
    above = false;
  } else if (c === lo) {
    above = true;
  } else {
    const forcedAbove = f === undefined ? undefined : f > c ? 1n : 0n;
    above = source.drawBits(1, forcedAbove) === 1n;
  }

  const gap = above ? hi - c : c - lo;
  const bits = bitLength(gap);
  const forcedProbe =
    f === undefined ? undefined : above ? f - c : c - f;

  let probe = gap + 1n;
  while (probe > gap) {
    source.startSpan(LABELS.INTEGER_RANGE);
    probe = source.drawBits(bits, forcedProbe);
    source.stopSpan(probe > gap);
  }
  return Number(above ? c + probe : c - probe);
}
