/**
 * Block-level mutation of an existing example.
 *
 * A Mutator picks three strategies at random when it is created and
 * applies one of them to every block the executor draws, so a single
 * mutator explores one "flavour" of neighbourhood around its origins.
 */

import type {
  ByteSource,
  ConjectureData,
  ConjectureResult,
} from '../data/conjecture-data.js';
import { intFromBytes, intToBytes } from '../util/bytes.js';
import type { Random } from '../util/rng.js';

export type MutationStrategy = (
  mutator: Mutator,
  data: ConjectureData,
  n: number
) => Uint8Array;

/** Rewrites a block the way generation bounds its size. */
export type ZeroBound = (data: ConjectureData, bytes: Uint8Array) => Uint8Array;

export function uniform(random: Random, n: number): Uint8Array {
  return intToBytes(random.getrandbits(n * 8), n);
}

/** Random bytes strictly below `xs` in lexicographic order, when possible. */
export function drawPredecessor(random: Random, xs: Uint8Array): Uint8Array {
  const out = new Uint8Array(xs.length);
  let strict = false;
  xs.forEach((x, i) => {
    const c = strict ? random.randint(0, 255) : random.randint(0, x);
    if (c < x) strict = true;
    out[i] = c;
  });
  return out;
}

/** Random bytes strictly above `xs` in lexicographic order, when possible. */
export function drawSuccessor(random: Random, xs: Uint8Array): Uint8Array {
  const out = new Uint8Array(xs.length);
  let strict = false;
  xs.forEach((x, i) => {
    const c = strict ? random.randint(0, 255) : random.randint(x, 255);
    if (c > x) strict = true;
    out[i] = c;
  });
  return out;
}

function existing(m: Mutator, data: ConjectureData, n: number): Uint8Array {
  return m.origin.buffer.slice(data.index, data.index + n);
}

export const STRATEGIES = {
  drawNew: (m, _data, n) => uniform(m.random, n),
  drawExisting: existing,
  drawSmaller: (m, data, n) => {
    const current = existing(m, data, n);
    const r = uniform(m.random, n);
    return intFromBytes(r) <= intFromBytes(current)
      ? r
      : drawPredecessor(m.random, current);
  },
  drawLarger: (m, data, n) => {
    const current = existing(m, data, n);
    const r = uniform(m.random, n);
    return intFromBytes(r) >= intFromBytes(current)
      ? r
      : drawSuccessor(m.random, current);
  },
  reuseExisting: (m, data, n) => {
    const starts = data.blocks
      .filter((block) => block.end - block.start === n)
      .map((block) => block.start);
    if (starts.length === 0) return uniform(m.random, n);
    const i = m.random.choice(starts);
    return data.buffer.slice(i, i + n);
  },
  flipBit: (m, data, n) => {
    const buf = existing(m, data, n);
    const i = m.random.randint(0, n - 1);
    const k = m.random.randint(0, 7);
    buf[i] = (buf[i] ?? 0) ^ (1 << k);
    return buf;
  },
  drawZero: (_m, _data, n) => new Uint8Array(n),
  drawMax: (_m, _data, n) => new Uint8Array(n).fill(0xff),
  drawConstant: (m, _data, n) => new Uint8Array(n).fill(m.random.randint(0, 255)),
  redrawLast: (m, data, n) => {
    const lastStart = m.origin.blocks[m.origin.blocks.length - 1]?.start ?? 0;
    return data.index + n <= lastStart
      ? existing(m, data, n)
      : uniform(m.random, n);
  },
} satisfies Record<string, MutationStrategy>;

export type StrategyName = keyof typeof STRATEGIES;

/** Weighted pool the three strategies are drawn from (duplicates weight). */
export const STRATEGY_POOL: readonly StrategyName[] = [
  'drawNew',
  'redrawLast',
  'redrawLast',
  'reuseExisting',
  'reuseExisting',
  'drawExisting',
  'drawSmaller',
  'drawLarger',
  'flipBit',
  'drawZero',
  'drawMax',
  'drawZero',
  'drawMax',
  'drawConstant',
];

export class Mutator {
  readonly strategies: readonly StrategyName[];
  private target: ConjectureResult | undefined;
  private prefix: Uint8Array = new Uint8Array(0);

  constructor(
    readonly random: Random,
    private readonly novelPrefix: () => Uint8Array,
    private readonly zeroBound: ZeroBound
  ) {
    this.strategies = [0, 1, 2].map(() => random.choice(STRATEGY_POOL));
  }

  get origin(): ConjectureResult {
    if (!this.target) {
      throw new RangeError('Mutator used before mutateFrom()');
    }
    return this.target;
  }

  /** Byte source that mutates `origin` behind a fresh novel prefix. */
  mutateFrom(origin: ConjectureResult): ByteSource {
    this.target = origin;
    this.prefix = this.novelPrefix();
    return (data, n) => this.drawMutated(data, n);
  }

  private drawMutated(data: ConjectureData, n: number): Uint8Array {
    let result =
      data.index + n > this.origin.buffer.length
        ? uniform(this.random, n)
        : STRATEGIES[this.random.choice(this.strategies)](this, data, n);
    if (data.index < this.prefix.length) {
      const head = this.prefix.subarray(data.index, data.index + n);
      const merged = new Uint8Array(n);
      merged.set(result);
      merged.set(head);
      result = merged;
    }
    return this.zeroBound(data, result);
  }
}
