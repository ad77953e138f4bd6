import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { ConjectureData, type ConjectureResult } from '../../data/conjecture-data.js';
import { Status } from '../../data/status.js';
import { compareLex } from '../../util/bytes.js';
import { Random } from '../../util/rng.js';
import {
  Mutator,
  STRATEGIES,
  STRATEGY_POOL,
  drawPredecessor,
  drawSuccessor,
} from '../mutator.js';

function origin(bytes: readonly number[]): ConjectureResult {
  const data = ConjectureData.forBuffer(Uint8Array.from(bytes));
  for (let i = 0; i < bytes.length; i++) data.drawBits(8);
  data.conclude(Status.VALID);
  return data.asResult();
}

const keep = (_data: ConjectureData, bytes: Uint8Array): Uint8Array => bytes;

describe('predecessor and successor draws', () => {
  it('never lands above or below the original', () => {
    fc.assert(
      fc.property(fc.uint8Array({ minLength: 1, maxLength: 4 }), fc.nat(), (xs, seed) => {
        const random = new Random(seed);
        expect(compareLex(drawPredecessor(random, xs), xs)).toBeLessThanOrEqual(0);
        expect(compareLex(drawSuccessor(random, xs), xs)).toBeGreaterThanOrEqual(0);
      })
    );
  });
});

describe('Mutator', () => {
  it('picks three strategies from the pool', () => {
    const mutator = new Mutator(new Random(5), () => new Uint8Array(0), keep);
    expect(mutator.strategies).toHaveLength(3);
    for (const name of mutator.strategies) expect(STRATEGY_POOL).toContain(name);
  });

  it('refuses to mutate before it has an origin', () => {
    const mutator = new Mutator(new Random(5), () => new Uint8Array(0), keep);
    expect(() => mutator.origin).toThrow(RangeError);
  });

  it('keeps the novel prefix in front of the mutated bytes', () => {
    const mutator = new Mutator(new Random(5), () => Uint8Array.from([42]), keep);
    const source = mutator.mutateFrom(origin([1, 2, 3]));
    const data = new ConjectureData({ source });
    expect(data.drawBits(8)).toBe(42n);
    data.drawBits(8);
    data.drawBits(8);
    expect(data.index).toBe(3);
  });

  it('passes every block through the zero bound', () => {
    const mutator = new Mutator(new Random(5), () => new Uint8Array(0), (_d, b) => new Uint8Array(b.length));
    const data = new ConjectureData({ source: mutator.mutateFrom(origin([9, 9])) });
    expect(data.drawBits(16)).toBe(0n);
  });

  it('draws fixed blocks for the constant strategies', () => {
    const mutator = new Mutator(new Random(5), () => new Uint8Array(0), keep);
    mutator.mutateFrom(origin([7, 8]));
    const data = ConjectureData.forBuffer(new Uint8Array(2));
    expect(STRATEGIES.drawZero(mutator, data, 2)).toEqual(Uint8Array.from([0, 0]));
    expect(STRATEGIES.drawMax(mutator, data, 2)).toEqual(Uint8Array.from([255, 255]));
    expect(STRATEGIES.drawExisting(mutator, data, 2)).toEqual(Uint8Array.from([7, 8]));
  });
});
