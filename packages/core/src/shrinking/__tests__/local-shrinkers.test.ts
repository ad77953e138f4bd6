import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { compareLex } from '../../util/bytes.js';
import { Random } from '../../util/rng.js';
import { binsearch, findInteger } from '../common.js';
import { FloatShrinker } from '../float.js';
import { IntegerShrinker } from '../integer.js';
import { Length } from '../length.js';
import { Minimizer, minimizeInt } from '../minimizer.js';
import { Ordering } from '../ordering.js';

const options = () => ({ random: new Random(0) });
const sum = (bytes: Uint8Array): number => bytes.reduce((a, b) => a + b, 0);

describe('findInteger', () => {
  it('finds the largest n the predicate accepts', () => {
    expect(findInteger((n) => n <= 2)).toBe(2);
    expect(findInteger((n) => n <= 37)).toBe(37);
    expect(findInteger(() => false)).toBe(0);
  });
});

describe('binsearch', () => {
  it('probes until it brackets the change point', () => {
    const probed: number[] = [];
    binsearch(0, 100, (n) => {
      probed.push(n);
      return n < 40;
    });
    expect(probed).toContain(39);
    expect(probed).toContain(40);
  });
});

describe('Minimizer', () => {
  it('moves the weight of a sum into the last byte', () => {
    const result = Minimizer.shrink(new Uint8Array(8).fill(255), (b) => sum(b) > 10, options());
    expect(Array.from(result)).toEqual([0, 0, 0, 0, 0, 0, 0, 11]);
  });

  it('goes straight to zero when zero is allowed', () => {
    expect(Array.from(Minimizer.shrink(Uint8Array.from([9, 9]), () => true, options()))).toEqual([0, 0]);
  });

  it('never returns something larger or failing', () => {
    fc.assert(
      fc.property(fc.uint8Array({ minLength: 1, maxLength: 4 }), fc.nat(1000), (start, threshold) => {
        fc.pre(sum(start) >= threshold);
        const result = Minimizer.shrink(start, (b) => sum(b) >= threshold, options());
        expect(result.length).toBe(start.length);
        expect(sum(result)).toBeGreaterThanOrEqual(threshold);
        expect(compareLex(result, start)).toBeLessThanOrEqual(0);
      }),
      { numRuns: 50 }
    );
  });
});

describe('minimizeInt', () => {
  it('finds the monotone lower bound', () => {
    expect(minimizeInt(100, (v) => v >= 37)).toBe(37);
    expect(minimizeInt(5, (v) => v === 5)).toBe(5);
    expect(minimizeInt(9, () => true)).toBe(0);
  });
});

describe('IntegerShrinker', () => {
  it('shrinks to the smallest accepted value', () => {
    expect(IntegerShrinker.shrink(1000n, (n) => n >= 37n, options())).toBe(37n);
    expect(IntegerShrinker.shrink(12345n, (n) => n > 0n, options())).toBe(1n);
  });

  it('refuses negative candidates', () => {
    const shrinker = new IntegerShrinker(5n, () => true, options());
    expect(() => shrinker.incorporate(-1n)).toThrow(RangeError);
  });
});

describe('FloatShrinker', () => {
  it('prefers an integer over any fraction', () => {
    expect(FloatShrinker.shrink(3.7, (x) => x >= 1.5, options())).toBe(2);
  });

  it('keeps the sign when it is required', () => {
    expect(FloatShrinker.shrink(-2.5, (x) => x <= -2, options())).toBe(-2);
  });
});

describe('Ordering', () => {
  it('sorts when nothing depends on the order', () => {
    const sorted = Ordering.shrink([3, 1, 2], () => true, { ...options(), sortKey: (v: number) => v });
    expect(sorted).toEqual([1, 2, 3]);
  });

  it('only ever permutes the elements', () => {
    fc.assert(
      fc.property(fc.array(fc.nat(9), { maxLength: 8 }), (values) => {
        const first = values[0];
        const result = Ordering.shrink(values, (xs) => xs[0] === first, {
          ...options(),
          sortKey: (v: number) => v,
        });
        expect([...result].sort()).toEqual([...values].sort());
        expect(result[0]).toBe(first);
      }),
      { numRuns: 50 }
    );
  });
});

describe('Length', () => {
  it('deletes everything that is not needed', () => {
    expect(Length.shrink([1, 2, 3, 4, 5], (xs) => xs.includes(3), options())).toEqual([3]);
    expect(Length.shrink([1, 2], () => true, options())).toEqual([]);
  });

  it('keeps every required element', () => {
    const result = Length.shrink([5, 1, 7, 2, 9], (xs) => xs.includes(7) && xs.includes(9), options());
    expect(result).toEqual([7, 9]);
  });

  it('deletes object elements by identity', () => {
    const kept = { k: 2 };
    const result = Length.shrink([{ k: 1 }, kept], (xs) => xs.some((x) => x.k === 2), options());
    expect(result).toEqual([kept]);
    expect(result[0]).toBe(kept);
    expect(
      Length.shrink([{ k: 1 }, { k: 1 }, { k: 3 }], (xs) => xs.length >= 1, options())
    ).toHaveLength(1);
  });
});
