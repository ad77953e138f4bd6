import { describe, it, expect } from 'vitest';

import { fnv1a32, Random, XorShift32 } from '../rng.js';

describe('fnv1a32', () => {
  it('computes known FNV-1a hashes', () => {
    expect(fnv1a32('')).toBe(2166136261);
    expect(fnv1a32('a')).toBe(3826002220);
    expect(fnv1a32('hello')).toBe(1335831723);
  });
});

describe('XorShift32', () => {
  it('is deterministic for a seed and stream', () => {
    const a = new XorShift32(42, 'stream');
    const b = new XorShift32(42, 'stream');
    expect([a.next(), a.next(), a.next()]).toEqual([b.next(), b.next(), b.next()]);
  });

  it('follows the xorshift32 step from (seed ^ fnv1a32(stream))', () => {
    let x = (1 ^ 2166136261) >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    expect(new XorShift32(1, '').next()).toBe(x >>> 0);
  });

  it('never sticks at a zero state', () => {
    const rng = new XorShift32(fnv1a32('z'), 'z');
    expect(rng.next()).not.toBe(0);
  });

  it('keeps nextFloat01 in [0, 1)', () => {
    const rng = new XorShift32(1337, 'floats');
    for (let i = 0; i < 500; i++) {
      const v = rng.nextFloat01();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe('Random', () => {
  it('replays the same sequence for the same seed', () => {
    const a = new Random(7);
    const b = new Random(7);
    expect(a.bytes(16)).toEqual(b.bytes(16));
    expect(new Random('key').next()).toBe(new Random('key').next());
  });

  it('keeps randint within inclusive bounds', () => {
    const rng = new Random(3);
    const seen = new Set<number>();
    for (let i = 0; i < 400; i++) {
      const v = rng.randint(2, 5);
      expect(v).toBeGreaterThanOrEqual(2);
      expect(v).toBeLessThanOrEqual(5);
      seen.add(v);
    }
    expect([...seen].sort()).toEqual([2, 3, 4, 5]);
    expect(rng.randint(4, 4)).toBe(4);
  });

  it('draws exactly n random bits', () => {
    const rng = new Random(11);
    for (let i = 0; i < 100; i++) {
      expect(rng.getrandbits(12)).toBeLessThan(1n << 12n);
    }
  });

  it('shuffles in place and samples without replacement', () => {
    const rng = new Random(5);
    const items = [1, 2, 3, 4, 5, 6];
    const shuffled = rng.shuffle([...items]);
    expect([...shuffled].sort()).toEqual(items);
    const sample = rng.sample(items, 3);
    expect(sample).toHaveLength(3);
    expect(new Set(sample).size).toBe(3);
  });

  it('refuses to choose from nothing', () => {
    expect(() => new Random(1).choice([])).toThrow(RangeError);
  });
});
