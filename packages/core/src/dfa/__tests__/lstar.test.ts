import { describe, it, expect } from 'vitest';

import { InvalidState } from '../../types/errors.js';
import { IntegerNormalizer, LStar } from '../lstar.js';

const endsInFive = (s: Uint8Array): boolean => s.length > 0 && s[s.length - 1] === 5;

describe('IntegerNormalizer', () => {
  it('starts with every byte in one class', () => {
    const normalizer = new IntegerNormalizer();
    expect(normalizer.normalize(0)).toBe(0);
    expect(normalizer.normalize(200)).toBe(0);
    expect(normalizer.canonicalValues).toEqual([0]);
  });

  it('splits a class at the smallest value that behaves like the input', () => {
    const normalizer = new IntegerNormalizer();
    expect(normalizer.distinguish(100, (x) => x >= 40)).toBe(true);
    expect(normalizer.canonicalValues).toEqual([0, 40]);
    expect(normalizer.normalize(39)).toBe(0);
    expect(normalizer.normalize(255)).toBe(40);
  });

  it('leaves classes alone when the test agrees', () => {
    const normalizer = new IntegerNormalizer();
    expect(normalizer.distinguish(9, () => true)).toBe(false);
    expect(normalizer.distinguish(0, () => false)).toBe(false);
    expect(normalizer.canonicalValues).toEqual([0]);
  });
});

describe('LStar', () => {
  it('learns from membership queries until it classifies each example', () => {
    const lstar = new LStar(endsInFive);
    expect(lstar.dfa.matches(Uint8Array.of(5))).toBe(false);

    lstar.learn(Uint8Array.of(5));
    expect(lstar.dfa.matches(Uint8Array.of(5))).toBe(true);

    lstar.learn(Uint8Array.of(6));
    const { dfa } = lstar;
    expect(dfa.matches(Uint8Array.of(6))).toBe(false);
    expect(dfa.matches(Uint8Array.of(7, 5))).toBe(true);
    expect(dfa.matches(Uint8Array.of(5, 6))).toBe(false);
    expect(dfa.matches(Uint8Array.of(0))).toBe(false);
    expect(lstar.normalizer.canonicalValues).toEqual([0, 5, 6]);
  });

  it('does nothing for strings it already classifies', () => {
    const lstar = new LStar((s) => s.length % 2 === 0);
    const generation = lstar.generation;
    lstar.learn(Uint8Array.of(1));
    lstar.learn(Uint8Array.of(1, 2));
    expect(lstar.generation).toBe(generation);
    expect(lstar.dfa.matches(Uint8Array.of(3, 4, 5, 6))).toBe(true);
  });

  it('asks the oracle once per string', () => {
    let calls = 0;
    const lstar = new LStar((s) => {
      calls++;
      return s.length === 0;
    });
    const before = calls;
    lstar.member(Uint8Array.of(9));
    lstar.member(Uint8Array.of(9));
    expect(calls - before).toBe(1);
  });

  it('invalidates automata from earlier generations', () => {
    const lstar = new LStar(endsInFive);
    const stale = lstar.dfa;
    lstar.learn(Uint8Array.of(5));
    expect(() => stale.start).toThrow(InvalidState);
    expect(lstar.dfa.canonicalise().matches(Uint8Array.of(5))).toBe(true);
  });
});
