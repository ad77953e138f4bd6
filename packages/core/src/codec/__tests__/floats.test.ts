import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import {
  CANONICAL_NAN_BITS,
  NASTY_FLOATS,
  clampFloat,
  floatPermitted,
  floatToInt,
  floatToLex,
  intToFloat,
  isNegative,
  isSimple,
  lexToFloat,
  nextDown,
  nextUp,
  simplestFloat,
  DEFAULT_FLOAT_CONSTRAINTS,
} from '../floats.js';

describe('float lex encoding', () => {
  it('orders small integers before fractions', () => {
    expect(floatToLex(0)).toBe(0n);
    expect(floatToLex(1)).toBe(1n);
    expect(floatToLex(2)).toBe(2n);
    const fraction = floatToLex(1.5);
    expect(fraction >> 63n).toBe(1n);
    expect(fraction > floatToLex(2)).toBe(true);
  });

  it('classifies simple floats', () => {
    expect(isSimple(0)).toBe(true);
    expect(isSimple(12)).toBe(true);
    expect(isSimple(1.5)).toBe(false);
    expect(isSimple(Number.POSITIVE_INFINITY)).toBe(false);
    expect(isSimple(Number.NaN)).toBe(false);
  });

  it('decodes what it encodes for non-negative floats', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0, noNaN: true }).filter((f) => !Object.is(f, -0)),
        (f) => {
          expect(lexToFloat(floatToLex(f))).toBe(f);
        }
      )
    );
  });

  it('keeps larger integers after smaller ones', () => {
    fc.assert(
      fc.property(fc.nat(1_000_000), fc.nat(1_000_000), (a, b) => {
        fc.pre(a < b);
        expect(floatToLex(a) < floatToLex(b)).toBe(true);
      })
    );
  });
});

describe('float bits', () => {
  it('collapses every NaN onto one pattern', () => {
    expect(floatToInt(Number.NaN)).toBe(CANONICAL_NAN_BITS);
    expect(Number.isNaN(intToFloat(CANONICAL_NAN_BITS))).toBe(true);
  });

  it('reads the sign bit, including on zero', () => {
    expect(isNegative(-0)).toBe(true);
    expect(isNegative(0)).toBe(false);
    expect(isNegative(-2.5)).toBe(true);
    expect(floatToInt(1)).toBe(0x3ff0000000000000n);
  });

  it('steps to neighbouring doubles', () => {
    expect(nextUp(0)).toBe(Number.MIN_VALUE);
    expect(nextUp(1)).toBe(1 + Number.EPSILON);
    expect(nextDown(1 + Number.EPSILON)).toBe(1);
    expect(nextUp(Number.POSITIVE_INFINITY)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe('float constraints', () => {
  const unit = { ...DEFAULT_FLOAT_CONSTRAINTS, min: 0, max: 1, allowNan: false };

  it('treats -0.0 as outside [0, x]', () => {
    expect(floatPermitted(0, unit)).toBe(true);
    expect(floatPermitted(-0, unit)).toBe(false);
    expect(floatPermitted(Number.NaN, unit)).toBe(false);
    expect(floatPermitted(Number.NaN, DEFAULT_FLOAT_CONSTRAINTS)).toBe(true);
  });

  it('picks zero when allowed and the nearest bound otherwise', () => {
    expect(simplestFloat(unit)).toBe(0);
    expect(simplestFloat({ ...unit, min: 2, max: 3 })).toBe(2);
    expect(simplestFloat({ ...unit, min: -3, max: -2 })).toBe(-2);
  });

  it('leaves permitted values alone and maps NaN to the simplest', () => {
    expect(clampFloat(0.25, unit)).toBe(0.25);
    expect(clampFloat(Number.NaN, unit)).toBe(0);
    expect(floatPermitted(clampFloat(7, unit), unit)).toBe(true);
  });

  it('lists nasty floats simplest first, then their negations', () => {
    expect(NASTY_FLOATS[0]).toBe(0);
    expect(NASTY_FLOATS).toHaveLength(38);
    expect(Object.is(NASTY_FLOATS[19], -0)).toBe(true);
  });
});
