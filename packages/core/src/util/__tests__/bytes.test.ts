import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import {
  bitLength,
  bytesToHex,
  compareLex,
  compareTapes,
  concatBytes,
  hexToBytes,
  intFromBytes,
  intToBytes,
  replaceRange,
  startsWith,
} from '../bytes.js';

const tape = (...bytes: number[]): Uint8Array => Uint8Array.from(bytes);

describe('compareTapes', () => {
  it('orders shorter tapes first regardless of content', () => {
    expect(compareTapes(tape(255), tape(0, 0))).toBeLessThan(0);
    expect(compareTapes(tape(0, 0), tape(255))).toBeGreaterThan(0);
  });

  it('compares equal-length tapes bytewise', () => {
    expect(compareTapes(tape(1, 2), tape(1, 3))).toBeLessThan(0);
    expect(compareTapes(tape(1, 2), tape(1, 2))).toBe(0);
  });

  it('is a total order consistent with sorting', () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 6 }), fc.uint8Array({ maxLength: 6 }), (a, b) => {
        const ab = Math.sign(compareTapes(a, b));
        const ba = Math.sign(compareTapes(b, a));
        expect(ab).toBe(-ba);
      })
    );
  });
});

describe('compareLex', () => {
  it('ignores length until a common prefix is exhausted', () => {
    expect(compareLex(tape(0, 9), tape(1))).toBeLessThan(0);
    expect(compareLex(tape(1), tape(1, 0))).toBeLessThan(0);
  });
});

describe('integer conversions', () => {
  it('decodes big-endian', () => {
    expect(intFromBytes(tape(1, 0))).toBe(256n);
    expect(intFromBytes(tape())).toBe(0n);
  });

  it('encodes into a fixed width, dropping high bytes', () => {
    expect(intToBytes(258n, 2)).toEqual(tape(1, 2));
    expect(intToBytes(258n, 1)).toEqual(tape(2));
    expect(intToBytes(1n, 3)).toEqual(tape(0, 0, 1));
  });

  it('round-trips values that fit', () => {
    fc.assert(
      fc.property(fc.bigUintN(64), (v) => {
        expect(intFromBytes(intToBytes(v, 8))).toBe(v);
      })
    );
  });

  it('computes bit lengths', () => {
    expect(bitLength(0n)).toBe(0);
    expect(bitLength(1n)).toBe(1);
    expect(bitLength(255n)).toBe(8);
    expect(bitLength(256n)).toBe(9);
  });
});

describe('hex helpers', () => {
  it('formats and parses', () => {
    expect(bytesToHex(tape(0, 171, 16))).toBe('00ab10');
    expect(hexToBytes('00AB10')).toEqual(tape(0, 171, 16));
  });

  it('rejects odd lengths and non-hex characters', () => {
    expect(hexToBytes('abc')).toBeUndefined();
    expect(hexToBytes('zz')).toBeUndefined();
  });
});

describe('tape editing', () => {
  it('concatenates and replaces ranges', () => {
    expect(concatBytes(tape(1), tape(), tape(2, 3))).toEqual(tape(1, 2, 3));
    expect(replaceRange(tape(1, 2, 3, 4), 1, 3, tape(9))).toEqual(tape(1, 9, 4));
  });

  it('detects prefixes', () => {
    expect(startsWith(tape(1, 2, 3), tape(1, 2))).toBe(true);
    expect(startsWith(tape(1), tape(1, 2))).toBe(false);
  });
});
