import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { ConjectureData } from '../../data/conjecture-data.js';
import { LABELS } from '../../util/labels.js';
import { Many } from '../many.js';
import { biasedCoin, integerRange } from '../primitives.js';
import { Sampler } from '../sampler.js';

const tape = (...bytes: number[]): ConjectureData =>
  ConjectureData.forBuffer(Uint8Array.from(bytes));

describe('biasedCoin', () => {
  it('reads byte 0 as false and byte 255 as true for a fair coin', () => {
    expect(biasedCoin(tape(0), 0.5)).toBe(false);
    expect(biasedCoin(tape(0xff), 0.5)).toBe(true);
    expect(biasedCoin(tape(1), 0.5)).toBe(true);
  });

  it('writes a definite byte for certain outcomes', () => {
    const data = tape();
    const never = ConjectureData.forBuffer(new Uint8Array(1));
    expect(biasedCoin(never, 0)).toBe(false);
    expect(never.buffer).toEqual(Uint8Array.from([0]));
    expect(() => biasedCoin(data, 1)).toThrow();
  });

  it('writes the canonical byte for a forced outcome', () => {
    const data = ConjectureData.forBuffer(new Uint8Array(1));
    expect(biasedCoin(data, 0.3, true)).toBe(true);
    expect(data.buffer).toEqual(Uint8Array.from([1]));
  });

  it('wraps each coin in its own span', () => {
    const data = tape(0);
    biasedCoin(data, 0.5);
    expect(data.spans[1]?.label).toBe(LABELS.BIASED_COIN);
    expect(data.spans[2]?.label).toBe(LABELS.DRAW_BITS);
  });
});

describe('integerRange', () => {
  it('discards a probe that overshoots and reads the next one', () => {
    const data = tape(12, 3);
    expect(integerRange(data, 0, 10)).toBe(3);
    expect(data.spans[1]?.label).toBe(LABELS.INTEGER_RANGE);
    expect(data.spans[1]?.discarded).toBe(true);
    expect(data.spans[3]?.discarded).toBe(false);
    expect(data.hasDiscards).toBe(true);
  });

  it('still writes a byte when the range is a single value', () => {
    const data = tape(0);
    expect(integerRange(data, 7, 7)).toBe(7);
    expect(data.index).toBe(1);
  });

  it('shrinks toward an inner center from either side', () => {
    // above bit 0 then distance 2: below the center
    expect(integerRange(tape(0, 2), 0, 10, 5)).toBe(3);
    expect(integerRange(tape(1, 2), 0, 10, 5)).toBe(7);
    expect(integerRange(tape(0, 0), 0, 10, 5)).toBe(5);
  });

  it('rejects an empty range', () => {
    expect(() => integerRange(tape(0), 3, 2)).toThrow(RangeError);
  });

  it('replays a forced value from the bytes it wrote', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: -500, max: 500 }),
        fc.integer({ min: 0, max: 500 }),
        fc.integer({ min: 0, max: 1000 }),
        (lower, width, offset) => {
          const upper = lower + width;
          const value = lower + (offset % (width + 1));
          const forced = ConjectureData.forBuffer(new Uint8Array(64));
          expect(integerRange(forced, lower, upper, 0, value)).toBe(value);
          expect(integerRange(ConjectureData.forBuffer(forced.buffer), lower, upper, 0)).toBe(value);
        }
      )
    );
  });
});

describe('Sampler', () => {
  it('builds one row per weight with base below alternate', () => {
    const sampler = new Sampler([1, 2, 3, 4]);
    expect(sampler.table).toHaveLength(4);
    for (const row of sampler.table) {
      expect(row.base).toBeLessThanOrEqual(row.alternate);
    }
  });

  it('reads the row, then the alternate coin', () => {
    const uniform = new Sampler([1, 1]);
    expect(uniform.sample(tape(0, 0))).toBe(0);
    expect(uniform.sample(tape(1, 0))).toBe(1);
  });

  it('refuses weights it cannot sample from', () => {
    expect(() => new Sampler([])).toThrow(RangeError);
    expect(() => new Sampler([0, 0])).toThrow(RangeError);
  });
});

describe('Many', () => {
  it('draws exactly the fixed size without reading bytes', () => {
    const data = tape();
    const elements = new Many(data, { minSize: 3, maxSize: 3, averageSize: 3 });
    let drawn = 0;
    while (elements.more()) drawn++;
    expect(drawn).toBe(3);
    expect(data.index).toBe(0);
  });

  it('stops on a zero continue coin once the minimum is met', () => {
    const data = tape(0);
    const elements = new Many(data, { minSize: 0, maxSize: 10, averageSize: 2 });
    expect(elements.more()).toBe(false);
    expect(elements.count).toBe(0);
  });

  it('does not count rejected elements', () => {
    const data = tape(0);
    const elements = new Many(data, { minSize: 2, maxSize: 2, averageSize: 2 });
    expect(elements.more()).toBe(true);
    elements.reject();
    expect(elements.count).toBe(0);
    expect(() => elements.reject()).toThrow(RangeError);
  });
});
