import { describe, it, expect } from 'vitest';

import { ConjectureData, type ConjectureResult } from '../../data/conjecture-data.js';
import { Status } from '../../data/status.js';
import { Random } from '../../util/rng.js';
import { TargetSelector, popRandom } from '../target-selector.js';

function result(byte: number, status: Status): ConjectureResult {
  const data = ConjectureData.forBuffer(Uint8Array.from([byte]));
  data.drawBits(8);
  data.conclude(status);
  return data.asResult();
}

describe('popRandom', () => {
  it('removes exactly one element', () => {
    const values = [1, 2, 3, 4];
    const picked = popRandom(new Random(3), values);
    expect(values).toHaveLength(3);
    expect(values).not.toContain(picked);
    expect(popRandom(new Random(3), [])).toBeUndefined();
  });
});

describe('TargetSelector', () => {
  it('keeps only examples of the best status seen', () => {
    const selector = new TargetSelector(new Random(1));
    selector.add(result(1, Status.INVALID));
    expect(selector.size).toBe(1);
    selector.add(result(2, Status.VALID));
    expect(selector.size).toBe(1);
    selector.add(result(3, Status.INVALID));
    selector.add(result(4, Status.INTERESTING));
    expect(selector.size).toBe(1);
    expect(selector.select()?.buffer).toEqual(Uint8Array.from([2]));
  });

  it('hands out every fresh example before repeating one', () => {
    const selector = new TargetSelector(new Random(1));
    for (const byte of [1, 2, 3]) selector.add(result(byte, Status.VALID));
    const picked = [selector.select(), selector.select(), selector.select()].map(
      (r) => r?.buffer[0]
    );
    expect(picked.sort()).toEqual([1, 2, 3]);
    expect([1, 2, 3]).toContain(selector.select()?.buffer[0]);
  });

  it('stays within the pool size', () => {
    const selector = new TargetSelector(new Random(1), 2);
    for (const byte of [1, 2, 3, 4]) selector.add(result(byte, Status.VALID));
    expect(selector.size).toBe(2);
  });

  it('returns nothing from an empty pool', () => {
    expect(new TargetSelector(new Random(1)).select()).toBeUndefined();
  });
});
