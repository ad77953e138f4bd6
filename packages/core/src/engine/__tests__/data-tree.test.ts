import { describe, it, expect } from 'vitest';

import { ConjectureData, type ConjectureResult } from '../../data/conjecture-data.js';
import { StopTest } from '../../data/signals.js';
import { Status } from '../../data/status.js';
import { Random } from '../../util/rng.js';
import { DataTree } from '../data-tree.js';

function execute(
  buffer: readonly number[],
  body: (data: ConjectureData) => void
): ConjectureResult {
  const data = ConjectureData.forBuffer(Uint8Array.from(buffer));
  try {
    body(data);
    data.conclude(Status.VALID);
  } catch (error) {
    if (!(error instanceof StopTest)) throw error;
  }
  return data.asResult();
}

const twoBits = (data: ConjectureData): void => {
  data.drawBits(1);
  data.drawBits(1);
};

describe('DataTree', () => {
  it('is exhausted once every masked branch has been run', () => {
    const tree = new DataTree(100);
    for (const tape of [
      [0, 0],
      [0, 1],
      [1, 0],
    ]) {
      tree.add(execute(tape, twoBits));
      expect(tree.isExhausted).toBe(false);
    }
    tree.add(execute([1, 1], twoBits));
    expect(tree.isExhausted).toBe(true);
  });

  it('looks up stored results through masks and trailing bytes', () => {
    const tree = new DataTree(100);
    const stored = execute([0, 0], twoBits);
    tree.add(stored);
    expect(tree.lookup(Uint8Array.from([0, 0]))).toEqual({ kind: 'result', result: stored });
    expect(tree.lookup(Uint8Array.from([2, 0]))).toEqual({ kind: 'result', result: stored });
    expect(tree.lookup(Uint8Array.from([0, 0, 9]))).toEqual({ kind: 'result', result: stored });
  });

  it('knows a short buffer would overrun and a new branch is unknown', () => {
    const tree = new DataTree(100);
    expect(tree.lookup(Uint8Array.from([0]))).toEqual({ kind: 'unknown' });
    tree.add(execute([0, 0], twoBits));
    expect(tree.lookup(Uint8Array.from([0]))).toEqual({ kind: 'overrun' });
    expect(tree.lookup(Uint8Array.from([1, 0]))).toEqual({ kind: 'unknown' });
  });

  it('follows forced bytes whatever the buffer holds there', () => {
    const tree = new DataTree(100);
    const stored = execute([0, 0], (data) => {
      data.drawBits(8, 5n);
      data.drawBits(8);
    });
    tree.add(stored);
    expect(tree.lookup(Uint8Array.from([9, 0]))).toEqual({ kind: 'result', result: stored });
  });

  it('does not store overrun results', () => {
    const tree = new DataTree(100);
    const overrun = execute([1], twoBits);
    expect(overrun.status).toBe(Status.OVERRUN);
    tree.add(overrun);
    expect(tree.lookup(Uint8Array.from([1]))).toEqual({ kind: 'overrun' });
  });

  it('generates prefixes that step off the known tree', () => {
    const tree = new DataTree(100);
    tree.add(execute([0, 0], twoBits));
    const random = new Random(7);
    for (let i = 0; i < 20; i++) {
      const prefix = tree.generateNovelPrefix(random);
      expect(tree.lookup(prefix)).toEqual({ kind: 'unknown' });
    }
  });

  it('treats nodes at the cap as dead', () => {
    const tree = new DataTree(0);
    tree.add(execute([3], (data) => void data.drawBits(8)));
    expect(tree.isExhausted).toBe(true);
    expect(tree.size).toBe(2);
  });
});
