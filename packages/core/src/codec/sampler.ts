import type { BitSource } from './bit-source.js';
import { biasedCoin, integerRange } from './primitives.js';
import { LABELS } from '../util/labels.js';

export interface AliasRow {
  base: number;
  alternate: number;
  alternateChance: number;
}

function popMin(sorted: number[]): number | undefined {
  return sorted.shift();
}

function pushSorted(sorted: number[], value: number): void {
  let i = 0;
  while (i < sorted.length && (sorted[i] ?? 0) < value) i++;
  sorted.splice(i, 0, value);
}

/**
 * Weighted choice of an index with Vose's alias method.
 *
 * Rows are sorted and each row stores base <= alternate, so both lowering
 * the row and preferring the base over the alternate shrink toward lower
 * indices.
 */
export class Sampler {
  readonly table: readonly AliasRow[];

  constructor(weights: readonly number[]) {
    const n = weights.length;
    if (n === 0) throw new RangeError('Sampler needs at least one weight');
    const total = weights.reduce((a, b) => a + b, 0);
    if (!(total > 0)) throw new RangeError('Sampler weights must sum to > 0');

    const scaled = weights.map((w) => (w / total) * n);
    const alternates: (number | undefined)[] = new Array(n).fill(undefined);
    const chances: (number | undefined)[] = new Array(n).fill(undefined);
    const small: number[] = [];
    const large: number[] = [];

    scaled.forEach((s, i) => {
      if (s === 1) chances[i] = 0;
      else if (s < 1) small.push(i);
      else large.push(i);
    });

    while (small.length > 0 && large.length > 0) {
      const lo = popMin(small);
      const hi = popMin(large);
      if (lo === undefined || hi === undefined) break;
      alternates[lo] = hi;
      chances[lo] = 1 - (scaled[lo] ?? 0);
      const remaining = (scaled[hi] ?? 0) + (scaled[lo] ?? 0) - 1;
      scaled[hi] = remaining;
      if (remaining < 1) pushSorted(small, hi);
      else if (remaining === 1) chances[hi] = 0;
      else pushSorted(large, hi);
    }
    for (const i of [...large, ...small]) chances[i] = 0;

    const rows: AliasRow[] = [];
    for (let i = 0; i < n; i++) {
      const alternate = alternates[i] ?? i;
      const chance = chances[i] ?? 0;
      rows.push(
        alternate < i
          ? { base: alternate, alternate: i, alternateChance: 1 - chance }
          : { base: i, alternate, alternateChance: chance }
      );
    }
    rows.sort(
      (a, b) =>
        a.base - b.base ||
        a.alternate - b.alternate ||
        a.alternateChance - b.alternateChance
    );
    this.table = rows;
  }

  sample(source: BitSource, forced?: number): number {
    let forcedRow: number | undefined;
    let forcedAlternate: boolean | undefined;
    if (forced !== undefined) {
      const row = this.table.findIndex(
        (r) =>
          (r.base === forced && r.alternateChance < 1) ||
          (r.alternate === forced && r.alternateChance > 0)
      );
      if (row < 0) throw new RangeError(`Cannot force sample ${forced}`);
      const entry = this.table[row];
      forcedRow = row;
      forcedAlternate =
        entry !== undefined &&
        !(entry.base === forced && entry.alternateChance < 1);
    }

    source.startSpan(LABELS.SAMPLER);
    try {
      const i = integerRange(source, 0, this.table.length - 1, 0, forcedRow);
      const row = this.table[i];
      if (row === undefined) throw new RangeError(`No sampler row ${i}`);
      const useAlternate = biasedCoin(
        source,
        row.alternateChance,
        forcedAlternate
      );
      return useAlternate ? row.alternate : row.base;
    } finally {
      source.stopSpan();
    }
  }
}
