import { findInteger, LocalShrinker, type LocalShrinkerOptions, type Predicate } from './common.js';

export type SortKey<T> = (value: T) => number | string;

function compareKeys(a: number | string, b: number | string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Moves a sequence towards sorted order under `sortKey` without changing
 * its elements: sorts growing regions, then regions with one fixed gap.
 */
export class Ordering<T> extends LocalShrinker<readonly T[]> {
  constructor(
    initial: readonly T[],
    predicate: Predicate<readonly T[]>,
    options: LocalShrinkerOptions & { sortKey: SortKey<T>; elementKey?: (value: T) => string }
  ) {
    super(initial, predicate, options);
    this.sortKey = options.sortKey;
    this.elementKey = options.elementKey ?? ((value) => String(options.sortKey(value)));
  }

  private readonly sortKey: SortKey<T>;
  private readonly elementKey: (value: T) => string;

  static shrink<T>(
    initial: readonly T[],
    predicate: Predicate<readonly T[]>,
    options: LocalShrinkerOptions & { sortKey: SortKey<T>; elementKey?: (value: T) => string }
  ): readonly T[] {
    const shrinker = new Ordering(initial, predicate, options);
    shrinker.run();
    return shrinker.current;
  }

  protected key(value: readonly T[]): string {
    return value.map(this.elementKey).join('\u0000');
  }

  protected leftIsBetter(left: readonly T[], right: readonly T[]): boolean {
    for (let i = 0; i < Math.min(left.length, right.length); i++) {
      const l = left[i];
      const r = right[i];
      if (l === undefined || r === undefined) break;
      const c = compareKeys(this.sortKey(l), this.sortKey(r));
      if (c !== 0) return c < 0;
    }
    return left.length < right.length;
  }

  protected shortCircuit(): boolean {
    return this.consider(this.sorted(this.current));
  }

  protected runStep(): void {
    this.sortRegions();
    this.sortRegionsWithGaps();
  }

  private sorted(values: readonly T[]): T[] {
    return [...values].sort((a, b) => compareKeys(this.sortKey(a), this.sortKey(b)));
  }

  private sortRegions(): void {
    let i = 0;
    while (i + 1 < this.current.length) {
      const start = i;
      const k = findInteger((n) => {
        const cur = this.current;
        return (
          start + n <= cur.length &&
          this.consider([
            ...cur.slice(0, start),
            ...this.sorted(cur.slice(start, start + n)),
            ...cur.slice(start + n),
          ])
        );
      });
      i += Math.max(k, 1);
    }
  }

  private sortRegionsWithGaps(): void {
    for (let i = 1; i < this.current.length - 1; i++) {
      const [prev, here, next] = [this.current[i - 1], this.current[i], this.current[i + 1]];
      if (prev === undefined || here === undefined || next === undefined) continue;
      const kp = this.sortKey(prev);
      const kh = this.sortKey(here);
      const kn = this.sortKey(next);
      if (kp <= kh && kh <= kn) continue;

      const canSort = (a: number, b: number): boolean => {
        const cur = this.current;
        if (a < 0 || b > cur.length) return false;
        const fixed = cur[i];
        if (fixed === undefined) return false;
        const split = i - a;
        const values = this.sorted([...cur.slice(a, i), ...cur.slice(i + 1, b)]);
        return this.consider([
          ...cur.slice(0, a),
          ...values.slice(0, split),
          fixed,
          ...values.slice(split),
          ...cur.slice(b),
        ]);
      };

      const left = i;
      let right = i + 1;
      right += findInteger((k) => canSort(left, right + k));
      findInteger((k) => canSort(left - k, right));
    }
  }
}
