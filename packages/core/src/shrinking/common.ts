import type { Random } from '../util/rng.js';

export type Predicate<T> = (value: T) => boolean;

export interface LocalShrinkerOptions {
  random: Random;
  /** Run steps to a fixpoint rather than once. */
  full?: boolean;
}

/**
 * A single value and a predicate it must keep satisfying. Subclasses
 * define the order ("better") and the steps that propose candidates.
 */
export abstract class LocalShrinker<T> {
  current: T;
  changes = 0;
  readonly random: Random;
  readonly full: boolean;
  private readonly seen = new Set<string>();

  constructor(
    initial: T,
    private readonly predicate: Predicate<T>,
    options: LocalShrinkerOptions
  ) {
    this.current = initial;
    this.random = options.random;
    this.full = options.full ?? false;
  }

  run(): void {
    if (this.shortCircuit()) return;
    if (this.full) {
      let prev = -1;
      while (this.changes !== prev) {
        prev = this.changes;
        this.runStep();
      }
    } else {
      this.runStep();
    }
  }

  /** Adopt `value` if it is strictly better, unseen and satisfies the predicate. */
  incorporate(value: T): boolean {
    this.checkInvariants(value);
    if (!this.leftIsBetter(value, this.current)) return false;
    const key = this.key(value);
    if (this.seen.has(key)) return false;
    this.seen.add(key);
    if (!this.predicate(value)) return false;
    this.changes++;
    this.current = value;
    return true;
  }

  /** True when `value` is the current value afterwards. */
  consider(value: T): boolean {
    if (this.key(value) === this.key(this.current)) return true;
    return this.incorporate(value);
  }

  protected checkInvariants(_value: T): void {}

  protected abstract key(value: T): string;
  protected abstract leftIsBetter(left: T, right: T): boolean;
  protected abstract shortCircuit(): boolean;
  protected abstract runStep(): void;
}

/**
 * Largest n such that f(n) holds, assuming f(0) does and that f is
 * roughly monotone. Linear for 1..4, then exponential probing, then a
 * binary search.
 */
export function findInteger(f: (n: number) => boolean): number {
  for (let i = 1; i < 5; i++) {
    if (!f(i)) return i - 1;
  }
  let lo = 4;
  let hi = 5;
  while (f(hi)) {
    lo = hi;
    hi *= 2;
  }
  while (lo + 1 < hi) {
    const mid = Math.floor((lo + hi) / 2);
    if (f(mid)) {
      lo = mid;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Binary search for the point in [lo, hi] where f changes value. Used for
 * the side effects of calling f.
 */
export function binsearch(lo: number, hi: number, f: (n: number) => boolean): void {
  const loValue = f(lo);
  const hiValue = f(hi);
  if (loValue === hiValue) return;
  let low = lo;
  let high = hi;
  while (low + 1 < high) {
    const mid = Math.floor((low + high) / 2);
    if (f(mid) === loValue) {
      low = mid;
    } else {
      high = mid;
    }
  }
}
