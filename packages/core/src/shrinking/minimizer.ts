/**
 * Lexicographic minimizer for fixed-size byte blocks.
 *
 * Given a block and a predicate it satisfies, finds a block of the same
 * size that is lexicographically no larger and still satisfies it, by
 * repeated local changes. At a fixpoint no single byte can be lowered
 * with the others held fixed.
 */

import { floatToLex, isSimple, lexToFloat } from '../codec/floats.js';
import {
  bitLength,
  bytesToHex,
  compareLex,
  intFromBytes,
  intToBytes,
  isAllZero,
} from '../util/bytes.js';
import { binsearch, LocalShrinker, type LocalShrinkerOptions, type Predicate } from './common.js';

const FLOAT_CANDIDATES = [Number.NaN, Number.POSITIVE_INFINITY, Number.MAX_VALUE];

export class Minimizer extends LocalShrinker<Uint8Array> {
  readonly size: number;

  constructor(initial: Uint8Array, predicate: Predicate<Uint8Array>, options: LocalShrinkerOptions) {
    super(Uint8Array.from(initial), predicate, { ...options, full: options.full ?? true });
    this.size = initial.length;
  }

  static shrink(
    initial: Uint8Array,
    predicate: Predicate<Uint8Array>,
    options: LocalShrinkerOptions
  ): Uint8Array {
    const minimizer = new Minimizer(initial, predicate, options);
    minimizer.run();
    return minimizer.current;
  }

  get currentInt(): bigint {
    return intFromBytes(this.current);
  }

  protected key(value: Uint8Array): string {
    return bytesToHex(value);
  }

  protected leftIsBetter(left: Uint8Array, right: Uint8Array): boolean {
    return left.length === right.length && compareLex(left, right) < 0;
  }

  protected shortCircuit(): boolean {
    if (isAllZero(this.current)) return true;
    if (this.size === 1) {
      this.minimizeAsInteger();
      return true;
    }
    // The two smallest blocks of this size.
    if (this.incorporate(new Uint8Array(this.size))) return true;
    const one = new Uint8Array(this.size);
    one[this.size - 1] = 1;
    if (this.incorporate(one)) return true;

    let canZero = 0;
    while (this.current[canZero] === 0) canZero++;
    let base = this.current;
    binsearch(canZero, this.size, (mid) => {
      const attempt = Uint8Array.from(base);
      attempt.fill(0, 0, mid);
      return this.incorporate(attempt);
    });

    base = this.current;
    binsearch(0, this.size, (mid) => {
      if (mid === 0) return true;
      if (mid === this.size) return false;
      const attempt = new Uint8Array(this.size);
      attempt.set(base.subarray(0, this.size - mid), mid);
      return this.incorporate(attempt);
    });
    return false;
  }

  protected runStep(): void {
    this.sort();
    this.floatHack();
    this.shift();
    this.shrinkIndices();
    this.rotateSuffixes();
    this.minimizeAsInteger();
    this.partialSort();
  }

  private incorporateInt(value: bigint): boolean {
    return this.incorporate(intToBytes(value, this.size));
  }

  private incorporateFloat(f: number): boolean {
    return this.incorporateInt(floatToLex(f));
  }

  private sort(): boolean {
    return this.incorporate(Uint8Array.from(this.current).sort());
  }

  /**
   * An 8-byte block with the tag bit set may be a float in the lexical
   * encoding. Small float edits (to an integer, to a standard large
   * value, down by one) are large lexical jumps, so try them directly.
   */
  private floatHack(): void {
    if (this.size !== 8) return;
    if (((this.current[0] ?? 0) >> 7) === 0) return;

    let i = this.currentInt;
    let f = lexToFloat(i);
    if (isSimple(f)) {
      this.incorporateFloat(f);
      return;
    }

    for (const g of FLOAT_CANDIDATES) {
      const j = floatToLex(g);
      if (j < i && this.incorporateInt(j)) {
        f = g;
        i = j;
      }
    }
    if (!Number.isFinite(f)) return;

    for (const g of [Math.floor(f), Math.ceil(f)]) {
      if (this.incorporateFloatIfSmaller(g)) return;
    }
    if (f > 2) this.incorporateFloatIfSmaller(f - 1);
  }

  private incorporateFloatIfSmaller(f: number): boolean {
    const candidate = intToBytes(floatToLex(f), this.size);
    return compareLex(candidate, this.current) < 0 && this.incorporate(candidate);
  }

  /** Shift individual bytes right as far as they will go. */
  private shift(): void {
    let prev = -1;
    while (prev !== this.changes) {
      prev = this.changes;
      for (let i = 0; i < this.size; i++) {
        const block = Uint8Array.from(this.current);
        const c = block[i] ?? 0;
        for (let k = bitLength(BigInt(c)); k > 0; k--) {
          block[i] = c >> k;
          if (this.incorporate(Uint8Array.from(block))) break;
        }
      }
    }
  }

  private shrinkIndices(): void {
    for (let i = 0; i < this.size; i++) {
      const snapshot = this.current;
      minimizeInt(snapshot[i] ?? 0, (c) => {
        if (this.current[i] === c) return true;
        const attempt = Uint8Array.from(snapshot);
        attempt[i] = c;
        return this.incorporate(attempt);
      });
    }
  }

  private rotateSuffixes(): void {
    let significant = 0;
    while (significant < this.size && this.current[significant] === 0) significant++;
    if (significant === this.size) return;

    for (let i = 1; i < this.size - significant; i++) {
      const cur = this.current;
      const rotated = new Uint8Array(this.size);
      const right = cur.subarray(significant + i);
      rotated.set(right, significant);
      rotated.set(cur.subarray(significant, significant + i), significant + right.length);
      if (compareLex(rotated, cur) < 0) this.incorporate(rotated);
    }
  }

  private minimizeAsInteger(): void {
    minimizeBigInt(this.currentInt, (c) => c === this.currentInt || this.incorporateInt(c));
  }

  /** Adjacent swaps towards sorted order, keeping what cannot move. */
  private partialSort(): boolean {
    let sorted = false;
    let ps = Array.from(this.current);
    for (let i = 0; i < this.size - 1; i++) {
      let j = i + 1;
      while (j > 0 && (ps[j - 1] ?? 0) > (ps[j] ?? 0)) {
        const prev = [...ps];
        const left = ps[j - 1] ?? 0;
        ps[j - 1] = ps[j] ?? 0;
        ps[j] = left;
        if (this.incorporate(Uint8Array.from(ps))) {
          sorted = true;
        } else {
          ps = prev;
        }
        j--;
      }
    }
    return sorted;
  }
}

/**
 * Smallest value `f` accepts, starting from `c`, betting on a monotone
 * lower bound above which everything passes.
 */
export function minimizeInt(c: number, f: (value: number) => boolean): number {
  return Number(minimizeBigInt(BigInt(c), (value) => f(Number(value))));
}

export function minimizeBigInt(c: bigint, f: (value: bigint) => boolean): bigint {
  if (c === 0n) return 0n;
  if (f(0n)) return 0n;
  if (c === 1n || f(1n)) return 1n;
  if (c === 2n) return 2n;
  let hi: bigint;
  if (f(c - 1n)) {
    hi = c - 1n;
  } else if (f(c - 2n)) {
    hi = c - 2n;
  } else {
    return c;
  }
  let lo = 1n;
  while (lo + 1n < hi) {
    const mid = (lo + hi) / 2n;
    if (f(mid)) {
      hi = mid;
    } else {
      lo = mid;
    }
  }
  return hi;
}
