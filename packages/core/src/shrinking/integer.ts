import { bitLength } from '../util/bytes.js';
import { findInteger, LocalShrinker, type LocalShrinkerOptions, type Predicate } from './common.js';

/** Shrinks a non-negative bigint towards zero. */
export class IntegerShrinker extends LocalShrinker<bigint> {
  static shrink(
    initial: bigint,
    predicate: Predicate<bigint>,
    options: LocalShrinkerOptions
  ): bigint {
    const shrinker = new IntegerShrinker(initial, predicate, options);
    shrinker.run();
    return shrinker.current;
  }

  get size(): number {
    return bitLength(this.current);
  }

  protected key(value: bigint): string {
    return value.toString(16);
  }

  protected leftIsBetter(left: bigint, right: bigint): boolean {
    return left < right;
  }

  protected override checkInvariants(value: bigint): void {
    if (value < 0n) {
      throw new RangeError(`IntegerShrinker works on non-negative values, got ${value}`);
    }
  }

  protected shortCircuit(): boolean {
    for (const small of [0n, 1n]) {
      if (this.consider(small)) return true;
    }
    this.maskHighBits();
    if (this.size > 8) {
      // Try squeezing the value into a single byte.
      this.consider(this.current >> BigInt(this.size - 8));
      this.consider(this.current & 0xffn);
    }
    return this.current === 2n;
  }

  protected runStep(): void {
    this.shiftRight();
    this.shrinkByMultiples(2n);
    this.shrinkByMultiples(1n);
  }

  private shiftRight(): void {
    const base = this.current;
    findInteger((k) => k <= this.size && this.consider(base >> BigInt(k)));
  }

  private maskHighBits(): void {
    const base = this.current;
    const n = bitLength(base);
    findInteger((k) => {
      if (k >= n) return false;
      const mask = (1n << BigInt(n - k)) - 1n;
      return this.consider(mask & base);
    });
  }

  private shrinkByMultiples(k: bigint): void {
    const base = this.current;
    findInteger((n) => {
      const attempt = base - BigInt(n) * k;
      return attempt >= 0n && this.consider(attempt);
    });
  }
}
