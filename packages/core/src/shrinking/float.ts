import { floatToInt, floatToLex, isNegative } from '../codec/floats.js';
import { LocalShrinker, type LocalShrinkerOptions, type Predicate } from './common.js';
import { IntegerShrinker } from './integer.js';

/** Past this, every float is an integer and integral shrinking stops helping. */
const MAX_PRECISE_INTEGER = 2 ** 53;

/**
 * Shrinks a float towards simpler values: the lexical encoding of its
 * magnitude first, then positive before negative.
 */
export class FloatShrinker extends LocalShrinker<number> {
  static shrink(initial: number, predicate: Predicate<number>, options: LocalShrinkerOptions): number {
    const shrinker = new FloatShrinker(initial, predicate, options);
    shrinker.run();
    return shrinker.current;
  }

  protected key(value: number): string {
    return floatToInt(value).toString(16);
  }

  protected leftIsBetter(left: number, right: number): boolean {
    const l = floatToLex(Math.abs(left));
    const r = floatToLex(Math.abs(right));
    if (l !== r) return l < r;
    return !isNegative(left) && isNegative(right);
  }

  protected shortCircuit(): boolean {
    for (const g of [Number.MAX_VALUE, Number.POSITIVE_INFINITY, Number.NaN]) {
      this.consider(g);
    }
    if (!Number.isFinite(this.current)) return true;
    return Math.abs(this.current) >= MAX_PRECISE_INTEGER;
  }

  protected runStep(): void {
    if (!Number.isFinite(this.current)) return;
    this.consider(Math.abs(this.current));
    for (const g of [Math.floor(this.current), Math.ceil(this.current), Math.trunc(this.current)]) {
      this.consider(g);
    }

    if (Number.isInteger(this.current)) {
      const sign = isNegative(this.current) ? -1 : 1;
      IntegerShrinker.shrink(
        BigInt(Math.abs(this.current)),
        (n) => this.consider(sign * Number(n)),
        { random: this.random }
      );
      return;
    }

    // Drop fractional precision a bit at a time.
    for (let p = 0; p < 10; p++) {
      const scale = 2 ** p;
      const scaled = this.current * scale;
      for (const truncate of [Math.floor, Math.ceil]) {
        this.consider(truncate(scaled) / scale);
      }
    }
  }
}
