import { findInteger, LocalShrinker, type LocalShrinkerOptions, type Predicate } from './common.js';

export interface LengthOptions<T> extends LocalShrinkerOptions {
  /** Defaults to element identity (value equality for primitives). */
  elementKey?: (value: T) => string;
}

/**
 * Deletes elements from a sequence. Each step starts at a random element
 * that is not yet known to be required and deletes as long a run from
 * there as the predicate allows. An element whose lone deletion fails is
 * required and is never tried again in that step, so a step is linear.
 */
export class Length<T> extends LocalShrinker<readonly T[]> {
  private readonly elementKey: (value: T) => string;
  private readonly identities = new Map<T, number>();

  constructor(initial: readonly T[], predicate: Predicate<readonly T[]>, options: LengthOptions<T>) {
    super(initial, predicate, options);
    this.elementKey = options.elementKey ?? ((value) => this.identityKey(value));
  }

  static shrink<T>(
    initial: readonly T[],
    predicate: Predicate<readonly T[]>,
    options: LengthOptions<T>
  ): readonly T[] {
    const shrinker = new Length(initial, predicate, options);
    shrinker.run();
    return shrinker.current;
  }

  private identityKey(value: T): string {
    let id = this.identities.get(value);
    if (id === undefined) {
      id = this.identities.size;
      this.identities.set(value, id);
    }
    return String(id);
  }

  protected key(value: readonly T[]): string {
    return value.map(this.elementKey).join('\u0000');
  }

  protected leftIsBetter(left: readonly T[], right: readonly T[]): boolean {
    return left.length < right.length;
  }

  protected shortCircuit(): boolean {
    return this.consider([]) || this.current.length <= 1;
  }

  protected runStep(): void {
    let required: boolean[] = this.current.map(() => false);
    for (;;) {
      const open: number[] = [];
      required.forEach((isRequired, i) => {
        if (!isRequired) open.push(i);
      });
      if (open.length === 0) return;

      const i = this.random.choice(open);
      const start = this.current;
      const deleted = findInteger(
        (k) =>
          i + k <= start.length &&
          this.consider([...start.slice(0, i), ...start.slice(i + k)])
      );
      if (deleted === 0) {
        required[i] = true;
      } else {
        required = [...required.slice(0, i), ...required.slice(i + deleted)];
      }
    }
  }
}
