/**
 * An immutable set of code points as sorted, disjoint, inclusive intervals.
 *
 * Index order is code point order; shrink order rotates it so that '0'
 * (or the first member above it) is index 0, which makes shrunk strings
 * read as digits and letters rather than control characters.
 */
export class IntervalSet {
  readonly intervals: readonly (readonly [number, number])[];
  readonly size: number;
  readonly #offsets: readonly number[];
  readonly #zeroIndex: number;

  constructor(intervals: Iterable<readonly [number, number]>) {
    const sorted = [...intervals]
      .map(([a, b]): [number, number] => [Math.min(a, b), Math.max(a, b)])
      .sort((x, y) => x[0] - y[0]);
    const merged: [number, number][] = [];
    for (const [lo, hi] of sorted) {
      const last = merged[merged.length - 1];
      if (last && lo <= last[1] + 1) {
        last[1] = Math.max(last[1], hi);
      } else {
        merged.push([lo, hi]);
      }
    }
    this.intervals = merged;
    const offsets: number[] = [];
    let total = 0;
    for (const [lo, hi] of merged) {
      offsets.push(total);
      total += hi - lo + 1;
    }
    this.#offsets = offsets;
    this.size = total;
    this.#zeroIndex = this.#firstIndexAtLeast('0'.codePointAt(0) ?? 48);
  }

  static fromString(chars: string): IntervalSet {
    return new IntervalSet(
      Array.from(chars, (ch): [number, number] => {
        const cp = ch.codePointAt(0) ?? 0;
        return [cp, cp];
      })
    );
  }

  /** All of Unicode except surrogates. */
  static readonly UNICODE = new IntervalSet([
    [0, 0xd7ff],
    [0xe000, 0x10ffff],
  ]);

  at(index: number): number {
    if (index < 0 || index >= this.size) {
      throw new RangeError(`Index ${index} out of range for ${this.size}`);
    }
    let lo = 0;
    let hi = this.intervals.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.#offsets[mid] ?? 0) <= index) lo = mid;
      else hi = mid - 1;
    }
    const [start] = this.intervals[lo] ?? [0, 0];
    return start + index - (this.#offsets[lo] ?? 0);
  }

  indexOf(codePoint: number): number | undefined {
    for (let i = 0; i < this.intervals.length; i++) {
      const [lo, hi] = this.intervals[i] ?? [0, -1];
      if (codePoint < lo) return undefined;
      if (codePoint <= hi) return (this.#offsets[i] ?? 0) + codePoint - lo;
    }
    return undefined;
  }

  has(codePoint: number): boolean {
    return this.indexOf(codePoint) !== undefined;
  }

  charInShrinkOrder(i: number): number {
    return this.at((i + this.#zeroIndex) % this.size);
  }

  indexFromCharInShrinkOrder(codePoint: number): number | undefined {
    const index = this.indexOf(codePoint);
    if (index === undefined) return undefined;
    return (index - this.#zeroIndex + this.size) % this.size;
  }

  equals(other: IntervalSet): boolean {
    return (
      this.intervals.length === other.intervals.length &&
      this.intervals.every(
        ([lo, hi], i) =>
          other.intervals[i]?.[0] === lo && other.intervals[i]?.[1] === hi
      )
    );
  }

  #firstIndexAtLeast(codePoint: number): number {
    for (let i = 0; i < this.intervals.length; i++) {
      const [lo, hi] = this.intervals[i] ?? [0, -1];
      if (codePoint <= hi) {
        return (this.#offsets[i] ?? 0) + Math.max(0, codePoint - lo);
      }
    }
    return 0;
  }
}
