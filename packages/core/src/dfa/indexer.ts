import { InvalidArgument } from '../types/errors.js';
import type { Dfa } from './dfa.js';

/**
 * The language of a DFA as a random-access sequence in shortlex order.
 * Works for infinite languages too; only `length()` needs finiteness.
 */
export class DfaIndexer implements Iterable<Uint8Array> {
  #length: bigint | null | undefined;

  constructor(readonly dfa: Dfa) {}

  [Symbol.iterator](): Iterator<Uint8Array> {
    return this.dfa.allMatchingStrings();
  }

  /** Number of accepted strings, or null when there are infinitely many. */
  length(): bigint | null {
    if (this.#length === undefined) {
      const max = this.dfa.maxLength(this.dfa.start);
      if (!Number.isFinite(max)) {
        this.#length = null;
      } else {
        let total = 0n;
        for (let k = 0; k <= max; k++) total += this.dfa.countStrings(this.dfa.start, k);
        this.#length = total;
      }
    }
    return this.#length;
  }

  /** The string at `rank`, or undefined past the end of a finite language. */
  at(rank: bigint): Uint8Array | undefined {
    if (rank < 0n) {
      throw new InvalidArgument({
        message: `Negative rank ${rank} is not supported`,
        context: { argument: 'rank', value: rank.toString() },
      });
    }
    const { dfa } = this;
    const maxLength = dfa.maxLength(dfa.start);
    let remaining = rank;
    let length = 0;
    for (;;) {
      const n = dfa.countStrings(dfa.start, length);
      if (n > remaining) break;
      remaining -= n;
      length++;
      if (length > maxLength) return undefined;
    }

    const result: number[] = [];
    let state = dfa.start;
    while (result.length < length) {
      let moved = false;
      for (const [c, next] of dfa.transitions(state)) {
        const skip = dfa.countStrings(next, length - result.length - 1);
        if (remaining < skip) {
          result.push(c);
          state = next;
          moved = true;
          break;
        }
        remaining -= skip;
      }
      if (!moved) return undefined;
    }
    return Uint8Array.from(result);
  }

  /** Rank of `s`; the inverse of `at`. */
  indexOf(s: Uint8Array): bigint {
    const { dfa } = this;
    if (!dfa.matches(s)) {
      throw new InvalidArgument({
        message: 'String is not in the language',
        context: { argument: 's' },
      });
    }
    let result = 0n;
    for (let k = 0; k < s.length; k++) result += dfa.countStrings(dfa.start, k);
    let state = dfa.start;
    s.forEach((c, i) => {
      const remainder = s.length - i - 1;
      for (let d = 0; d < c; d++) {
        result += dfa.countStrings(dfa.transition(state, d), remainder);
      }
      state = dfa.transition(state, c);
    });
    return result;
  }
}
