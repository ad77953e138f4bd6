/**
 * L* automaton learning from a membership oracle.
 *
 * Follows Angluin's L* with the Rivest–Schapire counterexample analysis,
 * with three changes: states are learned lazily as strings are walked,
 * the mispredicted prefix is located with `findInteger` (mistakes tend to
 * be early), and bytes are collapsed into classes by an IntegerNormalizer
 * so that only distinctions the language makes are ever queried.
 *
 * Too slow for large inputs in the hot path; meant for tests and for
 * learning languages ahead of time.
 */

import { findInteger } from '../shrinking/common.js';
import { InvalidState } from '../types/errors.js';
import { bytesToHex, concatBytes } from '../util/bytes.js';
import { Dfa } from './dfa.js';

export type MembershipOracle = (s: Uint8Array) => boolean;

const EMPTY = new Uint8Array(0);

export class LStar {
  readonly experiments: Uint8Array[] = [];
  readonly normalizer = new IntegerNormalizer();
  dfa: LearnedDfa;

  readonly #rowsToCanonical = new Map<string, Uint8Array>();
  readonly #canonicalisation = new Map<string, Uint8Array>();
  readonly #members = new Map<string, boolean>();
  #generation = 0;

  constructor(private readonly oracle: MembershipOracle) {
    this.experiments.push(EMPTY);
    this.dfa = this.modelChanged();
  }

  /** Incremented every time the predicted automaton changes. */
  get generation(): number {
    return this.#generation;
  }

  member(s: Uint8Array): boolean {
    const key = bytesToHex(s);
    let result = this.#members.get(key);
    if (result === undefined) {
      result = this.oracle(s);
      this.#members.set(key, result);
    }
    return result;
  }

  /**
   * The chosen representative of the strings that behave like `s` under
   * every experiment. Stable until the model next changes.
   */
  canonicalise(s: Uint8Array): Uint8Array {
    const key = bytesToHex(s);
    const cached = this.#canonicalisation.get(key);
    if (cached) return cached;
    const row = this.experiments.map((e) => (this.member(concatBytes(s, e)) ? '1' : '0')).join('');
    let result = this.#rowsToCanonical.get(row);
    if (!result) {
      result = s;
      this.#rowsToCanonical.set(row, s);
    }
    this.#canonicalisation.set(key, result);
    return result;
  }

  /**
   * Update the model until it classifies `s` correctly. A later call may
   * undo this, but repeatedly learning a fixed set of strings until the
   * generation stops changing terminates.
   */
  learn(s: Uint8Array): void {
    const correct = this.member(s);
    if (this.dfa.matches(s) === correct) return;

    for (;;) {
      const dfa = this.dfa;
      const states = [dfa.start];
      // After reading n bytes, swapping them for our state's label keeps the answer.
      const seemsRight = (n: number): boolean => {
        if (n > s.length) return false;
        while (n >= states.length) {
          const prev = states[states.length - 1] ?? dfa.start;
          states.push(dfa.transition(prev, s[states.length - 1] ?? 0));
        }
        const state = states[n] ?? dfa.start;
        return this.member(concatBytes(dfa.label(state), s.subarray(n))) === correct;
      };

      const n = findInteger(seemsRight);
      if (n === s.length) break;

      const prefix = s.subarray(0, n);
      const suffix = s.subarray(n + 1);
      const distinguished = this.normalizer.distinguish(s[n] ?? 0, (x) =>
        this.member(concatBytes(prefix, Uint8Array.of(x), suffix))
      );
      if (distinguished) {
        this.dfa = this.modelChanged();
        continue;
      }
      this.experiments.push(Uint8Array.from(suffix));
      this.dfa = this.modelChanged();
    }
  }

  private modelChanged(): LearnedDfa {
    this.#generation++;
    this.#rowsToCanonical.clear();
    this.#canonicalisation.clear();
    return new LearnedDfa(this);
  }
}

/**
 * The automaton an LStar currently predicts. States are labelled by a
 * string that reaches them and discovered on demand. Any use after the
 * model has moved on throws InvalidState; canonicalise() first to keep it.
 */
export class LearnedDfa extends Dfa {
  readonly #lstar: LStar;
  readonly #generation: number;
  readonly #states: Uint8Array[];
  readonly #stateIndex = new Map<string, number>();
  readonly #transitions = new Map<string, number>();

  constructor(lstar: LStar) {
    super();
    this.#lstar = lstar;
    this.#generation = lstar.generation;
    const root = lstar.canonicalise(EMPTY);
    this.#states = [root];
    this.#stateIndex.set(bytesToHex(root), 0);
  }

  get start(): number {
    this.checkCurrent();
    return 0;
  }

  label(i: number): Uint8Array {
    return this.#states[i] ?? EMPTY;
  }

  isAccepting(i: number): boolean {
    this.checkCurrent();
    const label = this.#states[i];
    return label !== undefined && this.#lstar.member(label);
  }

  transition(i: number, c: number): number {
    this.checkCurrent();
    const normal = this.#lstar.normalizer.normalize(c);
    const key = `${i}:${normal}`;
    const cached = this.#transitions.get(key);
    if (cached !== undefined) return cached;

    const label = this.#lstar.canonicalise(concatBytes(this.label(i), Uint8Array.of(normal)));
    const labelKey = bytesToHex(label);
    let result = this.#stateIndex.get(labelKey);
    if (result === undefined) {
      result = this.#states.length;
      this.#states.push(label);
      this.#stateIndex.set(labelKey, result);
    }
    this.#transitions.set(key, result);
    return result;
  }

  private checkCurrent(): void {
    if (this.#generation !== this.#lstar.generation) {
      throw new InvalidState({
        message:
          'The L* model has changed since this DFA was built; canonicalise() a DFA to keep it',
        context: { generation: this.#generation, current: this.#lstar.generation },
      });
    }
  }
}

/**
 * Maps each byte to the smallest byte currently believed equivalent to
 * it. Starts with everything equivalent to 0 and splits classes only when
 * a test tells two members apart.
 */
export class IntegerNormalizer {
  readonly #values: number[] = [0];

  get canonicalValues(): readonly number[] {
    return this.#values;
  }

  normalize(value: number): number {
    let lo = 0;
    let hi = this.#values.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if ((this.#values[mid] ?? 0) <= value) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return this.#values[lo - 1] ?? 0;
  }

  /**
   * Split `value` from its class when `test` answers differently for it
   * and its canonical value. True when the classes changed.
   */
  distinguish(value: number, test: (x: number) => boolean): boolean {
    const canonical = this.normalize(value);
    if (canonical === value) return false;
    const valueTest = test(value);
    if (test(canonical) === valueTest) return false;

    const lowered = findInteger((k) => {
      const candidate = value - k;
      if (candidate <= canonical) return false;
      return test(candidate) === valueTest;
    });
    const split = value - lowered;
    const at = this.#values.findIndex((v) => v > split);
    this.#values.splice(at === -1 ? this.#values.length : at, 0, split);
    return true;
  }
}
