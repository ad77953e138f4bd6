/**
 * Deterministic finite automata over bytes.
 *
 * States are integer indices. `Dfa` is abstract so that states can be
 * discovered lazily (the L* learner does this); every derived query is
 * memoised per instance in explicit maps keyed by state and arguments.
 * `ConcreteDfa` is the arena form: byte-range transitions per state, with
 * `DEAD` standing in for every missing transition.
 */

export const DEAD = -1;

export const ALPHABET: readonly number[] = Array.from({ length: 256 }, (_, c) => c);

/** An inclusive byte range [lo, hi] leading to `target`. */
export type TransitionRange = readonly [lo: number, hi: number, target: number];

export abstract class Dfa {
  readonly #maxLength = new Map<number, number>();
  readonly #counts = new Map<string, bigint>();
  readonly #reachable = new Map<number, ReadonlySet<number>>();
  readonly #dead = new Map<number, boolean>();

  abstract get start(): number;
  abstract isAccepting(i: number): boolean;
  abstract transition(i: number, c: number): number;

  get alphabet(): readonly number[] {
    return ALPHABET;
  }

  /** (byte, state) pairs out of `i` that can still reach an accepting state. */
  transitions(i: number): Array<[number, number]> {
    const out: Array<[number, number]> = [];
    for (const c of this.alphabet) {
      const j = this.transition(i, c);
      if (!this.isDead(j)) out.push([c, j]);
    }
    return out;
  }

  matches(s: Uint8Array): boolean {
    let i = this.start;
    for (const c of s) i = this.transition(i, c);
    return this.isAccepting(i);
  }

  /** Every [u, v) such that `s[u:v]` matches. */
  allMatchingRegions(s: Uint8Array): Array<[number, number]> {
    const indices = Array.from({ length: s.length }, (_, i) => i);
    const stack: Array<[number, number, number[]]> = [[0, this.start, indices]];
    const results: Array<[number, number]> = [];
    for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
      const [k, state, starts] = top;
      if (this.isDead(state)) continue;
      if (this.isAccepting(state)) {
        for (const i of starts) results.push([i, i + k]);
      }
      const nextByState = new Map<number, number[]>();
      for (const i of starts) {
        const c = s[i + k];
        if (c === undefined) continue;
        const next = this.transition(state, c);
        const list = nextByState.get(next);
        if (list) {
          list.push(i);
        } else {
          nextByState.set(next, [i]);
        }
      }
      for (const [next, nextStarts] of nextByState) stack.push([k + 1, next, nextStarts]);
    }
    return results;
  }

  /** Longest accepted string from `i`; Infinity when a cycle is reachable. */
  maxLength(i: number): number {
    const cached = this.#maxLength.get(i);
    if (cached !== undefined) return cached;
    let result: number;
    if (this.isDead(i)) {
      result = 0;
    } else if (this.reachable(i).has(i)) {
      result = Number.POSITIVE_INFINITY;
    } else {
      const next = this.transitions(i).map(([, j]) => this.maxLength(j));
      result = next.length > 0 ? 1 + Math.max(...next) : 0;
    }
    this.#maxLength.set(i, result);
    return result;
  }

  /** Number of accepted strings of length `k` starting from `i`. */
  countStrings(i: number, k: number): bigint {
    const key = `${i}:${k}`;
    const cached = this.#counts.get(key);
    if (cached !== undefined) return cached;
    let result: bigint;
    if (k === 0) {
      result = this.isAccepting(i) ? 1n : 0n;
    } else if (k > this.maxLength(i)) {
      result = 0n;
    } else {
      result = 0n;
      for (const [, j] of this.transitions(i)) result += this.countStrings(j, k - 1);
    }
    this.#counts.set(key, result);
    return result;
  }

  /** States reachable from `i` by a non-empty string. */
  reachable(i: number): ReadonlySet<number> {
    const cached = this.#reachable.get(i);
    if (cached) return cached;
    const reached = new Set<number>();
    const queue = [i];
    for (let head = 0; head < queue.length; head++) {
      const j = queue[head] ?? i;
      for (const c of this.alphabet) {
        const k = this.transition(j, c);
        if (reached.has(k)) continue;
        reached.add(k);
        if (k !== i) queue.push(k);
      }
    }
    this.#reachable.set(i, reached);
    return reached;
  }

  /** No string is accepted from `i`. */
  isDead(i: number): boolean {
    const cached = this.#dead.get(i);
    if (cached !== undefined) return cached;
    let dead = !this.isAccepting(i);
    if (dead) {
      for (const j of this.reachable(i)) {
        if (this.isAccepting(j)) {
          dead = false;
          break;
        }
      }
    }
    this.#dead.set(i, dead);
    return dead;
  }

  /** Accepted strings of length `k` in ascending lexicographic order. */
  *allMatchingStringsOfLength(k: number): Generator<Uint8Array> {
    if (k === 0) {
      if (this.isAccepting(this.start)) yield new Uint8Array(0);
      return;
    }
    if (this.countStrings(this.start, k) === 0n) return;

    const path: number[] = [];
    const states: number[] = [this.start];
    for (;;) {
      while (path.length < k) {
        const state = states[states.length - 1] ?? DEAD;
        const step = this.transitions(state).find(
          ([, j]) => this.countStrings(j, k - path.length - 1) > 0n
        );
        if (!step) return;
        path.push(step[0]);
        states.push(step[1]);
      }
      yield Uint8Array.from(path);

      for (;;) {
        const last = path[path.length - 1];
        if (last === undefined) return;
        if (last === 255) {
          path.pop();
          states.pop();
          continue;
        }
        path[path.length - 1] = last + 1;
        const from = states[states.length - 2] ?? DEAD;
        const next = this.transition(from, last + 1);
        states[states.length - 1] = next;
        if (this.countStrings(next, k - path.length) > 0n) break;
      }
    }
  }

  /** Every accepted string, in shortlex order. */
  *allMatchingStrings(minLength = 0): Generator<Uint8Array> {
    const max = this.maxLength(this.start);
    for (let length = minLength; length <= max; length++) {
      yield* this.allMatchingStringsOfLength(length);
    }
  }

  /**
   * Relabel states in breadth-first order from the start, dropping dead
   * states. Two minimal automata for one language canonicalise to the
   * same structure.
   */
  canonicalise(): ConcreteDfa {
    const stateMap = new Map<number, number>();
    const order: number[] = [];
    const accepting = new Set<number>();
    const seen = new Set<number>([this.start]);
    const queue = [this.start];
    for (let head = 0; head < queue.length; head++) {
      const state = queue[head] ?? this.start;
      if (stateMap.has(state)) continue;
      const i = order.length;
      if (this.isAccepting(state)) accepting.add(i);
      order.push(state);
      stateMap.set(state, i);
      for (const [, j] of this.transitions(state)) {
        if (seen.has(j)) continue;
        seen.add(j);
        queue.push(j);
      }
    }
    const table = order.map((state) =>
      compressRanges(
        this.transitions(state).map(([c, j]): [number, number] => [c, stateMap.get(j) ?? DEAD])
      )
    );
    return new ConcreteDfa(table, accepting);
  }

  /** Same language as `other` (Hopcroft–Karp with union-find). */
  equivalent(other: Dfa): boolean {
    const parent = new Map<string, string>();
    const find = (key: string): string => {
      const trail = [key];
      for (;;) {
        const last = trail[trail.length - 1] ?? key;
        const up = parent.get(last);
        if (up === undefined || up === last) break;
        trail.push(up);
      }
      const root = trail[trail.length - 1] ?? key;
      for (const t of trail) parent.set(t, root);
      return root;
    };

    const alphabet = [...new Set([...this.alphabet, ...other.alphabet])].sort((a, b) => a - b);
    const queue: Array<[number, number]> = [[this.start, other.start]];
    for (let head = 0; head < queue.length; head++) {
      const pair = queue[head];
      if (!pair) break;
      const [mine, theirs] = pair;
      const left = find(`a${mine}`);
      const right = find(`b${theirs}`);
      if (left === right) continue;
      if (this.isAccepting(mine) !== other.isAccepting(theirs)) return false;
      parent.set(left, right);
      for (const c of alphabet) {
        queue.push([this.transition(mine, c), other.transition(theirs, c)]);
      }
    }
    return true;
  }
}

function compressRanges(pairs: ReadonlyArray<readonly [number, number]>): TransitionRange[] {
  const out: Array<[number, number, number]> = [];
  for (const [c, j] of pairs) {
    const last = out[out.length - 1];
    if (last && last[2] === j && last[1] + 1 === c) {
      last[1] = c;
    } else {
      out.push([c, c, j]);
    }
  }
  return out;
}

export class ConcreteDfa extends Dfa {
  readonly #start: number;
  readonly #accepting: ReadonlySet<number>;
  readonly #ranges: ReadonlyArray<readonly TransitionRange[]>;
  readonly #tables = new Map<number, Int32Array>();

  constructor(
    transitions: ReadonlyArray<readonly TransitionRange[]>,
    accepting: Iterable<number>,
    start = 0
  ) {
    super();
    this.#ranges = transitions.map((ranges) => [...ranges].sort((a, b) => a[0] - b[0]));
    this.#accepting = new Set(accepting);
    this.#start = start;
  }

  get start(): number {
    return this.#start;
  }

  get stateCount(): number {
    return this.#ranges.length;
  }

  isAccepting(i: number): boolean {
    return this.#accepting.has(i);
  }

  transition(i: number, c: number): number {
    if (i === DEAD) return DEAD;
    return this.table(i)[c] ?? DEAD;
  }

  ranges(i: number): readonly TransitionRange[] {
    return this.#ranges[i] ?? [];
  }

  /** Stable text form: equal keys mean identical structure. */
  structuralKey(): string {
    const accepting = [...this.#accepting].sort((a, b) => a - b).join(',');
    const states = this.#ranges
      .map((ranges) => ranges.map(([lo, hi, j]) => `${lo}-${hi}>${j}`).join(' '))
      .join('|');
    return `${this.#start};${accepting};${states}`;
  }

  private table(i: number): Int32Array {
    let table = this.#tables.get(i);
    if (!table) {
      table = new Int32Array(256).fill(DEAD);
      for (const [lo, hi, j] of this.#ranges[i] ?? []) table.fill(j, lo, hi + 1);
      this.#tables.set(i, table);
    }
    return table;
  }
}

const interned = new Map<string, ConcreteDfa>();

/**
 * Canonicalise `dfa` and return the shared instance for its structure,
 * so equal languages learned in different orders are one object.
 */
export function internDfa(dfa: Dfa): ConcreteDfa {
  const canonical = dfa.canonicalise();
  const key = canonical.structuralKey();
  const existing = interned.get(key);
  if (existing) return existing;
  interned.set(key, canonical);
  return canonical;
}
