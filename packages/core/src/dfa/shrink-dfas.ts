import type { ConjectureResult } from '../data/conjecture-data.js';
import { originsEqual, type InterestingOrigin } from '../data/origin.js';
import { Status } from '../data/status.js';
import { concatBytes } from '../util/bytes.js';
import { internDfa, type ConcreteDfa } from './dfa.js';
import { LStar } from './lstar.js';

export interface ShrinkDfaRunner {
  cachedTestFunction(buffer: Uint8Array): ConjectureResult;
}

export interface LearnShrinkDfaOptions {
  runner: ShrinkDfaRunner;
  origin: InterestingOrigin;
  /** Example whose region [start, end) is being generalised. */
  target: ConjectureResult;
  start: number;
  end: number;
  /** Known replacements (and non-replacements) to learn from. */
  examples: readonly Uint8Array[];
  /** Rounds over the examples before giving up on stabilising. */
  maxRounds?: number;
}

/**
 * Learn the language of byte strings that can replace
 * `target.buffer[start:end]` and still fail with `origin`. The result is
 * the interned canonical DFA, ready for the shrinker's DFA registry.
 */
export function learnShrinkDfa(options: LearnShrinkDfaOptions): ConcreteDfa {
  const { runner, origin, target, start, end } = options;
  const prefix = target.buffer.subarray(0, start);
  const suffix = target.buffer.subarray(end);
  const lstar = new LStar((s) => {
    const result = runner.cachedTestFunction(concatBytes(prefix, s, suffix));
    return result.status === Status.INTERESTING && originsEqual(result.interestingOrigin, origin);
  });

  const examples = [target.buffer.slice(start, end), ...options.examples];
  const maxRounds = options.maxRounds ?? 100;
  for (let round = 0; round < maxRounds; round++) {
    const before = lstar.generation;
    for (const example of examples) lstar.learn(example);
    if (lstar.generation === before) break;
  }
  return internDfa(lstar.dfa);
}
