import { describe, it, expect } from 'vitest';

import { Status } from '../../data/status.js';
import { ConjectureRunner, type Executor } from '../../engine/runner.js';
import { resolveSettings } from '../../types/options.js';
import { learnShrinkDfa } from '../shrink-dfas.js';

const origin = { kind: 'test', location: 'starts-with-seven' };

const startsWithSeven: Executor = (data) => {
  const first = data.drawBits(8);
  data.drawBits(8);
  if (first === 7n) data.markInteresting(origin);
};

function setup(): ConjectureRunner {
  return new ConjectureRunner(
    startsWithSeven,
    resolveSettings({ seed: 0, deadlinePerExampleMs: null }),
    { now: () => 0 }
  );
}

describe('learnShrinkDfa', () => {
  it('learns which replacements keep the failure', () => {
    const runner = setup();
    const target = runner.cachedTestFunction(Uint8Array.of(7, 3));
    expect(target.status).toBe(Status.INTERESTING);

    const dfa = learnShrinkDfa({ runner, origin, target, start: 0, end: 1, examples: [] });
    expect(dfa.matches(Uint8Array.of(7))).toBe(true);
    expect(dfa.matches(Uint8Array.of(7, 0))).toBe(true);
    expect(dfa.matches(Uint8Array.of(0))).toBe(false);
    expect(dfa.matches(new Uint8Array(0))).toBe(false);
  });

  it('returns the interned automaton', () => {
    const runner = setup();
    const target = runner.cachedTestFunction(Uint8Array.of(7, 3));
    const options = { runner, origin, target, start: 0, end: 1, examples: [] };
    expect(learnShrinkDfa(options)).toBe(learnShrinkDfa(options));
  });
});
