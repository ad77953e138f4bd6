import { describe, it, expect } from 'vitest';

import type { ConjectureData } from '../../data/conjecture-data.js';
import {
  Flaky,
  MultipleFailures,
  PropertyFailed,
  Unsatisfiable,
} from '../../types/errors.js';
import { runTest } from '../check.js';
import { InMemoryExampleDatabase } from '../database.js';
import { ExitReason } from '../runner.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

const atMostNinetyNine = (data: ConjectureData): void => {
  const n = data.drawInteger({ min: 0, max: 1000 });
  if (n >= 100) throw new Error(`${n} is too big`);
};

const base = { seed: 0, deadlinePerExampleMs: null };

describe('runTest', () => {
  it('returns a summary when the property holds', () => {
    const summary = runTest((data) => void data.drawBits(32), { ...base, maxExamples: 25 });
    expect(summary.exitReason).toBe(ExitReason.MAX_EXAMPLES);
    expect(summary.validExamples).toBe(25);
    expect(summary.callCount).toBeGreaterThanOrEqual(25);
    expect(summary.statistics.validExamples).toBe(25);
  });

  it('throws the minimal failure as PropertyFailed', () => {
    const error = thrown(() => runTest(atMostNinetyNine, base));
    expect(error).toBeInstanceOf(PropertyFailed);
    if (!(error instanceof PropertyFailed)) return;
    expect(Array.from(error.buffer)).toEqual([0, 100]);
    expect(error.origin.kind).toBe('Error');
    expect(error.message).toMatch(/^Property failed with Error@.+: 100 is too big$/);
    expect(error.failure).toBeInstanceOf(Error);
  });

  it('reports the falsifying example unless quiet', () => {
    const lines: string[] = [];
    thrown(() => runTest(atMostNinetyNine, base, { reporter: (line) => lines.push(line) }));
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^Falsifying example \(Error@.+\): 0064$/);

    const quiet: string[] = [];
    thrown(() =>
      runTest(atMostNinetyNine, { ...base, verbosity: 'quiet' }, { reporter: (line) => quiet.push(line) })
    );
    expect(quiet).toEqual([]);
  });

  it('groups distinct failures into MultipleFailures', () => {
    const twoBugs = (data: ConjectureData): void => {
      if (data.drawBits(1) === 0n) throw new TypeError('zero');
      throw new RangeError('one');
    };
    const error = thrown(() => runTest(twoBugs, base));
    expect(error).toBeInstanceOf(MultipleFailures);
    if (!(error instanceof MultipleFailures)) return;
    expect(error.message).toBe('Found 2 distinct failures');
    expect(error.failures.map((f) => f.origin.kind)).toEqual(['TypeError', 'RangeError']);
    expect(error.failures.map((f) => Array.from(f.buffer))).toEqual([[0], [1]]);
  });

  it('stops at the first failure when multiple bugs are not reported', () => {
    const twoBugs = (data: ConjectureData): void => {
      if (data.drawBits(1) === 0n) throw new TypeError('zero');
      throw new RangeError('one');
    };
    const error = thrown(() => runTest(twoBugs, { ...base, reportMultipleBugs: false }));
    expect(error).toBeInstanceOf(PropertyFailed);
    if (error instanceof PropertyFailed) expect(error.origin.kind).toBe('TypeError');
  });

  it('throws Unsatisfiable when nothing valid was generated', () => {
    expect(thrown(() => runTest((data) => data.reject(), base))).toBeInstanceOf(Unsatisfiable);
  });

  it('throws Flaky when a failure stops reproducing', () => {
    let calls = 0;
    const once = (data: ConjectureData): void => {
      data.drawBits(8);
      calls++;
      if (calls === 1) throw new Error('only once');
    };
    expect(thrown(() => runTest(once, base))).toBeInstanceOf(Flaky);
  });

  it('replays a stored failure from the database', () => {
    const database = new InMemoryExampleDatabase();
    const settings = { ...base, databaseKey: 'bounded' };
    thrown(() => runTest(atMostNinetyNine, settings, { database }));
    const key = new TextEncoder().encode('bounded');
    expect(database.fetch(key)).toEqual([Uint8Array.from([0, 100])]);

    const replayed = thrown(() =>
      runTest(atMostNinetyNine, { ...settings, phases: ['reuse'] }, { database })
    );
    expect(replayed).toBeInstanceOf(PropertyFailed);
    if (replayed instanceof PropertyFailed) expect(Array.from(replayed.buffer)).toEqual([0, 100]);
  });

  it('drops stored examples that no longer fail', () => {
    const database = new InMemoryExampleDatabase();
    const settings = { ...base, databaseKey: 'bounded' };
    thrown(() => runTest(atMostNinetyNine, settings, { database }));

    const summary = runTest(
      (data) => void data.drawInteger({ min: 0, max: 1000 }),
      { ...settings, phases: ['reuse'] },
      { database }
    );
    expect(summary.exitReason).toBe(ExitReason.FINISHED);
    expect(database.fetch(new TextEncoder().encode('bounded'))).toEqual([]);
  });
});
