import { describe, it, expect } from 'vitest';

import type { ConjectureData } from '../../data/conjecture-data.js';
import { Status } from '../../data/status.js';
import { HealthCheck } from '../health-check.js';
import { DeadlineExceeded, FailedHealthCheck } from '../../types/errors.js';
import { resolveSettings, type EngineSettings } from '../../types/options.js';
import { InMemoryExampleDatabase, subKey } from '../database.js';
import { ConjectureRunner, ExitReason, type Executor, type RunnerOptions } from '../runner.js';

function runner(
  executor: Executor,
  settings: EngineSettings = {},
  options: RunnerOptions = {}
): ConjectureRunner {
  return new ConjectureRunner(
    executor,
    resolveSettings({ seed: 0, deadlinePerExampleMs: null, ...settings }),
    { now: () => 0, ...options }
  );
}

const sumOfTen = (data: ConjectureData): void => {
  let sum = 0;
  for (let i = 0; i < 10; i++) sum += Number(data.drawBits(8));
  if (sum >= 2000) data.markInteresting({ kind: 'sum', location: 'sumOfTen' });
};

describe('ConjectureRunner', () => {
  it('shrinks a sum threshold to the shortlex-minimal tape', () => {
    const r = runner(sumOfTen, { maxShrinks: 10_000 });
    const start = r.cachedTestFunction(new Uint8Array(10).fill(255));
    expect(start.status).toBe(Status.INTERESTING);

    const shrunk = r.shrink(start, (result) => result.status === Status.INTERESTING);
    expect(Array.from(shrunk.buffer)).toEqual([0, 0, 215, 255, 255, 255, 255, 255, 255, 255]);
    expect(r.interestingExamples.get('sum@sumOfTen')?.buffer).toEqual(shrunk.buffer);
  });

  it('answers repeated buffers from the cache', () => {
    let calls = 0;
    const r = runner((data) => {
      calls++;
      data.drawBits(8);
    });
    const first = r.cachedTestFunction(Uint8Array.from([4]));
    const second = r.cachedTestFunction(Uint8Array.from([4]));
    expect(second).toBe(first);
    expect(calls).toBe(1);
    expect(r.callCount).toBe(1);
  });

  it('answers repeated choice sequences from the cache', () => {
    let calls = 0;
    const r = runner((data) => {
      calls++;
      data.drawBoolean();
    });
    const first = r.cachedTestFunctionChoices([true]);
    const second = r.cachedTestFunctionChoices([true]);
    expect(second).toBe(first);
    expect(r.cachedTestFunction(first.buffer)).toBe(first);
    expect(calls).toBe(1);
    r.cachedTestFunctionChoices([false]);
    expect(calls).toBe(2);
  });

  it('measures the hung-test limit from construction', () => {
    const r = runner((data) => {
      data.drawBits(8);
    }, {}, { now: () => 400_000 });
    expect(r.cachedTestFunction(Uint8Array.of(1)).status).toBe(Status.VALID);
  });

  it('knows from the trie that a short buffer overruns', () => {
    const r = runner((data) => {
      data.drawBits(8);
      data.drawBits(8);
    });
    r.cachedTestFunction(Uint8Array.from([1, 2]));
    expect(r.cachedTestFunction(Uint8Array.from([1])).status).toBe(Status.OVERRUN);
    expect(r.callCount).toBe(1);
  });

  it('stops generating at maxExamples valid examples', () => {
    const r = runner((data) => void data.drawBits(32), { maxExamples: 20 });
    expect(r.run()).toBe(ExitReason.MAX_EXAMPLES);
    expect(r.validExamples).toBe(20);
  });

  it('finishes once every tape has been tried', () => {
    const r = runner((data) => {
      data.drawBits(1);
      data.drawBits(1);
    });
    expect(r.run()).toBe(ExitReason.FINISHED);
    expect(r.treeIsExhausted).toBe(true);
    expect(r.validExamples).toBe(4);
  });

  it('fails the filter health check when almost everything is rejected', () => {
    const r = runner((data: ConjectureData) => {
      const b = data.drawBits(8);
      data.assume(b > 255n);
    });
    let caught: unknown;
    try {
      r.run();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(FailedHealthCheck);
    if (caught instanceof FailedHealthCheck) expect(caught.healthCheck).toBe('filterTooMuch');
  });

  it('runs to completion when the health check is suppressed', () => {
    const r = runner(
      (data: ConjectureData) => {
        const b = data.drawBits(8);
        data.assume(b > 255n);
      },
      { suppressedHealthChecks: [HealthCheck.FILTER_TOO_MUCH] }
    );
    expect(r.run()).toBe(ExitReason.FINISHED);
    expect(r.invalidExamples).toBe(256);
  });

  it('turns a slow execution into a deadline failure', () => {
    let clock = 0;
    const r = new ConjectureRunner(
      (data) => {
        data.drawBits(8);
        clock += 500;
      },
      resolveSettings({ seed: 0, deadlinePerExampleMs: 200 }),
      { now: () => clock }
    );
    r.run();
    const found = r.interestingExamples.get('DeadlineExceeded@<deadline>');
    expect(found?.buffer).toEqual(Uint8Array.from([0]));
    expect(found?.failure).toBeInstanceOf(DeadlineExceeded);
  });

  it('reports a failure that stops reproducing as flaky', () => {
    let calls = 0;
    const r = runner((data) => {
      data.drawBits(8);
      calls++;
      if (calls === 1) throw new Error('only once');
    });
    expect(r.run()).toBe(ExitReason.FLAKY);
  });

  it('saves the shrunk failure and downgrades the ones it replaced', () => {
    const db = new InMemoryExampleDatabase();
    const key = new TextEncoder().encode('sum');
    const r = runner(sumOfTen, { databaseKey: 'sum', maxShrinks: 10_000 }, { database: db });
    const start = r.cachedTestFunction(new Uint8Array(10).fill(255));
    r.shrink(start, (result) => result.status === Status.INTERESTING);

    expect(db.fetch(key)).toEqual([Uint8Array.from([0, 0, 215, 255, 255, 255, 255, 255, 255, 255])]);
    const secondary = db.fetch(subKey(key, 'secondary'));
    expect(secondary.length).toBeGreaterThan(0);
    expect(secondary).toContainEqual(new Uint8Array(10).fill(255));
  });

  it('tracks the best example of each target label', () => {
    const r = runner((data) => {
      data.target('value', Number(data.drawBits(8)));
    });
    r.cachedTestFunction(Uint8Array.from([3]));
    r.cachedTestFunction(Uint8Array.from([9]));
    r.cachedTestFunction(Uint8Array.from([5]));
    expect(r.bestObservedTargets.get('value')).toBe(9);
    expect(r.bestExamplesOfObservedTargets.get('value')?.buffer).toEqual(Uint8Array.from([9]));
  });

  it('hill-climbs a target during the TARGET phase', () => {
    const r = runner((data) => {
      data.target('value', Number(data.drawBits(8)));
    });
    r.cachedTestFunction(Uint8Array.from([3]));
    r.optimiseTargets();
    expect(r.bestObservedTargets.get('value')).toBeGreaterThan(3);
    expect(r.callCount).toBeGreaterThan(1);
  });
});
