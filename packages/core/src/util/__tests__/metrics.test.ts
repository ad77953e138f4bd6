import { describe, expect, it } from 'vitest';

import { EngineMetrics } from '../metrics.js';

describe('EngineMetrics', () => {
  it('tracks phase durations using an injected clock', () => {
    let now = 0;
    const metrics = new EngineMetrics({ now: () => now });
    metrics.begin('GENERATE');
    now += 5;
    metrics.end('GENERATE');
    metrics.time('SHRINK', () => {
      now += 3;
    });
    const snapshot = metrics.snapshotMetrics();
    expect(snapshot.generateMs).toBe(5);
    expect(snapshot.shrinkMs).toBe(3);
    expect(snapshot.reuseMs).toBe(0);
  });

  it('closes the timer when the timed function throws', () => {
    let now = 0;
    const metrics = new EngineMetrics({ now: () => now });
    expect(() =>
      metrics.time('TARGET', () => {
        now += 2;
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(metrics.snapshotMetrics().targetMs).toBe(2);
    expect(() => metrics.begin('TARGET')).not.toThrow();
  });

  it('rejects unbalanced timers', () => {
    const metrics = new EngineMetrics();
    expect(() => metrics.end('REUSE')).toThrow('was not started');
    metrics.begin('REUSE');
    expect(() => metrics.begin('REUSE')).toThrow('already started');
  });

  it('counts and aggregates shrink passes', () => {
    const metrics = new EngineMetrics();
    metrics.increment('calls');
    metrics.increment('calls', 4);
    metrics.recordShrinkPass('zeroExamples', 3, 1);
    metrics.recordShrinkPass('zeroExamples', 2, 0);
    const snapshot = metrics.snapshotMetrics();
    expect(snapshot.calls).toBe(5);
    expect(snapshot.shrinkPasses).toEqual({ zeroExamples: { calls: 5, shrinks: 1 } });
  });

  it('ignores everything when disabled', () => {
    const metrics = new EngineMetrics({ enabled: false });
    metrics.increment('calls');
    metrics.begin('GENERATE');
    metrics.recordShrinkPass('x', 1, 1);
    expect(metrics.get('calls')).toBe(0);
    expect(metrics.snapshotMetrics().shrinkPasses).toBeUndefined();
  });
});
