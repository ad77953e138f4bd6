import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  REUSE: 'reuseMs',
  GENERATE: 'generateMs',
  TARGET: 'targetMs',
  SHRINK: 'shrinkMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;

export interface MetricsSnapshot {
  reuseMs: number;
  generateMs: number;
  targetMs: number;
  shrinkMs: number;
  calls: number;
  validExamples: number;
  invalidExamples: number;
  overrunExamples: number;
  interestingExamples: number;
  shrinks: number;
  cacheHits: number;
  treeOverruns: number;
  misalignedReplays: number;
  // Per-pass shrink profile, populated only when the shrinker reports it
  shrinkPasses?: Record<string, { calls: number; shrinks: number }>;
}

export type MetricCounter = Exclude<
  keyof MetricsSnapshot,
  (typeof METRIC_PHASES)[MetricPhase] | 'shrinkPasses'
>;

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

const DEFAULT_COUNTERS: MetricsSnapshot = {
  reuseMs: 0,
  generateMs: 0,
  targetMs: 0,
  shrinkMs: 0,
  calls: 0,
  validExamples: 0,
  invalidExamples: 0,
  overrunExamples: 0,
  interestingExamples: 0,
  shrinks: 0,
  cacheHits: 0,
  treeOverruns: 0,
  misalignedReplays: 0,
};

export interface EngineMetricsOptions {
  now?: () => number;
  enabled?: boolean;
}

export class EngineMetrics {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<MetricsPhaseKey, TimerState>;
  private snapshot: MetricsSnapshot;

  constructor(options: EngineMetricsOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.snapshot = { ...DEFAULT_COUNTERS };
    this.timers = {
      reuseMs: { total: 0 },
      generateMs: { total: 0 },
      targetMs: { total: 0 },
      shrinkMs: { total: 0 },
    };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }
    this.timers[key] = { total: current.total, startedAt: this.now() };
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }
    this.accumulateDuration(key, this.now() - current.startedAt);
    this.timers[key] = { total: this.snapshot[key] };
  }

  /** Run `fn` inside begin/end, closing the timer even when it throws. */
  public time<T>(phase: MetricPhase, fn: () => T): T {
    this.begin(phase);
    try {
      return fn();
    } finally {
      this.end(phase);
    }
  }

  public recordDuration(phase: MetricPhase, durationMs: number): void {
    if (!this.enabled) {
      return;
    }
    this.accumulateDuration(METRIC_PHASES[phase], durationMs);
  }

  public increment(counter: MetricCounter, by = 1): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot[counter] += by;
  }

  public get(counter: MetricCounter): number {
    return this.snapshot[counter];
  }

  public recordShrinkPass(name: string, calls: number, shrinks: number): void {
    if (!this.enabled) {
      return;
    }
    const passes = (this.snapshot.shrinkPasses ??= {});
    const entry = (passes[name] ??= { calls: 0, shrinks: 0 });
    entry.calls += calls;
    entry.shrinks += shrinks;
  }

  public snapshotMetrics(): MetricsSnapshot {
    const copy: MetricsSnapshot = { ...this.snapshot };
    if (this.snapshot.shrinkPasses) {
      copy.shrinkPasses = { ...this.snapshot.shrinkPasses };
    }
    return copy;
  }

  private accumulateDuration(key: MetricsPhaseKey, durationMs: number): void {
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.snapshot[key] += safeDuration;
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
