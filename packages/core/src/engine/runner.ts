/* eslint-disable max-lines */
/**
 * ConjectureRunner: drives one property through its phases.
 *
 * REUSE replays the stored corpus, GENERATE explores fresh and mutated
 * tapes, TARGET hill-climbs observed target scores and SHRINK minimises
 * every distinct failure. All executions funnel through `testFunction`,
 * which keeps the trie, the Pareto front, the persisted corpus and the
 * run budgets up to date. A budget running out raises RunIsComplete,
 * which unwinds to `run()` from wherever the runner happens to be.
 */

import { performance } from 'node:perf_hooks';

import {
  ConjectureData,
  MAX_DEPTH,
  OVERRUN_RESULT,
  type ByteSource,
  type ConjectureResult,
} from '../data/conjecture-data.js';
import {
  choiceKey,
  choiceToString,
  isChoiceTemplate,
  type ChoiceInput,
} from '../data/choices.js';
import {
  originFromError,
  originKey,
  originsEqual,
  type InterestingOrigin,
} from '../data/origin.js';
import { isStopTest, UnsatisfiedAssumption } from '../data/signals.js';
import { Status, statusName } from '../data/status.js';
import type { Dfa } from '../dfa/dfa.js';
import { Shrinker, type ShrinkerHost } from '../shrinking/shrinker.js';
import {
  DeadlineExceeded,
  FailedHealthCheck,
  isChoicetapeError,
} from '../types/errors.js';
import type { Phase, ResolvedSettings, Verbosity } from '../types/options.js';
import { bytesToHex, compareTapes } from '../util/bytes.js';
import { LRUMap } from '../util/lru.js';
import { EngineMetrics, type MetricsSnapshot } from '../util/metrics.js';
import { Random } from '../util/rng.js';
import { DataTree } from './data-tree.js';
import { subKey, type ExampleDatabase } from './database.js';
import {
  HEALTH_CHECK_LIMITS,
  HealthCheck,
  HealthCheckState,
} from './health-check.js';
import { Mutator } from './mutator.js';
import { Optimiser, type OptimiserHost } from './optimiser.js';
import { ParetoFront } from './pareto.js';
import { TargetSelector } from './target-selector.js';

/** The property under test: performs draws on one attempt. */
export type Executor = (data: ConjectureData) => void;

export type Reporter = (message: string) => void;

export enum ExitReason {
  MAX_EXAMPLES = 'maxExamples',
  MAX_ITERATIONS = 'maxIterations',
  TIMEOUT = 'timeout',
  MAX_SHRINKS = 'maxShrinks',
  FINISHED = 'finished',
  FLAKY = 'flaky',
}

/** Unwinds the phases once the run has an exit reason. */
export class RunIsComplete extends Error {
  constructor(readonly reason: ExitReason) {
    super(`Run complete: ${reason}`);
    this.name = 'RunIsComplete';
  }
}

export interface RunnerOptions {
  database?: ExampleDatabase;
  reporter?: Reporter;
  /** Automata the shrinker's dfaReplacement pass may rewrite with. */
  learnedDfas?: readonly Dfa[];
  /** Clock used for the time budget, the deadline and the hung-test check. */
  now?: () => number;
}

export const CACHE_SIZE = 10_000;
const MUTATIONS_PER_MUTATOR = 10;
const HEALTH_CHECK_MIN_CALLS = 10;
const GENERATE_DEADLINE_GRACE = 1.25;
const INITIAL_MAX_IMPROVEMENTS = 10;

const VERBOSITY_RANK: Record<Verbosity, number> = {
  quiet: 0,
  normal: 1,
  verbose: 2,
  debug: 3,
};

const DEADLINE_ORIGIN: InterestingOrigin = {
  kind: 'DeadlineExceeded',
  location: '<deadline>',
};

/** Cache key for a choice replay; never collides with a hex tape key. */
function choiceInputsKey(choices: readonly ChoiceInput[]): string {
  const parts = choices.map((c) =>
    isChoiceTemplate(c) ? `t:${c.count ?? '*'}` : choiceKey(c)
  );
  return `choices:${parts.join('|')}`;
}

export class ConjectureRunner implements OptimiserHost, ShrinkerHost {
  readonly random: Random;
  readonly metrics: EngineMetrics;
  readonly learnedDfas: readonly Dfa[];
  readonly interestingExamples = new Map<string, ConjectureResult>();
  readonly paretoFront: ParetoFront;

  exitReason: ExitReason | undefined;
  callCount = 0;
  validExamples = 0;
  invalidExamples = 0;
  overrunExamples = 0;
  shrinks = 0;

  readonly bestObservedTargets = new Map<string, number>();
  readonly bestExamplesOfObservedTargets = new Map<string, ConjectureResult>();

  private readonly tree: DataTree;
  private readonly cache = new LRUMap<string, ConjectureResult>(CACHE_SIZE);
  private readonly targetSelector: TargetSelector;
  private readonly shrunkExamples = new Set<string>();
  private readonly database: ExampleDatabase | undefined;
  private readonly databaseKey: Uint8Array | undefined;
  private readonly reporter: Reporter;
  private readonly now: () => number;

  private healthCheckState: HealthCheckState | null = null;
  private readonly startTime: number;
  private firstBugFoundAt: number | null = null;
  private lastBugFoundAt: number | null = null;
  private generating = false;
  private optimisedDuringGeneration = false;

  constructor(
    private readonly executor: Executor,
    readonly settings: ResolvedSettings,
    options: RunnerOptions = {}
  ) {
    this.random = seedRandom(settings);
    this.metrics = new EngineMetrics({ enabled: settings.metrics, now: options.now });
    this.now = options.now ?? (() => performance.now());
    this.startTime = this.now();
    this.tree = new DataTree(this.cap);
    this.targetSelector = new TargetSelector(this.random);
    this.paretoFront = new ParetoFront(this.random);
    this.learnedDfas = options.learnedDfas ?? [];
    this.reporter = options.reporter ?? (() => undefined);

    if (settings.databaseKey !== null && options.database) {
      this.database = options.database;
      this.databaseKey = new TextEncoder().encode(settings.databaseKey);
    }

    this.paretoFront.onEvict((evicted) => {
      if (this.database && this.databaseKey) {
        this.database.delete(subKey(this.databaseKey, 'pareto'), evicted.buffer);
      }
    });
  }

  /** Depth past which generation only writes zeros. */
  get cap(): number {
    return Math.floor(this.settings.bufferSize / 2);
  }

  get reportDebugInfo(): boolean {
    return this.settings.verbosity === 'debug';
  }

  get statistics(): MetricsSnapshot {
    return this.metrics.snapshotMetrics();
  }

  get treeIsExhausted(): boolean {
    return this.tree.isExhausted;
  }

  // -------------------------------------------------------------------
  // Running

  run(): ExitReason {
    try {
      this.runPhases();
    } catch (error) {
      if (!(error instanceof RunIsComplete)) throw error;
      this.exitReason = error.reason;
    }
    const reason = this.exitReason ?? ExitReason.FINISHED;
    this.verbose(
      `Run ended (${reason}) after ${this.callCount} calls: ` +
        `${this.validExamples} valid, ${this.interestingExamples.size} failing`
    );
    return reason;
  }

  private runPhases(): void {
    if (this.phaseEnabled('reuse')) {
      this.metrics.time('REUSE', () => this.reuseExistingExamples());
    }
    if (this.phaseEnabled('generate')) {
      this.metrics.time('GENERATE', () => this.generateNewExamples());
    }
    if (this.phaseEnabled('target') && this.interestingExamples.size === 0) {
      this.metrics.time('TARGET', () => this.optimiseTargets());
    }
    if (this.phaseEnabled('shrink')) {
      this.metrics.time('SHRINK', () => this.shrinkInterestingExamples());
    }
    this.exitWith(ExitReason.FINISHED);
  }

  private phaseEnabled(phase: Phase): boolean {
    return this.settings.phases.includes(phase);
  }

  private exitWith(reason: ExitReason): never {
    this.exitReason = reason;
    throw new RunIsComplete(reason);
  }

  // -------------------------------------------------------------------
  // Execution

  testFunction(data: ConjectureData): void {
    if (this.now() - this.startTime >= HEALTH_CHECK_LIMITS.hungTestMs) {
      this.failHealthCheck(
        HealthCheck.HUNG_TEST,
        'The run has been executing for at least five minutes'
      );
    }

    this.callCount++;
    this.metrics.increment('calls');
    this.execute(data);
    const result = data.asResult();

    this.tree.add(result);
    this.targetSelector.add(result);
    this.debugData(result);

    switch (result.status) {
      case Status.VALID:
        this.validExamples++;
        this.metrics.increment('validExamples');
        break;
      case Status.INVALID:
        this.invalidExamples++;
        this.metrics.increment('invalidExamples');
        break;
      case Status.OVERRUN:
        this.overrunExamples++;
        this.metrics.increment('overrunExamples');
        break;
      case Status.INTERESTING:
        this.metrics.increment('interestingExamples');
        break;
    }
    if (result.misalignedAt !== null) this.metrics.increment('misalignedReplays');

    this.recordTargets(result);
    if (this.paretoFront.add(result)) this.saveBuffer(result.buffer, 'pareto');
    if (result.status === Status.INTERESTING) this.recordInteresting(result);

    if (
      this.settings.timeBudgetMs !== null &&
      this.now() - this.startTime >= this.settings.timeBudgetMs
    ) {
      this.exitWith(ExitReason.TIMEOUT);
    }
    if (this.interestingExamples.size === 0) {
      if (this.validExamples >= this.settings.maxExamples) {
        this.exitWith(ExitReason.MAX_EXAMPLES);
      }
      if (this.callCount >= this.settings.maxIterations) {
        this.exitWith(ExitReason.MAX_ITERATIONS);
      }
    }
    if (this.tree.isExhausted) this.exitWith(ExitReason.FINISHED);

    this.recordForHealthCheck(result);
  }

  /** Run the executor on `data` and leave it frozen with its outcome. */
  private execute(data: ConjectureData): void {
    const started = this.now();
    try {
      this.executor(data);
    } catch (error) {
      if (isStopTest(error)) {
        if (error.testCounter !== data.testCounter) throw error;
      } else if (error instanceof UnsatisfiedAssumption) {
        data.conclude(Status.INVALID, { reason: error.reason });
      } else if (isChoicetapeError(error)) {
        throw error;
      } else {
        data.conclude(Status.INTERESTING, {
          origin: originFromError(error),
          failure: error,
        });
      }
    }
    if (data.frozen) return;

    const deadline = this.settings.deadlinePerExampleMs;
    if (deadline !== null) {
      const drawTime = data.drawTimes.reduce((sum, t) => sum + t, 0);
      const runtime = this.now() - started - drawTime;
      const limit = this.generating ? deadline * GENERATE_DEADLINE_GRACE : deadline;
      if (runtime > limit) {
        data.conclude(Status.INTERESTING, {
          origin: DEADLINE_ORIGIN,
          failure: new DeadlineExceeded({
            message: `Execution took ${runtime.toFixed(2)}ms, over the ${deadline}ms deadline`,
            runtimeMs: runtime,
            deadlineMs: deadline,
          }),
        });
        return;
      }
    }
    data.conclude(Status.VALID);
  }

  /** Execute `buffer` once more, outside the cache and all bookkeeping. */
  replay(buffer: Uint8Array): ConjectureResult {
    const data = ConjectureData.forBuffer(buffer);
    this.execute(data);
    return data.asResult();
  }

  cachedTestFunction(buffer: Uint8Array): ConjectureResult {
    const key = bytesToHex(buffer);
    const cached = this.cache.get(key);
    if (cached) {
      this.metrics.increment('cacheHits');
      return cached;
    }

    const known = this.tree.lookup(buffer);
    if (known.kind === 'result') {
      this.metrics.increment('cacheHits');
      this.cache.set(key, known.result);
      return known.result;
    }
    if (known.kind === 'overrun') {
      this.metrics.increment('treeOverruns');
      this.cache.set(key, OVERRUN_RESULT);
      return OVERRUN_RESULT;
    }

    const data = ConjectureData.forBuffer(buffer);
    this.testFunction(data);
    return this.remember(key, data.asResult());
  }

  /** Replay a choice sequence; misaligned replays overrun. */
  cachedTestFunctionChoices(choices: readonly ChoiceInput[]): ConjectureResult {
    const key = choiceInputsKey(choices);
    const cached = this.cache.get(key);
    if (cached) {
      this.metrics.increment('cacheHits');
      return cached;
    }

    const data = ConjectureData.forChoices(choices, {
      maxLength: this.settings.bufferSize,
    });
    this.testFunction(data);
    return this.remember(key, data.asResult());
  }

  generateFromPrefix(prefix: Uint8Array): ConjectureResult {
    const data = new ConjectureData({
      maxLength: this.settings.bufferSize,
      source: this.prefixedSource(prefix),
    });
    this.testFunction(data);
    return data.asResult();
  }

  private remember(key: string, result: ConjectureResult): ConjectureResult {
    this.cache.set(key, result);
    this.cache.set(bytesToHex(result.buffer), result);
    return result;
  }

  private prefixedSource(prefix: Uint8Array): ByteSource {
    return (data, n) => {
      let bytes: Uint8Array;
      if (data.index >= prefix.length) {
        bytes = this.random.bytes(n);
      } else {
        bytes = new Uint8Array(n);
        const head = prefix.subarray(data.index, data.index + n);
        bytes.set(head);
        bytes.set(this.random.bytes(n - head.length), head.length);
      }
      return this.zeroBound(data, bytes);
    };
  }

  /**
   * Replace generated bytes with zeros past the cap or when spans nest
   * too deeply, steering generation back towards small examples.
   */
  private zeroBound(data: ConjectureData, bytes: Uint8Array): Uint8Array {
    const n = bytes.length;
    if (data.depth * 2 >= MAX_DEPTH || data.index >= this.cap) {
      data.hitZeroBound = true;
      return new Uint8Array(n);
    }
    if (data.index + n >= this.cap) {
      data.hitZeroBound = true;
      const out = new Uint8Array(n);
      out.set(bytes.subarray(0, this.cap - data.index));
      return out;
    }
    return bytes;
  }

  // -------------------------------------------------------------------
  // Bookkeeping

  private recordTargets(result: ConjectureResult): void {
    if (result.status < Status.VALID) return;
    for (const [label, score] of result.targetObservations) {
      const best = this.bestObservedTargets.get(label);
      if (best === undefined || score > best) {
        this.bestObservedTargets.set(label, score);
        this.bestExamplesOfObservedTargets.set(label, result);
      }
    }
  }

  private recordInteresting(result: ConjectureResult): void {
    const origin = result.interestingOrigin;
    if (origin === null) return;
    const key = originKey(origin);
    const existing = this.interestingExamples.get(key);

    let changed = false;
    if (!existing) {
      if (this.interestingExamples.size < this.settings.maxInterestingOrigins) {
        changed = true;
        this.firstBugFoundAt ??= this.callCount;
        this.lastBugFoundAt = this.callCount;
        this.verbose(`Found failure ${key} at call ${this.callCount}`);
      }
    } else if (compareTapes(result.buffer, existing.buffer) < 0) {
      this.shrinks++;
      this.metrics.increment('shrinks');
      this.downgradeBuffer(existing.buffer);
      changed = true;
    }

    if (changed) {
      this.saveBuffer(result.buffer);
      this.interestingExamples.set(key, result);
      this.shrunkExamples.delete(key);
    }
    if (this.shrinks >= this.settings.maxShrinks) {
      this.exitWith(ExitReason.MAX_SHRINKS);
    }
  }

  private recordForHealthCheck(result: ConjectureResult): void {
    if (result.status === Status.INTERESTING) this.healthCheckState = null;
    const state = this.healthCheckState;
    if (!state) return;

    state.drawTimesMs.push(...result.drawTimes);
    if (result.status === Status.VALID) {
      state.validExamples++;
    } else if (result.status === Status.INVALID) {
      state.invalidExamples++;
    } else {
      state.overrunExamples++;
    }

    if (state.validExamples >= HEALTH_CHECK_LIMITS.validToClose) {
      this.healthCheckState = null;
      return;
    }
    if (state.overrunExamples === HEALTH_CHECK_LIMITS.maxOverruns) {
      this.failHealthCheck(
        HealthCheck.DATA_TOO_LARGE,
        `Examples routinely exceeded the maximum size ` +
          `(${state.overrunExamples} overran while generating ${state.validExamples} valid ones)`
      );
    }
    if (state.invalidExamples === HEALTH_CHECK_LIMITS.maxInvalid) {
      this.failHealthCheck(
        HealthCheck.FILTER_TOO_MUCH,
        `The executor filters out most examples ` +
          `(${state.invalidExamples} invalid, ${state.validExamples} valid)`
      );
    }
    const drawTime = state.totalDrawTimeMs;
    if (drawTime > HEALTH_CHECK_LIMITS.maxDrawTimeMs) {
      this.failHealthCheck(
        HealthCheck.TOO_SLOW,
        `Data generation is slow: ${state.validExamples} valid examples took ` +
          `${drawTime.toFixed(0)}ms of drawing`
      );
    }
  }

  private failHealthCheck(check: HealthCheck, message: string): void {
    if (this.settings.suppressedHealthChecks.includes(check)) return;
    throw new FailedHealthCheck({ message, healthCheck: check });
  }

  private saveBuffer(buffer: Uint8Array, suffix?: 'secondary' | 'pareto'): void {
    if (!this.database || !this.databaseKey) return;
    const key = suffix ? subKey(this.databaseKey, suffix) : this.databaseKey;
    this.database.save(key, buffer);
  }

  private downgradeBuffer(buffer: Uint8Array): void {
    if (!this.database || !this.databaseKey) return;
    this.database.move(this.databaseKey, subKey(this.databaseKey, 'secondary'), buffer);
  }

  // -------------------------------------------------------------------
  // Reporting

  debug(message: string): void {
    this.report('debug', message);
  }

  recordShrinkPass(name: string, calls: number, shrinks: number): void {
    this.metrics.recordShrinkPass(name, calls, shrinks);
  }

  private verbose(message: string): void {
    this.report('verbose', message);
  }

  private report(level: Verbosity, message: string): void {
    if (VERBOSITY_RANK[this.settings.verbosity] >= VERBOSITY_RANK[level]) {
      this.reporter(message);
    }
  }

  private debugData(result: ConjectureResult): void {
    if (!this.reportDebugInfo) return;
    const values = result.nodes.map(choiceToString).join(', ');
    const origin = result.interestingOrigin ? ` ${originKey(result.interestingOrigin)}` : '';
    this.debug(`${result.buffer.length} bytes [${values}] -> ${statusName(result.status)}${origin}`);
  }

  // -------------------------------------------------------------------
  // REUSE

  private reuseExistingExamples(): void {
    if (!this.database || !this.databaseKey) return;
    const { database, databaseKey } = this;
    this.verbose('Reusing examples from the database');

    const corpus = database.fetch(databaseKey).sort(compareTapes);
    const desiredSize = Math.max(2, Math.ceil(0.1 * this.settings.maxExamples));
    for (const suffix of ['secondary', 'pareto'] as const) {
      if (corpus.length >= desiredSize) break;
      const extraCorpus = database.fetch(subKey(databaseKey, suffix));
      const shortfall = desiredSize - corpus.length;
      const extra =
        extraCorpus.length <= shortfall
          ? extraCorpus
          : this.random.sample(extraCorpus, shortfall);
      corpus.push(...extra.sort(compareTapes));
    }

    const secondary = subKey(databaseKey, 'secondary');
    for (const existing of corpus) {
      const data = ConjectureData.forBuffer(existing);
      try {
        this.testFunction(data);
      } finally {
        if (data.frozen && data.status !== Status.INTERESTING) {
          database.delete(databaseKey, existing);
          database.delete(secondary, existing);
        }
      }
    }
  }

  // -------------------------------------------------------------------
  // GENERATE

  private generateNewExamples(): void {
    this.generating = true;
    try {
      this.generateFromZeroData();
    } finally {
      this.generating = false;
    }
  }

  private generateFromZeroData(): void {
    const zeroData = this.cachedTestFunction(new Uint8Array(this.settings.bufferSize));
    if (
      zeroData.status === Status.OVERRUN ||
      (zeroData.status === Status.VALID &&
        zeroData.buffer.length * 2 > this.settings.bufferSize)
    ) {
      this.failHealthCheck(
        HealthCheck.LARGE_BASE_EXAMPLE,
        'The smallest natural example is extremely large; ' +
          'consider bounding the size of what the executor draws'
      );
    }

    let fullyForced = true;
    for (let i = 0; i < this.cap; i++) {
      if (!zeroData.forcedIndices.has(i)) {
        fullyForced = false;
        break;
      }
    }
    if (fullyForced) this.exitWith(ExitReason.FINISHED);

    this.healthCheckState = new HealthCheckState();
    let count = 0;
    while (
      this.interestingExamples.size === 0 &&
      (count < HEALTH_CHECK_MIN_CALLS || this.healthCheckState !== null)
    ) {
      this.generateFromPrefix(this.tree.generateNovelPrefix(this.random));
      count++;
    }
    this.healthCheckState = null;

    this.mutationLoop();
  }

  private newMutator(): Mutator {
    return new Mutator(
      this.random,
      () => this.tree.generateNovelPrefix(this.random),
      (data, bytes) => this.zeroBound(data, bytes)
    );
  }

  private mutationLoop(): void {
    let mutations = 0;
    let mutator = this.newMutator();
    const zeroBoundQueue: ConjectureResult[] = [];

    while (this.shouldGenerateMore()) {
      if (
        this.phaseEnabled('target') &&
        !this.optimisedDuringGeneration &&
        this.validExamples >= this.settings.maxExamples / 2
      ) {
        this.optimisedDuringGeneration = true;
        this.metrics.time('TARGET', () => this.optimiseTargets());
        continue;
      }

      let result: ConjectureResult;
      const overdrawn = zeroBoundQueue.pop();
      const origin = overdrawn ? undefined : this.targetSelector.select();
      if (overdrawn) {
        // Spread the zeros the bound wrote over the whole tape and retry.
        const bytes = Array.from(overdrawn.buffer);
        for (const i of overdrawn.forcedIndices) bytes[i] = 0;
        const buffer = Uint8Array.from(this.random.shuffle(bytes));
        const data = new ConjectureData({
          maxLength: this.settings.bufferSize,
          source: (d, n) => {
            const out = new Uint8Array(n);
            out.set(buffer.subarray(d.index, d.index + n));
            return this.zeroBound(d, out);
          },
        });
        this.testFunction(data);
        result = data.asResult();
      } else if (origin) {
        mutations++;
        const data = new ConjectureData({
          maxLength: this.settings.bufferSize,
          source: mutator.mutateFrom(origin),
        });
        this.testFunction(data);
        result = data.asResult();
        if (result.status > origin.status) {
          mutations = 0;
        } else if (result.status < origin.status || mutations >= MUTATIONS_PER_MUTATOR) {
          mutations = 0;
          mutator = this.newMutator();
        }
      } else {
        result = this.generateFromPrefix(this.tree.generateNovelPrefix(this.random));
      }
      if (result.hitZeroBound) zeroBoundQueue.push(result);
    }
  }

  private shouldGenerateMore(): boolean {
    if (
      this.validExamples >= this.settings.maxExamples ||
      this.callCount >= this.settings.maxIterations
    ) {
      return false;
    }
    if (this.interestingExamples.size === 0) return true;
    if (!this.settings.reportMultipleBugs) return false;
    const first = this.firstBugFoundAt ?? this.callCount;
    const last = this.lastBugFoundAt ?? this.callCount;
    return this.callCount < Math.min(first + 1000, last * 2);
  }

  // -------------------------------------------------------------------
  // TARGET

  optimiseTargets(): void {
    let maxImprovements = INITIAL_MAX_IMPROVEMENTS;
    for (;;) {
      const previousCalls = this.callCount;
      let anyImprovements = false;
      for (const [label, example] of [...this.bestExamplesOfObservedTargets]) {
        const optimiser = new Optimiser(this, example, label, maxImprovements);
        optimiser.run();
        if (optimiser.improvements > 0) anyImprovements = true;
      }
      if (this.interestingExamples.size > 0) break;
      maxImprovements *= 2;
      if (!anyImprovements || this.callCount === previousCalls) break;
    }
  }

  // -------------------------------------------------------------------
  // SHRINK

  private shrinkInterestingExamples(): void {
    if (this.interestingExamples.size === 0) return;

    const byTape = [...this.interestingExamples.values()].sort((a, b) =>
      compareTapes(a.buffer, b.buffer)
    );
    for (const previous of byTape) {
      const data = ConjectureData.forBuffer(previous.buffer);
      this.testFunction(data);
      if (
        data.status !== Status.INTERESTING ||
        !originsEqual(data.interestingOrigin, previous.interestingOrigin)
      ) {
        this.verbose(`Failure ${previousKey(previous)} did not reproduce`);
        this.exitWith(ExitReason.FLAKY);
      }
    }

    this.clearSecondaryKey();

    for (;;) {
      const next = this.nextUnshrunk();
      if (!next) break;
      const [key, example] = next;
      this.verbose(`Shrinking ${key}`);
      const origin = example.interestingOrigin;
      this.shrink(example, (result) =>
        result.status === Status.INTERESTING &&
        originsEqual(result.interestingOrigin, origin)
      );
      this.shrunkExamples.add(key);
    }
  }

  /** Shrink `example` under `predicate`; returns the smallest target found. */
  shrink(
    example: ConjectureResult,
    predicate: (result: ConjectureResult) => boolean
  ): ConjectureResult {
    const shrinker = new Shrinker(this, example, predicate);
    shrinker.shrink();
    return shrinker.shrinkTarget;
  }

  private nextUnshrunk(): [string, ConjectureResult] | undefined {
    let best: [string, ConjectureResult] | undefined;
    for (const [key, example] of this.interestingExamples) {
      if (this.shrunkExamples.has(key)) continue;
      if (
        !best ||
        compareTapes(example.buffer, best[1].buffer) < 0 ||
        (compareTapes(example.buffer, best[1].buffer) === 0 && key < best[0])
      ) {
        best = [key, example];
      }
    }
    return best;
  }

  private clearSecondaryKey(): void {
    if (!this.database || !this.databaseKey || !this.phaseEnabled('reuse')) return;
    const secondary = subKey(this.databaseKey, 'secondary');
    const corpus = this.database.fetch(secondary).sort(compareTapes);
    for (const candidate of corpus) {
      const worst = [...this.interestingExamples.values()]
        .map((example) => example.buffer)
        .sort(compareTapes)
        .pop();
      if (!worst || compareTapes(candidate, worst) > 0) break;
      this.cachedTestFunction(candidate);
      this.database.delete(secondary, candidate);
    }
  }
}

function previousKey(result: ConjectureResult): string {
  return result.interestingOrigin ? originKey(result.interestingOrigin) : '<none>';
}

function seedRandom(settings: ResolvedSettings): Random {
  if (settings.derandomize) return new Random(settings.databaseKey ?? 'choicetape');
  if (settings.seed !== null) return new Random(settings.seed);
  return Random.fromEntropy();
}
