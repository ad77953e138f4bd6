/**
 * Shrinker: reduces one interesting example to a shortlex-smaller one
 * satisfying the same predicate.
 *
 * The shrinker owns a current best target and improves it by running
 * shrink passes, each a family of local edits recomputed against the
 * current target. Passes run in three escalating groups, each to a
 * fixpoint. Every call goes through the runner's cached test function, so
 * an improvement is already recorded by the runner when this returns or
 * when a run-level stop unwinds out of it.
 */

import type { ConjectureResult } from '../data/conjecture-data.js';
import type { Block, Span } from '../data/spans.js';
import { isTrivial } from '../data/spans.js';
import { Status } from '../data/status.js';
import type { Dfa } from '../dfa/dfa.js';
import {
  bytesToHex,
  compareTapes,
  concatBytes,
  intFromBytes,
  intToBytes,
  isAllZero,
  startsWith,
} from '../util/bytes.js';
import type { Random } from '../util/rng.js';
import { IntegerShrinker } from './integer.js';
import {
  COARSE_PASSES,
  EMERGENCY_PASSES,
  FINE_PASSES,
  type ShrinkPassDefinition,
} from './passes.js';

export type ShrinkPredicate = (result: ConjectureResult) => boolean;

/** What the shrinker needs from the runner. */
export interface ShrinkerHost {
  readonly random: Random;
  readonly callCount: number;
  readonly learnedDfas: readonly Dfa[];
  readonly reportDebugInfo: boolean;
  cachedTestFunction(buffer: Uint8Array): ConjectureResult;
  debug(message: string): void;
  recordShrinkPass(name: string, calls: number, shrinks: number): void;
}

export interface ShrinkerOptions {
  /**
   * Consecutive unproductive calls after which a pass skips the rest of
   * its steps for the current sweep.
   */
  stallLimit?: number;
}

export const DEFAULT_STALL_LIMIT = 1000;

/** One registered pass with its per-run bookkeeping. */
export class ShrinkPass {
  runs = 0;
  calls = 0;
  shrinks = 0;
  deletions = 0;
  stalledCalls = 0;
  fixedPointAt: ConjectureResult | undefined;

  private steps: Array<() => void> = [];
  private stepsFor: ConjectureResult | undefined;

  constructor(
    readonly definition: ShrinkPassDefinition,
    private readonly shrinker: Shrinker
  ) {}

  get name(): string {
    return this.definition.name;
  }

  /** Step thunks for the current target, recomputed when it changes. */
  get stepCount(): number {
    return this.currentSteps().length;
  }

  generateSteps(): number[] {
    if (this.fixedPointAt === this.shrinker.shrinkTarget) return [];
    return Array.from({ length: this.stepCount }, (_, i) => i);
  }

  runStep(i: number): void {
    if (this.stalledCalls >= this.shrinker.stallLimit) return;
    const steps = this.currentSteps();
    const step = steps[i];
    if (step === undefined) return;

    const initialShrinks = this.shrinker.shrinks;
    const initialCalls = this.shrinker.calls;
    const size = this.shrinker.buffer.length;
    try {
      step();
    } finally {
      const calls = this.shrinker.calls - initialCalls;
      const shrinks = this.shrinker.shrinks - initialShrinks;
      this.calls += calls;
      this.shrinks += shrinks;
      this.deletions += size - this.shrinker.buffer.length;
      this.stalledCalls = shrinks > 0 ? 0 : this.stalledCalls + calls;
    }
  }

  private currentSteps(): Array<() => void> {
    const target = this.shrinker.shrinkTarget;
    if (this.stepsFor !== target) {
      this.steps = this.definition.steps(this.shrinker);
      this.stepsFor = target;
    }
    return this.steps;
  }
}

export class Shrinker {
  shrinkTarget: ConjectureResult;
  shrinks = 0;
  readonly stallLimit: number;
  readonly initialSize: number;
  readonly initialCalls: number;
  readonly passes: ShrinkPass[] = [];

  private readonly passesByName = new Map<string, ShrinkPass>();
  private readonly shrinkingPrefixes = new Set<string>();
  private shrinkingBlockCache = new Map<number, boolean>();
  private readonly changedBlocks = new Set<number>();
  private derivedEndpoints: number[][] | undefined;
  private derivedSpansByLabel: Map<number, Span[]> | undefined;

  constructor(
    private readonly host: ShrinkerHost,
    initial: ConjectureResult,
    readonly predicate: ShrinkPredicate,
    options: ShrinkerOptions = {}
  ) {
    this.shrinkTarget = initial;
    this.initialSize = initial.buffer.length;
    this.initialCalls = host.callCount;
    this.stallLimit = options.stallLimit ?? DEFAULT_STALL_LIMIT;
  }

  get calls(): number {
    return this.host.callCount;
  }

  get random(): Random {
    return this.host.random;
  }

  get learnedDfas(): readonly Dfa[] {
    return this.host.learnedDfas;
  }

  get buffer(): Uint8Array {
    return this.shrinkTarget.buffer;
  }

  get blocks(): readonly Block[] {
    return this.shrinkTarget.blocks;
  }

  get spans(): readonly Span[] {
    return this.shrinkTarget.spans;
  }

  debug(message: string): void {
    this.host.debug(message);
  }

  shrinkPass(definition: ShrinkPassDefinition): ShrinkPass {
    let pass = this.passesByName.get(definition.name);
    if (!pass) {
      pass = new ShrinkPass(definition, this);
      this.passes.push(pass);
      this.passesByName.set(definition.name, pass);
    }
    return pass;
  }

  /** Run every step of one pass once, in random order. */
  runShrinkPass(definition: ShrinkPassDefinition): void {
    const pass = this.shrinkPass(definition);
    this.debug(`Shrink pass ${pass.name}`);
    pass.runs++;
    pass.stalledCalls = 0;
    for (const step of this.random.shuffle(pass.generateSteps())) {
      pass.runStep(step);
    }
  }

  // -------------------------------------------------------------------
  // Running candidates

  cachedTestFunction(buffer: Uint8Array): ConjectureResult {
    const result = this.host.cachedTestFunction(buffer);
    this.incorporateTestData(result);
    return result;
  }

  /** True when running `buffer` would leave it as the shrink target. */
  considerNewBuffer(buffer: Uint8Array): boolean {
    return startsWith(buffer, this.buffer) || this.incorporateNewBuffer(buffer);
  }

  /**
   * Run `buffer` when it could possibly improve on the target. Returns
   * whether the target changed.
   */
  incorporateNewBuffer(buffer: Uint8Array): boolean {
    const truncated = buffer.slice(0, this.buffer.length);
    if (compareTapes(truncated, this.buffer) >= 0) return false;
    if (startsWith(this.buffer, truncated)) return false;
    const previous = this.shrinkTarget;
    this.cachedTestFunction(truncated);
    return previous !== this.shrinkTarget;
  }

  private incorporateTestData(result: ConjectureResult): boolean {
    if (result.status === Status.OVERRUN || result === this.shrinkTarget) return false;
    if (this.predicate(result) && compareTapes(result.buffer, this.buffer) < 0) {
      this.updateShrinkTarget(result);
      return true;
    }
    return false;
  }

  private updateShrinkTarget(next: ConjectureResult): void {
    const current = this.shrinkTarget;
    this.shrinks++;
    if (!sameBlockBounds(current, next)) {
      this.clearChangeTracking();
    } else {
      current.blocks.forEach((block, i) => {
        if (this.changedBlocks.has(i)) return;
        for (let k = block.start; k < block.end; k++) {
          if (current.buffer[k] !== next.buffer[k]) {
            this.changedBlocks.add(i);
            return;
          }
        }
      });
    }
    this.shrinkTarget = next;
    this.shrinkingBlockCache = new Map();
    this.derivedEndpoints = undefined;
    this.derivedSpansByLabel = undefined;
  }

  // -------------------------------------------------------------------
  // The main loop

  /**
   * Shrink to a fixpoint of every pass group. Running it again on the
   * result changes nothing.
   */
  shrink(): void {
    if (isAllZero(this.buffer) || this.incorporateNewBuffer(new Uint8Array(this.buffer.length))) {
      return;
    }
    try {
      this.greedyShrink();
    } finally {
      for (const pass of this.passes) {
        this.host.recordShrinkPass(pass.name, pass.calls, pass.shrinks);
      }
      if (this.host.reportDebugInfo) this.reportProfile();
    }
  }

  greedyShrink(): void {
    this.fixateShrinkPasses(COARSE_PASSES);
    this.fixateShrinkPasses([...COARSE_PASSES, ...FINE_PASSES]);
    this.fixateShrinkPasses([...COARSE_PASSES, ...FINE_PASSES, ...EMERGENCY_PASSES]);
  }

  /** Run steps of `definitions`, shuffled together, until none improves the target. */
  fixateShrinkPasses(definitions: readonly ShrinkPassDefinition[]): void {
    const passes = definitions.map((d) => this.shrinkPass(d));
    let initial: ConjectureResult | undefined;
    while (initial !== this.shrinkTarget) {
      initial = this.shrinkTarget;
      for (const pass of passes) {
        pass.stalledCalls = 0;
        if (pass.stepCount > 0) pass.runs++;
      }
      const passesWithSteps: Array<[ShrinkPass, number]> = [];
      for (const pass of passes) {
        for (const step of pass.generateSteps()) passesWithSteps.push([pass, step]);
      }
      this.random.shuffle(passesWithSteps);

      let canDiscard = this.removeDiscarded();
      for (const [pass, step] of passesWithSteps) {
        pass.runStep(step);
        if (canDiscard) canDiscard = this.removeDiscarded();
      }
    }
    for (const pass of passes) pass.fixedPointAt = this.shrinkTarget;
  }

  /**
   * Delete every discarded span at once. False when there was discarded
   * data and deleting it failed.
   */
  removeDiscarded(): boolean {
    for (;;) {
      const discarded: Array<[number, number]> = [];
      for (const span of this.spans) {
        const last = discarded[discarded.length - 1];
        if (
          span.end > span.start &&
          span.discarded &&
          (last === undefined || span.start >= last[1])
        ) {
          discarded.push([span.start, span.end]);
        }
      }
      if (discarded.length === 0) return true;

      const pieces: Uint8Array[] = [];
      let at = 0;
      for (const [u, v] of discarded) {
        pieces.push(this.buffer.subarray(at, u));
        at = v;
      }
      pieces.push(this.buffer.subarray(at));
      if (!this.incorporateNewBuffer(concatBytes(...pieces))) return false;
    }
  }

  // -------------------------------------------------------------------
  // Derived values of the current target

  get spansByLabel(): Map<number, Span[]> {
    if (!this.derivedSpansByLabel) {
      const byLabel = new Map<number, Span[]>();
      for (const span of this.spans) {
        const list = byLabel.get(span.label);
        if (list) {
          list.push(span);
        } else {
          byLabel.set(span.label, [span]);
        }
      }
      this.derivedSpansByLabel = byLabel;
    }
    return this.derivedSpansByLabel;
  }

  /**
   * Increasingly fine partitions of the buffer: the span endpoints at or
   * above each depth, skipping depths that add no new endpoint.
   */
  get endpointsByDepth(): number[][] {
    if (!this.derivedEndpoints) {
      const atDepth = new Map<number, Set<number>>();
      let maxDepth = 0;
      for (const span of this.spans) {
        let set = atDepth.get(span.depth);
        if (!set) {
          set = new Set();
          atDepth.set(span.depth, set);
        }
        set.add(span.start);
        set.add(span.end);
        maxDepth = Math.max(maxDepth, span.depth);
      }
      const partitions: Array<Set<number>> = [new Set([0, this.buffer.length])];
      for (let d = 0; d <= maxDepth; d++) {
        const prev = partitions[partitions.length - 1] ?? new Set<number>();
        const here = atDepth.get(d) ?? new Set<number>();
        if ([...here].some((p) => !prev.has(p))) {
          partitions.push(new Set([...prev, ...here]));
        }
      }
      this.derivedEndpoints = partitions
        .slice(1)
        .map((set) => [...set].sort((a, b) => a - b));
    }
    return this.derivedEndpoints;
  }

  /** Pairs of spans with the same label where the first contains the second. */
  calculateDescents(): Array<[Span, Span]> {
    const result: Array<[Span, Span]> = [];
    for (const spans of this.spansByLabel.values()) {
      if (spans.length <= 1) continue;
      spans.slice(0, -1).forEach((ancestor, i) => {
        let lo = i + 1;
        let hi = spans.length;
        if ((spans[lo]?.start ?? ancestor.end) >= ancestor.end) return;
        while (lo + 1 < hi) {
          const mid = Math.floor((lo + hi) / 2);
          if ((spans[mid]?.start ?? ancestor.end) >= ancestor.end) {
            hi = mid;
          } else {
            lo = mid;
          }
        }
        for (const descendant of spans.slice(i + 1, hi)) {
          result.push([ancestor, descendant]);
        }
      });
    }
    return result;
  }

  // -------------------------------------------------------------------
  // Block edits

  isShrinkingBlock(i: number): boolean {
    if (this.shrinkingPrefixes.size === 0) return false;
    const cached = this.shrinkingBlockCache.get(i);
    if (cached !== undefined) return cached;
    const block = this.blocks[i];
    const shrinking =
      block !== undefined &&
      this.shrinkingPrefixes.has(bytesToHex(this.buffer.subarray(0, block.start)));
    this.shrinkingBlockCache.set(i, shrinking);
    return shrinking;
  }

  /** Lowering these blocks may make the test draw less data after them. */
  markShrinking(blocks: readonly number[]): void {
    for (const i of blocks) {
      if (this.shrinkingBlockCache.get(i) === true) continue;
      this.shrinkingBlockCache.set(i, true);
      const block = this.blocks[i];
      if (block) this.shrinkingPrefixes.add(bytesToHex(this.buffer.subarray(0, block.start)));
    }
  }

  clearChangeTracking(): void {
    this.changedBlocks.clear();
  }

  /**
   * Replace the tail of each block in `blocks` with `bytes`. When that
   * keeps the test valid but shortens the tape, also try deleting the
   * regions that the shorter run no longer reads.
   */
  tryShrinkingBlocks(blocks: readonly number[], bytes: Uint8Array): boolean {
    const attempt = Uint8Array.from(this.buffer);
    const used: number[] = [];
    let lastEnd = 0;
    for (const index of blocks) {
      const block = this.blocks[index];
      if (!block) break;
      const n = Math.min(block.end - block.start, bytes.length);
      attempt.set(bytes.subarray(bytes.length - n), block.end - n);
      used.push(index);
      lastEnd = block.end;
    }
    const first = this.blocks[used[0] ?? -1];
    const lastIndex = used[used.length - 1];
    const last = this.blocks[lastIndex ?? -1];
    if (!first || !last || lastIndex === undefined) return false;
    const start = first.start;
    const end = last.end;

    const target = this.shrinkTarget;
    const initial = this.cachedTestFunction(attempt);
    if (initial.status === Status.INTERESTING) {
      this.lowerCommonBlockOffset();
      return initial === this.shrinkTarget;
    }
    if (initial.status < Status.VALID) return false;
    if (initial.buffer.length < lastEnd) return false;
    const lost = target.buffer.length - initial.buffer.length;
    if (lost <= 0) return false;

    this.markShrinking(used);
    const regions = new Map<string, [number, number]>();
    const addRegion = (u: number, v: number): void => {
      regions.set(`${u}:${v}`, [u, v]);
    };
    addRegion(end, end + lost);

    for (const j of [lastIndex + 1, lastIndex + 2]) {
      if (j >= Math.min(initial.blocks.length, target.blocks.length)) continue;
      const before = target.blocks[j];
      const after = initial.blocks[j];
      if (!before || !after) continue;
      const shrunkBy = before.end - before.start - (after.end - after.start);
      if (shrunkBy <= 0 || before.start !== after.start) continue;
      addRegion(before.start, before.start + shrunkBy);
    }

    for (const span of target.spans) {
      if (span.start > start || span.end <= end) continue;
      const replacement = initial.spans[span.index];
      if (!replacement) continue;
      const inOriginal = span.children
        .map((c) => target.spans[c])
        .filter((c): c is Span => c !== undefined && c.start >= end);
      const inReplaced = replacement.children
        .map((c) => initial.spans[c])
        .filter((c): c is Span => c !== undefined && c.start >= end);
      if (inReplaced.length >= inOriginal.length || inReplaced.length === 0) continue;
      const from = inOriginal[0];
      const to = inOriginal[inOriginal.length - inReplaced.length];
      if (from && to) addRegion(from.start, to.start);
    }

    const ordered = [...regions.values()].sort((a, b) => b[1] - b[0] - (a[1] - a[0]));
    for (const [u, v] of ordered) {
      const withDeleted = concatBytes(attempt.subarray(0, u), attempt.subarray(v));
      if (this.incorporateNewBuffer(withDeleted)) return true;
    }
    return false;
  }

  /**
   * When several blocks keep changing together, lower their common offset
   * in one go instead of zig-zagging them down a little at a time.
   */
  lowerCommonBlockOffset(): void {
    if (this.changedBlocks.size <= 1) return;
    const current = this.shrinkTarget;
    const blocked = current.blocks.map((b) => current.buffer.slice(b.start, b.end));
    const changed = [...this.changedBlocks]
      .sort((a, b) => a - b)
      .filter((i) => {
        const block = current.blocks[i];
        return block !== undefined && !isTrivial(current.buffer, block);
      });
    if (changed.length === 0) return;

    const ints = changed.map((i) => intFromBytes(blocked[i] ?? new Uint8Array(0)));
    const offset = ints.reduce((a, b) => (b < a ? b : a));
    const deltas = ints.map((v) => v - offset);

    const reoffset = (o: bigint): boolean => {
      const next = [...blocked];
      changed.forEach((i, k) => {
        const size = blocked[i]?.length ?? 0;
        next[i] = intToBytes((deltas[k] ?? 0n) + o, size);
      });
      return this.incorporateNewBuffer(concatBytes(...next));
    };
    IntegerShrinker.shrink(offset, reoffset, { random: this.random });
    this.clearChangeTracking();
  }

  // -------------------------------------------------------------------

  private reportProfile(): void {
    const s = (n: number): string => (n === 1 ? '' : 's');
    const totalDeleted = this.initialSize - this.buffer.length;
    const calls = this.calls - this.initialCalls;
    this.debug('---------------------');
    this.debug('Shrink pass profiling');
    this.debug('---------------------');
    this.debug(
      `Shrinking made a total of ${calls} call${s(calls)} of which ${this.shrinks} shrank. ` +
        `This deleted ${totalDeleted} byte${s(totalDeleted)} out of ${this.initialSize}.`
    );
    const ordered = [...this.passes].sort(
      (a, b) =>
        b.calls - a.calls || b.runs - a.runs || a.deletions - b.deletions || a.shrinks - b.shrinks
    );
    for (const useful of [true, false]) {
      this.debug(useful ? 'Useful passes:' : 'Useless passes:');
      for (const p of ordered) {
        if (p.calls === 0 || (p.shrinks !== 0) !== useful) continue;
        this.debug(
          `  * ${p.name} ran ${p.runs} time${s(p.runs)}, making ${p.calls} call${s(p.calls)} ` +
            `of which ${p.shrinks} shrank, deleting ${p.deletions} byte${s(p.deletions)}.`
        );
      }
    }
  }
}

function sameBlockBounds(a: ConjectureResult, b: ConjectureResult): boolean {
  if (a.blocks.length !== b.blocks.length) return false;
  return a.blocks.every((block, i) => {
    const other = b.blocks[i];
    return other !== undefined && other.start === block.start && other.end === block.end;
  });
}
