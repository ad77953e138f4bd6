/* eslint-disable max-lines */
/**
 * ConjectureData: one structured attempt at running the test.
 *
 * Records the tape, the choice nodes, spans and blocks while the executor
 * draws, then freezes into an immutable ConjectureResult. Conclusions
 * (markInvalid, markInteresting, markOverrun) freeze the data and unwind
 * to the runner with a StopTest carrying this attempt's counter.
 */

import { performance } from 'node:perf_hooks';

import type { BitSource } from '../codec/bit-source.js';
import {
  drawBytes as encodeBytes,
  drawFloat as encodeFloat,
  drawInteger as encodeInteger,
  drawString as encodeString,
  MAX_UNBOUNDED_MAGNITUDE,
} from '../codec/draws.js';
import {
  DEFAULT_FLOAT_CONSTRAINTS,
  floatPermitted,
  simplestFloat,
} from '../codec/floats.js';
import { IntervalSet } from '../codec/intervals.js';
import { biasedCoin } from '../codec/primitives.js';
import { Frozen, InvalidArgument } from '../types/errors.js';
import { intFromBytes, intToBytes } from '../util/bytes.js';
import { LABELS } from '../util/labels.js';
import type { Random } from '../util/rng.js';
import {
  choicePermitted,
  isChoiceTemplate,
  type BooleanConstraints,
  type BytesConstraints,
  type ChoiceInput,
  type ChoiceKind,
  type ChoiceNode,
  type ChoiceValue,
  type FloatConstraints,
  type IntegerConstraints,
  type StringConstraints,
} from './choices.js';
import type { InterestingOrigin } from './origin.js';
import { StopTest, UnsatisfiedAssumption } from './signals.js';
import type { Block, Span } from './spans.js';
import { Status } from './status.js';

export const MAX_DEPTH = 100;
export const DEFAULT_MAX_LENGTH = 8192;

/** Supplies the next n bytes of an unforced draw. */
export type ByteSource = (data: ConjectureData, n: number) => Uint8Array;

export interface ConjectureResult {
  readonly status: Status;
  readonly interestingOrigin: InterestingOrigin | null;
  readonly buffer: Uint8Array;
  readonly nodes: readonly ChoiceNode[];
  readonly spans: readonly Span[];
  readonly blocks: readonly Block[];
  readonly targetObservations: ReadonlyMap<string, number>;
  readonly events: ReadonlyMap<string, string>;
  readonly output: string;
  readonly extraInformation: Readonly<Record<string, unknown>>;
  readonly hasDiscards: boolean;
  readonly forcedIndices: ReadonlySet<number>;
  readonly masks: ReadonlyMap<number, number>;
  readonly drawTimes: readonly number[];
  readonly misalignedAt: number | null;
  readonly hitZeroBound: boolean;
  readonly failure: unknown;
}

/** Shared result for overruns the trie proves without executing. */
export const OVERRUN_RESULT: ConjectureResult = Object.freeze({
  status: Status.OVERRUN,
  interestingOrigin: null,
  buffer: new Uint8Array(0),
  nodes: [],
  spans: [],
  blocks: [],
  targetObservations: new Map<string, number>(),
  events: new Map<string, string>(),
  output: '',
  extraInformation: {},
  hasDiscards: false,
  forcedIndices: new Set<number>(),
  masks: new Map<number, number>(),
  drawTimes: [],
  misalignedAt: null,
  hitZeroBound: false,
  failure: undefined,
});

let globalTestCounter = 0;

export interface ConjectureDataOptions {
  maxLength?: number;
  source: ByteSource;
  /** Replay these choices before falling back to `random` (or overrunning). */
  choices?: readonly ChoiceInput[];
  random?: Random;
}

export interface ConclusionOptions {
  origin?: InterestingOrigin | null;
  failure?: unknown;
  reason?: string;
}

export class ConjectureData implements BitSource {
  readonly testCounter: number;
  readonly maxLength: number;

  status: Status = Status.VALID;
  interestingOrigin: InterestingOrigin | null = null;
  failure: unknown = undefined;
  hitZeroBound = false;
  misalignedAt: number | null = null;
  hasDiscards = false;

  readonly nodes: ChoiceNode[] = [];
  readonly spans: Span[] = [];
  readonly blocks: Block[] = [];
  readonly forcedIndices = new Set<number>();
  readonly masks = new Map<number, number>();
  readonly drawTimes: number[] = [];
  readonly targetObservations = new Map<string, number>();
  readonly events = new Map<string, string>();
  readonly extraInformation: Record<string, unknown> = {};

  readonly #bytes: number[] = [];
  readonly #source: ByteSource;
  readonly #choices: readonly ChoiceInput[] | undefined;
  readonly #random: Random | undefined;
  readonly #spanStack: number[] = [];
  readonly #output: string[] = [];
  #choiceIndex = 0;
  #simplestRemaining = 0;
  #useZeros = false;
  #replaying = false;
  #frozen = false;
  #result: ConjectureResult | undefined;

  constructor(options: ConjectureDataOptions) {
    this.testCounter = ++globalTestCounter;
    this.maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
    this.#source = options.source;
    this.#choices = options.choices;
    this.#random = options.random;
    this.startSpan(LABELS.TOP);
  }

  /** Replay a raw tape; reading past its end overruns. */
  static forBuffer(buffer: Uint8Array): ConjectureData {
    return new ConjectureData({
      maxLength: buffer.length,
      source: (data, n) => buffer.subarray(data.index, data.index + n),
    });
  }

  /** Fresh random data, optionally starting from a fixed prefix. */
  static forRandom(
    random: Random,
    options: { prefix?: Uint8Array; maxLength?: number } = {}
  ): ConjectureData {
    const prefix = options.prefix ?? new Uint8Array(0);
    return new ConjectureData({
      maxLength: options.maxLength,
      source: (data, n) => {
        if (data.index >= prefix.length) return random.bytes(n);
        const head = prefix.subarray(data.index, data.index + n);
        if (head.length === n) return head;
        const out = new Uint8Array(n);
        out.set(head);
        out.set(random.bytes(n - head.length), head.length);
        return out;
      },
    });
  }

  /**
   * Replay choices by value. A value of the wrong kind, or one its draw's
   * constraints do not permit, is a misalignment and overruns.
   */
  static forChoices(
    choices: readonly ChoiceInput[],
    options: { random?: Random; maxLength?: number } = {}
  ): ConjectureData {
    const { random } = options;
    return new ConjectureData({
      maxLength: options.maxLength,
      choices,
      random,
      source: (_data, n) => (random ? random.bytes(n) : new Uint8Array(n)),
    });
  }

  get index(): number {
    return this.#bytes.length;
  }

  get buffer(): Uint8Array {
    return Uint8Array.from(this.#bytes);
  }

  get frozen(): boolean {
    return this.#frozen;
  }

  /** Nesting depth of open spans below the top-level one. */
  get depth(): number {
    return this.#spanStack.length - 1;
  }

  get output(): string {
    return this.#output.join('\n');
  }

  // ---------------------------------------------------------------------
  // Bits

  drawBits(n: number, forced?: bigint): bigint {
    this.#assertActive('drawBits');
    if (!Number.isInteger(n) || n < 0) {
      throw new InvalidArgument({
        message: `drawBits(${n}) needs a non-negative integer`,
        context: { argument: 'n', value: n },
      });
    }
    if (n === 0) return 0n;
    const nBytes = (n + 7) >> 3;
    if (this.index + nBytes > this.maxLength) this.markOverrun();

    let buf: Uint8Array;
    if (forced !== undefined) {
      buf = intToBytes(forced, nBytes);
    } else {
      const read = this.#useZeros
        ? new Uint8Array(nBytes)
        : this.#source(this, nBytes);
      if (read.length < nBytes) this.markOverrun();
      buf = Uint8Array.from(read.subarray(0, nBytes));
    }
    const mask = n % 8 === 0 ? 0xff : (1 << n % 8) - 1;
    buf[0] = (buf[0] ?? 0) & mask;

    const start = this.index;
    for (const b of buf) this.#bytes.push(b);
    const end = this.index;
    if (mask !== 0xff) this.masks.set(start, mask);
    const inherentlyForced = forced !== undefined && !this.#replaying;
    if (inherentlyForced) {
      for (let i = start; i < end; i++) this.forcedIndices.add(i);
    }
    this.blocks.push({
      index: this.blocks.length,
      start,
      end,
      forced: inherentlyForced,
    });
    this.#pushSpan(LABELS.DRAW_BITS, start, end);
    return intFromBytes(buf);
  }

  /** Force bytes onto the tape, as a block. */
  write(bytes: Uint8Array): Uint8Array {
    this.drawBits(bytes.length * 8, intFromBytes(bytes));
    return bytes;
  }

  // ---------------------------------------------------------------------
  // Typed draws

  drawInteger(
    constraints: Partial<IntegerConstraints> = {},
    forced?: number
  ): number {
    const c: IntegerConstraints = {
      min: constraints.min ?? null,
      max: constraints.max ?? null,
      weights: constraints.weights ?? null,
      shrinkTowards: constraints.shrinkTowards ?? 0,
    };
    validateInteger(c);
    const kind: ChoiceKind = { type: 'integer', constraints: c };
    this.#validateForced(kind, forced);
    if (forced !== undefined && (c.min === null || c.max === null)) {
      const towards = Math.min(
        Math.max(c.shrinkTowards, c.min ?? -Infinity),
        c.max ?? Infinity
      );
      if (Math.abs(forced - towards) > MAX_UNBOUNDED_MAGNITUDE) {
        throw new InvalidArgument({
          message: `Cannot force ${forced}: too far from ${towards} for an unbounded draw`,
          context: { argument: 'forced', value: forced },
        });
      }
    }
    const replay = this.#prepareDraw(kind, forced);
    const start = this.index;
    const value = this.#timed(replay, () =>
      encodeInteger(
        this,
        c,
        forced ?? (typeof replay?.value === 'number' ? replay.value : undefined)
      )
    );
    this.nodes.push({
      type: 'integer',
      value,
      constraints: c,
      wasForced: forced !== undefined,
      start,
      end: this.index,
    });
    return value;
  }

  drawBoolean(p = 0.5, forced?: boolean): boolean {
    const c: BooleanConstraints = { p };
    if (!(p >= 0 && p <= 1)) {
      throw new InvalidArgument({
        message: `drawBoolean(p=${p}) needs 0 <= p <= 1`,
        context: { argument: 'p', value: p },
      });
    }
    const kind: ChoiceKind = { type: 'boolean', constraints: c };
    this.#validateForced(kind, forced);
    const replay = this.#prepareDraw(kind, forced);
    const start = this.index;
    const value = this.#timed(replay, () =>
      biasedCoin(
        this,
        p,
        forced ?? (typeof replay?.value === 'boolean' ? replay.value : undefined)
      )
    );
    this.nodes.push({
      type: 'boolean',
      value,
      constraints: c,
      wasForced: forced !== undefined,
      start,
      end: this.index,
    });
    return value;
  }

  drawFloat(constraints: Partial<FloatConstraints> = {}, forced?: number): number {
    const c: FloatConstraints = { ...DEFAULT_FLOAT_CONSTRAINTS, ...constraints };
    validateFloat(c);
    const kind: ChoiceKind = { type: 'float', constraints: c };
    this.#validateForced(kind, forced);
    const replay = this.#prepareDraw(kind, forced);
    const start = this.index;
    const value = this.#timed(replay, () =>
      encodeFloat(
        this,
        c,
        forced ?? (typeof replay?.value === 'number' ? replay.value : undefined)
      )
    );
    this.nodes.push({
      type: 'float',
      value,
      constraints: c,
      wasForced: forced !== undefined,
      start,
      end: this.index,
    });
    return value;
  }

  drawString(
    constraints: Partial<StringConstraints> = {},
    forced?: string
  ): string {
    const c: StringConstraints = {
      intervals: constraints.intervals ?? IntervalSet.UNICODE,
      minSize: constraints.minSize ?? 0,
      maxSize: constraints.maxSize ?? Number.POSITIVE_INFINITY,
    };
    validateSizes(c.minSize, c.maxSize);
    if (c.intervals.size === 0 && c.minSize > 0) {
      throw new InvalidArgument({
        message: 'Cannot draw a non-empty string from an empty alphabet',
        context: { argument: 'intervals' },
      });
    }
    if (c.intervals.size === 0) c.maxSize = 0;
    const kind: ChoiceKind = { type: 'string', constraints: c };
    this.#validateForced(kind, forced);
    const replay = this.#prepareDraw(kind, forced);
    const start = this.index;
    const value = this.#timed(replay, () =>
      encodeString(
        this,
        c,
        forced ?? (typeof replay?.value === 'string' ? replay.value : undefined)
      )
    );
    this.nodes.push({
      type: 'string',
      value,
      constraints: c,
      wasForced: forced !== undefined,
      start,
      end: this.index,
    });
    return value;
  }

  drawBytes(
    constraints: Partial<BytesConstraints> = {},
    forced?: Uint8Array
  ): Uint8Array {
    const c: BytesConstraints = {
      minSize: constraints.minSize ?? 0,
      maxSize: constraints.maxSize ?? Number.POSITIVE_INFINITY,
    };
    validateSizes(c.minSize, c.maxSize);
    const kind: ChoiceKind = { type: 'bytes', constraints: c };
    this.#validateForced(kind, forced);
    const replay = this.#prepareDraw(kind, forced);
    const start = this.index;
    const value = this.#timed(replay, () =>
      encodeBytes(
        this,
        c,
        forced ??
          (replay?.value instanceof Uint8Array ? replay.value : undefined)
      )
    );
    this.nodes.push({
      type: 'bytes',
      value,
      constraints: c,
      wasForced: forced !== undefined,
      start,
      end: this.index,
    });
    return value;
  }

  // ---------------------------------------------------------------------
  // Spans

  startSpan(label: number): void {
    this.#assertActive('startSpan');
    const parent = this.#spanStack[this.#spanStack.length - 1] ?? null;
    const index = this.spans.length;
    this.spans.push({
      index,
      label,
      start: this.index,
      end: -1,
      depth: this.#spanStack.length,
      parent,
      children: [],
      discarded: false,
    });
    if (parent !== null) this.spans[parent]?.children.push(index);
    this.#spanStack.push(index);
    if (this.depth > MAX_DEPTH) this.markInvalid('max depth exceeded');
  }

  stopSpan(discard = false): void {
    if (this.#frozen) return;
    if (this.#spanStack.length <= 1) {
      throw new InvalidArgument({
        message: 'stopSpan called with no open span',
      });
    }
    const index = this.#spanStack.pop();
    const span = index === undefined ? undefined : this.spans[index];
    if (!span) return;
    span.end = this.index;
    if (discard) {
      span.discarded = true;
      this.hasDiscards = true;
    }
  }

  // ---------------------------------------------------------------------
  // Observations

  target(label: string, score: number): void {
    this.#assertActive('target');
    if (!Number.isFinite(score)) {
      throw new InvalidArgument({
        message: `target(${label}) needs a finite score, got ${score}`,
        context: { argument: 'score', value: score },
      });
    }
    this.targetObservations.set(label, score);
  }

  event(key: string, value = ''): void {
    this.events.set(key, value);
  }

  note(text: string): void {
    this.#output.push(text);
  }

  assume(condition: boolean, reason?: string): asserts condition {
    if (!condition) throw new UnsatisfiedAssumption(reason);
  }

  reject(reason?: string): never {
    throw new UnsatisfiedAssumption(reason);
  }

  // ---------------------------------------------------------------------
  // Conclusion

  /** Freeze with a status without unwinding; the runner's entry point. */
  conclude(status: Status, options: ConclusionOptions = {}): void {
    if (this.#frozen) {
      throw new Frozen({
        message: `Cannot conclude attempt ${this.testCounter}: already frozen`,
      });
    }
    this.status = status;
    this.interestingOrigin = options.origin ?? null;
    if (options.failure !== undefined) this.failure = options.failure;
    if (options.reason !== undefined) {
      this.events.set('invalid because', options.reason);
    }
    this.freeze();
  }

  markInteresting(origin: InterestingOrigin): never {
    this.conclude(Status.INTERESTING, { origin });
    throw new StopTest(this.testCounter);
  }

  markInvalid(reason?: string): never {
    this.conclude(Status.INVALID, { reason });
    throw new StopTest(this.testCounter);
  }

  markOverrun(): never {
    this.conclude(Status.OVERRUN);
    throw new StopTest(this.testCounter);
  }

  freeze(): void {
    if (this.#frozen) return;
    while (this.#spanStack.length > 0) {
      const index = this.#spanStack.pop();
      const span = index === undefined ? undefined : this.spans[index];
      if (span) span.end = this.index;
    }
    this.#frozen = true;
  }

  asResult(): ConjectureResult {
    if (!this.#frozen) {
      throw new InvalidArgument({
        message: 'asResult() requires frozen data',
      });
    }
    this.#result ??= Object.freeze({
      status: this.status,
      interestingOrigin: this.interestingOrigin,
      buffer: this.buffer,
      nodes: Object.freeze([...this.nodes]),
      spans: Object.freeze(this.spans.map(frozenSpan)),
      blocks: Object.freeze(this.blocks.map((block) => Object.freeze({ ...block }))),
      targetObservations: new Map(this.targetObservations),
      events: new Map(this.events),
      output: this.output,
      extraInformation: { ...this.extraInformation },
      hasDiscards: this.hasDiscards,
      forcedIndices: new Set(this.forcedIndices),
      masks: new Map(this.masks),
      drawTimes: Object.freeze([...this.drawTimes]),
      misalignedAt: this.misalignedAt,
      hitZeroBound: this.hitZeroBound,
      failure: this.failure,
    });
    return this.#result;
  }

  // ---------------------------------------------------------------------
  // Internals

  #assertActive(operation: string): void {
    if (this.#frozen) {
      throw new Frozen({
        message: `Cannot ${operation} on frozen data (attempt ${this.testCounter})`,
      });
    }
  }

  #validateForced(kind: ChoiceKind, forced: ChoiceValue | undefined): void {
    if (forced !== undefined && !choicePermitted(kind, forced)) {
      throw new InvalidArgument({
        message: `Forced value is not permitted by the ${kind.type} constraints`,
        context: { argument: 'forced', value: forced },
      });
    }
  }

  /**
   * Position replay for the next draw. Returns the value to replay, or
   * undefined when the draw reads bytes (fresh, zeros for a template, or
   * user-forced).
   */
  #prepareDraw(
    kind: ChoiceKind,
    forced: ChoiceValue | undefined
  ): { value: ChoiceValue } | undefined {
    this.#assertActive(`draw ${kind.type}`);
    const choices = this.#choices;
    if (choices === undefined) return undefined;
    if (this.#simplestRemaining > 0) {
      this.#simplestRemaining--;
      this.#useZeros = true;
      return undefined;
    }
    const input = choices[this.#choiceIndex];
    if (input === undefined) {
      if (this.#random) return undefined;
      this.markOverrun();
    }
    this.#choiceIndex++;
    if (isChoiceTemplate(input)) {
      const count = input.count ?? Number.POSITIVE_INFINITY;
      if (count <= 0) return this.#prepareDraw(kind, forced);
      this.#simplestRemaining = count - 1;
      this.#useZeros = true;
      return undefined;
    }
    if (forced !== undefined) return undefined;
    if (!choicePermitted(kind, input)) {
      this.misalignedAt = this.#choiceIndex - 1;
      this.markOverrun();
    }
    return { value: input };
  }

  #timed<T>(replay: { value: ChoiceValue } | undefined, draw: () => T): T {
    const started = performance.now();
    this.#replaying = replay !== undefined;
    try {
      return draw();
    } finally {
      this.#replaying = false;
      this.#useZeros = false;
      this.drawTimes.push(performance.now() - started);
    }
  }

  #pushSpan(label: number, start: number, end: number): void {
    const parent = this.#spanStack[this.#spanStack.length - 1] ?? null;
    const index = this.spans.length;
    this.spans.push({
      index,
      label,
      start,
      end,
      depth: this.#spanStack.length,
      parent,
      children: [],
      discarded: false,
    });
    if (parent !== null) this.spans[parent]?.children.push(index);
  }
}

function validateInteger(c: IntegerConstraints): void {
  for (const [name, v] of [
    ['min', c.min],
    ['max', c.max],
  ] as const) {
    if (v !== null && !Number.isSafeInteger(v)) {
      throw new InvalidArgument({
        message: `${name}=${v} must be a safe integer`,
        context: { argument: name, value: v },
      });
    }
  }
  if (!Number.isSafeInteger(c.shrinkTowards)) {
    throw new InvalidArgument({
      message: `shrinkTowards=${c.shrinkTowards} must be a safe integer`,
      context: { argument: 'shrinkTowards', value: c.shrinkTowards },
    });
  }
  if (c.min !== null && c.max !== null && c.min > c.max) {
    throw new InvalidArgument({
      message: `min=${c.min} > max=${c.max}`,
      context: { argument: 'min' },
    });
  }
  if (c.weights !== null) {
    let total = 0;
    for (const [value, p] of c.weights) {
      if (
        !Number.isSafeInteger(value) ||
        (c.min !== null && value < c.min) ||
        (c.max !== null && value > c.max)
      ) {
        throw new InvalidArgument({
          message: `Weighted value ${value} is outside [${c.min}, ${c.max}]`,
          context: { argument: 'weights', value },
        });
      }
      if (!(p > 0)) {
        throw new InvalidArgument({
          message: `Weight for ${value} must be positive`,
          context: { argument: 'weights', value: p },
        });
      }
      total += p;
    }
    if (total > 1) {
      throw new InvalidArgument({
        message: `Weights sum to ${total}, more than 1`,
        context: { argument: 'weights', value: total },
      });
    }
  }
}

function validateFloat(c: FloatConstraints): void {
  if (Number.isNaN(c.min) || Number.isNaN(c.max) || c.min > c.max) {
    throw new InvalidArgument({
      message: `Invalid float bounds [${c.min}, ${c.max}]`,
      context: { argument: 'min' },
    });
  }
  if (!(c.smallestNonzeroMagnitude > 0)) {
    throw new InvalidArgument({
      message: 'smallestNonzeroMagnitude must be positive',
      context: { argument: 'smallestNonzeroMagnitude' },
    });
  }
  if (!floatPermitted(simplestFloat(c), c)) {
    throw new InvalidArgument({
      message: `No float in [${c.min}, ${c.max}] satisfies smallestNonzeroMagnitude=${c.smallestNonzeroMagnitude}`,
      context: { argument: 'smallestNonzeroMagnitude' },
    });
  }
}

function validateSizes(minSize: number, maxSize: number): void {
  const maxOk = maxSize === Number.POSITIVE_INFINITY || Number.isSafeInteger(maxSize);
  if (!Number.isSafeInteger(minSize) || minSize < 0 || !maxOk || maxSize < minSize) {
    throw new InvalidArgument({
      message: `Invalid size bounds [${minSize}, ${maxSize}]`,
      context: { argument: 'minSize' },
    });
  }
}

/** Frozen copy of a span record, children included. */
function frozenSpan(span: Span): Span {
  const children = [...span.children];
  Object.freeze(children);
  const copy: Span = { ...span, children };
  Object.freeze(copy);
  return copy;
}
