/**
 * Shrink pass definitions.
 *
 * A pass maps the current shrink target to a list of steps. The shrinker
 * recomputes the steps whenever the target changes and runs them in a
 * random order, so a step must re-read the target rather than rely on
 * anything captured before an earlier step ran. Whether a pass makes
 * progress on a given target is deterministic: run twice on a target it
 * could not improve, it fails twice.
 */

import { floatToLex, lexToFloat } from '../codec/floats.js';
import type { Span } from '../data/spans.js';
import { isTrivial } from '../data/spans.js';
import { Status } from '../data/status.js';
import { DfaIndexer } from '../dfa/indexer.js';
import {
  bytesToHex,
  compareTapes,
  concatBytes,
  intFromBytes,
  intToBytes,
  replaceRange,
} from '../util/bytes.js';
import { LABELS } from '../util/labels.js';
import { findInteger } from './common.js';
import { FloatShrinker } from './float.js';
import { IntegerShrinker } from './integer.js';
import { Minimizer } from './minimizer.js';
import { Ordering } from './ordering.js';
import type { Shrinker } from './shrinker.js';

export interface ShrinkPassDefinition {
  readonly name: string;
  steps(shrinker: Shrinker): Array<() => void>;
}

function definePass<A>(
  name: string,
  generateArguments: (shrinker: Shrinker) => readonly A[],
  run: (shrinker: Shrinker, argument: A) => void
): ShrinkPassDefinition {
  return {
    name,
    steps: (shrinker) => generateArguments(shrinker).map((arg) => () => run(shrinker, arg)),
  };
}

function fits(value: bigint, size: number): boolean {
  return value >= 0n && value < 1n << BigInt(8 * size);
}

/** Shortlex order as a string, for Ordering over byte pieces. */
function tapeSortKey(tape: Uint8Array): string {
  return `${tape.length.toString(16).padStart(8, '0')}${bytesToHex(tape)}`;
}

/** The suffix of `b` starting at its first non-zero byte. */
export function nonZeroSuffix(b: Uint8Array): Uint8Array {
  let i = 0;
  while (i < b.length && b[i] === 0) i++;
  return b.subarray(i);
}

/** A block that is neither forced nor known to change the tape's shape. */
function isPayloadBlock(shrinker: Shrinker, i: number): boolean {
  const block = shrinker.blocks[i];
  return block !== undefined && !block.forced && !shrinker.isShrinkingBlock(i);
}

// ---------------------------------------------------------------------
// Coarse passes

/** Replace a span with a descendant of the same label. */
export const passToDescendant = definePass<[Span, Span]>(
  'passToDescendant',
  (s) => s.calculateDescents(),
  (s, [ancestor, descendant]) => {
    const buf = s.buffer;
    s.incorporateNewBuffer(
      concatBytes(
        buf.subarray(0, ancestor.start),
        buf.subarray(descendant.start, descendant.end),
        buf.subarray(ancestor.end)
      )
    );
  }
);

/** Replace a span with zeros, or with as many zeros as the zeroed run used. */
export const zeroExamples = definePass<Span>(
  'zeroExamples',
  (s) => s.spans.filter((span) => !isTrivial(s.buffer, span)),
  (s, span) => {
    const buf = s.buffer;
    const attempt = s.cachedTestFunction(
      replaceRange(buf, span.start, span.end, new Uint8Array(span.end - span.start))
    );
    if (attempt.status === Status.OVERRUN) return;
    const replaced = attempt.spans[span.index];
    if (!replaced) return;
    const used = replaced.end - replaced.start;
    if (
      !s.predicate(attempt) &&
      replaced.end < attempt.buffer.length &&
      used < span.end - span.start
    ) {
      s.incorporateNewBuffer(replaceRange(buf, span.start, span.end, new Uint8Array(used)));
    }
  }
);

/**
 * Delete spans, growing a successful deletion to cover neighbouring
 * spans at the same granularity.
 */
export const adaptiveExampleDeletion = definePass<[number, number]>(
  'adaptiveExampleDeletion',
  (s) => s.endpointsByDepth.flatMap((partition, i) => partition.map((_, j): [number, number] => [i, j])),
  (s, [i, j]) => {
    const partition = s.endpointsByDepth[i];
    if (!partition || j >= partition.length - 1) return;
    const buf = s.buffer;
    const deleteRegion = (a: number, b: number): boolean => {
      if (a < 0 || b >= partition.length - 1) return false;
      const from = partition[a];
      const to = partition[b];
      if (from === undefined || to === undefined) return false;
      return s.considerNewBuffer(concatBytes(buf.subarray(0, from), buf.subarray(to)));
    };
    const toRight = findInteger((n) => deleteRegion(j, j + n));
    if (toRight > 0) findInteger((n) => deleteRegion(j - n, j + toRight));
  }
);

// ---------------------------------------------------------------------
// Fine passes

/** Sort the children of a span into shortlex order. */
export const reorderExamples = definePass<Span>(
  'reorderExamples',
  (s) => s.spans.filter((span) => !isTrivial(s.buffer, span) && span.children.length > 1),
  (s, span) => {
    const buf = s.buffer;
    const pieces = span.children.flatMap((c) => {
      const child = s.spans[c];
      return child ? [buf.slice(child.start, child.end)] : [];
    });
    const prefix = buf.subarray(0, span.start);
    const suffix = buf.subarray(span.end);
    Ordering.shrink(
      pieces,
      (ordered) => s.incorporateNewBuffer(concatBytes(prefix, ...ordered, suffix)),
      { random: s.random, sortKey: tapeSortKey }
    );
  }
);

/**
 * Float-shaped edits (to an integer, to a standard large value) that are
 * hard to find lexically. Applies to spans that look like an encoded float.
 */
export const minimizeFloats = definePass<Span>(
  'minimizeFloats',
  (s) =>
    s.spans.filter((span) => {
      if (span.label !== LABELS.DRAW_FLOAT || span.children.length !== 2) return false;
      const first = s.spans[span.children[0] ?? -1];
      return first !== undefined && first.end - first.start === 8;
    }),
  (s, span) => {
    const lexSpan = s.spans[span.children[0] ?? -1];
    if (!lexSpan) return;
    const { start: u, end: v } = lexSpan;
    const buf = s.buffer;
    const b = buf.slice(u, v);
    const f = lexToFloat(intFromBytes(b));
    const canonical = intToBytes(floatToLex(f), 8);
    if (compareTapes(b, canonical) !== 0 && !s.considerNewBuffer(replaceRange(buf, u, v, canonical))) {
      return;
    }
    FloatShrinker.shrink(
      f,
      (x) => s.considerNewBuffer(replaceRange(s.buffer, u, v, intToBytes(floatToLex(x), 8))),
      { random: s.random }
    );
  }
);

/** Blocks grouped by non-zero suffix, where more than one block shares it. */
export function duplicatedBlockSuffixes(s: Shrinker): Array<[Uint8Array, number[]]> {
  const groups = new Map<string, [Uint8Array, number[]]>();
  for (const block of s.blocks) {
    const suffix = nonZeroSuffix(s.buffer.subarray(block.start, block.end));
    if (suffix.length === 0) continue;
    const key = bytesToHex(suffix);
    const group = groups.get(key);
    if (group) {
      group[1].push(block.index);
    } else {
      groups.set(key, [Uint8Array.from(suffix), [block.index]]);
    }
  }
  return [...groups.values()]
    .filter(([, indices]) => indices.length > 1)
    .sort(([a], [b]) => compareLexThenLength(a, b));
}

function compareLexThenLength(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    if (d !== 0) return d;
  }
  return a.length - b.length;
}

/** Lower every copy of a repeated block value together. */
export const minimizeDuplicatedBlocks = definePass<[Uint8Array, number[]]>(
  'minimizeDuplicatedBlocks',
  duplicatedBlockSuffixes,
  (s, [suffix, targets]) => {
    Minimizer.shrink(suffix, (b) => s.tryShrinkingBlocks(targets, b), {
      random: s.random,
      full: false,
    });
  }
);

export const minimizeIndividualBlocks = definePass<number>(
  'minimizeIndividualBlocks',
  (s) => s.blocks.filter((block) => !block.forced).map((block) => block.index),
  (s, index) => {
    const block = s.blocks[index];
    if (!block) return;
    Minimizer.shrink(
      s.buffer.slice(block.start, block.end),
      (b) => s.tryShrinkingBlocks([index], b),
      { random: s.random, full: false }
    );
  }
);

// ---------------------------------------------------------------------
// Emergency passes

const blockPrograms = new Map<string, ShrinkPassDefinition>();

/**
 * A pass running `description` over every run of consecutive blocks:
 * `-` lowers a block by one (the step is skipped if it is zero) and `X`
 * deletes it.
 */
export function blockProgram(description: string): ShrinkPassDefinition {
  const existing = blockPrograms.get(description);
  if (existing) return existing;
  if (!/^[-X]+$/.test(description)) {
    throw new RangeError(`Unrecognised block program '${description}'`);
  }
  const pass = definePass<number>(
    `blockProgram(${description})`,
    (s) => s.blocks.map((block) => block.index),
    (s, i) => {
      const n = description.length;
      if (i + n > s.blocks.length) return;
      let attempt = Uint8Array.from(s.buffer);
      for (let k = n - 1; k >= 0; k--) {
        const block = s.blocks[i + k];
        if (!block) return;
        if (description[k] === '-') {
          const value = intFromBytes(attempt.subarray(block.start, block.end));
          if (value === 0n) return;
          attempt.set(intToBytes(value - 1n, block.end - block.start), block.start);
        } else {
          attempt = concatBytes(attempt.subarray(0, block.start), attempt.subarray(block.end));
        }
      }
      s.incorporateNewBuffer(attempt);
    }
  );
  blockPrograms.set(description, pass);
  return pass;
}

/** Delete a span after a shrinking block while lowering that block by one. */
export const exampleDeletionWithBlockLowering = definePass<[number, Span]>(
  'exampleDeletionWithBlockLowering',
  (s) =>
    s.blocks
      .filter((block) => s.isShrinkingBlock(block.index))
      .flatMap((block) =>
        s.spans
          .filter((span) => span.start >= block.end && span.end > span.start)
          .map((span): [number, Span] => [block.index, span])
      ),
  (s, [index, span]) => {
    const block = s.blocks[index];
    if (!block) return;
    const n = intFromBytes(s.buffer.subarray(block.start, block.end));
    if (n === 0n) return;
    const lowered = replaceRange(
      s.buffer,
      block.start,
      block.end,
      intToBytes(n - 1n, block.end - block.start)
    );
    s.incorporateNewBuffer(replaceRange(lowered, span.start, span.end, new Uint8Array(0)));
  }
);

/**
 * Move value from an earlier payload block to a later one of the same
 * size, keeping their sum. Finds the m + n = constant minima that lowering
 * blocks one at a time cannot reach.
 */
export const minimizeBlockPairsRetainingSum = definePass<[number, number]>(
  'minimizeBlockPairsRetainingSum',
  (s) => {
    const pairs: Array<[number, number]> = [];
    s.blocks.forEach((first) => {
      if (!isPayloadBlock(s, first.index) || isTrivial(s.buffer, first)) return;
      for (const second of s.blocks.slice(first.index + 1)) {
        if (!isPayloadBlock(s, second.index)) continue;
        if (second.end - second.start !== first.end - first.start) continue;
        pairs.push([first.index, second.index]);
      }
    });
    return pairs;
  },
  (s, [i, j]) => {
    const first = s.blocks[i];
    const second = s.blocks[j];
    if (!first || !second) return;
    const { start: u, end: v } = first;
    const { start: r, end: e } = second;
    const trial = (x: bigint, y: bigint): boolean => {
      if (e > s.buffer.length || !fits(x, v - u) || !fits(y, e - r)) return false;
      const attempt = Uint8Array.from(s.buffer);
      attempt.set(intToBytes(x, v - u), u);
      attempt.set(intToBytes(y, e - r), r);
      return s.incorporateNewBuffer(attempt);
    };
    const m = intFromBytes(s.buffer.subarray(u, v));
    const n = intFromBytes(s.buffer.subarray(r, e));
    if (m === 0n || !trial(m - 1n, n + 1n) || m <= 1n) return;

    const mNow = intFromBytes(s.buffer.subarray(u, v));
    const total = mNow + intFromBytes(s.buffer.subarray(r, e));
    IntegerShrinker.shrink(mNow, (x) => trial(x, total - x), { random: s.random });
  }
);

/**
 * Replace every byte `c` with a smaller byte everywhere at once. Shrinks
 * the set of bytes in use, which raises the cache hit rate as well.
 */
export const alphabetMinimize = definePass<number>(
  'alphabetMinimize',
  () => Array.from({ length: 256 }, (_, c) => c),
  (s, c) => {
    const buf = s.buffer;
    if (!buf.includes(c)) return;

    const canReplaceWith = (d: number): boolean => {
      if (d < 0) return false;
      if (!s.considerNewBuffer(buf.map((b) => (b === c ? d : b)))) return false;
      if (d <= 1) {
        findInteger((k) => {
          if (k > c) return false;
          return s.considerNewBuffer(buf.map((b) => (c - k <= b && b <= c && d < b ? d : b)));
        });
      }
      return true;
    };

    if (
      !canReplaceWith(c - 1) ||
      canReplaceWith(0) ||
      canReplaceWith(1) ||
      !canReplaceWith(c - 2)
    ) {
      return;
    }
    let lo = 1;
    let hi = c - 2;
    while (lo + 1 < hi) {
      const mid = Math.floor((lo + hi) / 2);
      if (canReplaceWith(mid)) {
        hi = mid;
      } else {
        lo = mid;
      }
    }
  }
);

/**
 * Rewrite each region a learned DFA matches into that DFA's smallest
 * string. Does nothing while no DFA has been learned.
 */
export const dfaReplacement = definePass<[number, number, number]>(
  'dfaReplacement',
  (s) =>
    s.learnedDfas.flatMap((dfa, d) =>
      dfa.allMatchingRegions(s.buffer).map(([u, v]): [number, number, number] => [d, u, v])
    ),
  (s, [d, u, v]) => {
    const dfa = s.learnedDfas[d];
    if (!dfa) return;
    const smallest = new DfaIndexer(dfa).at(0n);
    if (!smallest) return;
    const buf = s.buffer;
    if (v > buf.length || compareTapes(smallest, buf.subarray(u, v)) >= 0) return;
    s.incorporateNewBuffer(replaceRange(buf, u, v, smallest));
  }
);

export const COARSE_PASSES: readonly ShrinkPassDefinition[] = [
  passToDescendant,
  zeroExamples,
  adaptiveExampleDeletion,
];

export const FINE_PASSES: readonly ShrinkPassDefinition[] = [
  reorderExamples,
  minimizeFloats,
  minimizeDuplicatedBlocks,
  minimizeIndividualBlocks,
];

export const EMERGENCY_PASSES: readonly ShrinkPassDefinition[] = [
  blockProgram('-XX'),
  blockProgram('XX'),
  exampleDeletionWithBlockLowering,
  minimizeBlockPairsRetainingSum,
  alphabetMinimize,
  dfaReplacement,
];
