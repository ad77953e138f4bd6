/**
 * Approximate pareto front over executed examples.
 *
 * An example is better when it is smaller in sort-key order, has a higher
 * status, and scores at least as high on every shared target label. Each
 * interesting origin is its own objective, so failures with different
 * origins never dominate each other.
 */

import type { ConjectureResult } from '../data/conjecture-data.js';
import { originsEqual } from '../data/origin.js';
import { Status } from '../data/status.js';
import { bytesEqual, bytesToHex, compareTapes } from '../util/bytes.js';
import type { Random } from '../util/rng.js';

export enum DominanceRelation {
  NO_DOMINANCE = 'NO_DOMINANCE',
  EQUAL = 'EQUAL',
  LEFT_DOMINATES = 'LEFT_DOMINATES',
  RIGHT_DOMINATES = 'RIGHT_DOMINATES',
}

type Comparable = Pick<
  ConjectureResult,
  'buffer' | 'status' | 'interestingOrigin' | 'targetObservations'
>;

export function dominance(left: Comparable, right: Comparable): DominanceRelation {
  if (bytesEqual(left.buffer, right.buffer)) return DominanceRelation.EQUAL;

  if (compareTapes(right.buffer, left.buffer) < 0) {
    const flipped = dominance(right, left);
    // With right strictly smaller, left can at best be incomparable.
    return flipped === DominanceRelation.LEFT_DOMINATES
      ? DominanceRelation.RIGHT_DOMINATES
      : DominanceRelation.NO_DOMINANCE;
  }

  if (left.status < right.status) return DominanceRelation.NO_DOMINANCE;

  if (
    left.status === Status.INTERESTING &&
    !originsEqual(left.interestingOrigin, right.interestingOrigin)
  ) {
    return DominanceRelation.NO_DOMINANCE;
  }

  for (const [label, score] of left.targetObservations) {
    const other = right.targetObservations.get(label);
    if (other !== undefined && other > score) {
      return DominanceRelation.NO_DOMINANCE;
    }
  }

  return DominanceRelation.LEFT_DOMINATES;
}

export type EvictionListener = (result: ConjectureResult) => void;

/** Members examined for eviction on each insertion. */
const CLEAR_DOWN_SAMPLE = 10;

export class ParetoFront implements Iterable<ConjectureResult> {
  private readonly front: ConjectureResult[] = [];
  private readonly contained = new Map<string, number>();
  private readonly listeners: EvictionListener[] = [];
  private pending: ConjectureResult | null = null;

  constructor(private readonly random: Random) {}

  /**
   * Offer `result` to the front. Returns whether it is a member afterwards;
   * false when it was below VALID, already present, or dominated.
   */
  add(result: ConjectureResult): boolean {
    if (result.status < Status.VALID) return false;

    if (this.front.length === 0) {
      this.insert(result);
      return true;
    }
    if (this.has(result.buffer)) return false;

    this.insert(result);
    this.pending = result;
    try {
      const dominators: ConjectureResult[] = [result];
      // The newcomer sits last; sample only from the members before it.
      const others = this.front.length - 1;
      const stopping = Math.max(0, others - CLEAR_DOWN_SAMPLE);
      for (let i = others - 1; i >= stopping; i--) {
        this.swap(i, this.random.randint(0, i));
        const existing = this.front[i];
        if (existing === undefined) continue;

        let replaced = false;
        let survived = true;
        let j = 0;
        while (j < dominators.length) {
          const v = dominators[j];
          if (v === undefined) break;
          const relation = dominance(existing, v);
          if (relation === DominanceRelation.LEFT_DOMINATES) {
            if (!replaced) {
              replaced = true;
              dominators[j] = existing;
              j++;
            } else {
              const last = dominators.pop();
              if (last !== undefined && j < dominators.length) {
                dominators[j] = last;
              }
            }
            this.remove(v);
          } else if (relation === DominanceRelation.RIGHT_DOMINATES) {
            this.remove(existing);
            survived = false;
            break;
          } else if (relation === DominanceRelation.EQUAL) {
            survived = false;
            break;
          } else {
            j++;
          }
        }
        if (survived) dominators.push(existing);
      }
      return this.has(result.buffer);
    } finally {
      this.pending = null;
    }
  }

  /** Called with each member evicted because another one dominates it. */
  onEvict(listener: EvictionListener): void {
    this.listeners.push(listener);
  }

  has(buffer: Uint8Array): boolean {
    return this.contained.has(bytesToHex(buffer));
  }

  get size(): number {
    return this.front.length;
  }

  [Symbol.iterator](): Iterator<ConjectureResult> {
    return this.front[Symbol.iterator]();
  }

  private insert(result: ConjectureResult): void {
    this.contained.set(bytesToHex(result.buffer), this.front.length);
    this.front.push(result);
  }

  private remove(result: ConjectureResult): void {
    const key = bytesToHex(result.buffer);
    const i = this.contained.get(key);
    if (i === undefined) return;
    this.swap(i, this.front.length - 1);
    this.front.pop();
    this.contained.delete(key);
    if (result !== this.pending) {
      for (const listener of this.listeners) listener(result);
    }
  }

  private swap(i: number, j: number): void {
    if (i === j) return;
    const a = this.front[i];
    const b = this.front[j];
    if (a === undefined || b === undefined) return;
    this.front[i] = b;
    this.front[j] = a;
    this.contained.set(bytesToHex(b.buffer), i);
    this.contained.set(bytesToHex(a.buffer), j);
  }
}
