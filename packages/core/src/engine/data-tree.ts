/**
 * Byte trie over every tape the runner has executed.
 *
 * Each edge is one (masked) byte. Terminal nodes hold the result of the
 * execution that ended there; interior nodes remember which bytes were
 * forced, the mask of a partial first byte, and the size of the block
 * that starts at them. A node is dead once every continuation through it
 * has been explored, so generation never has to revisit it.
 */

import type { ConjectureResult } from '../data/conjecture-data.js';
import { Status } from '../data/status.js';
import type { Random } from '../util/rng.js';

interface TreeNode {
  readonly children: Map<number, TreeNode>;
  result?: ConjectureResult;
  forced?: number;
  mask?: number;
  blockSize?: number;
  dead: boolean;
}

export type TreeLookup =
  | { kind: 'result'; result: ConjectureResult }
  | { kind: 'overrun' }
  | { kind: 'unknown' };

function newNode(): TreeNode {
  return { children: new Map(), dead: false };
}

export class DataTree {
  private readonly root: TreeNode = newNode();
  private nodeCount = 1;

  /** Nodes at or past `cap` bytes deep are dead on arrival. */
  constructor(readonly cap: number) {}

  get isExhausted(): boolean {
    return this.root.dead;
  }

  get size(): number {
    return this.nodeCount;
  }

  add(result: ConjectureResult): void {
    const { buffer } = result;
    const path: TreeNode[] = [this.root];
    let node = this.root;
    for (let i = 0; i < buffer.length; i++) {
      // A stored result on the way means this execution added nothing new.
      if (node.result !== undefined) return;
      if (result.forcedIndices.has(i)) node.forced = buffer[i];
      const mask = result.masks.get(i);
      if (mask !== undefined) node.mask = mask;
      const byte = buffer[i] ?? 0;
      let child = node.children.get(byte);
      if (!child) {
        child = newNode();
        node.children.set(byte, child);
        this.nodeCount++;
      }
      node = child;
      path.push(node);
    }

    for (const block of result.blocks) {
      const start = path[block.start];
      if (start && block.start < buffer.length) {
        start.blockSize = block.end - block.start;
      }
    }

    for (let depth = this.cap; depth < path.length; depth++) {
      const deep = path[depth];
      if (deep) deep.dead = true;
    }

    if (result.status === Status.OVERRUN) return;
    node.result ??= result;
    if (node.dead) return;
    node.dead = true;
    for (let depth = path.length - 2; depth >= 0; depth--) {
      const parent = path[depth];
      if (!parent || !this.fullyExplored(parent)) break;
      parent.dead = true;
    }
  }

  /**
   * What the trie knows about executing `buffer`: the stored result of a
   * terminal node on its path, a definite overrun when the buffer runs
   * out before the test would stop reading, or nothing.
   */
  lookup(buffer: Uint8Array): TreeLookup {
    let node = this.root;
    for (let i = 0; i < buffer.length; i++) {
      if (node.result !== undefined) return { kind: 'result', result: node.result };
      if (node.blockSize !== undefined && i + node.blockSize > buffer.length) {
        return { kind: 'overrun' };
      }
      let byte = node.forced ?? buffer[i] ?? 0;
      if (node.mask !== undefined) byte &= node.mask;
      const child = node.children.get(byte);
      if (!child) return { kind: 'unknown' };
      node = child;
    }
    if (node.result !== undefined) return { kind: 'result', result: node.result };
    // A known non-terminal node means the test kept reading past here.
    return this.nodeCount === 1 ? { kind: 'unknown' } : { kind: 'overrun' };
  }

  /**
   * A prefix whose continuation has never been executed. Walks from the
   * root taking random live branches until it steps off the known tree.
   */
  generateNovelPrefix(random: Random): Uint8Array {
    const prefix: number[] = [];
    let node = this.root;
    while (!node.dead) {
      let byte: number;
      if (node.forced !== undefined) {
        byte = node.forced;
      } else {
        const upper = node.mask ?? 0xff;
        byte = random.randint(0, upper);
        const picked = node.children.get(byte);
        if (picked?.dead) {
          const live: number[] = [];
          for (let c = 0; c <= upper; c++) {
            const child = node.children.get(c);
            if (!child || !child.dead) live.push(c);
          }
          if (live.length === 0) break;
          byte = random.choice(live);
        }
      }
      prefix.push(byte);
      const next = node.children.get(byte);
      if (!next) break;
      node = next;
    }
    return Uint8Array.from(prefix);
  }

  private fullyExplored(node: TreeNode): boolean {
    const width = (node.mask ?? 0xff) + 1;
    if (node.forced === undefined && node.children.size < width) return false;
    for (const child of node.children.values()) {
      if (!child.dead) return false;
    }
    return true;
  }
}
