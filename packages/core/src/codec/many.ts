import type { BitSource } from './bit-source.js';
import { biasedCoin } from './primitives.js';
import { LABELS } from '../util/labels.js';

export interface ManyOptions {
  minSize: number;
  maxSize: number;
  averageSize: number;
  forcedSize?: number;
}

/**
 * Collection loop with shrink-friendly structure: each element lives in its
 * own span, and a coin before each element decides whether to continue.
 *
 *   const elements = new Many(source, opts);
 *   while (elements.more()) { ...draw one element, maybe elements.reject() }
 */
export class Many {
  readonly #source: BitSource;
  readonly #minSize: number;
  readonly #maxSize: number;
  readonly #pContinue: number;
  readonly #forcedSize: number | undefined;
  #count = 0;
  #rejections = 0;
  #drawn = false;
  #forceStop = false;
  #rejected = false;

  constructor(source: BitSource, options: ManyOptions) {
    this.#source = source;
    this.#minSize = options.minSize;
    this.#maxSize = options.maxSize;
    this.#forcedSize = options.forcedSize;
    const average = Math.max(0, options.averageSize - options.minSize);
    this.#pContinue = 1 - 1 / (1 + average);
  }

  get count(): number {
    return this.#count;
  }

  /** Should another element be drawn? */
  more(): boolean {
    if (this.#drawn) {
      this.#source.stopSpan(this.#rejected);
    }
    this.#drawn = true;
    this.#rejected = false;
    this.#source.startSpan(LABELS.MANY_ELEMENT);

    let shouldContinue: boolean;
    if (this.#minSize === this.#maxSize) {
      shouldContinue = this.#count < this.#minSize;
    } else {
      let forced: boolean | undefined;
      if (this.#forcedSize !== undefined) {
        forced = this.#count < this.#forcedSize;
      } else if (this.#forceStop) {
        forced = false;
      } else if (this.#count < this.#minSize) {
        forced = true;
      } else if (this.#count >= this.#maxSize) {
        forced = false;
      }
      shouldContinue = biasedCoin(this.#source, this.#pContinue, forced);
    }

    if (shouldContinue) {
      this.#count++;
      return true;
    }
    this.#source.stopSpan();
    return false;
  }

  /** Drop the last element: its span is discarded and it does not count. */
  reject(reason?: string): void {
    if (this.#count <= 0) throw new RangeError('Nothing to reject');
    this.#count--;
    this.#rejections++;
    this.#rejected = true;
    if (this.#rejections > Math.max(3, 2 * this.#count)) {
      if (this.#count < this.#minSize) {
        this.#source.markInvalid(reason ?? 'too many rejected elements');
      }
      this.#forceStop = true;
    }
  }
}
