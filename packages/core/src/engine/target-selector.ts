import type { ConjectureResult } from '../data/conjecture-data.js';
import { Status } from '../data/status.js';
import type { Random } from '../util/rng.js';

export const MUTATION_POOL_SIZE = 100;

/** Remove and return a random element, reordering `values`. */
export function popRandom<T>(random: Random, values: T[]): T | undefined {
  if (values.length === 0) return undefined;
  const i = random.randint(0, values.length - 1);
  const last = values.pop();
  if (last === undefined || i === values.length) return last;
  const picked = values[i];
  values[i] = last;
  return picked;
}

/**
 * Bounded pool of mutation origins. Only examples of the best status seen
 * so far (INTERESTING excluded) are kept, and examples never handed out
 * are preferred over ones already mutated from.
 */
export class TargetSelector {
  private bestStatus: Status = Status.OVERRUN;
  private fresh: ConjectureResult[] = [];
  private used: ConjectureResult[] = [];

  constructor(
    private readonly random: Random,
    private readonly poolSize = MUTATION_POOL_SIZE
  ) {}

  get size(): number {
    return this.fresh.length + this.used.length;
  }

  add(result: ConjectureResult): void {
    if (result.status === Status.INTERESTING) return;
    if (result.status < this.bestStatus) return;
    if (result.status > this.bestStatus) {
      this.bestStatus = result.status;
      this.fresh = [];
      this.used = [];
    }
    this.fresh.push(result);
    if (this.size > this.poolSize) {
      popRandom(this.random, this.used.length > 0 ? this.used : this.fresh);
    }
  }

  select(): ConjectureResult | undefined {
    const picked = popRandom(this.random, this.fresh);
    if (picked !== undefined) {
      this.used.push(picked);
      return picked;
    }
    return this.used.length > 0 ? this.random.choice(this.used) : undefined;
  }
}
