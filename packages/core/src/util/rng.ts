import { randomBytes } from 'node:crypto';

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

/**
 * xorshift32 RNG with uint32 state.
 * Initialization: x = (seed >>> 0) ^ fnv1a32(stream)
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 * next() returns x >>> 0
 */
export class XorShift32 {
  private x: number;

  constructor(seed: number, stream: string) {
    // A zero state is a fixed point of the step function
    this.x = ((seed >>> 0) ^ fnv1a32(stream)) >>> 0 || 0x9e3779b9;
  }

  /** Returns the next uint32 value. */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a deterministic float in [0, 1). */
  nextFloat01(): number {
    return (this.next() >>> 0) / 0x100000000;
  }
}

/**
 * Seedable random source used by generation, mutation and shrinking.
 * Same seed, same sequence.
 */
export class Random {
  readonly #core: XorShift32;

  constructor(seed: number | string) {
    this.#core =
      typeof seed === 'number'
        ? new XorShift32(seed, 'choicetape')
        : new XorShift32(0, seed);
  }

  /** Fresh random source seeded from the OS. */
  static fromEntropy(): Random {
    return new Random(randomBytes(4).readUInt32BE(0));
  }

  next(): number {
    return this.#core.next();
  }

  random(): number {
    return this.#core.nextFloat01();
  }

  /** Uniform integer in [lo, hi], both inclusive. */
  randint(lo: number, hi: number): number {
    if (hi <= lo) return lo;
    const span = hi - lo + 1;
    if (span <= 0x100000000) {
      return lo + Math.floor(this.random() * span);
    }
    return lo + Math.floor((this.random() + this.next() / 2 ** 64) * span);
  }

  getrandbits(n: number): bigint {
    let result = 0n;
    let remaining = n;
    while (remaining > 0) {
      const take = Math.min(32, remaining);
      const chunk = take === 32 ? this.next() : this.next() >>> (32 - take);
      result = (result << BigInt(take)) | BigInt(chunk);
      remaining -= take;
    }
    return result;
  }

  bytes(n: number): Uint8Array {
    const out = new Uint8Array(n);
    for (let i = 0; i < n; i++) out[i] = this.next() & 0xff;
    return out;
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty sequence');
    }
    const picked = items[this.randint(0, items.length - 1)];
    if (picked === undefined) throw new RangeError('Index out of range');
    return picked;
  }

  /** In-place Fisher–Yates shuffle. */
  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.randint(0, i);
      const a = items[i];
      const b = items[j];
      if (a === undefined || b === undefined) continue;
      items[i] = b;
      items[j] = a;
    }
    return items;
  }

  sample<T>(items: readonly T[], k: number): T[] {
    return this.shuffle([...items]).slice(0, Math.max(0, k));
  }
}
