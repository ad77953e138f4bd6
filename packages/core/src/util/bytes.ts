/**
 * Byte tape helpers.
 *
 * The sort key over tapes is shortlex: a shorter tape always sorts first,
 * equal-length tapes compare bytewise. Every shrinking decision in the
 * engine is made against this order.
 */

export type Tape = Uint8Array;

export const EMPTY_TAPE: Tape = new Uint8Array(0);

/** Shortlex comparison: negative when a sorts before b. */
export function compareTapes(a: Tape, b: Tape): number {
  if (a.length !== b.length) return a.length - b.length;
  for (let i = 0; i < a.length; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    if (d !== 0) return d;
  }
  return 0;
}

export function sortKeyLess(a: Tape, b: Tape): boolean {
  return compareTapes(a, b) < 0;
}

/** Plain lexicographic comparison, ignoring length first. */
export function compareLex(a: Tape, b: Tape): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    if (d !== 0) return d;
  }
  return a.length - b.length;
}

export function bytesEqual(a: Tape, b: Tape): boolean {
  return a.length === b.length && compareLex(a, b) === 0;
}

export function startsWith(tape: Tape, prefix: Tape): boolean {
  if (prefix.length > tape.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (tape[i] !== prefix[i]) return false;
  }
  return true;
}

export function concatBytes(...parts: readonly Tape[]): Tape {
  let total = 0;
  for (const p of parts) total += p.length;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}

export function isAllZero(tape: Tape): boolean {
  for (const b of tape) if (b !== 0) return false;
  return true;
}

/** Big-endian decode. */
export function intFromBytes(bytes: Tape): bigint {
  let result = 0n;
  for (const b of bytes) result = (result << 8n) | BigInt(b);
  return result;
}

/** Big-endian encode into exactly `size` bytes (high bytes dropped). */
export function intToBytes(value: bigint, size: number): Tape {
  const out = new Uint8Array(size);
  let v = value;
  for (let i = size - 1; i >= 0; i--) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

export function bitLength(value: bigint): number {
  let v = value < 0n ? -value : value;
  let n = 0;
  while (v > 0n) {
    v >>= 1n;
    n++;
  }
  return n;
}

export function bytesToHex(tape: Tape): string {
  let s = '';
  for (const b of tape) s += b.toString(16).padStart(2, '0');
  return s;
}

export function hexToBytes(hex: string): Tape | undefined {
  const clean = hex.trim().toLowerCase();
  if (clean.length % 2 !== 0 || !/^[0-9a-f]*$/.test(clean)) return undefined;
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(2 * i, 2 * i + 2), 16);
  }
  return out;
}

/** Copy of `tape` with [start, end) replaced by `replacement`. */
export function replaceRange(
  tape: Tape,
  start: number,
  end: number,
  replacement: Tape
): Tape {
  return concatBytes(
    tape.subarray(0, start),
    replacement,
    tape.subarray(end)
  );
}
