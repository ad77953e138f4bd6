/**
 * The narrow surface the codec primitives draw through. ConjectureData
 * implements it; primitives never see the tape directly.
 */
export interface BitSource {
  /** Draw n bits (ceil(n/8) bytes, high bits of the first byte masked). */
  drawBits(n: number, forced?: bigint): bigint;
  startSpan(label: number): void;
  stopSpan(discard?: boolean): void;
  markInvalid(reason?: string): never;
}
