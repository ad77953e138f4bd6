import { createHash } from 'node:crypto';

const LABEL_MASK = 2n ** 48n - 1n;

/** Stable 48-bit label for a span name. */
export function calcLabel(name: string): number {
  const digest = createHash('sha256').update(name, 'utf8').digest();
  return digest.readUIntBE(0, 6);
}

export function combineLabels(...labels: readonly number[]): number {
  let label = 0n;
  for (const l of labels) {
    label = ((label << 1n) & LABEL_MASK) ^ BigInt(l);
  }
  return Number(label & LABEL_MASK);
}

export const LABELS = {
  TOP: calcLabel('top'),
  DRAW_BITS: calcLabel('draw bits'),
  INTEGER_RANGE: calcLabel('integer range'),
  BIASED_COIN: calcLabel('biased coin'),
  SAMPLER: calcLabel('sampler'),
  DRAW_FLOAT: calcLabel('draw float'),
  NASTY_FLOAT: calcLabel('nasty float'),
  MANY_ELEMENT: calcLabel('many element'),
  MANY: calcLabel('many'),
  UNBOUNDED_INTEGER: calcLabel('unbounded integer'),
  STRING: calcLabel('string'),
  BYTES: calcLabel('bytes'),
} as const;
