/**
 * A labelled region of the tape. Spans nest; every drawBits call is a leaf
 * span labelled "draw bits". Span 0 covers the whole execution.
 */
export interface Span {
  index: number;
  label: number;
  start: number;
  end: number;
  depth: number;
  parent: number | null;
  children: number[];
  discarded: boolean;
}

/** One drawBits call: the unit the minimizer and the trie work in. */
export interface Block {
  index: number;
  start: number;
  end: number;
  forced: boolean;
}

export function spanLength(span: Pick<Span, 'start' | 'end'>): number {
  return span.end - span.start;
}

export function blockLength(block: Pick<Block, 'start' | 'end'>): number {
  return block.end - block.start;
}

/** Whether the region of `buffer` the span covers is all zero bytes. */
export function isTrivial(
  buffer: Uint8Array,
  region: Pick<Span, 'start' | 'end'>
): boolean {
  for (let i = region.start; i < region.end; i++) {
    if (buffer[i] !== 0) return false;
  }
  return true;
}
