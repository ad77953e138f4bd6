import type { ConjectureResult } from '../data/conjecture-data.js';
import type { Span } from '../data/spans.js';
import { Status } from '../data/status.js';
import { concatBytes } from '../util/bytes.js';
import type { Random } from '../util/rng.js';

export const NO_SCORE = Number.NEGATIVE_INFINITY;

/** What the optimiser needs from the runner. */
export interface OptimiserHost {
  readonly random: Random;
  cachedTestFunction(buffer: Uint8Array): ConjectureResult;
  /** Execute with `prefix` fixed and fresh random bytes after it. */
  generateFromPrefix(prefix: Uint8Array): ConjectureResult;
}

type SpanSelector = (result: ConjectureResult) => number | undefined;

const MAX_CONSECUTIVE_FAILURES = 10;

/**
 * Hill climbing on one target label: keep a prefix of the current best
 * example, regenerate one span after it, and keep whatever scores higher.
 */
export class Optimiser {
  improvements = 0;
  private current: ConjectureResult;

  constructor(
    private readonly host: OptimiserHost,
    start: ConjectureResult,
    readonly label: string,
    private readonly maxImprovements = 100
  ) {
    this.current = start;
  }

  get best(): ConjectureResult {
    return this.current;
  }

  run(): void {
    this.climb(lastNonEmptySpan);
    this.climb((result) => {
      const candidates = result.spans
        .filter((span) => span.end > span.start)
        .map((span) => span.index);
      return candidates.length > 0 ? this.host.random.choice(candidates) : undefined;
    });
  }

  private score(result: ConjectureResult): number {
    return result.targetObservations.get(this.label) ?? NO_SCORE;
  }

  private consider(result: ConjectureResult): boolean {
    if (result.status < Status.VALID) return false;
    if (this.score(result) <= this.score(this.current)) return false;
    this.current = result;
    this.improvements++;
    return true;
  }

  private climb(select: SpanSelector): void {
    let failures = 0;
    while (
      failures < MAX_CONSECUTIVE_FAILURES &&
      this.current.status <= Status.VALID &&
      this.improvements <= this.maxImprovements
    ) {
      const index = select(this.current);
      if (index === undefined) return;
      if (this.attemptToImprove(index)) {
        failures = 0;
      } else {
        failures++;
      }
    }
  }

  private attemptToImprove(spanIndex: number): boolean {
    const data = this.current;
    const span: Span | undefined = data.spans[spanIndex];
    if (!span || span.end === span.start) return false;
    const prefix = data.buffer.slice(0, span.start);

    const attempt = this.host.generateFromPrefix(prefix);
    if (this.consider(attempt)) return true;

    const regenerated = attempt.spans[spanIndex];
    if (!regenerated || regenerated.start !== span.start) return false;
    const replacement = attempt.buffer.subarray(regenerated.start, regenerated.end);
    return this.consider(
      this.host.cachedTestFunction(
        concatBytes(prefix, replacement, data.buffer.subarray(span.end))
      )
    );
  }
}

function lastNonEmptySpan(result: ConjectureResult): number | undefined {
  for (let i = result.spans.length - 1; i >= 0; i--) {
    const span = result.spans[i];
    if (span && span.end > span.start) return i;
  }
  return undefined;
}
