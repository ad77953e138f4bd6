/**
 * Identity of a failure, used to deduplicate and group what the runner finds.
 * Two results are the same bug exactly when their origin keys are equal.
 */
export interface InterestingOrigin {
  kind: string;
  location: string;
  detail?: string;
}

export function originKey(origin: InterestingOrigin): string {
  return origin.detail === undefined
    ? `${origin.kind}@${origin.location}`
    : `${origin.kind}@${origin.location}#${origin.detail}`;
}

export function originsEqual(
  a: InterestingOrigin | null,
  b: InterestingOrigin | null
): boolean {
  if (a === null || b === null) return a === b;
  return originKey(a) === originKey(b);
}

const FRAME_PATTERN = /\(?([^()\s]+:\d+:\d+)\)?\s*$/;

/** Origin of an uncaught error: its name plus the first stack frame. */
export function originFromError(error: unknown): InterestingOrigin {
  if (error instanceof Error) {
    const frames = (error.stack ?? '').split('\n').slice(1);
    const first = frames.find((line) => FRAME_PATTERN.test(line.trim()));
    const match = first ? FRAME_PATTERN.exec(first.trim()) : null;
    return { kind: error.name, location: match?.[1] ?? '<unknown>' };
  }
  return { kind: typeof error, location: '<thrown value>' };
}
