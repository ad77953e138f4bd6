import { describe, it, expect } from 'vitest';

import { err, isErr, isOk, ok, type Result } from '../result.js';

function parsePositive(n: number): Result<number, string> {
  return n > 0 ? ok(n) : err(`${n} is not positive`);
}

describe('Result', () => {
  it('tags successes and failures', () => {
    expect(ok(3)).toEqual({ ok: true, value: 3 });
    expect(err('nope')).toEqual({ ok: false, error: 'nope' });
  });

  it('narrows with the type guards', () => {
    const good = parsePositive(1);
    const bad = parsePositive(0);
    expect(isOk(good)).toBe(true);
    expect(isErr(good)).toBe(false);
    expect(isOk(bad)).toBe(false);
    expect(isErr(bad) && bad.error).toBe('0 is not positive');
    expect(isOk(good) && good.value).toBe(1);
  });
});
