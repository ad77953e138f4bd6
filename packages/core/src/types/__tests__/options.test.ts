import { describe, it, expect } from 'vitest';

import { HealthCheck } from '../../engine/health-check.js';
import { ErrorCode } from '../../errors/codes.js';
import { ConfigError } from '../errors.js';
import { DEFAULT_SETTINGS, parseSettings, resolveSettings } from '../options.js';

describe('resolveSettings', () => {
  it('applies every default when no settings are given', () => {
    const resolved = resolveSettings();
    expect(resolved.maxExamples).toBe(100);
    expect(resolved.maxIterations).toBe(1000);
    expect(resolved.bufferSize).toBe(8192);
    expect(resolved.phases).toEqual(['reuse', 'generate', 'target', 'shrink']);
    expect(resolved.deadlinePerExampleMs).toBe(200);
    expect(resolved.maxShrinks).toBe(500);
    expect(resolved.verbosity).toBe('normal');
    expect(resolved.databaseKey).toBeNull();
  });

  it('derives maxIterations from maxExamples', () => {
    expect(resolveSettings({ maxExamples: 5 }).maxIterations).toBe(1000);
    expect(resolveSettings({ maxExamples: 200 }).maxIterations).toBe(2000);
    expect(resolveSettings({ maxExamples: 200, maxIterations: 7 }).maxIterations).toBe(7);
  });

  it('puts phases in canonical order', () => {
    expect(resolveSettings({ phases: ['shrink', 'reuse'] }).phases).toEqual(['reuse', 'shrink']);
  });

  it('keeps explicit nulls and suppressed health checks', () => {
    const resolved = resolveSettings({
      deadlinePerExampleMs: null,
      suppressedHealthChecks: [HealthCheck.TOO_SLOW],
    });
    expect(resolved.deadlinePerExampleMs).toBeNull();
    expect(resolved.suppressedHealthChecks).toEqual(['tooSlow']);
  });

  it('returns a frozen object and leaves the defaults untouched', () => {
    const resolved = resolveSettings({ maxExamples: 3 });
    expect(Object.isFrozen(resolved)).toBe(true);
    expect(DEFAULT_SETTINGS.maxExamples).toBe(100);
  });

  it('re-resolves already resolved settings to the same values', () => {
    const resolved = resolveSettings({ maxExamples: 10, seed: 4 });
    expect(resolveSettings(resolved)).toEqual(resolved);
  });

  it('rejects unknown settings', () => {
    expect(() => resolveSettings({ maxExampels: 10 })).toThrow(ConfigError);
    const result = parseSettings({ maxExampels: 10 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Unknown setting 'maxExampels'");
      expect(result.error.setting).toBe('maxExampels');
      expect(result.error.errorCode).toBe(ErrorCode.CONFIGURATION_ERROR);
    }
  });

  it('names the offending setting for out-of-range values', () => {
    const result = parseSettings({ maxExamples: 0 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.setting).toBe('maxExamples');
      expect(result.error.message).toBe("Setting 'maxExamples' must be >= 1");
    }
  });

  it('rejects unknown phases and health checks', () => {
    expect(parseSettings({ phases: ['explain'] }).ok).toBe(false);
    expect(parseSettings({ suppressedHealthChecks: ['notACheck'] }).ok).toBe(false);
    expect(parseSettings('not an object').ok).toBe(false);
  });
});
