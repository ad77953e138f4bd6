/**
 * Health checks guard against executors the engine cannot test
 * meaningfully: ones that mostly overrun, filter, stall or hang.
 */

export enum HealthCheck {
  DATA_TOO_LARGE = 'dataTooLarge',
  FILTER_TOO_MUCH = 'filterTooMuch',
  TOO_SLOW = 'tooSlow',
  LARGE_BASE_EXAMPLE = 'largeBaseExample',
  HUNG_TEST = 'hungTest',
}

export const ALL_HEALTH_CHECKS: readonly HealthCheck[] = Object.values(HealthCheck);

export function isHealthCheck(value: unknown): value is HealthCheck {
  return (
    typeof value === 'string' &&
    ALL_HEALTH_CHECKS.some((check) => check === value)
  );
}

/** Thresholds of the health-check window opened at the start of GENERATE. */
export const HEALTH_CHECK_LIMITS = {
  validToClose: 10,
  maxOverruns: 20,
  maxInvalid: 50,
  maxDrawTimeMs: 1000,
  hungTestMs: 5 * 60 * 1000,
} as const;

export class HealthCheckState {
  validExamples = 0;
  invalidExamples = 0;
  overrunExamples = 0;
  drawTimesMs: number[] = [];

  get totalDrawTimeMs(): number {
    return this.drawTimesMs.reduce((sum, t) => sum + t, 0);
  }
}
