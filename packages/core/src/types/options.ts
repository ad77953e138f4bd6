/**
 * Settings for a choicetape run
 *
 * All settings are optional with conservative defaults. `resolveSettings`
 * merges user input over the defaults and validates the result against a
 * JSON schema compiled once with ajv.
 */

import AjvModule, { type ErrorObject } from 'ajv';

import { ALL_HEALTH_CHECKS, type HealthCheck } from '../engine/health-check.js';
import { ConfigError } from './errors.js';
import { err, ok, type Result } from './result.js';

export const PHASES = ['reuse', 'generate', 'target', 'shrink'] as const;
export type Phase = (typeof PHASES)[number];

export const VERBOSITY_LEVELS = ['quiet', 'normal', 'verbose', 'debug'] as const;
export type Verbosity = (typeof VERBOSITY_LEVELS)[number];

/**
 * User-facing settings; every field is optional
 */
export interface EngineSettings {
  /** Valid examples before generation stops (default: 100) */
  maxExamples?: number;
  /** Test-function calls before generation stops; null derives max(10·maxExamples, 1000) */
  maxIterations?: number | null;
  /** Wall-clock budget in milliseconds; null disables (default: null) */
  timeBudgetMs?: number | null;
  /** Maximum tape length (default: 8192) */
  bufferSize?: number;
  /** Seed from databaseKey, or a constant (default: false) */
  derandomize?: boolean;
  /** Explicit seed when not derandomized (default: null) */
  seed?: number | null;
  /** Persistence key; null disables the database (default: null) */
  databaseKey?: string | null;
  /** Health checks that never fail the run (default: []) */
  suppressedHealthChecks?: HealthCheck[];
  /** Enabled phases, run in canonical order (default: all) */
  phases?: Phase[];
  /** Keep generating after the first bug and report every origin (default: true) */
  reportMultipleBugs?: boolean;
  /** Per-execution deadline excluding draw time; null disables (default: 200) */
  deadlinePerExampleMs?: number | null;
  /** Successful shrinks before the run stops (default: 500) */
  maxShrinks?: number;
  /** Cap on distinct failure origins tracked (default: 32) */
  maxInterestingOrigins?: number;
  /** Reporter verbosity (default: 'normal') */
  verbosity?: Verbosity;
  /** Enable metrics collection (default: true) */
  metrics?: boolean;
}

export interface ResolvedSettings {
  maxExamples: number;
  maxIterations: number;
  timeBudgetMs: number | null;
  bufferSize: number;
  derandomize: boolean;
  seed: number | null;
  databaseKey: string | null;
  suppressedHealthChecks: readonly HealthCheck[];
  phases: readonly Phase[];
  reportMultipleBugs: boolean;
  deadlinePerExampleMs: number | null;
  maxShrinks: number;
  maxInterestingOrigins: number;
  verbosity: Verbosity;
  metrics: boolean;
}

/**
 * Default settings; maxIterations here matches the default maxExamples
 */
export const DEFAULT_SETTINGS: Readonly<ResolvedSettings> = Object.freeze({
  maxExamples: 100,
  maxIterations: 1000,
  timeBudgetMs: null,
  bufferSize: 8192,
  derandomize: false,
  seed: null,
  databaseKey: null,
  suppressedHealthChecks: [],
  phases: PHASES,
  reportMultipleBugs: true,
  deadlinePerExampleMs: 200,
  maxShrinks: 500,
  maxInterestingOrigins: 32,
  verbosity: 'normal',
  metrics: true,
});

const nullableNumber = (minimum: number): Record<string, unknown> => ({
  anyOf: [{ type: 'number', minimum }, { type: 'null' }],
});

const SETTINGS_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    maxExamples: { type: 'integer', minimum: 1 },
    maxIterations: {
      anyOf: [{ type: 'integer', minimum: 1 }, { type: 'null' }],
    },
    timeBudgetMs: nullableNumber(0),
    bufferSize: { type: 'integer', minimum: 1 },
    derandomize: { type: 'boolean' },
    seed: { anyOf: [{ type: 'integer' }, { type: 'null' }] },
    databaseKey: { anyOf: [{ type: 'string', minLength: 1 }, { type: 'null' }] },
    suppressedHealthChecks: {
      type: 'array',
      items: { enum: [...ALL_HEALTH_CHECKS] },
      uniqueItems: true,
    },
    phases: {
      type: 'array',
      items: { enum: [...PHASES] },
      uniqueItems: true,
    },
    reportMultipleBugs: { type: 'boolean' },
    deadlinePerExampleMs: nullableNumber(0),
    maxShrinks: { type: 'integer', minimum: 0 },
    maxInterestingOrigins: { type: 'integer', minimum: 1 },
    verbosity: { enum: [...VERBOSITY_LEVELS] },
    metrics: { type: 'boolean' },
  },
} as const;

// ajv ships CommonJS; under NodeNext the constructor is the default export's `default`.
const Ajv = AjvModule.default;

let compiled: ReturnType<typeof compileValidator> | undefined;

function compileValidator() {
  const ajv = new Ajv({ allErrors: true, strict: true });
  return ajv.compile<EngineSettings>(SETTINGS_SCHEMA);
}

function describeError(error: ErrorObject): { setting: string; message: string } {
  const fromPath = error.instancePath.split('/').filter(Boolean)[0];
  const additional =
    error.keyword === 'additionalProperties' &&
    typeof error.params['additionalProperty'] === 'string'
      ? error.params['additionalProperty']
      : undefined;
  const setting = additional ?? fromPath ?? '<root>';
  const message =
    additional !== undefined
      ? `Unknown setting '${additional}'`
      : `Setting '${setting}' ${error.message ?? 'is invalid'}`;
  return { setting, message };
}

/**
 * Merge `input` over DEFAULT_SETTINGS and validate; throws ConfigError
 */
export function resolveSettings(input: unknown = {}): ResolvedSettings {
  const result = parseSettings(input);
  if (!result.ok) throw result.error;
  return result.value;
}

/**
 * Result-returning form of resolveSettings
 */
export function parseSettings(
  input: unknown = {}
): Result<ResolvedSettings, ConfigError> {
  compiled ??= compileValidator();
  const validate = compiled;
  if (!validate(input)) {
    const first = validate.errors?.[0];
    const { setting, message } = first
      ? describeError(first)
      : { setting: '<root>', message: 'Settings are invalid' };
    return err(
      new ConfigError({
        message,
        context: { setting, value: input },
      })
    );
  }

  const maxExamples = input.maxExamples ?? DEFAULT_SETTINGS.maxExamples;
  const resolved: ResolvedSettings = {
    ...DEFAULT_SETTINGS,
    ...stripUndefined(input),
    maxIterations: input.maxIterations ?? Math.max(10 * maxExamples, 1000),
    phases: PHASES.filter((phase) =>
      (input.phases ?? DEFAULT_SETTINGS.phases).includes(phase)
    ),
  };

  return ok(Object.freeze(resolved));
}

function stripUndefined(input: EngineSettings): Partial<ResolvedSettings> {
  const out: Partial<ResolvedSettings> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}
