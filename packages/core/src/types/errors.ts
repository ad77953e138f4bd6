/* eslint-disable max-lines */
/**
 * Error hierarchy for choicetape
 * Structured errors with stable codes, context and exit codes
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';
import type { HealthCheck } from '../engine/health-check.js';
import type { InterestingOrigin } from '../data/origin.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  value?: unknown; // Problematic value (may contain PII)
  valueExcerpt?: string; // Safe excerpt of value
  setting?: string; // Offending settings key
  argument?: string; // Offending draw argument
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  setting?: string;
}

export interface ChoicetapeErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

type SubclassParams = Omit<ChoicetapeErrorParams, 'errorCode'> & {
  errorCode?: ErrorCode;
};

/**
 * Base error class for all choicetape errors
 */
export abstract class ChoicetapeError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];
  public documentation?: string;

  constructor(params: ChoicetapeErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and applies basic PII redaction to context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      setting: this.context?.setting,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  // Basic PII redaction for production serialization
  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;
    const SENSITIVE_KEYS = new Set([
      'password',
      'apiKey',
      'secret',
      'token',
    ]);

    const redactValue = (val: unknown): unknown => {
      if (val instanceof Uint8Array) return `<${val.length} bytes>`;
      if (val && typeof val === 'object') {
        if (Array.isArray(val)) return val.map(redactValue);
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redactValue(v);
        }
        return out;
      }
      return val;
    };

    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
    }
    return redacted;
  }
}

/**
 * A health check tripped during generation; always fatal
 */
export class FailedHealthCheck extends ChoicetapeError {
  public readonly healthCheck: HealthCheck;

  constructor(params: SubclassParams & { healthCheck: HealthCheck }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.FAILED_HEALTH_CHECK,
      severity: params.severity,
      context: { healthCheck: params.healthCheck, ...(params.context ?? {}) },
      cause: params.cause,
    });
    this.healthCheck = params.healthCheck;
    this.suggestions = [
      `Add '${params.healthCheck}' to suppressedHealthChecks if this is expected`,
    ];
  }
}

/**
 * A stored failing tape did not reproduce its origin on replay
 */
export class Flaky extends ChoicetapeError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.FLAKY });
  }
}

/**
 * Generation never produced a valid example
 */
export class Unsatisfiable extends ChoicetapeError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.UNSATISFIABLE,
    });
  }
}

/**
 * A single minimised failure, surfaced to the caller
 */
export class PropertyFailed extends ChoicetapeError {
  public readonly buffer: Uint8Array;
  public readonly origin: InterestingOrigin;
  public readonly failure: unknown;
  public readonly output: string;

  constructor(
    params: SubclassParams & {
      buffer: Uint8Array;
      origin: InterestingOrigin;
      failure?: unknown;
      output?: string;
    }
  ) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.PROPERTY_FAILED,
      severity: params.severity,
      context: {
        origin: params.origin,
        valueExcerpt: excerptBytes(params.buffer),
        ...(params.context ?? {}),
      },
      cause: params.failure instanceof Error ? params.failure : params.cause,
    });
    this.buffer = params.buffer;
    this.origin = params.origin;
    this.failure = params.failure;
    this.output = params.output ?? '';
  }
}

/**
 * Every distinct failure found during one run
 */
export class MultipleFailures extends ChoicetapeError {
  public readonly failures: readonly PropertyFailed[];

  constructor(params: SubclassParams & { failures: PropertyFailed[] }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.MULTIPLE_FAILURES,
      context: {
        failureCount: params.failures.length,
        ...(params.context ?? {}),
      },
    });
    this.failures = params.failures;
  }
}

/**
 * An execution took longer than deadlinePerExampleMs
 */
export class DeadlineExceeded extends ChoicetapeError {
  public readonly runtimeMs: number;
  public readonly deadlineMs: number;

  constructor(
    params: SubclassParams & { runtimeMs: number; deadlineMs: number }
  ) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.DEADLINE_EXCEEDED,
      context: {
        runtimeMs: params.runtimeMs,
        deadlineMs: params.deadlineMs,
        ...(params.context ?? {}),
      },
    });
    this.runtimeMs = params.runtimeMs;
    this.deadlineMs = params.deadlineMs;
  }
}

/**
 * A draw or mutation was attempted on frozen data
 */
export class Frozen extends ChoicetapeError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.FROZEN });
  }
}

/**
 * Programming errors in the executor: bad draw constraints, unbalanced spans
 */
export class InvalidArgument extends ChoicetapeError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_ARGUMENT,
    });
  }
}

/**
 * An object was used after the state it depends on moved on
 */
export class InvalidState extends ChoicetapeError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_STATE,
    });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends ChoicetapeError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Utility functions for error handling
 */
export function isChoicetapeError(error: unknown): error is ChoicetapeError {
  return error instanceof ChoicetapeError;
}

function excerptBytes(buffer: Uint8Array): string {
  const shown = Array.from(buffer.subarray(0, 32), (b) =>
    b.toString(16).padStart(2, '0')
  ).join('');
  return buffer.length > 32 ? `${shown}… (${buffer.length} bytes)` : shown;
}
