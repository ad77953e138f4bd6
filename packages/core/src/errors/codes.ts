/**
 * Error Code Infrastructure
 * Stable error codes and exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Engine Errors (E100–E199)
  FAILED_HEALTH_CHECK = 'E100',
  FLAKY = 'E101',
  UNSATISFIABLE = 'E102',
  MULTIPLE_FAILURES = 'E103',
  PROPERTY_FAILED = 'E104',
  DEADLINE_EXCEEDED = 'E105',

  // Data Errors (E200–E299)
  FROZEN = 'E200',
  INVALID_ARGUMENT = 'E201',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Automaton Errors (E400–E499)
  INVALID_STATE = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.FAILED_HEALTH_CHECK]: 10,
  [ErrorCode.FLAKY]: 11,
  [ErrorCode.UNSATISFIABLE]: 12,
  [ErrorCode.MULTIPLE_FAILURES]: 13,
  [ErrorCode.PROPERTY_FAILED]: 1,
  [ErrorCode.DEADLINE_EXCEEDED]: 14,
  [ErrorCode.FROZEN]: 20,
  [ErrorCode.INVALID_ARGUMENT]: 21,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INVALID_STATE]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
