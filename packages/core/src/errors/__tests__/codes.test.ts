import { describe, test, expect } from 'vitest';

import { ErrorCode, EXIT_CODES, getExitCode } from '../codes.js';

describe('Error codes', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    expect(new Set(codes).size).toBe(codes.length);
  });

  test('codes follow the E### pattern', () => {
    for (const code of Object.values(ErrorCode)) {
      expect(code).toMatch(/^E\d{3}$/);
    }
  });

  test('every code has an exit code', () => {
    for (const code of Object.values(ErrorCode)) {
      expect(typeof EXIT_CODES[code]).toBe('number');
    }
    expect(getExitCode(ErrorCode.PROPERTY_FAILED)).toBe(1);
    expect(getExitCode(ErrorCode.CONFIGURATION_ERROR)).toBe(50);
  });
});
