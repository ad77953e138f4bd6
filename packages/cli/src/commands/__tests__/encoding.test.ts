import { describe, expect, it } from 'vitest';

import { InvalidArgument } from '@choicetape/core';

import { describeFloat, sortTapes } from '../encoding.js';

describe('describeFloat', () => {
  it('prints small integers untagged', () => {
    expect(describeFloat('2')).toEqual([
      'float: 2',
      'lex: 0x0000000000000002',
      'sign: 0',
      'round-trip: ok',
    ]);
  });

  it('keeps the sign of negative zero', () => {
    expect(describeFloat('-0')).toEqual([
      'float: -0',
      'lex: 0x0000000000000000',
      'sign: 1',
      'round-trip: ok',
    ]);
  });

  it('accepts named values', () => {
    expect(describeFloat('nan')[3]).toBe('round-trip: ok');
    expect(describeFloat('-inf')[2]).toBe('sign: 1');
  });

  it('rejects non-numbers', () => {
    expect(() => describeFloat('abc')).toThrow(InvalidArgument);
    expect(() => describeFloat(' ')).toThrow(InvalidArgument);
  });
});

describe('sortTapes', () => {
  it('orders shorter tapes first, then bytewise', () => {
    expect(sortTapes(['0102', 'ff', '00', ''])).toEqual(['', '00', 'ff', '0102']);
  });

  it('names the offending tape', () => {
    expect(() => sortTapes(['00', 'abc'])).toThrow(/tape #2/);
  });
});
