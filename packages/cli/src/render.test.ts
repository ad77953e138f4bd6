import { describe, it, expect } from 'vitest';

import { ErrorCode, type CLIErrorView } from '@choicetape/core';

import { renderCLIView, stripAnsi } from './render.js';

describe('renderCLIView', () => {
  it('renders title, location, details and workaround', () => {
    const view: CLIErrorView = {
      title: 'Error E104: Property failed',
      code: ErrorCode.PROPERTY_FAILED,
      location: 'Origin: Error at test.ts:1:1',
      details: ['Falsifying example: 0064'],
      workaround: 'Replay the tape',
      colors: false,
      terminalWidth: 80,
    };
    expect(renderCLIView(view).split('\n')).toEqual([
      'Error E104: Property failed',
      'Origin: Error at test.ts:1:1',
      '  Falsifying example: 0064',
      'Workaround: Replay the tape',
    ]);
  });

  it('wraps prose to the terminal width', () => {
    const view: CLIErrorView = {
      title: 'Error E300: Bad setting',
      code: ErrorCode.CONFIGURATION_ERROR,
      details: [],
      workaround: 'Use a positive number here',
      colors: false,
      terminalWidth: 20,
    };
    expect(renderCLIView(view).split('\n')).toEqual([
      'Error E300: Bad setting',
      'Workaround: Use a',
      'positive number here',
    ]);
  });

  it('applies ANSI colors when enabled', () => {
    const view: CLIErrorView = {
      title: 'Error E500: Internal error',
      code: ErrorCode.INTERNAL_ERROR,
      details: [],
      colors: true,
      terminalWidth: 80,
    };
    const out = renderCLIView(view);
    expect(out.startsWith('\u001B[1m')).toBe(false);
    expect(out.startsWith('\u001B[31m')).toBe(true);
    expect(stripAnsi(out)).toBe('Error E500: Internal error');
  });
});
