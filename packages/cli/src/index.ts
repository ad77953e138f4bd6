#!/usr/bin/env node

// CLI entry point: `choicetape` inspects example databases and the tape
// encodings the engine uses. It never runs tests itself.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ChoicetapeError,
  ErrorCode,
  ErrorPresenter,
  getExitCode,
  isChoicetapeError,
} from '@choicetape/core';

import { deleteEntries, listKeys, showKey } from './commands/db.js';
import { describeFloat, sortTapes } from './commands/encoding.js';
import { renderCLIView } from './render.js';

class UnexpectedError extends ChoicetapeError {}

function print(lines: readonly string[]): void {
  if (lines.length > 0) process.stdout.write(lines.join('\n') + '\n');
}

function log(message: string): void {
  process.stderr.write(`[choicetape] ${message}\n`);
}

const program = new Command();

program
  .name('choicetape')
  .description('Inspect choicetape example databases and tape encodings')
  .version('0.1.0');

const db = program.command('db').description('Work with a directory-based example database');

db.command('keys')
  .description('List stored keys (hex) with their entry counts')
  .argument('<dir>', 'Database directory')
  .action((dir: string) => {
    print(listKeys(dir));
  });

db.command('show')
  .description('List the tapes stored under a key, smallest first')
  .argument('<dir>', 'Database directory')
  .argument('<key>', 'Key as hex')
  .action((dir: string, key: string) => {
    print(showKey(dir, key));
  });

db.command('delete')
  .description('Delete one tape, or every tape under the key')
  .argument('<dir>', 'Database directory')
  .argument('<key>', 'Key as hex')
  .argument('[value]', 'Tape as hex; omit to delete the whole key')
  .action((dir: string, key: string, value: string | undefined) => {
    const removed = deleteEntries(dir, key, value);
    log(`deleted ${removed} ${removed === 1 ? 'entry' : 'entries'}`);
  });

program
  .command('lex')
  .description('Print the lexicographic encoding of a float (use -- before negatives)')
  .argument('<float>', 'A number, nan, inf or -inf')
  .action((value: string) => {
    print(describeFloat(value));
  });

program
  .command('sort')
  .description('Order hex tapes by sort key: shorter first, then bytewise')
  .argument('<tapes...>', 'Tapes as hex')
  .action((tapes: string[]) => {
    print(sortTapes(tapes));
  });

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: process.stderr.isTTY === true });

  let error: ChoicetapeError;
  if (isChoicetapeError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new UnexpectedError({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  console.error(renderCLIView(presenter.formatForCLI(error)));
  return process.exit(getExitCode(error.errorCode));
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile = typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);

if (entryFile === moduleFile) {
  await main();
}
