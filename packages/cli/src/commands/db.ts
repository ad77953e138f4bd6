import { DirectoryBasedExampleDatabase, InvalidArgument, bytesToHex } from '@choicetape/core';
import { existsSync } from 'node:fs';

import { parseHexArg } from '../flags.js';

function openDatabase(dir: string): DirectoryBasedExampleDatabase {
  const db = new DirectoryBasedExampleDatabase(dir);
  if (!existsSync(db.root)) {
    throw new InvalidArgument({
      message: `No example database at ${db.root}`,
      context: { argument: 'dir', suggestion: 'Pass the directory the runner was given as its database' },
    });
  }
  return db;
}

/** `<hex key>\t<entries>` for every stored key. */
export function listKeys(dir: string): string[] {
  return openDatabase(dir)
    .keys()
    .map(({ key, entries }) => `${bytesToHex(key)}\t${entries}`);
}

/** Stored tapes for a key, as hex, smallest first. */
export function showKey(dir: string, keyHex: string): string[] {
  const key = parseHexArg(keyHex, 'key');
  return openDatabase(dir).fetch(key).map(bytesToHex);
}

/**
 * Delete one tape, or every tape under the key when `valueHex` is
 * omitted. Returns the number of tapes removed.
 */
export function deleteEntries(dir: string, keyHex: string, valueHex?: string): number {
  const key = parseHexArg(keyHex, 'key');
  const db = openDatabase(dir);
  const stored = db.fetch(key);
  if (valueHex === undefined) {
    db.clear(key);
    return stored.length;
  }
  const value = parseHexArg(valueHex, 'value');
  const hex = bytesToHex(value);
  if (!stored.some((v) => bytesToHex(v) === hex)) return 0;
  db.delete(key, value);
  return 1;
}
