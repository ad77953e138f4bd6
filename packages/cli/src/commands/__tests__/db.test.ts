import { mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DirectoryBasedExampleDatabase, InvalidArgument } from '@choicetape/core';

import { deleteEntries, listKeys, showKey } from '../db.js';

describe('db commands', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'choicetape-cli-'));
    const db = new DirectoryBasedExampleDatabase(dir);
    db.save(Uint8Array.of(0x6b), Uint8Array.of(1, 2));
    db.save(Uint8Array.of(0x6b), Uint8Array.of(3));
    db.save(Uint8Array.of(0x01), Uint8Array.of(9));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('lists keys with entry counts', () => {
    expect(listKeys(dir)).toEqual(['01\t1', '6b\t2']);
  });

  it('shows tapes smallest first', () => {
    expect(showKey(dir, '6b')).toEqual(['03', '0102']);
    expect(showKey(dir, '0x6b')).toEqual(['03', '0102']);
    expect(showKey(dir, 'ff')).toEqual([]);
  });

  it('deletes a single tape', () => {
    expect(deleteEntries(dir, '6b', '03')).toBe(1);
    expect(deleteEntries(dir, '6b', '04')).toBe(0);
    expect(showKey(dir, '6b')).toEqual(['0102']);
  });

  it('deletes a whole key', () => {
    expect(deleteEntries(dir, '6b')).toBe(2);
    expect(listKeys(dir)).toEqual(['01\t1']);
  });

  it('rejects bad input', () => {
    expect(() => showKey(dir, 'xyz')).toThrow(InvalidArgument);
    expect(() => listKeys(path.join(dir, 'missing'))).toThrow(InvalidArgument);
  });
});
