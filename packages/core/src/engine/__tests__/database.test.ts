import { mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import {
  DirectoryBasedExampleDatabase,
  InMemoryExampleDatabase,
  subKey,
} from '../database.js';

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);
const text = (s: string): Uint8Array => new TextEncoder().encode(s);

describe('subKey', () => {
  it('appends the suffix to the key bytes', () => {
    expect(new TextDecoder().decode(subKey(text('prop'), 'secondary'))).toBe('prop.secondary');
    expect(new TextDecoder().decode(subKey(text('prop'), 'pareto'))).toBe('prop.pareto');
  });
});

describe('InMemoryExampleDatabase', () => {
  it('stores each value once per key', () => {
    const db = new InMemoryExampleDatabase();
    db.save(text('k'), bytes(1, 2));
    db.save(text('k'), bytes(1, 2));
    db.save(text('k'), bytes(3));
    expect(db.fetch(text('k'))).toEqual([bytes(1, 2), bytes(3)]);
    expect(db.fetch(text('other'))).toEqual([]);
  });

  it('deletes and moves values between keys', () => {
    const db = new InMemoryExampleDatabase();
    db.save(text('a'), bytes(7));
    db.move(text('a'), text('b'), bytes(7));
    expect(db.fetch(text('a'))).toEqual([]);
    expect(db.fetch(text('b'))).toEqual([bytes(7)]);
    db.delete(text('b'), bytes(7));
    expect(db.fetch(text('b'))).toEqual([]);
  });
});

describe('DirectoryBasedExampleDatabase', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(os.tmpdir(), 'choicetape-db-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('fetches saved values in shortlex order', () => {
    const db = new DirectoryBasedExampleDatabase(root);
    db.save(text('k'), bytes(9, 9));
    db.save(text('k'), bytes(5));
    db.save(text('k'), bytes(1, 0));
    expect(db.fetch(text('k'))).toEqual([bytes(5), bytes(1, 0), bytes(9, 9)]);
  });

  it('persists across instances over the same directory', () => {
    new DirectoryBasedExampleDatabase(root).save(text('k'), bytes(4));
    expect(new DirectoryBasedExampleDatabase(root).fetch(text('k'))).toEqual([bytes(4)]);
  });

  it('moves, deletes and clears values', () => {
    const db = new DirectoryBasedExampleDatabase(root);
    db.save(text('src'), bytes(1));
    db.save(text('src'), bytes(2));
    db.move(text('src'), text('dest'), bytes(1));
    expect(db.fetch(text('src'))).toEqual([bytes(2)]);
    expect(db.fetch(text('dest'))).toEqual([bytes(1)]);
    db.delete(text('src'), bytes(2));
    expect(db.fetch(text('src'))).toEqual([]);
    db.clear(text('dest'));
    expect(db.fetch(text('dest'))).toEqual([]);
  });

  it('moving onto the same key keeps the value', () => {
    const db = new DirectoryBasedExampleDatabase(root);
    db.save(text('k'), bytes(3));
    db.move(text('k'), text('k'), bytes(3));
    expect(db.fetch(text('k'))).toEqual([bytes(3)]);
  });

  it('lists stored keys with their value counts', () => {
    const db = new DirectoryBasedExampleDatabase(root);
    expect(new DirectoryBasedExampleDatabase(path.join(root, 'missing')).keys()).toEqual([]);
    db.save(text('b'), bytes(1));
    db.save(text('a'), bytes(1));
    db.save(text('a'), bytes(2));
    expect(db.keys()).toEqual([
      { key: text('a'), entries: 2 },
      { key: text('b'), entries: 1 },
    ]);
  });
});
