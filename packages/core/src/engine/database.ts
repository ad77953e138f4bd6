import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { bytesToHex, compareTapes, hexToBytes } from '../util/bytes.js';
import { sha256Hex } from '../util/struct-hash.js';

/**
 * Persistence for failing (and otherwise useful) tapes, keyed by test.
 * Each key holds a set of values; saving an existing value is a no-op.
 */
export interface ExampleDatabase {
  save(key: Uint8Array, value: Uint8Array): void;
  fetch(key: Uint8Array): Uint8Array[];
  delete(key: Uint8Array, value: Uint8Array): void;
  move(src: Uint8Array, dest: Uint8Array, value: Uint8Array): void;
}

export const KEY_FILE = '.key';

/** Derived key: `<key>.<suffix>`. */
export function subKey(key: Uint8Array, suffix: 'secondary' | 'pareto'): Uint8Array {
  const tail = new TextEncoder().encode(`.${suffix}`);
  const out = new Uint8Array(key.length + tail.length);
  out.set(key);
  out.set(tail, key.length);
  return out;
}

export class InMemoryExampleDatabase implements ExampleDatabase {
  private readonly data = new Map<string, Set<string>>();

  save(key: Uint8Array, value: Uint8Array): void {
    const k = bytesToHex(key);
    let values = this.data.get(k);
    if (!values) {
      values = new Set();
      this.data.set(k, values);
    }
    values.add(bytesToHex(value));
  }

  fetch(key: Uint8Array): Uint8Array[] {
    const values = this.data.get(bytesToHex(key));
    if (!values) return [];
    const out: Uint8Array[] = [];
    for (const hex of values) {
      const bytes = hexToBytes(hex);
      if (bytes) out.push(bytes);
    }
    return out;
  }

  delete(key: Uint8Array, value: Uint8Array): void {
    this.data.get(bytesToHex(key))?.delete(bytesToHex(value));
  }

  move(src: Uint8Array, dest: Uint8Array, value: Uint8Array): void {
    this.delete(src, value);
    this.save(dest, value);
  }
}

function expandHome(p: string): string {
  if (p.startsWith('~')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

export interface StoredKey {
  key: Uint8Array;
  entries: number;
}

/**
 * One directory per key (`sha256(key)[0:16]`), one file per value
 * (`sha256(value)[0:16]`) holding the raw bytes. A `.key` file beside the
 * values records the key itself so tooling can list what is stored.
 */
export class DirectoryBasedExampleDatabase implements ExampleDatabase {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(expandHome(root));
  }

  save(key: Uint8Array, value: Uint8Array): void {
    const dir = this.keyDir(key);
    mkdirSync(dir, { recursive: true });
    const keyFile = path.join(dir, KEY_FILE);
    if (!existsSync(keyFile)) writeFileSync(keyFile, key);
    const file = this.valuePath(key, value);
    if (existsSync(file)) return;
    // Write then rename so readers never observe a partial value.
    const tmp = `${file}.${process.pid}.tmp`;
    writeFileSync(tmp, value);
    renameSync(tmp, file);
  }

  fetch(key: Uint8Array): Uint8Array[] {
    const dir = this.keyDir(key);
    if (!existsSync(dir)) return [];
    const out: Uint8Array[] = [];
    for (const name of readdirSync(dir)) {
      if (name === KEY_FILE || name.endsWith('.tmp')) continue;
      out.push(new Uint8Array(readFileSync(path.join(dir, name))));
    }
    return out.sort(compareTapes);
  }

  delete(key: Uint8Array, value: Uint8Array): void {
    rmSync(this.valuePath(key, value), { force: true });
  }

  move(src: Uint8Array, dest: Uint8Array, value: Uint8Array): void {
    if (bytesToHex(src) === bytesToHex(dest)) {
      this.save(src, value);
      return;
    }
    this.delete(src, value);
    this.save(dest, value);
  }

  /** Remove every value stored under `key`. */
  clear(key: Uint8Array): void {
    rmSync(this.keyDir(key), { recursive: true, force: true });
  }

  /** Every key that has a `.key` file, with its value count. */
  keys(): StoredKey[] {
    if (!existsSync(this.root)) return [];
    const out: StoredKey[] = [];
    for (const dirent of readdirSync(this.root, { withFileTypes: true })) {
      if (!dirent.isDirectory()) continue;
      const dir = path.join(this.root, dirent.name);
      const keyFile = path.join(dir, KEY_FILE);
      if (!existsSync(keyFile)) continue;
      const entries = readdirSync(dir).filter(
        (name) => name !== KEY_FILE && !name.endsWith('.tmp')
      ).length;
      out.push({ key: new Uint8Array(readFileSync(keyFile)), entries });
    }
    return out.sort((a, b) => compareTapes(a.key, b.key));
  }

  private keyDir(key: Uint8Array): string {
    return path.join(this.root, sha256Hex(key).slice(0, 16));
  }

  private valuePath(key: Uint8Array, value: Uint8Array): string {
    return path.join(this.keyDir(key), sha256Hex(value).slice(0, 16));
  }
}
