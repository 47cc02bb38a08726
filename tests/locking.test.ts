/**
 * Advisory locking tests
 *
 * Contention is reproduced in-process: flock locks belong to the open file
 * description, so a lock held on a second descriptor of an entry file
 * conflicts with the descriptor DiskMap opens for the same file.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { flockSync } from 'fs-ext';
import { type DiskMap, unwrap } from '../src';
import { makeTempDir, openStore, removeDir } from './helpers/store';

let tmp: string;
let store: DiskMap<string, number>;
let held: number | null;

function holdLock(key: string, mode: 'sh' | 'ex'): void {
  held = fs.openSync(path.join(store.directory, key), 'r');
  flockSync(held, mode === 'sh' ? 'shnb' : 'exnb');
}

function release(): void {
  if (held !== null) fs.closeSync(held);
  held = null;
}

beforeEach(() => {
  tmp = makeTempDir();
  held = null;
  store = openStore(tmp, { blocking: false });
  unwrap(store.insert('k', 1));
});

afterEach(() => {
  release();
  removeDir(tmp);
});

describe('DiskMap locking (non-blocking)', () => {
  it('get fails with CannotGetLock while another descriptor holds an exclusive lock', () => {
    holdLock('k', 'ex');
    const result = store.get('k');
    expect(result.success).toBe(false);
    expect(!result.success && result.error.kind).toBe('CannotGetLock');

    release();
    expect(unwrap(store.get('k'))).toBe(1);
  });

  it('get shares the file with another reader', () => {
    holdLock('k', 'sh');
    expect(unwrap(store.get('k'))).toBe(1);
  });

  it('alter fails with CannotGetLock under a shared lock and leaves the value', () => {
    holdLock('k', 'sh');
    const result = store.alter('k', (x) => x + 100);
    expect(!result.success && result.error.kind).toBe('CannotGetLock');

    release();
    expect(unwrap(store.get('k'))).toBe(1);
  });

  it('overwrite fails with CannotGetLock under an exclusive lock and leaves the value', () => {
    holdLock('k', 'ex');
    const result = store.overwrite('k', 42);
    expect(!result.success && result.error.kind).toBe('CannotGetLock');

    release();
    expect(unwrap(store.get('k'))).toBe(1);
  });

  it('alterWithDefault surfaces the lock failure of its alter step', () => {
    holdLock('k', 'ex');
    const result = store.alterWithDefault('k', 0, (x) => x + 1);
    expect(!result.success && result.error.kind).toBe('CannotGetLock');
  });

  it('delete takes no lock', () => {
    holdLock('k', 'ex');
    unwrap(store.delete('k'));
    expect(unwrap(store.containsKey('k'))).toBe(false);
  });

  it('releases its lock after a failed read', () => {
    fs.writeFileSync(path.join(store.directory, 'empty'), '');
    const result = store.get('empty');
    expect(!result.success && result.error.kind).toBe('CannotReadFromFile');

    expect(() => holdLock('empty', 'ex')).not.toThrow();
  });

  it('releases its lock after a successful alter', () => {
    unwrap(store.alter('k', (x) => x + 1));
    expect(() => holdLock('k', 'ex')).not.toThrow();
  });
});
