import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { InvalidEntryPolicy, Logger, Result } from '../../types';
import { createLogger } from '../../utils/logger';
import { type DiskMapErrorKind, fail, isAlreadyExists, ok } from './errors';
import { type LockMode, lockDescriptor } from './fileLock';
import { type KeyCodec, KeyNameSchema, TEMP_PREFIX } from './keyCodec';
import { cborValues, type ValueCodec } from './valueCodec';

export interface DiskMapOptions<K, V> {
  /** Maps keys to entry file names and back. */
  keyCodec: KeyCodec<K>;
  /** Serialization of entry values. Defaults to CBOR. */
  valueCodec?: ValueCodec<V>;
  /**
   * Wait for contended locks (default). When false, contention fails
   * immediately with `CannotGetLock`.
   */
  blocking?: boolean;
  /**
   * What `getKeys()` does with directory entries that are not regular files or
   * whose names the key codec rejects: skip them with a warning (default), or
   * fail the listing with `CannotOpenDirectory`.
   */
  invalidEntries?: InvalidEntryPolicy;
  logger?: Logger;
}

interface ListedEntry<K> {
  name: string;
  key: K;
}

/**
 * Persistent key-value map storing every entry as one file under a directory.
 *
 * Entry files are named by the key codec and hold the encoded value. Reads take
 * a shared `flock`, rewrites an exclusive one, each on the operation's own
 * descriptor and released when it closes. Inserts publish a complete file. The handle holds no open files
 * between calls, so any number of handles, threads or processes may work on
 * the same directory.
 *
 * All operations are synchronous and return a `Result`; none throws.
 */
export class DiskMap<K, V> {
  readonly directory: string;
  private readonly keyCodec: KeyCodec<K>;
  private readonly valueCodec: ValueCodec<V>;
  private readonly blocking: boolean;
  private readonly invalidEntries: InvalidEntryPolicy;
  private readonly logger: Logger;

  private constructor(directory: string, options: DiskMapOptions<K, V>, logger: Logger) {
    this.directory = directory;
    this.keyCodec = options.keyCodec;
    this.valueCodec = options.valueCodec ?? cborValues<V>();
    this.blocking = options.blocking ?? true;
    this.invalidEntries = options.invalidEntries ?? 'skip';
    this.logger = logger;
  }

  /**
   * Opens the store at `directory`, creating it and any missing parents.
   */
  static open<K, V>(directory: string, options: DiskMapOptions<K, V>): Result<DiskMap<K, V>> {
    const base: Logger = options.logger ?? createLogger();
    const logger = base.child({ directory });
    try {
      fs.mkdirSync(directory, { recursive: true });
    } catch (err) {
      return fail('CannotOpenDirectory', directory, err);
    }
    logger.debug('store opened');
    return ok(new DiskMap<K, V>(directory, options, logger));
  }

  /**
   * Removes whatever is at `directory`, then opens an empty store there.
   * Entries written concurrently by other handles are destroyed too.
   */
  static openNew<K, V>(directory: string, options: DiskMapOptions<K, V>): Result<DiskMap<K, V>> {
    const logger: Logger = options.logger ?? createLogger();
    try {
      fs.rmSync(directory, { recursive: true, force: true });
    } catch (err) {
      return fail('CannotRemoveDirectory', directory, err);
    }
    logger.debug({ directory }, 'store wiped');
    return DiskMap.open(directory, { ...options, logger });
  }

  /**
   * Create-only write: fails with `CannotOpenFile` when the key already exists.
   *
   * The value is written to a temporary file first and published under the
   * key's name with `link`, which fails atomically when the name is taken. No
   * reader ever sees the entry before its value is complete.
   */
  insert(key: K, value: V): Result<void> {
    const resolved = this._filename(key, 'CannotOpenFile');
    if (!resolved.success) return resolved;
    const file = resolved.data;

    const encoded = this._encode(value, file, 'CannotInsert');
    if (!encoded.success) return encoded;

    const temp = path.join(this.directory, `${TEMP_PREFIX}${randomUUID()}`);
    const opened = this._open(temp, 'wx');
    if (!opened.success) return opened;

    try {
      // the link shares the inode, so the lock covers the published entry too
      const locked = this._lock(opened.data, temp, 'exclusive');
      if (!locked.success) return locked;
      const written = this._write(opened.data, temp, encoded.data);
      if (!written.success) return written;
      try {
        fs.linkSync(temp, file);
      } catch (err) {
        return fail('CannotOpenFile', file, err);
      }
      return ok(undefined);
    } finally {
      this._close(opened.data, temp);
      this._discard(temp);
    }
  }

  get(key: K): Result<V> {
    const resolved = this._filename(key, 'CannotOpenFile');
    if (!resolved.success) return resolved;
    const file = resolved.data;

    const opened = this._open(file, 'r');
    if (!opened.success) return opened;
    const fd = opened.data;

    try {
      const locked = this._lock(fd, file, 'shared');
      if (!locked.success) return locked;
      return this._read(fd, file);
    } finally {
      this._close(fd, file);
    }
  }

  /**
   * Read-modify-write of one entry under a single exclusive lock, so
   * concurrent alterers of the same key are serialized. Returns the new value.
   * The entry is left untouched when `fn` throws.
   */
  alter(key: K, fn: (value: V) => V): Result<V> {
    const resolved = this._filename(key, 'CannotOpenFile');
    if (!resolved.success) return resolved;
    const file = resolved.data;

    const opened = this._open(file, 'r+');
    if (!opened.success) return opened;
    const fd = opened.data;

    try {
      const locked = this._lock(fd, file, 'exclusive');
      if (!locked.success) return locked;

      const current = this._read(fd, file);
      if (!current.success) return current;

      let next: V;
      let bytes: Uint8Array;
      try {
        next = fn(current.data);
        bytes = this.valueCodec.encode(next);
      } catch (err) {
        return fail('CannotAlterFile', file, err);
      }

      const rewritten = this._rewrite(fd, file, bytes);
      if (!rewritten.success) return rewritten;
      return ok(next);
    } finally {
      this._close(fd, file);
    }
  }

  /**
   * Replaces the value of an existing entry. Never creates one: an absent key
   * fails with `CannotOpenFile`.
   */
  overwrite(key: K, value: V): Result<void> {
    const resolved = this._filename(key, 'CannotOpenFile');
    if (!resolved.success) return resolved;
    const file = resolved.data;

    const encoded = this._encode(value, file, 'CannotAlterFile');
    if (!encoded.success) return encoded;

    const opened = this._open(file, 'r+');
    if (!opened.success) return opened;
    const fd = opened.data;

    try {
      const locked = this._lock(fd, file, 'exclusive');
      if (!locked.success) return locked;
      return this._rewrite(fd, file, encoded.data);
    } finally {
      this._close(fd, file);
    }
  }

  /**
   * Unlinks the entry file. Takes no lock: holders of an open descriptor finish
   * their operation, later lookups miss.
   */
  delete(key: K): Result<void> {
    const resolved = this._filename(key, 'CannotDeleteFile');
    if (!resolved.success) return resolved;
    const file = resolved.data;

    try {
      fs.unlinkSync(file);
    } catch (err) {
      return fail('CannotDeleteFile', file, err);
    }
    return ok(undefined);
  }

  /**
   * Keys of all entries, in directory enumeration order.
   */
  getKeys(): Result<K[]> {
    const listed = this._entries();
    if (!listed.success) return listed;
    return ok(listed.data.map((entry) => entry.key));
  }

  containsKey(key: K): Result<boolean> {
    const resolved = this._keyName(key, 'CannotOpenFile');
    if (!resolved.success) return resolved;

    const listed = this._entries();
    if (!listed.success) return listed;
    return ok(listed.data.some((entry) => entry.name === resolved.data));
  }

  size(): Result<number> {
    const listed = this._entries();
    if (!listed.success) return listed;
    return ok(listed.data.length);
  }

  /**
   * Every entry as a `[key, value]` pair. Stops at the first entry that
   * cannot be read.
   */
  asArray(): Result<Array<[K, V]>> {
    const listed = this._entries();
    if (!listed.success) return listed;

    const pairs: Array<[K, V]> = [];
    for (const { key } of listed.data) {
      const value = this.get(key);
      if (!value.success) return value;
      pairs.push([key, value.data]);
    }
    return ok(pairs);
  }

  /**
   * Deletes every entry. Stops at the first failed delete, leaving the store
   * partially cleared.
   */
  clear(): Result<void> {
    const listed = this._entries();
    if (!listed.success) return listed;

    for (const { key } of listed.data) {
      const deleted = this.delete(key);
      if (!deleted.success) return deleted;
    }
    return ok(undefined);
  }

  /**
   * Inserts `defaultValue` when the key is absent, then alters the entry.
   * A concurrent insert of the same key between the two steps is not an error.
   */
  alterWithDefault(key: K, defaultValue: V, fn: (value: V) => V): Result<V> {
    const inserted = this.insert(key, defaultValue);
    if (!inserted.success && !isAlreadyExists(inserted.error)) return inserted;
    return this.alter(key, fn);
  }

  // ─── Private helpers ────────────────────────────────────────────────────

  private _keyName(key: K, kind: DiskMapErrorKind): Result<string> {
    let name: string;
    try {
      name = this.keyCodec.encode(key);
    } catch (err) {
      return fail(kind, this.directory, err);
    }
    const parsed = KeyNameSchema.safeParse(name);
    if (!parsed.success) return fail(kind, this.directory, parsed.error);
    return ok(name);
  }

  private _filename(key: K, kind: DiskMapErrorKind): Result<string> {
    const name = this._keyName(key, kind);
    if (!name.success) return name;
    return ok(path.join(this.directory, name.data));
  }

  private _entries(): Result<ListedEntry<K>[]> {
    let dirents: fs.Dirent[];
    try {
      dirents = fs.readdirSync(this.directory, { withFileTypes: true });
    } catch (err) {
      return fail('CannotOpenDirectory', this.directory, err);
    }

    const entries: ListedEntry<K>[] = [];
    for (const dirent of dirents) {
      // an insert in flight, or one interrupted before cleanup
      if (dirent.name.startsWith(TEMP_PREFIX)) continue;
      const key = this._decodeName(dirent);
      if (key.success) {
        entries.push({ name: dirent.name, key: key.data });
        continue;
      }
      if (this.invalidEntries === 'error') return key;
      this.logger.warn({ entry: dirent.name, err: key.error.cause }, 'skipping directory entry');
    }
    return ok(entries);
  }

  private _decodeName(dirent: fs.Dirent): Result<K> {
    const file = path.join(this.directory, dirent.name);
    if (!dirent.isFile()) {
      return fail('CannotOpenDirectory', file, new Error('not a regular file'));
    }
    try {
      return ok(this.keyCodec.decode(dirent.name));
    } catch (err) {
      return fail('CannotOpenDirectory', file, err);
    }
  }

  private _open(file: string, flags: 'r' | 'r+' | 'wx'): Result<number> {
    try {
      return ok(fs.openSync(file, flags));
    } catch (err) {
      return fail('CannotOpenFile', file, err);
    }
  }

  private _lock(fd: number, file: string, mode: LockMode): Result<void> {
    try {
      lockDescriptor(fd, mode, this.blocking);
    } catch (err) {
      return fail('CannotGetLock', file, err);
    }
    return ok(undefined);
  }

  private _write(fd: number, file: string, bytes: Uint8Array): Result<void> {
    try {
      fs.writeFileSync(fd, bytes);
    } catch (err) {
      return fail('CannotInsert', file, err);
    }
    return ok(undefined);
  }

  private _encode(value: V, file: string, kind: DiskMapErrorKind): Result<Uint8Array> {
    try {
      return ok(this.valueCodec.encode(value));
    } catch (err) {
      return fail(kind, file, err);
    }
  }

  private _read(fd: number, file: string): Result<V> {
    try {
      return ok(this.valueCodec.decode(fs.readFileSync(fd)));
    } catch (err) {
      return fail('CannotReadFromFile', file, err);
    }
  }

  /** Truncates the file and writes `bytes` from offset 0. */
  private _rewrite(fd: number, file: string, bytes: Uint8Array): Result<void> {
    try {
      fs.ftruncateSync(fd, 0);
      let offset = 0;
      while (offset < bytes.length) {
        offset += fs.writeSync(fd, bytes, offset, bytes.length - offset, offset);
      }
    } catch (err) {
      return fail('CannotAlterFile', file, err);
    }
    return ok(undefined);
  }

  /** Removes the temporary file of an insert. */
  private _discard(file: string): void {
    try {
      fs.unlinkSync(file);
    } catch (err) {
      this.logger.warn({ file, err }, 'failed to remove temporary entry file');
    }
  }

  private _close(fd: number, file: string): void {
    try {
      fs.closeSync(fd);
    } catch (err) {
      this.logger.warn({ file, err }, 'failed to close entry file');
    }
  }
}
