import { z } from 'zod';

/**
 * Two-way mapping between a key and the file name that stores its entry.
 *
 * `encode` must be deterministic and injective: two distinct keys that render
 * to the same name silently alias one entry. `decode` is only ever called on
 * names listed from the store directory, i.e. on outputs of `encode`.
 */
export interface KeyCodec<K> {
  encode(key: K): string;
  decode(name: string): K;
}

/** Names starting with this prefix are inserts in flight, never keys. */
export const TEMP_PREFIX = '.disk-map-tmp-';

/**
 * A key name must be usable as a single path component and must not collide
 * with the temporary files of `insert`.
 */
export const KeyNameSchema = z
  .string()
  .min(1, 'key name is empty')
  .refine((name) => name !== '.' && name !== '..', 'key name is a relative path segment')
  .refine((name) => !/[/\\\0]/.test(name), 'key name contains a path separator or NUL')
  .refine((name) => Buffer.byteLength(name) <= 255, 'key name is longer than 255 bytes')
  .refine((name) => !name.startsWith(TEMP_PREFIX), 'key name uses the reserved temporary prefix');

export const stringKeys: KeyCodec<string> = {
  encode: (key) => key,
  decode: (name) => name,
};

export const integerKeys: KeyCodec<number> = {
  encode(key) {
    if (!Number.isSafeInteger(key)) throw new RangeError(`not a safe integer key: ${key}`);
    return String(key);
  },
  decode(name) {
    if (!/^-?\d+$/.test(name)) throw new RangeError(`not an integer key name: ${name}`);
    return Number(name);
  },
};
