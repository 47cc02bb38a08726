/**
 * Core types shared across the DiskMap modules
 */

import type { DiskMapError } from '../modules/diskMap/errors';

export type Success<T> = { success: true; data: T; error: null };
export type Failure<E = DiskMapError> = { success: false; data: null; error: E };

/**
 * Outcome of every DiskMap operation. Failures carry a typed `DiskMapError`
 * instead of being thrown.
 */
export type Result<T, E = DiskMapError> = Success<T> | Failure<E>;

/**
 * Minimal logger surface matching pino's API, so any pino-compatible
 * logger can be injected without coupling callers to pino itself.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;

  /** Create a child logger with additional context */
  child(bindings: Record<string, unknown>): Logger;
}

/** What `getKeys()` does with directory entries it cannot turn into keys. */
export type InvalidEntryPolicy = 'skip' | 'error';
