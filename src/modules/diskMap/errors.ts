import type { Failure, Success } from '../../types';

export type DiskMapErrorKind =
  | 'CannotOpenDirectory'
  | 'CannotRemoveDirectory'
  | 'CannotOpenFile'
  | 'CannotReadFromFile'
  | 'CannotInsert'
  | 'CannotAlterFile'
  | 'CannotDeleteFile'
  | 'CannotGetLock';

const MESSAGES: Record<DiskMapErrorKind, string> = {
  CannotOpenDirectory: 'cannot open store directory',
  CannotRemoveDirectory: 'cannot remove store directory',
  CannotOpenFile: 'cannot open entry file',
  CannotReadFromFile: 'cannot decode entry file',
  CannotInsert: 'cannot insert entry',
  CannotAlterFile: 'cannot rewrite entry file',
  CannotDeleteFile: 'cannot delete entry file',
  CannotGetLock: 'cannot acquire file lock',
};

/**
 * Typed failure returned by every DiskMap operation.
 * `path` is the entry file or store directory involved; `cause` is the
 * underlying errno error, codec error or value thrown by a caller's function.
 */
export class DiskMapError extends Error {
  readonly kind: DiskMapErrorKind;
  readonly path: string;

  constructor(kind: DiskMapErrorKind, path: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`${MESSAGES[kind]} (${path})${detail}`, { cause });
    this.name = 'DiskMapError';
    this.kind = kind;
    this.path = path;
  }
}

export function ok<T>(data: T): Success<T> {
  return { success: true, data, error: null };
}

export function fail(kind: DiskMapErrorKind, path: string, cause?: unknown): Failure {
  return { success: false, data: null, error: new DiskMapError(kind, path, cause) };
}

/**
 * Returns the data of a successful result or throws its error.
 * For callers that prefer exceptions over result objects.
 */
export function unwrap<T>(result: Success<T> | Failure): T {
  if (!result.success) throw result.error;
  return result.data;
}

/** True when a create-only insert failed because the entry was already there. */
export function isAlreadyExists(error: DiskMapError): boolean {
  return error.kind === 'CannotOpenFile' && errnoCode(error.cause) === 'EEXIST';
}

export function errnoCode(cause: unknown): string | undefined {
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}
