import { flockSync } from 'fs-ext';

export type LockMode = 'shared' | 'exclusive';

/**
 * Takes a BSD advisory lock on an open descriptor. The lock lives as long as
 * the descriptor: closing it releases the lock, so callers never unlock
 * explicitly. Non-blocking mode throws EWOULDBLOCK on contention.
 */
export function lockDescriptor(fd: number, mode: LockMode, blocking: boolean): void {
  if (mode === 'shared') {
    flockSync(fd, blocking ? 'sh' : 'shnb');
  } else {
    flockSync(fd, blocking ? 'ex' : 'exnb');
  }
}
