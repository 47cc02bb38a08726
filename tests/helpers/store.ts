import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DiskMap, type DiskMapOptions, stringKeys, unwrap } from '../../src';

export function createTestLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'disk-map-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Fresh string-keyed store under `dir/store`. */
export function openStore<V = number>(
  dir: string,
  options: Partial<DiskMapOptions<string, V>> = {},
): DiskMap<string, V> {
  return unwrap(
    DiskMap.openNew<string, V>(path.join(dir, 'store'), {
      keyCodec: stringKeys,
      logger: createTestLogger(),
      ...options,
    }),
  );
}
