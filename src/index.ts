export { DiskMap, type DiskMapOptions } from './modules/diskMap';
export {
  DiskMapError,
  type DiskMapErrorKind,
  fail,
  isAlreadyExists,
  ok,
  unwrap,
} from './modules/diskMap/errors';
export type { LockMode } from './modules/diskMap/fileLock';
export {
  integerKeys,
  type KeyCodec,
  KeyNameSchema,
  stringKeys,
  TEMP_PREFIX,
} from './modules/diskMap/keyCodec';
export { cborValues, type ValueCodec } from './modules/diskMap/valueCodec';
export * from './types';
export { createLogger, levelFromEnv, type LoggerConfig } from './utils/logger';
