import { createLogger, levelFromEnv } from '../src';

describe('logger', () => {
  it('reads the level from DISK_MAP_LOG_LEVEL', () => {
    expect(levelFromEnv({ DISK_MAP_LOG_LEVEL: 'debug' })).toBe('debug');
    expect(levelFromEnv({ DISK_MAP_LOG_LEVEL: 'silent' })).toBe('silent');
  });

  it('falls back to warn for missing or unknown levels', () => {
    expect(levelFromEnv({})).toBe('warn');
    expect(levelFromEnv({ DISK_MAP_LOG_LEVEL: 'loud' })).toBe('warn');
  });

  it('creates a pino logger with the requested level', () => {
    const logger = createLogger({ level: 'silent' });
    expect(logger.level).toBe('silent');
    expect(logger.child({ directory: '/tmp/x' }).level).toBe('silent');
  });
});
