import pino from 'pino';
import { z } from 'zod';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Logger name, bound to every line */
  name: string;
  /** Log level */
  level: pino.LevelWithSilent;
}

const LevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Reads the level from `DISK_MAP_LOG_LEVEL`. Unknown values fall back to `warn`.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): pino.LevelWithSilent {
  const parsed = LevelSchema.safeParse(env['DISK_MAP_LOG_LEVEL']);
  return parsed.success ? parsed.data : 'warn';
}

/**
 * Create the default logger used by a DiskMap when none is injected.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { name, level } = { name: 'disk-map', level: levelFromEnv(), ...config };
  return pino({ name, level });
}
