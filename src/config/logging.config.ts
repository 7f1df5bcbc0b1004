/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggingConfig {
  level: LogLevelName;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
}

const LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLevel(raw: string | undefined): LogLevelName {
  const value = raw?.trim().toLowerCase();
  return LEVELS.find(level => level === value) ?? 'info';
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const isDev = env.NODE_ENV !== 'production';

  return {
    level: parseLevel(env.LOG_LEVEL),
    pretty: env.LOG_PRETTY === 'true' || (isDev && env.LOG_PRETTY !== 'false'),
    // File output is opt-in: the bridge usually runs beside the display tool
    toFile: env.LOG_TO_FILE === 'true',
    dir: env.LOG_DIR || './logs',
    rotateDays: Number(env.LOG_ROTATE_DAYS || 14),
    console: env.LOG_CONSOLE !== 'false',
  };
}
