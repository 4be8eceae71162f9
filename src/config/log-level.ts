import { LogLevel } from '@nestjs/common';

// Most to least severe.
export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/** Levels enabled at and above the given minimum; unknown values fall back to 'log' */
export function resolveLogLevels(minimum?: string): LogLevel[] {
  const level = minimum && isLogLevel(minimum) ? minimum : 'log';
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}
