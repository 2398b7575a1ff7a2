import { LogLevel } from '@nestjs/common';

const DEFAULT_TRUNCATE_LENGTH = 500;
const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Truncate text for logging; server errors can echo whole rows back
 */
export function truncateForLog(text: string, maxLength: number = DEFAULT_TRUNCATE_LENGTH): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.substring(0, maxLength) + '...';
}

/**
 * Get enabled log levels based on minimum level.
 * NestJS uses cumulative log levels, so 'debug' includes error, warn, log, and debug.
 */
export function getLogLevels(minLevel: string = 'log'): LogLevel[] {
  const index = LOG_LEVELS.findIndex(level => level === minLevel.toLowerCase());
  return index >= 0 ? LOG_LEVELS.slice(0, index + 1) : ['error', 'warn', 'log'];
}
