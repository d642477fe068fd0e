/**
 * Observability Module
 *
 * Default Logger and Metrics implementations. Every module accepts these as
 * optional trailing parameters so tests can substitute capturing fakes.
 */

import type { Logger, Metrics } from '../types/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function parseLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error'
  ) {
    return normalized;
  }
  return 'info';
}

/**
 * Create a console logger writing one JSON line per entry
 *
 * @param module - Name stamped on every entry
 * @param level - Minimum level (defaults to LOG_LEVEL or info)
 */
export function createConsoleLogger(
  module: string,
  level: LogLevel = parseLevel(process.env.LOG_LEVEL)
): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    const line = JSON.stringify({
      level: entryLevel,
      module,
      message,
      ...context,
      timestamp: new Date().toISOString(),
    });
    switch (entryLevel) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  };

  return {
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    debug: (message, context) => write('debug', message, context),
  };
}

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = createConsoleLogger('crawler');

/**
 * Default no-op metrics implementation
 */
export const defaultMetrics: Metrics = {
  increment: () => { /* no-op */ },
  gauge: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};
