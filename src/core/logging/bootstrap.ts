import { createRootLogger } from './create-logger.js';
import { LOG_LEVELS } from './types.js';
import type { Logger, LogLevel } from './types.js';

/**
 * Logger for code that runs before the container exists (config loading,
 * container initialization). After that, inject `LoggerFactory` instead.
 */
let _bootstrapLogger: Logger | null = null;

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    const requested = process.env['CORPUS_FILTER_LOG_LEVEL']?.toLowerCase() ?? 'warn';
    _bootstrapLogger = createRootLogger(isLogLevel(requested) ? requested : 'warn');
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
