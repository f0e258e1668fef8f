import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type: pino's own, no wrapper.
 *
 * Data-first call style:
 *   logger.info({ copied: 42 }, 'Staged documents');
 *   logger.error({ err }, 'Copy failed');
 */
export type Logger = PinoLogger;

export interface LoggerFactory {
  /** Child logger bound to `{ component }`. */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const satisfies readonly LogLevel[];
