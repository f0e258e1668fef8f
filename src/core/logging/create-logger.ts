import pino from 'pino';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { FilterConfig } from '../../config/filter-config.js';
import type { Logger, LoggerFactory, LogLevel } from './types.js';

/**
 * Root pino logger.
 *
 * JSON lines on stderr, written synchronously so the last line before a fatal
 * exit is never lost. Stdout carries the operator report.
 */
export function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      base: { app: 'corpus-filter' },
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements LoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.Filter) config: FilterConfig) {
    this._root = createRootLogger(config.logLevel);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
