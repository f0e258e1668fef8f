export type { Logger, LoggerFactory, LogLevel } from './types.js';
export { LOG_LEVELS } from './types.js';

export { PinoLoggerFactory, createRootLogger } from './create-logger.js';

export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';
