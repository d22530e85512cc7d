/**
 * @fileoverview Logging exports
 */

export {
  TaskLogger,
  LOG_LEVELS,
  isLogLevel,
  getLogger,
  configureLogger,
  createLogger,
  resetLogger,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';
