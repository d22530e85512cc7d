/**
 * @fileoverview Logging infrastructure for tasktrack
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output by default, pino-pretty when stderr is a terminal
 * - Component-scoped child loggers
 *
 * stdout carries command output, so logs go to stderr unless a file
 * destination is configured.
 */

import pino from 'pino';

// =============================================================================
// Types
// =============================================================================

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
  /** File descriptor or file path; defaults to stderr */
  destination?: number | string;
}

export interface LogContext {
  component?: string;
  taskId?: number;
  [key: string]: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// =============================================================================
// Logger Factory
// =============================================================================

function resolveLevel(options: LoggerOptions): LogLevel {
  if (options.level) return options.level;
  const fromEnv = process.env.TASKTRACK_LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  const level = resolveLevel(options);
  const pretty = options.pretty ?? process.stderr.isTTY === true;
  const destination = options.destination ?? 2;

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'tasktrack',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        name: bindings.name,
      }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: typeof destination === 'number',
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination({ dest: destination, sync: true }));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

export class TaskLogger {
  private pino: pino.Logger;
  readonly context: LogContext;

  constructor(options: LoggerOptions = {}, context: LogContext = {}, instance?: pino.Logger) {
    this.pino = instance ?? createPinoLogger(options);
    this.context = context;
  }

  get level(): string {
    return this.pino.level;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): TaskLogger {
    return new TaskLogger({}, { ...this.context, ...context }, this.pino.child(context));
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.pino.trace(data ?? {}, msg);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, msg);
  }

  error(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else {
      this.pino.error(error ?? {}, msg);
    }
  }

  /**
   * Run `fn` and log its duration at `level`; failures are logged at
   * `failureLevel` and rethrown.
   */
  async timed<T>(
    label: string,
    fn: () => Promise<T>,
    level: LogLevel = 'debug',
    failureLevel: LogLevel = 'error'
  ): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      const duration = performance.now() - start;
      this.pino[level]({ durationMs: duration.toFixed(2) }, `${label} completed`);
      return result;
    } catch (error) {
      const duration = performance.now() - start;
      this.pino[failureLevel](
        {
          durationMs: duration.toFixed(2),
          err: error instanceof Error ? error : new Error(String(error)),
        },
        `${label} failed`
      );
      throw error;
    }
  }
}

// =============================================================================
// Default Logger
// =============================================================================

let defaultLogger: TaskLogger | null = null;

/**
 * Get the default logger instance
 */
export function getLogger(options?: LoggerOptions): TaskLogger {
  if (!defaultLogger) {
    defaultLogger = new TaskLogger(options);
  }
  return defaultLogger;
}

/**
 * Replace the default logger. Loggers created earlier with createLogger
 * keep writing through the previous instance.
 */
export function configureLogger(options: LoggerOptions): TaskLogger {
  defaultLogger = new TaskLogger(options);
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): TaskLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Reset the default logger (for testing)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
