import type { LogLevel } from '@noderpc/config';

/**
 * Log message context
 */
export interface LogContext {
  /** Module or component name */
  module?: string;
  /** Node URL */
  node?: string;
  /** Remote method name */
  method?: string;
  /** Chain height the message refers to */
  height?: number;
  /** Error object */
  error?: Error;
  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Logger interface with multi-level logging support
 */
export interface ILogger {
  /**
   * Current log level
   */
  readonly level: LogLevel;

  /**
   * Log an error message (level 1: -v)
   */
  error(message: string, context?: LogContext): void;

  /**
   * Log a warning message (level 2: -vv)
   */
  warn(message: string, context?: LogContext): void;

  /**
   * Log an info message (level 3: -vvv)
   */
  info(message: string, context?: LogContext): void;

  /**
   * Log a debug message (level 4: -vvvv)
   */
  debug(message: string, context?: LogContext): void;

  /**
   * Log a trace message (level 5: -vvvvv)
   */
  trace(message: string, context?: LogContext): void;

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): ILogger;

  /**
   * Check if a log level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean;
}

/**
 * Log level numeric values (for comparison)
 */
export const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};
