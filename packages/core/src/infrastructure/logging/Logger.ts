import type { LogLevel } from '@noderpc/config';
import type { ILogger, LogContext } from '../../application/ports/ILogger.ts';
import { LOG_LEVEL_VALUES } from '../../application/ports/ILogger.ts';

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
};

/**
 * Log level to color mapping
 */
const LEVEL_COLORS: Record<LogLevel, string> = {
  error: COLORS.red,
  warn: COLORS.yellow,
  info: COLORS.green,
  debug: COLORS.cyan,
  trace: COLORS.gray,
};

/**
 * Log level to prefix mapping
 */
const LEVEL_PREFIX: Record<LogLevel, string> = {
  error: 'ERR',
  warn: 'WRN',
  info: 'INF',
  debug: 'DBG',
  trace: 'TRC',
};

/**
 * Logger implementation with multi-level support
 */
export class Logger implements ILogger {
  readonly level: LogLevel;
  private readonly timestamps: boolean;
  private readonly json: boolean;
  private readonly context: LogContext;

  constructor(config: {
    level: LogLevel;
    timestamps?: boolean;
    json?: boolean;
    context?: LogContext;
  }) {
    this.level = config.level;
    this.timestamps = config.timestamps ?? true;
    this.json = config.json ?? false;
    this.context = config.context ?? {};
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  child(context: LogContext): ILogger {
    return new Logger({
      level: this.level,
      timestamps: this.timestamps,
      json: this.json,
      context: { ...this.context, ...context },
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[this.level];
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    const mergedContext = { ...this.context, ...context };

    if (this.json) {
      this.logJson(level, message, mergedContext);
    } else {
      this.logPretty(level, message, mergedContext);
    }
  }

  private logJson(level: LogLevel, message: string, context: LogContext): void {
    const entry: Record<string, unknown> = {
      level,
      message,
      ...context,
    };

    if (this.timestamps) {
      entry.timestamp = new Date().toISOString();
    }

    // Handle error objects
    if (context.error instanceof Error) {
      entry.error = {
        name: context.error.name,
        message: context.error.message,
        stack: context.error.stack,
      };
    }

    // Handle BigInt serialization
    const serialized = JSON.stringify(entry, (_, value) =>
      typeof value === 'bigint' ? value.toString() : value
    );

    console.log(serialized);
  }

  private logPretty(level: LogLevel, message: string, context: LogContext): void {
    const color = LEVEL_COLORS[level];
    const prefix = LEVEL_PREFIX[level];

    let output = '';

    // Timestamp
    if (this.timestamps) {
      const time = new Date().toISOString().replace('T', ' ').slice(0, -1);
      output += `${COLORS.dim}${time}${COLORS.reset} `;
    }

    // Level
    output += `${color}${COLORS.bold}${prefix}${COLORS.reset} `;

    // Module/node prefix
    if (context.module) {
      output += `${COLORS.magenta}[${context.module}]${COLORS.reset} `;
    }
    if (context.node) {
      output += `${COLORS.blue}[${context.node}]${COLORS.reset} `;
    }

    // Message
    output += message;

    // Context fields
    const contextFields = Object.entries(context).filter(
      ([key, value]) => !['module', 'node', 'error'].includes(key) && value !== undefined
    );

    if (contextFields.length > 0) {
      const formatted = contextFields
        .map(([key, value]) => {
          const v = typeof value === 'bigint' ? value.toString() : value;
          return `${COLORS.dim}${key}=${COLORS.reset}${v}`;
        })
        .join(' ');
      output += ` ${formatted}`;
    }

    console.log(output);

    // Error stack trace
    if (context.error instanceof Error && level === 'error') {
      console.log(`${COLORS.dim}${context.error.stack}${COLORS.reset}`);
    }
  }
}

/**
 * Create a logger from the logging section of the configuration
 */
export function createLogger(config: {
  level?: LogLevel;
  timestamps?: boolean;
  json?: boolean;
}): ILogger {
  return new Logger({
    level: config.level ?? 'info',
    timestamps: config.timestamps,
    json: config.json,
  });
}
