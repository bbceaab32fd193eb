/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  context?: Record<string, unknown>;
  /** Destination for formatted lines (default: the console method of the same level) */
  write?: LogWriter;
}

export type LogWriter = (level: LogLevel, line: string) => void;

const consoleWriter: LogWriter = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};


export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Type guard for log level names coming from flags or environment
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Create a leveled console logger.
 *
 * Every line carries a timestamp, the level, the prefix and the merged
 * context as JSON.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const prefix = options.prefix ?? 'stig-extract';
  const baseContext = options.context ?? {};
  const write = options.write ?? consoleWriter;

  const shouldLog = (level: LogLevel): boolean => LOG_LEVELS[level] >= minLevel;

  const formatMessage = (level: LogLevel, message: string, context?: Record<string, unknown>): string => {
    const timestamp = new Date().toISOString();
    const mergedContext = { ...baseContext, ...context };
    const contextStr = Object.keys(mergedContext).length > 0
      ? ` ${JSON.stringify(mergedContext)}`
      : '';

    return `[${timestamp}] [${level.toUpperCase()}] [${prefix}] ${message}${contextStr}`;
  };

  const logger: Logger = {
    debug(message: string, context?: Record<string, unknown>) {
      if (shouldLog('debug')) {
        write('debug', formatMessage('debug', message, context));
      }
    },

    info(message: string, context?: Record<string, unknown>) {
      if (shouldLog('info')) {
        write('info', formatMessage('info', message, context));
      }
    },

    warn(message: string, context?: Record<string, unknown>) {
      if (shouldLog('warn')) {
        write('warn', formatMessage('warn', message, context));
      }
    },

    error(message: string, context?: Record<string, unknown>) {
      if (shouldLog('error')) {
        write('error', formatMessage('error', message, context));
      }
    },

    child(context: Record<string, unknown>): Logger {
      const childOptions: LoggerOptions = {
        prefix,
        context: { ...baseContext, ...context },
        write,
      };
      if (options.level !== undefined) {
        childOptions.level = options.level;
      }
      return createLogger(childOptions);
    },
  };

  return logger;
}
