/**
 * Log levels
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

/**
 * Check whether a value names a log level
 * Used to validate levels handed to the standalone worker
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Logger interface
 */
export interface Logger {
  trace(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger format
 */
export type LogFormat = 'pretty' | 'json';

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default 'info'
   */
  level?: LogLevel;

  /**
   * Output format
   * @default 'pretty'
   */
  format?: LogFormat;

  /**
   * Custom prefix for all log messages
   * @default '[HTTP-TRANSPORT]'
   */
  prefix?: string;

  /**
   * Whether to include timestamps
   * @default true
   */
  timestamp?: boolean;
}

/**
 * Create a logger with the specified configuration
 *
 * @param config - Logger configuration
 * @returns Logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', format: 'json' });
 * logger.debug('Request dispatched', { url: 'http://localhost:8080/rpc' });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const {
    level = 'info',
    format = 'pretty',
    prefix = '[HTTP-TRANSPORT]',
    timestamp = true,
  } = config;

  const minLevelIndex = LEVELS.indexOf(level);

  const shouldLog = (logLevel: LogLevel): boolean => {
    return LEVELS.indexOf(logLevel) >= minLevelIndex;
  };

  const formatMessage = (
    logLevel: LogLevel,
    message: string,
    ...args: unknown[]
  ): string | object => {
    if (format === 'json') {
      return {
        timestamp: timestamp ? new Date().toISOString() : undefined,
        level: logLevel,
        message,
        data: args.length > 0 ? args : undefined,
      };
    }

    // Pretty format
    const parts: string[] = [];

    if (timestamp) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(prefix);
    parts.push(`[${logLevel.toUpperCase()}]`);
    parts.push(message);

    return parts.join(' ');
  };

  const log = (
    logLevel: LogLevel,
    consoleFn: (...args: unknown[]) => void,
    message: string,
    ...args: unknown[]
  ): void => {
    if (!shouldLog(logLevel)) {
      return;
    }

    const formatted = formatMessage(logLevel, message, ...args);

    if (format === 'json') {
      consoleFn(JSON.stringify(formatted));
    } else {
      consoleFn(formatted, ...args);
    }
  };

  return {
    trace: (message: string, ...args: unknown[]) => {
      log('trace', console.log, message, ...args);
    },

    debug: (message: string, ...args: unknown[]) => {
      log('debug', console.log, message, ...args);
    },

    info: (message: string, ...args: unknown[]) => {
      log('info', console.log, message, ...args);
    },

    warn: (message: string, ...args: unknown[]) => {
      log('warn', console.warn, message, ...args);
    },

    error: (message: string, ...args: unknown[]) => {
      log('error', console.error, message, ...args);
    },
  };
}

/**
 * No-op logger that does nothing
 * Useful for disabling logging
 */
export const noopLogger: Logger = {
  trace: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Default logger instance: warnings and errors only, pretty format
 * Undeliverable responses are reported at warn level
 */
export const defaultLogger = createLogger({ level: 'warn' });
