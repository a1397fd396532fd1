/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

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
 * Destination of formatted log lines. Defaults to the console.
 */
export type LogWriter = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

/**
 * Logger options
 */
export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  context?: Record<string, unknown>;
  writer?: LogWriter;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const LOG_LEVEL_NAMES: readonly string[] = Object.keys(LOG_LEVELS);

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

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

/**
 * Create a console logger.
 *
 * Lines look like `[2024-05-01T10:00:00.000Z] [INFO] [vies-batch] message {"k":"v"}`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const minLevel = LOG_LEVELS[level];
  const prefix = options.prefix ?? 'vies-batch';
  const baseContext = options.context ?? {};
  const writer = options.writer ?? consoleWriter;

  const formatMessage = (lvl: LogLevel, message: string, context?: Record<string, unknown>): string => {
    const timestamp = new Date().toISOString();
    const mergedContext = { ...baseContext, ...context };
    const contextStr = Object.keys(mergedContext).length > 0
      ? ` ${JSON.stringify(mergedContext)}`
      : '';

    return `[${timestamp}] [${lvl.toUpperCase()}] [${prefix}] ${message}${contextStr}`;
  };

  const emit = (lvl: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVELS[lvl] >= minLevel) {
      writer(lvl, formatMessage(lvl, message, context));
    }
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
    child(context: Record<string, unknown>): Logger {
      return createLogger({
        level,
        prefix,
        writer,
        context: { ...baseContext, ...context },
      });
    },
  };
}

/**
 * Logger that drops everything. Default for library classes.
 */
export const noopLogger: Logger = createLogger({ level: 'silent' });
