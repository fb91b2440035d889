// core/logger.ts
// Leveled console logging with "[level] (context)" prefixes

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Same sink and level, nested context ("composer:loader") */
  child(context: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const LOG_LEVELS = Object.keys(levelPriority);

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelPriority, value);
}

function format(level: LogLevel, context: string, message: string, data?: Record<string, unknown>): string {
  const ctx = context ? ` (${context})` : '';
  const output = `[${level}]${ctx} ${message}`;
  return data ? `${output} ${JSON.stringify(data)}` : output;
}

/**
 * Create a console logger. Messages below `level` are dropped.
 */
export function createLogger(context: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const shouldLog = (target: LogLevel) => levelPriority[target] >= levelPriority[level];

  return {
    debug(message, data) {
      if (shouldLog('debug')) console.log(format('debug', context, message, data));
    },
    info(message, data) {
      if (shouldLog('info')) console.log(format('info', context, message, data));
    },
    warn(message, data) {
      if (shouldLog('warn')) console.warn(format('warn', context, message, data));
    },
    error(message, data) {
      if (shouldLog('error')) console.error(format('error', context, message, data));
    },
    child(name) {
      return createLogger(context ? `${context}:${name}` : name, options);
    },
  };
}

export const silentLogger: Logger = createLogger('', { level: 'silent' });
