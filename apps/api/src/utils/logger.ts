// =====================================================
// Simple Logger Utility
// =====================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_COLORS = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m',  // Green
  warn: '\x1b[33m',  // Yellow
  error: '\x1b[31m', // Red
  reset: '\x1b[0m',
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function shouldLog(level: LogLevel): boolean {
  if (level === 'debug' && process.env.NODE_ENV === 'production') {
    return false;
  }
  const configured = process.env.LOG_LEVEL;
  const threshold = isLogLevel(configured) ? configured : 'info';
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Errors have no enumerable own properties, so JSON.stringify would
 * print them as {}. Keep name and message.
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
  const timestamp = new Date().toISOString();
  const color = LOG_COLORS[level];
  const reset = LOG_COLORS.reset;
  const levelUpper = level.toUpperCase().padEnd(5);

  return `${color}[${timestamp}] [${levelUpper}]${reset} ${message} ${args.length ? JSON.stringify(args, errorReplacer) : ''}`;
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (shouldLog('debug')) {
      console.debug(formatMessage('debug', message, ...args));
    }
  },

  info(message: string, ...args: unknown[]): void {
    if (shouldLog('info')) {
      console.info(formatMessage('info', message, ...args));
    }
  },

  warn(message: string, ...args: unknown[]): void {
    if (shouldLog('warn')) {
      console.warn(formatMessage('warn', message, ...args));
    }
  },

  error(message: string, ...args: unknown[]): void {
    if (shouldLog('error')) {
      console.error(formatMessage('error', message, ...args));
    }
  },
};
