import { isTest } from './isTest.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.keys(levels).includes(value);

const threshold = (): LogLevel | null => {
  const configured = process.env.LOGROLL_LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) {
    return configured;
  }
  // quiet under jest unless asked for
  return isTest ? null : 'info';
};

const format = (level: LogLevel, message: string): string =>
  `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;

const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
  const min = threshold();
  if (min === null || levels[level] < levels[min]) {
    return;
  }

  const args: unknown[] = meta ? [format(level, message), meta] : [format(level, message)];
  switch (level) {
    case 'error':
      console.error(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    default:
      console.log(...args);
  }
};

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => log('debug', message, meta),
  info: (message: string, meta?: Record<string, unknown>) => log('info', message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log('warn', message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log('error', message, meta),
};
