/**
 * Logger - winston-backed category loggers
 *
 * - Level from LOG_LEVEL (default: info)
 * - createLogger('Category') prefixes every message with [Category]
 * - LOG_FILE adds a size-rotated file transport
 * - Silent under NODE_ENV=test
 */

import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && LOG_LEVELS.some(level => level === value);

const envLevel = process.env.LOG_LEVEL;

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `[${String(timestamp)}] ${level.toUpperCase()}: ${String(message)} ${metaStr}`;
  })
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp }) => {
    return `[${String(timestamp)}] ${level}: ${String(message)}`;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({ format: consoleFormat, stderrLevels: ['error', 'warn'] })
];

if (process.env.LOG_FILE) {
  transports.push(
    new winston.transports.File({
      filename: process.env.LOG_FILE,
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5
    })
  );
}

export const logger = winston.createLogger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  silent: process.env.NODE_ENV === 'test',
  transports
});

export interface CategoryLogger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

/**
 * Create a logger whose messages carry a [category] prefix
 *
 * @example
 * const log = createLogger('HistoryStore');
 * log.info('opened'); // [12:00:00] info: [HistoryStore] opened
 */
export function createLogger(category: string): CategoryLogger {
  return {
    debug: (msg, meta) => { logger.debug(`[${category}] ${msg}`, meta); },
    info: (msg, meta) => { logger.info(`[${category}] ${msg}`, meta); },
    warn: (msg, meta) => { logger.warn(`[${category}] ${msg}`, meta); },
    error: (msg, meta) => { logger.error(`[${category}] ${msg}`, meta); }
  };
}

/**
 * Change the level at runtime, e.g. from the CLI's --verbose flag
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
