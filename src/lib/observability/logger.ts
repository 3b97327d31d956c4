/**
 * Structured Logger using Winston
 * Supports correlation IDs, log levels, and file rotation
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';
const level = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.metadata(),
  isDevelopment
    ? winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, metadata }) => {
          const meta = metadata as Record<string, unknown>;
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `[${timestamp}] ${level}: ${message}${metaStr}`;
        })
      )
    : winston.format.json()
);

const consoleTransport = new winston.transports.Console({ level });

// Rotated files only in production
const fileTransports: winston.transport[] = [];

if (!isDevelopment) {
  fileTransports.push(
    new DailyRotateFile({
      filename: 'logs/error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '14d',
      format: winston.format.json(),
    })
  );

  fileTransports.push(
    new DailyRotateFile({
      filename: 'logs/combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '7d',
      format: winston.format.json(),
    })
  );
}

// exitOnError=false: a failing transport must never take ingestion down
const logger = winston.createLogger({
  level,
  format: logFormat,
  transports: [consoleTransport, ...fileTransports],
  exitOnError: false,
  silent: isTest,
});

/** Logging surface the engine and stores depend on. */
export interface IngestLogger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

function serializeError(error?: Error) {
  return error
    ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
      }
    : undefined;
}

function wrap(target: winston.Logger): IngestLogger {
  return {
    info: (message, context) => target.info(message, context),
    warn: (message, context) => target.warn(message, context),
    error: (message, error, context) =>
      target.error(message, { ...context, error: serializeError(error) }),
    debug: (message, context) => target.debug(message, context),
  };
}

export const appLogger: IngestLogger = wrap(logger);

// Helper to add correlation ID
export function withCorrelationId(correlationId: string): IngestLogger {
  return wrap(logger.child({ correlationId }));
}

export const logInfo = (message: string, context?: Record<string, unknown>) =>
  appLogger.info(message, context);

export const logWarn = (message: string, context?: Record<string, unknown>) =>
  appLogger.warn(message, context);

export const logError = (message: string, error?: Error, context?: Record<string, unknown>) =>
  appLogger.error(message, error, context);

export const logDebug = (message: string, context?: Record<string, unknown>) =>
  appLogger.debug(message, context);

/**
 * Wrap a logger so a throwing sink is contained. Used around injected
 * loggers, which are not guaranteed to share winston's exitOnError handling.
 */
export function guardLogger(inner: IngestLogger): IngestLogger {
  const guard =
    <A extends unknown[]>(fn: (...args: A) => void) =>
    (...args: A) => {
      try {
        fn(...args);
      } catch (err) {
        process.emitWarning(`logger failure: ${err instanceof Error ? err.message : String(err)}`);
      }
    };
  return {
    info: guard(inner.info.bind(inner)),
    warn: guard(inner.warn.bind(inner)),
    error: guard(inner.error.bind(inner)),
    debug: guard(inner.debug.bind(inner)),
  };
}

