import winston from 'winston';
import * as Sentry from '@sentry/node';

/**
 * Winston logger configuration for structured logging
 */
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        let msg = `${timestamp} [${level}]: ${message}`;
        if (Object.keys(meta).length > 0) {
          msg += ` ${JSON.stringify(meta)}`;
        }
        return msg;
      }),
    ),
  }),
];

// Only add file transport outside of tests
if (process.env.NODE_ENV !== 'test') {
  transports.push(new winston.transports.File({ filename: 'media-router.log' }));
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'media-router' },
  transports,
});

/**
 * Log an error with stack trace and forward it to Sentry (no-op without a DSN)
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
): void {
  logger.error({
    message: error.message,
    stack: error.stack,
    ...context,
  });
  Sentry.captureException(error, { extra: context });
}

/**
 * Initialize error reporting when a DSN is configured
 */
export function initErrorReporting(dsn?: string): void {
  if (!dsn) return;
  Sentry.init({ dsn, environment: process.env.NODE_ENV || 'production' });
  logger.info('Error reporting enabled');
}
