// src/utils/logger.ts
import winston from 'winston';

const environment = process.env.NODE_ENV || 'development';
// Set default log level based on environment, allow override
const defaultLogLevel = environment === 'production' ? 'info' : 'debug';
const logLevel = process.env.LOG_LEVEL || defaultLogLevel;

// Custom format for better console readability
const consoleFormat = winston.format.printf(({ level, message, timestamp, ...metadata }) => {
  const { service, method, path, statusCode, durationMs, userId, ...rest } = metadata;

  let logString = `${timestamp} [${level.toUpperCase()}] [${service}]`;

  if (method && path) logString += ` ${method} ${path}`;
  if (statusCode) logString += ` (${statusCode})`;
  if (durationMs !== undefined) logString += ` - ${durationMs}ms`;
  if (userId) logString += ` [user:${userId}]`;

  logString += ` ${message}`;

  if (Object.keys(rest).length > 0) {
    logString += ` ${JSON.stringify(rest)}`;
  }

  return logString;
});

// Keep the instance internal to this module
const internalLogger = winston.createLogger({
  level: logLevel,
  // Jest runs with NODE_ENV=test; tests opt back in with LOG_LEVEL
  silent: environment === 'test' && !process.env.LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'entitlement-bridge' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        consoleFormat
      )
    })
  ]
});

if (environment === 'production') {
  internalLogger.add(new winston.transports.File({
    filename: 'error.log',
    level: 'error',
    dirname: 'logs'
  }));

  internalLogger.add(new winston.transports.File({
    filename: 'combined.log',
    dirname: 'logs'
  }));
}

export const log = {
  debug: (message: string, meta: Record<string, unknown> = {}) =>
    internalLogger.debug(message, { ...meta }),
  info: (message: string, meta: Record<string, unknown> = {}) =>
    internalLogger.info(message, { ...meta }),
  warn: (message: string, meta: Record<string, unknown> = {}) =>
    internalLogger.warn(message, { ...meta }),
  error: (message: string, meta: Record<string, unknown> = {}) =>
    internalLogger.error(message, { ...meta }),
};
