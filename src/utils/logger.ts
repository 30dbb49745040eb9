/**
 * Logger utility module for the infraction bot.
 * Provides structured logging with Winston, including file rotation,
 * console output, and specialized handlers for errors and rejections.
 *
 * @module utils/logger
 */

import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

/**
 * Directory path for log files.
 * Logs are stored in the 'logs' directory at the project root.
 */
const logDir = path.join(__dirname, '../../logs');

const isTest = process.env.NODE_ENV === 'test';

/**
 * Custom format for log entries.
 * Combines timestamp, error stack traces, and metadata into a readable format.
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0 && meta.stack) {
      msg += `\n${meta.stack}`;
    } else if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

/**
 * Gets the log level from environment variables.
 * Reads directly from process.env to avoid circular dependency with config module.
 */
const getLogLevel = (): string => {
  return process.env.LOG_LEVEL || 'info';
};

/**
 * Builds the transports for the current environment.
 * Tests get a single silent console transport and no log directory.
 */
const buildTransports = (): NonNullable<winston.LoggerOptions['transports']> => {
  const consoleTransport = new winston.transports.Console({
    silent: isTest,
    format: winston.format.combine(
      winston.format.colorize(),
      logFormat
    )
  });

  if (isTest) {
    return [consoleTransport];
  }

  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  return [
    consoleTransport,
    // Combined log file with rotation
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 10485760, // 10MB
      maxFiles: 5,
      tailable: true
    }),
    // Error log file with rotation
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 10485760, // 10MB
      maxFiles: 5,
      tailable: true
    })
  ];
};

/**
 * Main Winston logger instance.
 *
 * Outside of tests it writes to the console, a combined log file, an error
 * log file, and dedicated files for uncaught exceptions and rejections.
 *
 * @example
 * ```typescript
 * logger.info('Infraction applied', { infractionId: 12, type: 'ban' });
 * logger.error('Enforcement failed', { error, userId: 123 });
 * ```
 */
export const logger = winston.createLogger({
  level: getLogLevel(),
  format: logFormat,
  transports: buildTransports(),
  exceptionHandlers: isTest
    ? []
    : [
        new winston.transports.File({
          filename: path.join(logDir, 'exceptions.log'),
          maxsize: 10485760, // 10MB
          maxFiles: 3
        })
      ],
  rejectionHandlers: isTest
    ? []
    : [
        new winston.transports.File({
          filename: path.join(logDir, 'rejections.log'),
          maxsize: 10485760, // 10MB
          maxFiles: 3
        })
      ]
});

/**
 * Updates the logger's level at runtime.
 *
 * @param level - The new log level (error, warn, info, debug)
 */
export const updateLogLevel = (level: string): void => {
  logger.level = level;
};

/**
 * Context metadata for structured logging.
 */
export interface LogContext {
  /** Telegram user ID */
  userId?: number;
  /** Username */
  username?: string;
  /** Infraction ID */
  infractionId?: number;
  /** Operation type */
  operation?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Helper class for structured logging with consistent context.
 * Provides domain-specific logging methods for common operations.
 */
export class StructuredLogger {
  /**
   * Logs a user action with context.
   *
   * @example
   * ```typescript
   * StructuredLogger.logUserAction('User created', {
   *   userId: 12345,
   *   username: 'alice',
   *   operation: 'user_created'
   * });
   * ```
   */
  static logUserAction(action: string, context: LogContext): void {
    logger.info(action, this.sanitizeContext(context));
  }

  /**
   * Logs a security event (permission problems, rejected moderation attempts).
   */
  static logSecurityEvent(event: string, context: LogContext): void {
    logger.warn(`[SECURITY] ${event}`, this.sanitizeContext(context));
  }

  /**
   * Logs an infraction lifecycle event (applied, expired, pardoned, removed, failures).
   * Failures are logged at warn level so they land in the error-adjacent views.
   *
   * @example
   * ```typescript
   * StructuredLogger.logInfraction('applied', {
   *   infractionId: 7,
   *   userId: 12345,
   *   type: 'ban',
   *   duration: 'permanent'
   * });
   * ```
   */
  static logInfraction(event: string, context: LogContext, failed = false): void {
    const message = `[INFRACTION] ${event}`;
    if (failed) {
      logger.warn(message, this.sanitizeContext(context));
    } else {
      logger.info(message, this.sanitizeContext(context));
    }
  }

  /**
   * Logs an error with full context and stack trace.
   */
  static logError(error: unknown, context: LogContext = {}): void {
    if (error instanceof Error) {
      logger.error(error.message, { ...this.sanitizeContext(context), stack: error.stack });
    } else {
      logger.error(String(error), this.sanitizeContext(context));
    }
  }

  /**
   * Logs a debug message (only in debug log level).
   */
  static logDebug(message: string, context: LogContext = {}): void {
    logger.debug(message, this.sanitizeContext(context));
  }

  /**
   * Masks fields that may carry credentials.
   */
  private static sanitizeContext(context: LogContext): LogContext {
    const sanitized = { ...context };

    const sensitiveKeys = ['token', 'botToken', 'password', 'secret'];

    for (const key of sensitiveKeys) {
      if (key in sanitized) {
        sanitized[key] = '[REDACTED]';
      }
    }

    return sanitized;
  }
}
