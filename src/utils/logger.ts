/**
 * Logger utility module for the Groupkeeper bot.
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
const logDir = process.env.LOG_DIR || path.join(__dirname, '../../logs');

if (!fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true });
}

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
 * Reads the log level straight from the environment so the logger can be
 * imported before configuration is loaded.
 */
const getLogLevel = (): string => {
  return process.env.LOG_LEVEL || 'info';
};

/**
 * Main Winston logger instance.
 *
 * - Console output with color coding
 * - Combined log file (all levels) with 10MB rotation, 5 files max
 * - Error log file (errors only) with 10MB rotation, 5 files max
 * - Exception and rejection handlers
 *
 * @example
 * ```typescript
 * logger.info('Captcha verified', { groupId: -100123, userId: 42 });
 * ```
 */
export const logger = winston.createLogger({
  level: getLogLevel(),
  format: logFormat,
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat
      )
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 10485760, // 10MB
      maxFiles: 5,
      tailable: true
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 10485760, // 10MB
      maxFiles: 5,
      tailable: true
    })
  ],
  exceptionHandlers: [
    new winston.transports.File({
      filename: path.join(logDir, 'exceptions.log'),
      maxsize: 10485760, // 10MB
      maxFiles: 3
    })
  ],
  rejectionHandlers: [
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
  /** Telegram group ID */
  groupId?: number;
  /** Telegram user ID */
  userId?: number;
  /** Tracker kind (profile, probation) */
  kind?: string;
  /** Enforcement action decided by the core */
  action?: string;
  /** Operation type */
  operation?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Helper class for structured logging with consistent context.
 */
export class StructuredLogger {
  /**
   * Logs a user action with context.
   *
   * @example
   * ```typescript
   * StructuredLogger.logUserAction('Captcha created', {
   *   groupId: -1001234567890,
   *   userId: 12345,
   *   operation: 'captcha_create'
   * });
   * ```
   */
  static logUserAction(action: string, context: LogContext): void {
    logger.info(action, this.sanitizeContext(context));
  }

  /**
   * Logs a security event (warnings, restrictions, captcha expiries).
   *
   * @example
   * ```typescript
   * StructuredLogger.logSecurityEvent('User restricted', {
   *   groupId: -1001234567890,
   *   userId: 12345,
   *   kind: 'profile',
   *   action: 'restrict'
   * });
   * ```
   */
  static logSecurityEvent(event: string, context: LogContext): void {
    logger.warn(`[SECURITY] ${event}`, this.sanitizeContext(context));
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
   * Masks fields like bot tokens before they reach a transport.
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
