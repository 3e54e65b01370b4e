import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { BackupError } from './BackupErrors';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'accesskey', 'access_key'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Replace values of sensitive keys with [REDACTED], recursing into nested objects
 */
export function sanitizeMeta(meta: LogMeta): LogMeta {
  const sanitized: LogMeta = { ...meta };

  for (const [key, value] of Object.entries(sanitized)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      sanitized[key] = sanitizeMeta(value);
    }
  }

  return sanitized;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: LogMeta = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      transports: [new winston.transports.Console()],
    });
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta: LogMeta = {
      ...meta,
      ...(error && { error: this.describeError(error) }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logBackupStart(sourceBucket: string, backupBucket: string, timestamp: string): void {
    this.info('Backup operation started', {
      operation: 'backup_start',
      sourceBucket,
      backupBucket,
      timestamp,
    });
  }

  logObjectBackedUp(key: string, backupKey: string, size: number): void {
    this.info(`Backed up ${key} to ${backupKey}`, {
      operation: 'object_backup',
      key,
      backupKey,
      size,
    });
  }

  logBackupComplete(objectCount: number, totalBytes: number, duration: number): void {
    this.info(`Backup completed: ${objectCount} objects, ${totalBytes} bytes`, {
      operation: 'backup_complete',
      objectCount,
      totalBytes,
      duration,
      totalSizeMB: Math.round((totalBytes / 1024 / 1024) * 100) / 100,
    });
  }

  logBackupError(operation: string, error: Error, meta?: LogMeta): void {
    this.error(`Backup operation failed: ${operation}`, error, {
      operation: 'backup_error',
      failedOperation: operation,
      ...meta,
    });
  }

  logRetentionCleanup(deletedCount: number, retentionDays: number): void {
    this.info('Retention cleanup completed', {
      operation: 'retention_cleanup',
      deletedCount,
      retentionDays,
    });
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config: sanitizeMeta(config),
    });
  }

  logScheduledExecution(cronExpression: string): void {
    this.info('Scheduled backup execution triggered', {
      operation: 'scheduled_execution',
      cronExpression,
    });
  }

  private describeError(error: Error): LogMeta {
    const details: LogMeta = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };

    if (error instanceof BackupError) {
      details.operation = error.operation;
      if (error.cause) {
        details.cause = `${error.cause.name}: ${error.cause.message}`;
      }
    }
    if ('code' in error && error.code !== undefined) {
      details.code = error.code;
    }
    if ('$metadata' in error && isRecord(error.$metadata)) {
      details.httpStatusCode = error.$metadata.httpStatusCode;
    }

    return details;
  }

  /**
   * Create a logger instance with the specified log level from environment
   */
  static createFromEnvironment(env: NodeJS.ProcessEnv = process.env): Logger {
    const logLevel = env.LOG_LEVEL?.toLowerCase() ?? LogLevel.INFO;

    if (!isLogLevel(logLevel)) {
      console.warn(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}. Using INFO level.`);
      return new Logger(LogLevel.INFO);
    }

    return new Logger(logLevel);
  }
}
