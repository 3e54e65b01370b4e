export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for backup operations
  logBackupStart(sourceBucket: string, backupBucket: string, timestamp: string): void;
  logObjectBackedUp(key: string, backupKey: string, size: number): void;
  logBackupComplete(objectCount: number, totalBytes: number, duration: number): void;
  logBackupError(operation: string, error: Error, meta?: LogMeta): void;
  logRetentionCleanup(deletedCount: number, retentionDays: number): void;
  logConfigurationStart(config: LogMeta): void;
  logScheduledExecution(cronExpression: string): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
