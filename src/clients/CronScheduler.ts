import * as cron from 'node-cron';
import { CronScheduler as ICronScheduler, CronSchedulerConfig } from '../interfaces/CronScheduler';
import { BackupManager } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { BackupError, toError } from './BackupErrors';

export class CronSchedulerError extends BackupError {
  constructor(message: string, operation: string, cause?: Error) {
    super(message, operation, cause);
    this.name = 'CronSchedulerError';
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

/**
 * CronScheduler implementation using node-cron library.
 * Runs backups on the configured schedule and skips a tick while the previous run is still going.
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private config: CronSchedulerConfig;
  private backupManager: BackupManager;
  private isBackupRunning = false;
  private logger: Logger;

  constructor(config: CronSchedulerConfig, backupManager: BackupManager, logger: Logger) {
    this.config = config;
    this.backupManager = backupManager;
    this.logger = logger;
  }

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new CronValidationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        this.config.cronExpression
      );
    }

    const timezone = this.config.timezone ?? 'UTC';
    this.logger.info(
      `Starting cron scheduler with expression: ${this.config.cronExpression} (timezone: ${timezone})`
    );

    this.task = cron.schedule(
      this.config.cronExpression,
      () => {
        void this.executeScheduledBackup();
      },
      { scheduled: false, timezone }
    );
    this.task.start();

    this.logger.info('CronScheduler started successfully');

    if (this.config.runOnInit) {
      this.logger.info('Running initial backup due to runOnInit configuration');
      setImmediate(() => {
        void this.executeScheduledBackup();
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped successfully');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  /**
   * Validate a cron expression using node-cron's built-in validation
   */
  validateCronExpression(expression: string): boolean {
    try {
      return cron.validate(expression);
    } catch (error) {
      this.logger.error('Cron expression validation error', toError(error), { expression });
      return false;
    }
  }

  /**
   * Run one backup; never rejects
   */
  async executeScheduledBackup(): Promise<void> {
    if (this.isBackupRunning) {
      this.logger.warn('Backup is already running, skipping this scheduled execution');
      return;
    }

    this.isBackupRunning = true;
    this.logger.logScheduledExecution(this.config.cronExpression);

    try {
      const result = await this.backupManager.executeBackup();
      this.logger.info(
        `Scheduled backup completed: ${result.objectsBackedUp} of ${result.sourceCount} objects in ${result.duration}ms`,
        { timestamp: result.timestamp, failures: result.failures.length }
      );
    } catch (error) {
      this.logger.logBackupError('scheduled_backup', toError(error), {
        cronExpression: this.config.cronExpression,
      });
    } finally {
      this.isBackupRunning = false;
    }
  }
}
