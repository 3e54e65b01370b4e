import {
  RetentionManager as IRetentionManager,
  RetentionResult,
} from '../interfaces/RetentionManager';
import { S3Client, S3Object } from '../interfaces/S3Client';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { DeleteError, ListingError, formatError, toError } from './BackupErrors';
import { collectObjects } from './S3Client';

export const BACKUP_PREFIX = 'backup/';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * RetentionManager implementation for managing backup lifecycle.
 * Deletes objects under the backup prefix whose last-modified time is older
 * than the retention window.
 */
export class RetentionManager implements IRetentionManager {
  private s3Client: S3Client;
  private retentionDays: number;
  private logger: Logger;

  constructor(s3Client: S3Client, config: Pick<BackupConfig, 'retentionDays'>, logger: Logger) {
    this.s3Client = s3Client;
    this.retentionDays = config.retentionDays;
    this.logger = logger;
  }

  /**
   * Clean up expired backups. Never rejects: a listing failure ends the pass
   * and a failed deletion is skipped, both recorded in the result's errors.
   */
  async cleanupExpiredBackups(bucket: string): Promise<RetentionResult> {
    const result: RetentionResult = {
      deletedCount: 0,
      totalCount: 0,
      deletedKeys: [],
      errors: [],
    };

    const cutoffDate = this.getCutoffDate(new Date());

    let objects: S3Object[];
    try {
      objects = await collectObjects(this.s3Client.listObjects(bucket, BACKUP_PREFIX));
    } catch (error) {
      const listingError =
        error instanceof ListingError
          ? error
          : new ListingError(
              `Failed to list backups for cleanup: ${formatError(error)}`,
              bucket,
              BACKUP_PREFIX,
              toError(error)
            );
      result.errors.push(listingError.message);
      this.logger.error('Error cleaning up old backups', listingError, { bucket });
      return result;
    }

    result.totalCount = objects.length;

    if (objects.length === 0) {
      this.logger.debug(`No backups found with prefix: ${BACKUP_PREFIX}`, { bucket });
      return result;
    }

    this.logger.debug(`Deleting backups older than: ${cutoffDate.toISOString()}`, {
      bucket,
      totalCount: objects.length,
    });

    for (const obj of objects) {
      if (!this.isOlderThan(obj.lastModified, cutoffDate)) {
        continue;
      }

      try {
        await this.s3Client.deleteObject(bucket, obj.key);
        result.deletedCount++;
        result.deletedKeys.push(obj.key);
        this.logger.info(`Deleted old backup: ${obj.key}`, {
          lastModified: obj.lastModified.toISOString(),
        });
      } catch (error) {
        const deletionError =
          error instanceof DeleteError
            ? error
            : new DeleteError(
                `Failed to delete backup ${obj.key}: ${formatError(error)}`,
                obj.key,
                toError(error)
              );
        result.errors.push(deletionError.message);
        this.logger.error(`Error deleting ${obj.key}`, deletionError, {
          key: obj.key,
          lastModified: obj.lastModified.toISOString(),
          size: obj.size,
        });
      }
    }

    this.logger.logRetentionCleanup(result.deletedCount, this.retentionDays);

    if (result.errors.length > 0) {
      this.logger.warn(
        `Retention cleanup had ${result.errors.length} errors. Some backups may not have been deleted.`
      );
    }

    return result;
  }

  /**
   * A backup exactly at the cutoff is kept
   */
  isBackupExpired(lastModified: Date, now: Date = new Date()): boolean {
    return this.isOlderThan(lastModified, this.getCutoffDate(now));
  }

  private getCutoffDate(now: Date): Date {
    return new Date(now.getTime() - this.retentionDays * DAY_MS);
  }

  private isOlderThan(lastModified: Date, cutoffDate: Date): boolean {
    return lastModified.getTime() < cutoffDate.getTime();
  }
}
