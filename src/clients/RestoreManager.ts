import {
  RestoreManager as IRestoreManager,
  BackupDescriptor,
  BackupInfo,
} from '../interfaces/RestoreManager';
import { S3Client } from '../interfaces/S3Client';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { RestoreError, formatError, toError } from './BackupErrors';
import { METADATA_KEYS } from './BackupManager';
import { BACKUP_PREFIX } from './RetentionManager';
import { collectObjects } from './S3Client';

/**
 * Restore and inspection utilities over the backup bucket
 */
export class RestoreManager implements IRestoreManager {
  private s3Client: S3Client;
  private config: Pick<BackupConfig, 'sourceBucket' | 'backupBucket'>;
  private logger: Logger;

  constructor(
    s3Client: S3Client,
    config: Pick<BackupConfig, 'sourceBucket' | 'backupBucket'>,
    logger: Logger
  ) {
    this.s3Client = s3Client;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Restore a backup object to the key recorded in its metadata.
   * Whatever currently exists at that key in the source bucket is overwritten.
   */
  async restoreFromBackup(backupKey: string): Promise<boolean> {
    const { sourceBucket, backupBucket } = this.config;

    try {
      const head = await this.s3Client.headObject(backupBucket, backupKey);
      const originalKey = head.metadata[METADATA_KEYS.originalKey];

      if (!originalKey) {
        throw new RestoreError(
          `Backup ${backupKey} has no ${METADATA_KEYS.originalKey} metadata`,
          backupKey
        );
      }

      await this.s3Client.copyObject({
        sourceBucket: backupBucket,
        sourceKey: backupKey,
        destinationBucket: sourceBucket,
        destinationKey: originalKey,
      });

      this.logger.info(`Restored ${backupKey} to ${originalKey}`, {
        operation: 'restore',
        sourceBucket,
        backupBucket,
      });
      return true;
    } catch (error) {
      const restoreError =
        error instanceof RestoreError
          ? error
          : new RestoreError(
              `Error restoring ${backupKey}: ${formatError(error)}`,
              backupKey,
              toError(error)
            );
      this.logger.error(`Error restoring ${backupKey}`, restoreError);
      return false;
    }
  }

  async listBackups(
    prefix: string = BACKUP_PREFIX,
    bucket: string = this.config.backupBucket
  ): Promise<BackupDescriptor[]> {
    const objects = await collectObjects(this.s3Client.listObjects(bucket, prefix));

    return objects.map(obj => ({
      key: obj.key,
      size: obj.size,
      lastModified: obj.lastModified,
      storageClass: obj.storageClass,
    }));
  }

  async getBackupInfo(
    backupKey: string,
    bucket: string = this.config.backupBucket
  ): Promise<BackupInfo | null> {
    try {
      const head = await this.s3Client.headObject(bucket, backupKey);

      return {
        key: backupKey,
        size: head.contentLength,
        lastModified: head.lastModified,
        metadata: head.metadata,
        storageClass: head.storageClass,
      };
    } catch (error) {
      this.logger.error(`Error getting backup info for ${backupKey}`, toError(error), { bucket });
      return null;
    }
  }
}
