import { v4 as uuidv4 } from 'uuid';
import {
  BackupManager as IBackupManager,
  BackupFailure,
  BackupRunResult,
} from '../interfaces/BackupManager';
import { S3Client, S3Object } from '../interfaces/S3Client';
import { RetentionManager } from '../interfaces/RetentionManager';
import { MetricsReporter } from '../interfaces/MetricsReporter';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { CopyError, formatError, toError } from './BackupErrors';
import { BACKUP_PREFIX } from './RetentionManager';
import { collectObjects } from './S3Client';

/**
 * Provenance metadata keys written on every backup object
 */
export const METADATA_KEYS = {
  originalBucket: 'original-bucket',
  originalKey: 'original-key',
  backupTimestamp: 'backup-timestamp',
  originalSize: 'original-size',
  originalLastModified: 'original-last-modified',
} as const;

/**
 * Format date to YYYYMMDD_HHMMSS in UTC
 */
export function formatBackupTimestamp(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  const hours = String(date.getUTCHours()).padStart(2, '0');
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  const seconds = String(date.getUTCSeconds()).padStart(2, '0');

  return `${year}${month}${day}_${hours}${minutes}${seconds}`;
}

export function buildBackupKey(timestamp: string, originalKey: string): string {
  return `${BACKUP_PREFIX}${timestamp}/${originalKey}`;
}

export function buildProvenanceMetadata(
  sourceBucket: string,
  obj: S3Object,
  timestamp: string
): Record<string, string> {
  return {
    [METADATA_KEYS.originalBucket]: sourceBucket,
    [METADATA_KEYS.originalKey]: obj.key,
    [METADATA_KEYS.backupTimestamp]: timestamp,
    [METADATA_KEYS.originalSize]: String(obj.size),
    [METADATA_KEYS.originalLastModified]: obj.lastModified.toISOString(),
  };
}

/**
 * BackupManager implementation that orchestrates a full-bucket backup run.
 * Copies every source object under backup/<timestamp>/, then runs retention
 * cleanup and publishes metrics.
 */
export class BackupManager implements IBackupManager {
  private s3Client: S3Client;
  private retentionManager: RetentionManager;
  private metricsReporter: MetricsReporter;
  private config: Pick<BackupConfig, 'sourceBucket' | 'backupBucket'>;
  private logger: Logger;

  constructor(
    s3Client: S3Client,
    retentionManager: RetentionManager,
    metricsReporter: MetricsReporter,
    config: Pick<BackupConfig, 'sourceBucket' | 'backupBucket'>,
    logger: Logger
  ) {
    this.s3Client = s3Client;
    this.retentionManager = retentionManager;
    this.metricsReporter = metricsReporter;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Execute a backup run. Rejects only when the source listing fails;
   * per-object copy failures are recorded and skipped.
   */
  async executeBackup(): Promise<BackupRunResult> {
    const startTime = Date.now();
    const operationId = `backup-${uuidv4()}`;
    const { sourceBucket, backupBucket } = this.config;
    const timestamp = formatBackupTimestamp(new Date(startTime));

    this.logger.logBackupStart(sourceBucket, backupBucket, timestamp);

    const sourceObjects = await collectObjects(this.s3Client.listObjects(sourceBucket));

    if (sourceObjects.length === 0) {
      this.logger.info('No objects found in source bucket', { operationId, sourceBucket });
      return {
        timestamp,
        sourceCount: 0,
        objectsBackedUp: 0,
        totalSizeBytes: 0,
        failures: [],
        duration: Date.now() - startTime,
      };
    }

    let backupCount = 0;
    let totalSize = 0;
    const failures: BackupFailure[] = [];

    for (const obj of sourceObjects) {
      const backupKey = buildBackupKey(timestamp, obj.key);

      try {
        await this.s3Client.copyObject({
          sourceBucket,
          sourceKey: obj.key,
          destinationBucket: backupBucket,
          destinationKey: backupKey,
          metadata: buildProvenanceMetadata(sourceBucket, obj, timestamp),
        });

        backupCount++;
        totalSize += obj.size;
        this.logger.logObjectBackedUp(obj.key, backupKey, obj.size);
      } catch (error) {
        const copyError =
          error instanceof CopyError
            ? error
            : new CopyError(
                `Error backing up ${obj.key}: ${formatError(error)}`,
                obj.key,
                backupKey,
                toError(error)
              );
        failures.push({ key: obj.key, error: copyError.message });
        this.logger.error(`Error backing up ${obj.key}`, copyError, { operationId });
      }
    }

    const retention = await this.retentionManager.cleanupExpiredBackups(backupBucket);
    await this.metricsReporter.reportBackup(backupCount, totalSize);

    const duration = Date.now() - startTime;
    this.logger.logBackupComplete(backupCount, totalSize, duration);

    if (failures.length > 0) {
      this.logger.warn(`${failures.length} of ${sourceObjects.length} objects could not be backed up`, {
        operationId,
        failedKeys: failures.map(failure => failure.key),
      });
    }

    return {
      timestamp,
      sourceCount: sourceObjects.length,
      objectsBackedUp: backupCount,
      totalSizeBytes: totalSize,
      failures,
      retention,
      duration,
    };
  }
}
