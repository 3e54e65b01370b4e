import { ConfigurationManager } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { S3Client } from './clients/S3Client';
import { CloudWatchMetricsSink } from './clients/CloudWatchMetricsSink';
import { MetricsReporter } from './clients/MetricsReporter';
import { RetentionManager } from './clients/RetentionManager';
import { BackupManager } from './clients/BackupManager';
import { RestoreManager } from './clients/RestoreManager';
import { BackupConfig } from './interfaces/BackupConfig';
import {
  BackupManager as IBackupManager,
  BackupRunResult,
  HandlerResponse,
} from './interfaces/BackupManager';
import { RestoreManager as IRestoreManager } from './interfaces/RestoreManager';
import { Logger as ILogger } from './interfaces/Logger';
import { toError } from './clients/BackupErrors';

export interface BackupComponents {
  backupManager: IBackupManager;
  restoreManager: IRestoreManager;
}

/**
 * Build the backup and restore components for one configuration
 */
export function createComponents(config: BackupConfig, logger: ILogger): BackupComponents {
  const s3Client = new S3Client(config);
  const metricsReporter = new MetricsReporter(
    new CloudWatchMetricsSink(config),
    logger,
    config.metricsNamespace
  );
  const retentionManager = new RetentionManager(s3Client, config, logger);

  return {
    backupManager: new BackupManager(s3Client, retentionManager, metricsReporter, config, logger),
    restoreManager: new RestoreManager(s3Client, config, logger),
  };
}

export function toHandlerResponse(result: BackupRunResult): HandlerResponse {
  if (result.sourceCount === 0) {
    return {
      statusCode: 200,
      body: {
        message: 'No objects to backup',
        timestamp: result.timestamp,
      },
    };
  }

  return {
    statusCode: 200,
    body: {
      message: 'Backup completed successfully',
      timestamp: result.timestamp,
      objects_backed_up: result.objectsBackedUp,
      total_size_bytes: result.totalSizeBytes,
    },
  };
}

export function toFailureResponse(error: unknown): HandlerResponse {
  return {
    statusCode: 500,
    body: {
      message: 'Backup failed',
      error: error instanceof Error ? error.message : String(error),
    },
  };
}

/**
 * Run one backup and convert the outcome into a structured response
 */
export async function runBackup(backupManager: IBackupManager, logger: ILogger): Promise<HandlerResponse> {
  try {
    const result = await backupManager.executeBackup();
    return toHandlerResponse(result);
  } catch (error) {
    logger.error('Error in backup process', toError(error));
    return toFailureResponse(error);
  }
}

/**
 * Entry point for a scheduled invocation. The event and context only trigger
 * the run; configuration comes from the environment on every call.
 */
export async function handler(_event?: unknown, _context?: unknown): Promise<HandlerResponse> {
  const logger = Logger.createFromEnvironment();

  let config: BackupConfig;
  try {
    config = ConfigurationManager.loadConfiguration();
  } catch (error) {
    logger.error('Configuration error', toError(error));
    return toFailureResponse(error);
  }

  const { backupManager } = createComponents(config, logger);
  return runBackup(backupManager, logger);
}
