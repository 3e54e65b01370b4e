import * as cron from 'node-cron';
import { BackupConfig } from '../interfaces/BackupConfig';
import { DEFAULT_METRICS_NAMESPACE } from '../clients/MetricsReporter';

export const DEFAULT_RETENTION_DAYS = 30;
export const DEFAULT_REGION = 'us-east-1';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ConfigurationManager {
  private static readonly REQUIRED_VARS = ['SOURCE_BUCKET', 'BACKUP_BUCKET'] as const;

  /**
   * Load and validate configuration from environment variables
   */
  static loadConfiguration(env: NodeJS.ProcessEnv = process.env): BackupConfig {
    const read = (name: string): string | undefined => {
      const value = env[name]?.trim();
      return value ? value : undefined;
    };

    const missingVars = ConfigurationManager.REQUIRED_VARS.filter(name => !read(name));
    if (missingVars.length > 0) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missingVars.join(', ')}`,
        missingVars[0]
      );
    }

    const config: BackupConfig = {
      sourceBucket: read('SOURCE_BUCKET') ?? '',
      backupBucket: read('BACKUP_BUCKET') ?? '',
      retentionDays: ConfigurationManager.parseRetentionDays(read('RETENTION_DAYS')),
      region: read('AWS_REGION') ?? DEFAULT_REGION,
      metricsNamespace: read('METRICS_NAMESPACE') ?? DEFAULT_METRICS_NAMESPACE,
    };

    const s3Url = read('S3_URL');
    if (s3Url) {
      config.s3Url = s3Url;
    }

    const accessKey = read('S3_ACCESS_KEY');
    const secretKey = read('S3_SECRET_KEY');
    if (Boolean(accessKey) !== Boolean(secretKey)) {
      throw new ConfigurationError(
        'S3_ACCESS_KEY and S3_SECRET_KEY must be set together',
        accessKey ? 'S3_SECRET_KEY' : 'S3_ACCESS_KEY'
      );
    }
    if (accessKey && secretKey) {
      config.s3AccessKey = accessKey;
      config.s3SecretKey = secretKey;
    }

    const schedule = read('BACKUP_SCHEDULE');
    if (schedule) {
      if (!cron.validate(schedule)) {
        throw new ConfigurationError(`Invalid cron expression: ${schedule}`, 'BACKUP_SCHEDULE');
      }
      config.backupSchedule = schedule;
    }

    return config;
  }

  /**
   * Copy of the configuration that is safe to log
   */
  static sanitizeForLogging(config: BackupConfig): Record<string, unknown> {
    const { s3AccessKey, s3SecretKey, ...rest } = config;
    return {
      ...rest,
      ...(s3AccessKey ? { s3AccessKey: `${s3AccessKey.slice(0, 4)}***` } : {}),
      ...(s3SecretKey ? { s3SecretKey: '[REDACTED]' } : {}),
    };
  }

  private static parseRetentionDays(value: string | undefined): number {
    if (value === undefined) {
      return DEFAULT_RETENTION_DAYS;
    }

    if (!/^\+?\d+$/.test(value)) {
      throw new ConfigurationError(
        `RETENTION_DAYS must be a non-negative integer, got: ${value}`,
        'RETENTION_DAYS'
      );
    }

    return parseInt(value, 10);
  }
}
