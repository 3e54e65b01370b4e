export interface BackupConfig {
  sourceBucket: string;
  backupBucket: string;
  retentionDays: number;
  region: string;
  s3Url?: string;
  s3AccessKey?: string;
  s3SecretKey?: string;
  metricsNamespace: string;
  backupSchedule?: string; // cron format, service mode only
}
