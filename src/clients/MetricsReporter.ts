import {
  MetricsReporter as IMetricsReporter,
  MetricsSink,
} from '../interfaces/MetricsReporter';
import { Logger } from '../interfaces/Logger';
import { MetricsError, formatError, toError } from './BackupErrors';

export const DEFAULT_METRICS_NAMESPACE = 'MapReduce/Backup';

export const METRIC_NAMES = {
  objectsCount: 'BackupObjectsCount',
  sizeBytes: 'BackupSizeBytes',
  success: 'BackupSuccess',
} as const;

/**
 * Best-effort reporter for backup run counters
 */
export class MetricsReporter implements IMetricsReporter {
  constructor(
    private readonly sink: MetricsSink,
    private readonly logger: Logger,
    private readonly namespace: string = DEFAULT_METRICS_NAMESPACE
  ) {}

  async reportBackup(objectCount: number, totalBytes: number): Promise<boolean> {
    const timestamp = new Date();

    try {
      await this.sink.putMetricData(this.namespace, [
        { name: METRIC_NAMES.objectsCount, value: objectCount, unit: 'Count', timestamp },
        { name: METRIC_NAMES.sizeBytes, value: totalBytes, unit: 'Bytes', timestamp },
        { name: METRIC_NAMES.success, value: 1, unit: 'Count', timestamp },
      ]);

      this.logger.debug('Backup metrics published', {
        namespace: this.namespace,
        objectCount,
        totalBytes,
      });
      return true;
    } catch (error) {
      const metricsError =
        error instanceof MetricsError
          ? error
          : new MetricsError(`Error sending metrics: ${formatError(error)}`, toError(error));
      this.logger.error('Error sending metrics', metricsError, { namespace: this.namespace });
      return false;
    }
  }
}
