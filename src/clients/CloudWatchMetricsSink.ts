import {
  CloudWatchClient,
  CloudWatchClientConfig,
  PutMetricDataCommand,
  MetricDatum as CloudWatchDatum,
} from '@aws-sdk/client-cloudwatch';
import { MetricDatum, MetricsSink } from '../interfaces/MetricsReporter';
import { BackupConfig } from '../interfaces/BackupConfig';
import { MetricsError, formatError, toError } from './BackupErrors';

/**
 * MetricsSink backed by CloudWatch PutMetricData
 */
export class CloudWatchMetricsSink implements MetricsSink {
  private client: CloudWatchClient;

  constructor(config: Pick<BackupConfig, 'region' | 's3AccessKey' | 's3SecretKey'>) {
    const clientConfig: CloudWatchClientConfig = {
      region: config.region,
    };

    if (config.s3AccessKey && config.s3SecretKey) {
      clientConfig.credentials = {
        accessKeyId: config.s3AccessKey,
        secretAccessKey: config.s3SecretKey,
      };
    }

    this.client = new CloudWatchClient(clientConfig);
  }

  async putMetricData(namespace: string, data: MetricDatum[]): Promise<void> {
    const metricData: CloudWatchDatum[] = data.map(datum => ({
      MetricName: datum.name,
      Value: datum.value,
      Unit: datum.unit,
      Timestamp: datum.timestamp,
    }));

    try {
      await this.client.send(
        new PutMetricDataCommand({ Namespace: namespace, MetricData: metricData })
      );
    } catch (error) {
      throw new MetricsError(
        `Failed to publish ${data.length} metrics to ${namespace}: ${formatError(error)}`,
        toError(error)
      );
    }
  }
}
