export type MetricUnit = 'Count' | 'Bytes';

export interface MetricDatum {
  name: string;
  value: number;
  unit: MetricUnit;
  timestamp: Date;
}

/**
 * Telemetry sink accepting named data points under a namespace
 */
export interface MetricsSink {
  putMetricData(namespace: string, data: MetricDatum[]): Promise<void>;
}

/**
 * Interface for reporting backup run metrics
 */
export interface MetricsReporter {
  /**
   * Emit object count, byte count and success flag for a finished run.
   * Resolves to false when the sink rejected the data; never rejects.
   */
  reportBackup(objectCount: number, totalBytes: number): Promise<boolean>;
}
