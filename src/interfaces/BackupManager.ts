import { RetentionResult } from './RetentionManager';

/**
 * A source object that could not be copied during a run
 */
export interface BackupFailure {
  key: string;
  error: string;
}

/**
 * Result of a backup run
 */
export interface BackupRunResult {
  /** Capture time of the run, YYYYMMDD_HHMMSS in UTC */
  timestamp: string;

  /** Number of source objects found */
  sourceCount: number;

  /** Number of objects copied successfully */
  objectsBackedUp: number;

  /** Sum of the sizes of the copied objects */
  totalSizeBytes: number;

  /** Objects skipped because their copy failed */
  failures: BackupFailure[];

  /** Outcome of the retention pass, absent when the source bucket was empty */
  retention?: RetentionResult;

  /** Duration of the run in milliseconds */
  duration: number;
}

/**
 * Interface for the main backup orchestration manager
 */
export interface BackupManager {
  /** Copy every source object into the backup bucket, then enforce retention and report metrics */
  executeBackup(): Promise<BackupRunResult>;
}

export interface BackupSuccessBody {
  message: string;
  timestamp: string;
  objects_backed_up?: number;
  total_size_bytes?: number;
}

export interface BackupFailureBody {
  message: string;
  error: string;
}

export type HandlerResponse =
  | { statusCode: 200; body: BackupSuccessBody }
  | { statusCode: 500; body: BackupFailureBody };
