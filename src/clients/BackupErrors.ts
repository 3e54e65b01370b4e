/**
 * Error classes for backup, retention, restore and metrics operations
 */
export class BackupError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'BackupError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/** Listing failed at some page; fatal to the calling step */
export class ListingError extends BackupError {
  constructor(
    message: string,
    public readonly bucket: string,
    public readonly prefix: string | undefined,
    cause?: Error
  ) {
    super(message, 'listing', cause);
    this.name = 'ListingError';
  }
}

export class CopyError extends BackupError {
  constructor(
    message: string,
    public readonly sourceKey: string,
    public readonly destinationKey: string,
    cause?: Error
  ) {
    super(message, 'copy', cause);
    this.name = 'CopyError';
  }
}

export class DeleteError extends BackupError {
  constructor(
    message: string,
    public readonly key: string,
    cause?: Error
  ) {
    super(message, 'deletion', cause);
    this.name = 'DeleteError';
  }
}

export class HeadObjectError extends BackupError {
  constructor(
    message: string,
    public readonly key: string,
    cause?: Error
  ) {
    super(message, 'head', cause);
    this.name = 'HeadObjectError';
  }
}

export class MetricsError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'metrics', cause);
    this.name = 'MetricsError';
  }
}

export class RestoreError extends BackupError {
  constructor(
    message: string,
    public readonly backupKey: string,
    cause?: Error
  ) {
    super(message, 'restore', cause);
    this.name = 'RestoreError';
  }
}

/**
 * Format error for consistent logging
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
