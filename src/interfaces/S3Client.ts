/**
 * Represents an S3 object with metadata
 */
export interface S3Object {
  /** S3 object key */
  key: string;

  /** Size of the object in bytes */
  size: number;

  /** Last modified timestamp */
  lastModified: Date;

  /** Storage class, STANDARD when S3 omits it */
  storageClass: string;
}

/**
 * Server-side copy between two bucket/key locations
 */
export interface CopyObjectParams {
  sourceBucket: string;
  sourceKey: string;
  destinationBucket: string;
  destinationKey: string;

  /** Replaces the user metadata of the copy when given */
  metadata?: Record<string, string>;
}

/**
 * Result of a HEAD request on a single object
 */
export interface HeadObjectResult {
  contentLength: number;
  lastModified: Date;
  metadata: Record<string, string>;
  storageClass: string;
}

/**
 * Interface for S3 operations
 */
export interface S3Client {
  /**
   * Lazily list every object under a prefix, following continuation tokens.
   * Each iteration starts again from the first page.
   */
  listObjects(bucket: string, prefix?: string): AsyncIterable<S3Object>;

  /** Copy an object, optionally replacing its metadata */
  copyObject(params: CopyObjectParams): Promise<void>;

  /** Delete an object from S3 */
  deleteObject(bucket: string, key: string): Promise<void>;

  /** Read size, timestamps and user metadata of an object */
  headObject(bucket: string, key: string): Promise<HeadObjectResult>;
}
