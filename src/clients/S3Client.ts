import {
  S3Client as AWSS3Client,
  S3ClientConfig,
  ListObjectsV2Command,
  CopyObjectCommand,
  DeleteObjectCommand,
  HeadObjectCommand,
  ListObjectsV2CommandInput,
  ListObjectsV2CommandOutput,
  CopyObjectCommandInput,
  HeadObjectCommandOutput,
} from '@aws-sdk/client-s3';
import {
  S3Client as IS3Client,
  S3Object,
  CopyObjectParams,
  HeadObjectResult,
} from '../interfaces/S3Client';
import { BackupConfig } from '../interfaces/BackupConfig';
import {
  ListingError,
  CopyError,
  DeleteError,
  HeadObjectError,
  formatError,
  toError,
} from './BackupErrors';

export const DEFAULT_STORAGE_CLASS = 'STANDARD';

export type S3ConnectionConfig = Pick<
  BackupConfig,
  'region' | 's3Url' | 's3AccessKey' | 's3SecretKey'
>;

/**
 * Build the CopySource value: bucket followed by the URL-encoded key segments
 */
export function buildCopySource(bucket: string, key: string): string {
  const encodedKey = key.split('/').map(encodeURIComponent).join('/');
  return `${bucket}/${encodedKey}`;
}

/**
 * S3Client implementation using AWS SDK v3.
 * Every call is a single request; callers decide how failures are handled.
 */
export class S3Client implements IS3Client {
  private client: AWSS3Client;

  constructor(config: S3ConnectionConfig) {
    const clientConfig: S3ClientConfig = {
      region: config.region,
    };

    // Static credentials only when both halves are configured, otherwise the default provider chain
    if (config.s3AccessKey && config.s3SecretKey) {
      clientConfig.credentials = {
        accessKeyId: config.s3AccessKey,
        secretAccessKey: config.s3SecretKey,
      };
    }

    // Use custom endpoint if provided (for S3-compatible services)
    if (config.s3Url) {
      clientConfig.endpoint = config.s3Url;
      clientConfig.forcePathStyle = true; // Required for MinIO and other S3-compatible services
    }

    this.client = new AWSS3Client(clientConfig);
  }

  listObjects(bucket: string, prefix?: string): AsyncIterable<S3Object> {
    return {
      [Symbol.asyncIterator]: () => this.paginate(bucket, prefix),
    };
  }

  async copyObject(params: CopyObjectParams): Promise<void> {
    const copyParams: CopyObjectCommandInput = {
      CopySource: buildCopySource(params.sourceBucket, params.sourceKey),
      Bucket: params.destinationBucket,
      Key: params.destinationKey,
    };

    // S3 ignores supplied metadata unless the directive says REPLACE
    if (params.metadata) {
      copyParams.Metadata = params.metadata;
      copyParams.MetadataDirective = 'REPLACE';
    }

    try {
      await this.client.send(new CopyObjectCommand(copyParams));
    } catch (error) {
      throw new CopyError(
        `Failed to copy s3://${params.sourceBucket}/${params.sourceKey} to s3://${params.destinationBucket}/${params.destinationKey}: ${formatError(error)}`,
        params.sourceKey,
        params.destinationKey,
        toError(error)
      );
    }
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
    } catch (error) {
      throw new DeleteError(
        `Failed to delete s3://${bucket}/${key}: ${formatError(error)}`,
        key,
        toError(error)
      );
    }
  }

  async headObject(bucket: string, key: string): Promise<HeadObjectResult> {
    let response: HeadObjectCommandOutput;
    try {
      response = await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
    } catch (error) {
      throw new HeadObjectError(
        `Failed to read metadata of s3://${bucket}/${key}: ${formatError(error)}`,
        key,
        toError(error)
      );
    }

    return {
      contentLength: response.ContentLength ?? 0,
      lastModified: response.LastModified ?? new Date(0),
      metadata: response.Metadata ?? {},
      storageClass: response.StorageClass ?? DEFAULT_STORAGE_CLASS,
    };
  }

  /**
   * Walk ListObjectsV2 pages until the listing is no longer truncated
   */
  private async *paginate(bucket: string, prefix?: string): AsyncGenerator<S3Object> {
    let continuationToken: string | undefined;

    do {
      const listParams: ListObjectsV2CommandInput = {
        Bucket: bucket,
        Prefix: prefix,
        ContinuationToken: continuationToken,
      };

      let response: ListObjectsV2CommandOutput;
      try {
        response = await this.client.send(new ListObjectsV2Command(listParams));
      } catch (error) {
        const location = prefix ? `s3://${bucket}/${prefix}` : `s3://${bucket}`;
        throw new ListingError(
          `Failed to list objects in ${location}: ${formatError(error)}`,
          bucket,
          prefix,
          toError(error)
        );
      }

      for (const item of response.Contents ?? []) {
        if (!item.Key) continue;
        yield {
          key: item.Key,
          size: item.Size ?? 0,
          lastModified: item.LastModified ?? new Date(0),
          storageClass: item.StorageClass ?? DEFAULT_STORAGE_CLASS,
        };
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);
  }
}

/**
 * Drain a listing into an array; a failing page rejects the whole listing
 */
export async function collectObjects(objects: AsyncIterable<S3Object>): Promise<S3Object[]> {
  const collected: S3Object[] = [];
  for await (const obj of objects) {
    collected.push(obj);
  }
  return collected;
}
