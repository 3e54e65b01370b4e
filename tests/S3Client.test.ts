import {
  S3Client as AWSS3Client,
  ListObjectsV2Command,
  CopyObjectCommand,
  DeleteObjectCommand,
  HeadObjectCommand,
} from '@aws-sdk/client-s3';
import { S3Client, buildCopySource, collectObjects } from '../src/clients/S3Client';
import { CopyError, DeleteError, HeadObjectError, ListingError } from '../src/clients/BackupErrors';

const mockSend = jest.fn();

// Keep the real command classes so their inputs can be asserted
jest.mock('@aws-sdk/client-s3', () => ({
  ...jest.requireActual<typeof import('@aws-sdk/client-s3')>('@aws-sdk/client-s3'),
  S3Client: jest.fn().mockImplementation(() => ({ send: mockSend })),
}));

describe('S3Client', () => {
  let s3Client: S3Client;

  beforeEach(() => {
    jest.clearAllMocks();
    mockSend.mockReset();
    s3Client = new S3Client({ region: 'us-east-1' });
  });

  describe('constructor', () => {
    it('should rely on the default credential chain when no keys are configured', () => {
      new S3Client({ region: 'eu-west-1' });

      expect(AWSS3Client).toHaveBeenLastCalledWith({ region: 'eu-west-1' });
    });

    it('should use static credentials and a path-style custom endpoint when configured', () => {
      new S3Client({
        region: 'us-east-1',
        s3Url: 'http://localhost:9000',
        s3AccessKey: 'test-key',
        s3SecretKey: 'test-secret',
      });

      expect(AWSS3Client).toHaveBeenLastCalledWith({
        region: 'us-east-1',
        credentials: {
          accessKeyId: 'test-key',
          secretAccessKey: 'test-secret',
        },
        endpoint: 'http://localhost:9000',
        forcePathStyle: true,
      });
    });
  });

  describe('listObjects', () => {
    it('should follow continuation tokens until the listing is exhausted', async () => {
      const first = new Date('2024-01-01T00:00:00Z');
      const second = new Date('2024-01-02T00:00:00Z');
      mockSend
        .mockResolvedValueOnce({
          Contents: [{ Key: 'data/a.csv', Size: 10, LastModified: first, StorageClass: 'GLACIER' }],
          IsTruncated: true,
          NextContinuationToken: 'token-1',
        })
        .mockResolvedValueOnce({
          Contents: [{ Key: 'data/b.csv', LastModified: second }],
          IsTruncated: false,
        });

      const objects = await collectObjects(s3Client.listObjects('source-bucket', 'data/'));

      expect(objects).toEqual([
        { key: 'data/a.csv', size: 10, lastModified: first, storageClass: 'GLACIER' },
        { key: 'data/b.csv', size: 0, lastModified: second, storageClass: 'STANDARD' },
      ]);
      expect(mockSend).toHaveBeenCalledTimes(2);
      expect(mockSend.mock.calls[0][0]).toBeInstanceOf(ListObjectsV2Command);
      expect(mockSend.mock.calls[0][0].input).toEqual({ Bucket: 'source-bucket', Prefix: 'data/' });
      expect(mockSend.mock.calls[1][0].input).toEqual({
        Bucket: 'source-bucket',
        Prefix: 'data/',
        ContinuationToken: 'token-1',
      });
    });

    it('should not send any request before the listing is iterated', () => {
      s3Client.listObjects('source-bucket');

      expect(mockSend).not.toHaveBeenCalled();
    });

    it('should restart from the first page on every iteration', async () => {
      mockSend.mockResolvedValue({
        Contents: [{ Key: 'a.txt', Size: 1, LastModified: new Date('2024-01-01T00:00:00Z') }],
        IsTruncated: false,
      });
      const listing = s3Client.listObjects('source-bucket');

      const firstPass = await collectObjects(listing);
      const secondPass = await collectObjects(listing);

      expect(secondPass).toEqual(firstPass);
      expect(mockSend).toHaveBeenCalledTimes(2);
      expect(mockSend.mock.calls[1][0].input.ContinuationToken).toBeUndefined();
    });

    it('should return an empty listing when the bucket has no contents', async () => {
      mockSend.mockResolvedValue({ KeyCount: 0, IsTruncated: false });

      await expect(collectObjects(s3Client.listObjects('source-bucket'))).resolves.toEqual([]);
    });

    it('should skip entries without a key', async () => {
      mockSend.mockResolvedValue({
        Contents: [{ Size: 5 }, { Key: 'kept.txt', Size: 3, LastModified: new Date(0) }],
        IsTruncated: false,
      });

      const objects = await collectObjects(s3Client.listObjects('source-bucket'));

      expect(objects.map(obj => obj.key)).toEqual(['kept.txt']);
    });

    it('should fail the whole listing with ListingError when a page fails', async () => {
      mockSend
        .mockResolvedValueOnce({
          Contents: [{ Key: 'a.txt', Size: 1, LastModified: new Date(0) }],
          IsTruncated: true,
          NextContinuationToken: 'token-1',
        })
        .mockRejectedValueOnce(new Error('SlowDown'));

      const listing = collectObjects(s3Client.listObjects('source-bucket'));

      await expect(listing).rejects.toBeInstanceOf(ListingError);
      await expect(listing).rejects.toThrow('Failed to list objects in s3://source-bucket: Error: SlowDown');
    });
  });

  describe('copyObject', () => {
    it('should copy with replaced provenance metadata', async () => {
      mockSend.mockResolvedValue({});

      await s3Client.copyObject({
        sourceBucket: 'source-bucket',
        sourceKey: 'data/my file.csv',
        destinationBucket: 'backup-bucket',
        destinationKey: 'backup/20240115_093000/data/my file.csv',
        metadata: { 'original-key': 'data/my file.csv' },
      });

      expect(mockSend.mock.calls[0][0]).toBeInstanceOf(CopyObjectCommand);
      expect(mockSend.mock.calls[0][0].input).toEqual({
        CopySource: 'source-bucket/data/my%20file.csv',
        Bucket: 'backup-bucket',
        Key: 'backup/20240115_093000/data/my file.csv',
        Metadata: { 'original-key': 'data/my file.csv' },
        MetadataDirective: 'REPLACE',
      });
    });

    it('should keep the source metadata when none is given', async () => {
      mockSend.mockResolvedValue({});

      await s3Client.copyObject({
        sourceBucket: 'backup-bucket',
        sourceKey: 'backup/20240115_093000/reports/q1.pdf',
        destinationBucket: 'source-bucket',
        destinationKey: 'reports/q1.pdf',
      });

      expect(mockSend.mock.calls[0][0].input).toEqual({
        CopySource: 'backup-bucket/backup/20240115_093000/reports/q1.pdf',
        Bucket: 'source-bucket',
        Key: 'reports/q1.pdf',
      });
    });

    it('should throw CopyError when the copy fails', async () => {
      mockSend.mockRejectedValue(new Error('AccessDenied'));

      const copy = s3Client.copyObject({
        sourceBucket: 'source-bucket',
        sourceKey: 'a.txt',
        destinationBucket: 'backup-bucket',
        destinationKey: 'backup/20240115_093000/a.txt',
      });

      await expect(copy).rejects.toBeInstanceOf(CopyError);
      await expect(copy).rejects.toMatchObject({
        sourceKey: 'a.txt',
        destinationKey: 'backup/20240115_093000/a.txt',
        operation: 'copy',
      });
    });
  });

  describe('deleteObject', () => {
    it('should delete the given key', async () => {
      mockSend.mockResolvedValue({});

      await s3Client.deleteObject('backup-bucket', 'backup/20230101_000000/a.txt');

      expect(mockSend.mock.calls[0][0]).toBeInstanceOf(DeleteObjectCommand);
      expect(mockSend.mock.calls[0][0].input).toEqual({
        Bucket: 'backup-bucket',
        Key: 'backup/20230101_000000/a.txt',
      });
    });

    it('should throw DeleteError when the delete fails', async () => {
      mockSend.mockRejectedValue(new Error('AccessDenied'));

      const deletion = s3Client.deleteObject('backup-bucket', 'backup/old.txt');

      await expect(deletion).rejects.toBeInstanceOf(DeleteError);
      await expect(deletion).rejects.toThrow(
        'Failed to delete s3://backup-bucket/backup/old.txt: Error: AccessDenied'
      );
    });
  });

  describe('headObject', () => {
    it('should map the response fields', async () => {
      const lastModified = new Date('2024-01-15T09:30:05Z');
      mockSend.mockResolvedValue({
        ContentLength: 2048,
        LastModified: lastModified,
        Metadata: { 'original-key': 'reports/q1.pdf' },
        StorageClass: 'STANDARD_IA',
      });

      const head = await s3Client.headObject('backup-bucket', 'backup/20240115_093000/reports/q1.pdf');

      expect(mockSend.mock.calls[0][0]).toBeInstanceOf(HeadObjectCommand);
      expect(head).toEqual({
        contentLength: 2048,
        lastModified,
        metadata: { 'original-key': 'reports/q1.pdf' },
        storageClass: 'STANDARD_IA',
      });
    });

    it('should fill defaults for missing fields', async () => {
      mockSend.mockResolvedValue({});

      const head = await s3Client.headObject('backup-bucket', 'backup/x');

      expect(head).toEqual({
        contentLength: 0,
        lastModified: new Date(0),
        metadata: {},
        storageClass: 'STANDARD',
      });
    });

    it('should throw HeadObjectError when the object cannot be read', async () => {
      mockSend.mockRejectedValue(new Error('NotFound'));

      await expect(s3Client.headObject('backup-bucket', 'backup/missing')).rejects.toBeInstanceOf(
        HeadObjectError
      );
    });
  });

  describe('buildCopySource', () => {
    it('should encode each key segment but keep the separators', () => {
      expect(buildCopySource('source-bucket', 'data/file.csv')).toBe('source-bucket/data/file.csv');
      expect(buildCopySource('source-bucket', 'a b/c+d.txt')).toBe('source-bucket/a%20b/c%2Bd.txt');
    });
  });
});
