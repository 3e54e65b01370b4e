import { RetentionManager, BACKUP_PREFIX } from '../src/clients/RetentionManager';
import { DeleteError, ListingError } from '../src/clients/BackupErrors';
import { Logger } from '../src/interfaces/Logger';
import { S3Client } from '../src/interfaces/S3Client';
import {
  createMockLogger,
  createMockS3Client,
  failingIterable,
  s3Object,
  toAsyncIterable,
} from './helpers/mocks';

describe('RetentionManager', () => {
  // 30 days before this instant is 2024-01-31T00:00:00.000Z
  const now = new Date('2024-03-01T00:00:00.000Z');

  let retentionManager: RetentionManager;
  let mockS3Client: jest.Mocked<S3Client>;
  let mockLogger: jest.Mocked<Logger>;

  beforeEach(() => {
    jest.useFakeTimers({ now });
    mockS3Client = createMockS3Client();
    mockLogger = createMockLogger();
    mockS3Client.deleteObject.mockResolvedValue(undefined);
    retentionManager = new RetentionManager(mockS3Client, { retentionDays: 30 }, mockLogger);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('isBackupExpired', () => {
    it('should return true for backup older than retention period', () => {
      expect(retentionManager.isBackupExpired(new Date('2024-01-01T00:00:00Z'), now)).toBe(true);
    });

    it('should return false for backup within retention period', () => {
      expect(retentionManager.isBackupExpired(new Date('2024-02-20T00:00:00Z'), now)).toBe(false);
    });

    it('should keep a backup exactly at the cutoff', () => {
      expect(retentionManager.isBackupExpired(new Date('2024-01-31T00:00:00.000Z'), now)).toBe(false);
      expect(retentionManager.isBackupExpired(new Date('2024-01-30T23:59:59.999Z'), now)).toBe(true);
    });

    it('should default to the current time', () => {
      expect(retentionManager.isBackupExpired(new Date('2024-01-30T23:59:59.999Z'))).toBe(true);
    });

    it('should treat a zero-day window as a cutoff at the current time', () => {
      const manager = new RetentionManager(mockS3Client, { retentionDays: 0 }, mockLogger);

      expect(manager.isBackupExpired(new Date(now.getTime() - 1), now)).toBe(true);
      expect(manager.isBackupExpired(now, now)).toBe(false);
    });
  });

  describe('cleanupExpiredBackups', () => {
    it('should list objects under the backup prefix of the given bucket', async () => {
      mockS3Client.listObjects.mockReturnValue(toAsyncIterable([]));

      await retentionManager.cleanupExpiredBackups('backup-bucket');

      expect(BACKUP_PREFIX).toBe('backup/');
      expect(mockS3Client.listObjects).toHaveBeenCalledWith('backup-bucket', 'backup/');
    });

    it('should delete expired backups and keep recent ones', async () => {
      mockS3Client.listObjects.mockReturnValue(
        toAsyncIterable([
          s3Object('backup/20240101_000000/a.txt', 10, '2024-01-01T00:00:00Z'),
          s3Object('backup/20240220_000000/b.txt', 20, '2024-02-20T00:00:00Z'),
        ])
      );

      const result = await retentionManager.cleanupExpiredBackups('backup-bucket');

      expect(mockS3Client.deleteObject).toHaveBeenCalledTimes(1);
      expect(mockS3Client.deleteObject).toHaveBeenCalledWith(
        'backup-bucket',
        'backup/20240101_000000/a.txt'
      );
      expect(result).toEqual({
        deletedCount: 1,
        totalCount: 2,
        deletedKeys: ['backup/20240101_000000/a.txt'],
        errors: [],
      });
      expect(mockLogger.logRetentionCleanup).toHaveBeenCalledWith(1, 30);
    });

    it('should retain a backup whose last-modified time equals the cutoff', async () => {
      mockS3Client.listObjects.mockReturnValue(
        toAsyncIterable([
          s3Object('backup/20240131_000000/edge.txt', 1, '2024-01-31T00:00:00.000Z'),
          s3Object('backup/20240130_235959/before.txt', 1, '2024-01-30T23:59:59.999Z'),
        ])
      );

      const result = await retentionManager.cleanupExpiredBackups('backup-bucket');

      expect(result.deletedKeys).toEqual(['backup/20240130_235959/before.txt']);
    });

    it('should continue deleting after a single deletion fails', async () => {
      mockS3Client.listObjects.mockReturnValue(
        toAsyncIterable([
          s3Object('backup/20231201_000000/a.txt', 1, '2023-12-01T00:00:00Z'),
          s3Object('backup/20231202_000000/b.txt', 1, '2023-12-02T00:00:00Z'),
        ])
      );
      mockS3Client.deleteObject
        .mockRejectedValueOnce(new DeleteError('delete refused', 'backup/20231201_000000/a.txt'))
        .mockResolvedValueOnce(undefined);

      const result = await retentionManager.cleanupExpiredBackups('backup-bucket');

      expect(mockS3Client.deleteObject).toHaveBeenCalledTimes(2);
      expect(result).toEqual({
        deletedCount: 1,
        totalCount: 2,
        deletedKeys: ['backup/20231202_000000/b.txt'],
        errors: ['delete refused'],
      });
      expect(mockLogger.error).toHaveBeenCalledWith(
        'Error deleting backup/20231201_000000/a.txt',
        expect.any(DeleteError),
        expect.objectContaining({ key: 'backup/20231201_000000/a.txt' })
      );
    });

    it('should wrap unexpected deletion errors in DeleteError', async () => {
      mockS3Client.listObjects.mockReturnValue(
        toAsyncIterable([s3Object('backup/20231201_000000/a.txt', 1, '2023-12-01T00:00:00Z')])
      );
      mockS3Client.deleteObject.mockRejectedValueOnce(new Error('socket hang up'));

      const result = await retentionManager.cleanupExpiredBackups('backup-bucket');

      expect(result.errors).toEqual([
        'Failed to delete backup backup/20231201_000000/a.txt: Error: socket hang up',
      ]);
    });

    it('should abort silently when the backup listing fails', async () => {
      const listingError = new ListingError('Failed to list objects', 'backup-bucket', 'backup/');
      mockS3Client.listObjects.mockReturnValue(
        failingIterable(listingError, [
          s3Object('backup/20231201_000000/a.txt', 1, '2023-12-01T00:00:00Z'),
        ])
      );

      const result = await retentionManager.cleanupExpiredBackups('backup-bucket');

      expect(mockS3Client.deleteObject).not.toHaveBeenCalled();
      expect(result).toEqual({
        deletedCount: 0,
        totalCount: 0,
        deletedKeys: [],
        errors: ['Failed to list objects'],
      });
      expect(mockLogger.error).toHaveBeenCalledWith('Error cleaning up old backups', listingError, {
        bucket: 'backup-bucket',
      });
    });

    it('should delete nothing when no backups exist', async () => {
      mockS3Client.listObjects.mockReturnValue(toAsyncIterable([]));

      const result = await retentionManager.cleanupExpiredBackups('backup-bucket');

      expect(result.totalCount).toBe(0);
      expect(mockS3Client.deleteObject).not.toHaveBeenCalled();
    });
  });
});
