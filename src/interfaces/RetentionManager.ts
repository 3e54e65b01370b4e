/**
 * Result of a retention cleanup operation
 */
export interface RetentionResult {
  /** Number of backups that were deleted */
  deletedCount: number;
  
  /** Total number of backups found */
  totalCount: number;
  
  /** List of deleted backup keys */
  deletedKeys: string[];
  
  /** Any errors encountered during listing or deletion */
  errors: string[];
}

/**
 * Interface for managing backup retention and cleanup
 */
export interface RetentionManager {
  /** 
   * Delete every object under the backup prefix older than the retention window
   * @param bucket Bucket holding the backups
   * @returns Promise resolving to cleanup results, never rejecting
   */
  cleanupExpiredBackups(bucket: string): Promise<RetentionResult>;
  
  /**
   * Check if a backup is older than the retention cutoff
   * @param now Reference time, defaults to the current time
   */
  isBackupExpired(lastModified: Date, now?: Date): boolean;
}
