/**
 * Listing entry for a stored backup object
 */
export interface BackupDescriptor {
  key: string;
  size: number;
  lastModified: Date;
  storageClass: string;
}

/**
 * Detailed information about a single backup object
 */
export interface BackupInfo extends BackupDescriptor {
  /** User metadata, including the provenance keys written at backup time */
  metadata: Record<string, string>;
}

/**
 * Interface for restore and inspection utilities
 */
export interface RestoreManager {
  /** Copy a backup object back to its original key in the source bucket */
  restoreFromBackup(backupKey: string): Promise<boolean>;

  /** List backup objects under a prefix, backup/ of the configured backup bucket by default */
  listBackups(prefix?: string, bucket?: string): Promise<BackupDescriptor[]>;

  /** Look up one backup object, null when the lookup fails */
  getBackupInfo(backupKey: string, bucket?: string): Promise<BackupInfo | null>;
}
