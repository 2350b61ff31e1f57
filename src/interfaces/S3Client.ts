/**
 * Location of a restic S3 repository
 */
export interface S3RepositoryLocation {
  /** Custom endpoint for S3-compatible services, undefined for AWS */
  endpoint?: string;

  bucket: string;
}

/**
 * Interface for S3 connectivity checks
 */
export interface S3Client {
  /** Test S3 connectivity and permissions on the repository bucket */
  testConnection(): Promise<boolean>;
}
