import { S3Client as AWSS3Client, HeadBucketCommand, S3ClientConfig } from '@aws-sdk/client-s3';
import { CloudCredentials } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { S3Client as IS3Client, S3RepositoryLocation } from '../interfaces/S3Client';
import { formatError } from '../utils/formatting';

const DEFAULT_REGION = 'us-east-1';
const AWS_HOST_PATTERN = /(^|\.)amazonaws\.com$/i;

/**
 * Parse a restic S3 repository string.
 * Accepted forms: s3:s3.amazonaws.com/bucket/prefix and s3:https://host:port/bucket/prefix
 * Returns null for any other repository type.
 */
export function parseS3Repository(repository: string): S3RepositoryLocation | null {
  if (!repository.startsWith('s3:')) {
    return null;
  }

  const location = repository.slice('s3:'.length);
  const hasScheme = /^https?:\/\//i.test(location);
  let url: URL;
  try {
    url = new URL(hasScheme ? location : `https://${location}`);
  } catch {
    return null;
  }

  const [bucket] = url.pathname.split('/').filter(part => part.length > 0);
  if (!bucket) {
    return null;
  }

  const result: S3RepositoryLocation = { bucket };

  if (!AWS_HOST_PATTERN.test(url.hostname)) {
    result.endpoint = `${url.protocol}//${url.host}`;
  }
  return result;
}

/**
 * S3Client implementation using AWS SDK v3, used to probe the repository bucket
 */
export class S3Client implements IS3Client {
  private client: AWSS3Client;
  private bucket: string;
  private logger: Logger;

  constructor(location: S3RepositoryLocation, credentials: CloudCredentials, logger: Logger) {
    const clientConfig: S3ClientConfig = {
      region: credentials.region ?? DEFAULT_REGION,
      credentials: {
        accessKeyId: credentials.accessKeyId,
        secretAccessKey: credentials.secretAccessKey,
      },
    };

    // Use custom endpoint if provided (for S3-compatible services)
    if (location.endpoint) {
      clientConfig.endpoint = location.endpoint;
      clientConfig.forcePathStyle = true; // Required for MinIO and other S3-compatible services
    }

    this.client = new AWSS3Client(clientConfig);
    this.bucket = location.bucket;
    this.logger = logger;
  }

  /**
   * Test S3 connectivity and permissions
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return true;
    } catch (error) {
      this.logger.error(
        `S3 connection test failed for bucket ${this.bucket}: ${formatError(error)}`
      );
      return false;
    } finally {
      this.client.destroy();
    }
  }
}
