/**
 * Snapshot retention counts passed to the backup tool's forget command.
 * An absent field is not passed at all.
 */
export interface RetentionPolicy {
  keepLast?: number;
  keepDaily?: number;
  keepWeekly?: number;
  keepMonthly?: number;
  keepYearly?: number;
}

export interface EmailSettings {
  smtpServer: string;
  smtpPort: number;
  smtpUser: string;
  smtpPassword: string;
  from: string;
  to: string;
  subject: string;
}

/**
 * Object storage credentials, only present for S3 repositories
 */
export interface CloudCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  region?: string;
}

export interface BackupConfig {
  projectName: string;
  logPath: string; // prefix, a timestamp is appended per run
  backupSource: string;
  backupToolPath: string;
  repository: string;
  repositoryPassword: string;
  useFilesystemSnapshot: boolean;
  retentionPolicy?: RetentionPolicy;
  emailSettings?: EmailSettings;
  cloudCredentials?: CloudCredentials;
  commandTimeoutMs?: number;
  logLevel?: string;
}
