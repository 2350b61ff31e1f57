import { promises as fs } from 'fs';
import { dirname, resolve } from 'path';
import {
  BackupConfig,
  CloudCredentials,
  EmailSettings,
  RetentionPolicy,
} from '../interfaces/BackupConfig';
import { LogLevel } from '../interfaces/Logger';

export const DEFAULT_CONFIG_PATH = 'backup-config.json';
export const CONFIG_PATH_ENV = 'BACKUP_CONFIG_PATH';

const REDACTED = '[REDACTED]';

const RETENTION_FIELDS: Array<keyof RetentionPolicy> = [
  'keepLast',
  'keepDaily',
  'keepWeekly',
  'keepMonthly',
  'keepYearly',
];

export type ConfigurationErrorKind = 'NotFound' | 'Malformed';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly kind: ConfigurationErrorKind,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null;
}

/**
 * Loads backup configuration records from JSON files.
 *
 * Required fields are never defaulted: a missing one fails the load with a
 * Malformed error naming the field.
 */
export class ConfigurationManager {
  /**
   * Resolve the config file for a run: explicit target, then BACKUP_CONFIG_PATH,
   * then ./backup-config.json
   */
  static resolveConfigPath(target?: string): string {
    const candidate = target || process.env[CONFIG_PATH_ENV] || DEFAULT_CONFIG_PATH;
    return resolve(candidate);
  }

  static async loadConfiguration(configPath: string): Promise<BackupConfig> {
    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(
        `Configuration file not found or not readable: ${configPath} (${reason})`,
        'NotFound'
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Failed to parse configuration JSON: ${reason}`, 'Malformed');
    }

    return ConfigurationManager.parseConfiguration(parsed);
  }

  static async saveConfiguration(configPath: string, config: BackupConfig): Promise<void> {
    await fs.mkdir(dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, 'utf8');
  }

  /**
   * Validate a parsed JSON value into a BackupConfig
   */
  static parseConfiguration(raw: unknown): BackupConfig {
    if (!isObject(raw)) {
      throw new ConfigurationError('Configuration must be a JSON object', 'Malformed');
    }

    const config: BackupConfig = {
      projectName: this.requireString(raw, 'projectName'),
      logPath: this.requireString(raw, 'logPath'),
      backupSource: this.requireString(raw, 'backupSource'),
      backupToolPath: this.requireString(raw, 'backupToolPath'),
      repository: this.requireString(raw, 'repository'),
      repositoryPassword: this.requireString(raw, 'repositoryPassword'),
      useFilesystemSnapshot: this.optionalBoolean(raw, 'useFilesystemSnapshot') ?? false,
    };

    // Add optional properties only if they exist
    if (!isAbsent(raw.retentionPolicy)) {
      config.retentionPolicy = this.parseRetentionPolicy(raw.retentionPolicy);
    }
    if (!isAbsent(raw.emailSettings)) {
      config.emailSettings = this.parseEmailSettings(raw.emailSettings);
    }
    if (!isAbsent(raw.cloudCredentials)) {
      config.cloudCredentials = this.parseCloudCredentials(raw.cloudCredentials);
    }

    const commandTimeoutMs = this.optionalInteger(raw, 'commandTimeoutMs', 'commandTimeoutMs');
    if (commandTimeoutMs !== undefined) {
      if (commandTimeoutMs <= 0) {
        throw new ConfigurationError(
          'Configuration field commandTimeoutMs must be a positive integer',
          'Malformed',
          'commandTimeoutMs'
        );
      }
      config.commandTimeoutMs = commandTimeoutMs;
    }

    const logLevel = this.optionalString(raw, 'logLevel', 'logLevel');
    if (logLevel !== undefined) {
      if (!Object.values<string>(LogLevel).includes(logLevel.toLowerCase())) {
        throw new ConfigurationError(
          `Configuration field logLevel must be one of: ${Object.values(LogLevel).join(', ')}`,
          'Malformed',
          'logLevel'
        );
      }
      config.logLevel = logLevel.toLowerCase();
    }

    return config;
  }

  /**
   * Return a copy of the configuration that is safe to log
   */
  static sanitizeForLogging(config: BackupConfig): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {
      ...config,
      repositoryPassword: REDACTED,
    };

    if (config.emailSettings) {
      sanitized.emailSettings = { ...config.emailSettings, smtpPassword: REDACTED };
    }
    if (config.cloudCredentials) {
      sanitized.cloudCredentials = {
        ...config.cloudCredentials,
        accessKeyId: REDACTED,
        secretAccessKey: REDACTED,
      };
    }

    return sanitized;
  }

  /**
   * Every secret value carried by the configuration
   */
  static secretValues(config: BackupConfig): string[] {
    const values = [config.repositoryPassword];
    if (config.emailSettings) {
      values.push(config.emailSettings.smtpPassword);
    }
    if (config.cloudCredentials) {
      values.push(config.cloudCredentials.accessKeyId, config.cloudCredentials.secretAccessKey);
    }
    return values.filter(value => value.length > 0);
  }

  private static parseRetentionPolicy(raw: unknown): RetentionPolicy {
    if (!isObject(raw)) {
      throw new ConfigurationError(
        'Configuration field retentionPolicy must be an object',
        'Malformed',
        'retentionPolicy'
      );
    }

    const policy: RetentionPolicy = {};
    for (const field of RETENTION_FIELDS) {
      const path = `retentionPolicy.${field}`;
      const value = this.optionalInteger(raw, field, path);
      if (value === undefined) {
        continue;
      }
      if (value < 0) {
        throw new ConfigurationError(
          `Configuration field ${path} must be a non-negative integer`,
          'Malformed',
          path
        );
      }
      policy[field] = value;
    }
    return policy;
  }

  private static parseEmailSettings(raw: unknown): EmailSettings {
    if (!isObject(raw)) {
      throw new ConfigurationError(
        'Configuration field emailSettings must be an object',
        'Malformed',
        'emailSettings'
      );
    }

    const smtpPort = this.optionalInteger(raw, 'smtpPort', 'emailSettings.smtpPort');
    if (smtpPort === undefined || smtpPort < 1 || smtpPort > 65535) {
      throw new ConfigurationError(
        'Configuration field emailSettings.smtpPort must be a port number between 1 and 65535',
        'Malformed',
        'emailSettings.smtpPort'
      );
    }

    return {
      smtpServer: this.requireString(raw, 'smtpServer', 'emailSettings.smtpServer'),
      smtpPort,
      smtpUser: this.requireString(raw, 'smtpUser', 'emailSettings.smtpUser'),
      smtpPassword: this.requireString(raw, 'smtpPassword', 'emailSettings.smtpPassword'),
      from: this.requireString(raw, 'from', 'emailSettings.from'),
      to: this.requireString(raw, 'to', 'emailSettings.to'),
      subject: this.requireString(raw, 'subject', 'emailSettings.subject'),
    };
  }

  private static parseCloudCredentials(raw: unknown): CloudCredentials {
    if (!isObject(raw)) {
      throw new ConfigurationError(
        'Configuration field cloudCredentials must be an object',
        'Malformed',
        'cloudCredentials'
      );
    }

    const credentials: CloudCredentials = {
      accessKeyId: this.requireString(raw, 'accessKeyId', 'cloudCredentials.accessKeyId'),
      secretAccessKey: this.requireString(
        raw,
        'secretAccessKey',
        'cloudCredentials.secretAccessKey'
      ),
    };

    const region = this.optionalString(raw, 'region', 'cloudCredentials.region');
    if (region !== undefined) {
      credentials.region = region;
    }
    return credentials;
  }

  private static requireString(source: JsonObject, field: string, path: string = field): string {
    const value = source[field];
    if (isAbsent(value) || value === '') {
      throw new ConfigurationError(
        `Missing required configuration field: ${path}`,
        'Malformed',
        path
      );
    }
    if (typeof value !== 'string') {
      throw new ConfigurationError(`Configuration field ${path} must be a string`, 'Malformed', path);
    }
    return value;
  }

  private static optionalString(source: JsonObject, field: string, path: string): string | undefined {
    const value = source[field];
    if (isAbsent(value)) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new ConfigurationError(`Configuration field ${path} must be a string`, 'Malformed', path);
    }
    return value;
  }

  private static optionalBoolean(source: JsonObject, field: string): boolean | undefined {
    const value = source[field];
    if (isAbsent(value)) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw new ConfigurationError(
        `Configuration field ${field} must be a boolean`,
        'Malformed',
        field
      );
    }
    return value;
  }

  private static optionalInteger(source: JsonObject, field: string, path: string): number | undefined {
    const value = source[field];
    if (isAbsent(value)) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new ConfigurationError(`Configuration field ${path} must be an integer`, 'Malformed', path);
    }
    return value;
  }
}
