import { promises as fs } from 'fs';
import { dirname } from 'path';
import { ConfigurationError, ConfigurationManager } from '../config/ConfigurationManager';
import { BackupConfig, CloudCredentials } from '../interfaces/BackupConfig';
import {
  BackupOrchestrator as IBackupOrchestrator,
  RunResult,
  ValidationReport,
} from '../interfaces/BackupOrchestrator';
import { CommandResult, CommandRunner, InitResult } from '../interfaces/CommandRunner';
import { Logger as ILogger } from '../interfaces/Logger';
import { Notifier } from '../interfaces/Notifier';
import { S3Client as IS3Client, S3RepositoryLocation } from '../interfaces/S3Client';
import { ScheduledTaskDefinition, TaskScheduler } from '../interfaces/TaskScheduler';
import { formatError } from '../utils/formatting';
import { EmailNotifier } from './EmailNotifier';
import { Logger, buildLogFilePath, parseLogLevel, redactSecrets } from './Logger';
import { ResticCommandRunner } from './ResticCommandRunner';
import { RetentionEnforcer } from './RetentionEnforcer';
import { S3Client, parseS3Repository } from './S3Client';
import { SecretScope, secretsForConfig, withSecrets } from './SecretScope';
import { createTaskScheduler } from './TaskScheduler';

export class ToolNotFoundError extends Error {
  constructor(public readonly toolPath: string) {
    super(`Backup tool not found at ${toolPath}`);
    this.name = 'ToolNotFoundError';
  }
}

export interface BackupOrchestratorOptions {
  /** Logger for events that happen outside a run (config errors, scheduling) */
  consoleLogger: ILogger;
  loadConfiguration?: (configPath: string) => Promise<BackupConfig>;
  createLogger?: (config: BackupConfig, logFilePath: string) => ILogger;

  /** Create the run log file (and its directory) before the logger opens it */
  prepareLogFile?: (logFilePath: string) => Promise<void>;
  createCommandRunner?: (config: BackupConfig, scope: SecretScope, logger: ILogger) => CommandRunner;
  createNotifier?: (logger: ILogger) => Notifier;
  createTaskScheduler?: (logger: ILogger) => TaskScheduler;
  createS3Client?: (
    location: S3RepositoryLocation,
    credentials: CloudCredentials,
    logger: ILogger
  ) => IS3Client;
  toolExists?: (toolPath: string) => Promise<boolean>;
  now?: () => Date;
}

async function createLogFile(logFilePath: string): Promise<void> {
  await fs.mkdir(dirname(logFilePath), { recursive: true });
  await fs.appendFile(logFilePath, '');
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * One line describing a failed tool invocation, for the run report
 */
export function describeFailure(operation: string, result: CommandResult): string {
  const reason = result.timedOut ? 'timed out' : `failed with exit code ${result.exitCode}`;
  const lastLine = result.output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .pop();
  return lastLine ? `${operation} ${reason}: ${lastLine}` : `${operation} ${reason}`;
}

/**
 * Orchestrates backup runs:
 *
 * LOAD_CONFIG -> VALIDATE_TOOL_PATH -> OPEN_SECRET_SCOPE -> CHECK_OR_INIT_REPO
 *   -> EXECUTE_BACKUP -> COLLECT_STATS -> ENFORCE_RETENTION -> CLOSE_SECRET_SCOPE
 *   -> NOTIFY -> DONE
 *
 * Only configuration and tool path problems abort a run, and both happen before
 * any secret is exposed. Every later failure is recorded in the run result.
 */
export class BackupOrchestrator implements IBackupOrchestrator {
  private consoleLogger: ILogger;
  private loadConfiguration: (configPath: string) => Promise<BackupConfig>;
  private createLogger: (config: BackupConfig, logFilePath: string) => ILogger;
  private prepareLogFile: (logFilePath: string) => Promise<void>;
  private createCommandRunner: (
    config: BackupConfig,
    scope: SecretScope,
    logger: ILogger
  ) => CommandRunner;
  private createNotifier: (logger: ILogger) => Notifier;
  private createTaskScheduler: (logger: ILogger) => TaskScheduler;
  private createS3Client: (
    location: S3RepositoryLocation,
    credentials: CloudCredentials,
    logger: ILogger
  ) => IS3Client;
  private toolExists: (toolPath: string) => Promise<boolean>;
  private now: () => Date;

  constructor(options: BackupOrchestratorOptions) {
    this.consoleLogger = options.consoleLogger;
    this.loadConfiguration =
      options.loadConfiguration ?? (configPath => ConfigurationManager.loadConfiguration(configPath));
    this.createLogger =
      options.createLogger ??
      ((config, logFilePath) =>
        new Logger({
          projectName: config.projectName,
          level: parseLogLevel(process.env.LOG_LEVEL ?? config.logLevel),
          logFilePath,
        }));
    this.prepareLogFile = options.prepareLogFile ?? createLogFile;
    this.createCommandRunner =
      options.createCommandRunner ??
      ((config, scope, logger) =>
        new ResticCommandRunner({
          toolPath: config.backupToolPath,
          repository: config.repository,
          secretScope: scope,
          logger,
          timeoutMs: config.commandTimeoutMs,
        }));
    this.createNotifier = options.createNotifier ?? (logger => new EmailNotifier(logger));
    this.createTaskScheduler = options.createTaskScheduler ?? (logger => createTaskScheduler(logger));
    this.createS3Client =
      options.createS3Client ??
      ((location, credentials, logger) => new S3Client(location, credentials, logger));
    this.toolExists = options.toolExists ?? fileExists;
    this.now = options.now ?? (() => new Date());
  }

  async runBackup(target?: string): Promise<RunResult> {
    const startedAt = this.now();
    const config = await this.load(target);
    const logger = await this.openRunLogger(config, startedAt);

    try {
      await this.validateToolPath(config, logger);
      logger.debug('Configuration loaded', ConfigurationManager.sanitizeForLogging(config));

      const failures: string[] = [];
      const secrets = ConfigurationManager.secretValues(config);
      const record = (line: string) => failures.push(redactSecrets(line, secrets));

      const outcome = await withSecrets(secretsForConfig(config), async scope => {
        const runner = this.createCommandRunner(config, scope, logger);

        await this.attempt('Repository check', record, logger, async () => {
          const state = await runner.checkRepository();
          if (state === 'absent') {
            const init = await runner.initRepository();
            if (!init.success && !init.alreadyInitialized) {
              record(describeFailure('Repository initialization', init));
            }
          } else if (state === 'unreachable') {
            logger.error('Repository check failed; skipping initialization and attempting the backup');
          }
        });

        await this.attempt('Backup', record, logger, async () => {
          const backup = await runner.runBackup(config.backupSource, config.useFilesystemSnapshot);
          if (!backup.success) {
            record(describeFailure('Backup', backup));
          }
        });

        const totalSize =
          (await this.attempt('Stats', record, logger, () => runner.getStats())) ?? null;

        await this.attempt('Retention', record, logger, async () => {
          const retention = await new RetentionEnforcer(runner).enforce(config.retentionPolicy);
          if (retention && !retention.success) {
            record(describeFailure('Retention', retention));
          }
        });

        return { totalSize };
      });

      const result: RunResult = {
        projectName: config.projectName,
        status: failures.length === 0 ? 'Success' : 'Failure',
        totalSize: outcome.totalSize,
        duration: this.now().getTime() - startedAt.getTime(),
        startedAt,
        logFilePath: logger.getLogFilePath() ?? '',
        failures,
      };
      logger.logRunComplete(result);

      await this.notify(config, result, logger);
      return result;
    } finally {
      await logger.close();
    }
  }

  async listSnapshots(target?: string): Promise<CommandResult> {
    return this.withRepository(target, runner => runner.listSnapshots());
  }

  async initRepository(target?: string): Promise<InitResult> {
    return this.withRepository(target, runner => runner.initRepository());
  }

  async scheduleDailyRun(definition: ScheduledTaskDefinition): Promise<void> {
    const scheduler = this.createTaskScheduler(this.consoleLogger);
    await scheduler.register(definition);
  }

  /**
   * Check the configuration, tool path, repository and (for S3) bucket access
   */
  async validateConfiguration(target?: string): Promise<ValidationReport> {
    const checks: ValidationReport['checks'] = [];
    const report = (): ValidationReport => ({
      valid: checks.every(check => check.passed),
      checks,
    });

    let config: BackupConfig;
    try {
      config = await this.load(target);
      checks.push({ name: 'configuration', passed: true });
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      checks.push({ name: 'configuration', passed: false, detail: error.message });
      return report();
    }

    let logger: ILogger;
    try {
      logger = await this.openRunLogger(config, this.now());
      checks.push({ name: 'log file', passed: true });
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      checks.push({ name: 'log file', passed: false, detail: error.message });
      return report();
    }

    try {
      const toolFound = await this.toolExists(config.backupToolPath);
      checks.push({
        name: 'backup tool',
        passed: toolFound,
        detail: toolFound ? undefined : `not found at ${config.backupToolPath}`,
      });
      if (!toolFound) {
        logger.error(`Backup tool not found at ${config.backupToolPath}`);
        return report();
      }

      const state = await withSecrets(secretsForConfig(config), scope =>
        this.createCommandRunner(config, scope, logger).checkRepository()
      );
      checks.push({
        name: 'repository',
        passed: state === 'present',
        detail: state === 'present' ? undefined : state === 'absent' ? 'not initialized' : 'unreachable',
      });

      const location = parseS3Repository(config.repository);
      if (location && config.cloudCredentials) {
        const reachable = await this.createS3Client(
          location,
          config.cloudCredentials,
          logger
        ).testConnection();
        checks.push({
          name: 's3 bucket',
          passed: reachable,
          detail: reachable ? undefined : `bucket ${location.bucket} is not accessible`,
        });
      }

      return report();
    } finally {
      await logger.close();
    }
  }

  /**
   * Load config, validate the tool, then run one command inside a secret scope
   */
  private async withRepository<T>(
    target: string | undefined,
    action: (runner: CommandRunner) => Promise<T>
  ): Promise<T> {
    const config = await this.load(target);
    const logger = await this.openRunLogger(config, this.now());

    try {
      await this.validateToolPath(config, logger);
      return await withSecrets(secretsForConfig(config), scope =>
        action(this.createCommandRunner(config, scope, logger))
      );
    } finally {
      await logger.close();
    }
  }

  private async load(target?: string): Promise<BackupConfig> {
    const configPath = ConfigurationManager.resolveConfigPath(target);
    try {
      return await this.loadConfiguration(configPath);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.consoleLogger.error('Configuration error', error, { configPath, kind: error.kind });
      }
      throw error;
    }
  }

  /**
   * Open the per-run log. A log file that cannot be created is a configuration
   * error, raised before any secret is exposed.
   */
  private async openRunLogger(config: BackupConfig, startedAt: Date): Promise<ILogger> {
    const logFilePath = buildLogFilePath(config.logPath, startedAt);
    try {
      await this.prepareLogFile(logFilePath);
    } catch (error) {
      const logError = new ConfigurationError(
        `Cannot create log file ${logFilePath}: ${formatError(error)}`,
        'Malformed',
        'logPath'
      );
      this.consoleLogger.error(logError.message, undefined, { logFilePath });
      throw logError;
    }

    const logger = this.createLogger(config, logFilePath);
    logger.addSecrets(ConfigurationManager.secretValues(config));
    return logger;
  }

  private async validateToolPath(config: BackupConfig, logger: ILogger): Promise<void> {
    if (!(await this.toolExists(config.backupToolPath))) {
      const error = new ToolNotFoundError(config.backupToolPath);
      logger.error(error.message, error);
      throw error;
    }
  }

  /**
   * Run one step; an unexpected exception is recorded as a failure instead of ending the run
   */
  private async attempt<T>(
    step: string,
    record: (line: string) => void,
    logger: ILogger,
    action: () => Promise<T>
  ): Promise<T | undefined> {
    try {
      return await action();
    } catch (error) {
      logger.error(`${step} failed unexpectedly`, error instanceof Error ? error : undefined);
      record(`${step} failed unexpectedly: ${formatError(error)}`);
      return undefined;
    }
  }

  private async notify(config: BackupConfig, result: RunResult, logger: ILogger): Promise<void> {
    try {
      await this.createNotifier(logger).notify(config.emailSettings, result);
    } catch (error) {
      logger.error('Notification failed', error instanceof Error ? error : undefined);
    }
  }
}
