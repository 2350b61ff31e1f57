import { RetentionPolicy } from '../interfaces/BackupConfig';
import {
  CommandResult,
  CommandRunner,
  InitResult,
  RepositoryState,
} from '../interfaces/CommandRunner';
import { Logger } from '../interfaces/Logger';
import { formatError } from '../utils/formatting';
import { ProcessExecutor, executeProcess } from './ProcessExecutor';
import { SecretScope } from './SecretScope';

/** restic exits with this code when the repository does not exist */
export const REPOSITORY_NOT_FOUND_EXIT_CODE = 10;

export const DEFAULT_COMMAND_TIMEOUT_MS = 6 * 60 * 60 * 1000;

const REPOSITORY_ABSENT_PATTERNS = [
  /repository does not exist/i,
  /is there a repository at the following location/i,
  /unable to open config file/i,
];

const ALREADY_INITIALIZED_PATTERNS = [/already initialized/i, /config file already exists/i];

const TOTAL_SIZE_PATTERN = /^\s*Total Size:\s*(.+?)\s*$/m;

const RETENTION_FLAGS: Array<[keyof RetentionPolicy, string]> = [
  ['keepLast', '--keep-last'],
  ['keepDaily', '--keep-daily'],
  ['keepWeekly', '--keep-weekly'],
  ['keepMonthly', '--keep-monthly'],
  ['keepYearly', '--keep-yearly'],
];

export function buildSnapshotsArgs(repository: string): string[] {
  return ['-r', repository, 'snapshots'];
}

export function buildInitArgs(repository: string): string[] {
  return ['-r', repository, 'init'];
}

export function buildBackupArgs(
  repository: string,
  source: string,
  useFilesystemSnapshot: boolean
): string[] {
  const args = ['-r', repository, 'backup', source];
  if (useFilesystemSnapshot) {
    args.push('--use-fs-snapshot');
  }
  return args;
}

export function buildStatsArgs(repository: string): string[] {
  return ['-r', repository, 'stats'];
}

/**
 * Build the prune invocation, passing only the policy fields that are set
 */
export function buildForgetArgs(repository: string, policy: RetentionPolicy): string[] {
  const args = ['-r', repository, 'forget', '--prune'];
  for (const [field, flag] of RETENTION_FLAGS) {
    const value = policy[field];
    if (value !== undefined) {
      args.push(flag, String(value));
    }
  }
  return args;
}

/**
 * Extract the "Total Size:" value from the stats output
 */
export function parseTotalSize(output: string): string | null {
  const match = TOTAL_SIZE_PATTERN.exec(output);
  return match ? match[1] : null;
}

export function classifyRepositoryCheck(result: CommandResult): RepositoryState {
  if (result.success) {
    return 'present';
  }
  if (
    result.exitCode === REPOSITORY_NOT_FOUND_EXIT_CODE ||
    REPOSITORY_ABSENT_PATTERNS.some(pattern => pattern.test(result.output))
  ) {
    return 'absent';
  }
  return 'unreachable';
}

export interface ResticCommandRunnerOptions {
  toolPath: string;
  repository: string;
  secretScope: SecretScope;
  logger: Logger;
  timeoutMs?: number;
  executor?: ProcessExecutor;
}

/**
 * CommandRunner for the restic executable.
 * Every call gets the secret scope's environment; results are classified by exit code alone.
 */
export class ResticCommandRunner implements CommandRunner {
  private toolPath: string;
  private repository: string;
  private secretScope: SecretScope;
  private logger: Logger;
  private timeoutMs: number;
  private executor: ProcessExecutor;

  constructor(options: ResticCommandRunnerOptions) {
    this.toolPath = options.toolPath;
    this.repository = options.repository;
    this.secretScope = options.secretScope;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.executor = options.executor ?? executeProcess;
  }

  async checkRepository(): Promise<RepositoryState> {
    this.logger.info(`Checking repository ${this.repository}`);
    const result = await this.execute(buildSnapshotsArgs(this.repository));
    const state = classifyRepositoryCheck(result);

    if (state === 'unreachable') {
      this.logger.logCommandResult('Repository check', result);
    } else {
      this.logger.info(
        state === 'present' ? 'Repository exists' : 'Repository does not exist yet'
      );
    }
    return state;
  }

  async initRepository(): Promise<InitResult> {
    this.logger.info(`Initializing repository ${this.repository}`);
    const result = await this.execute(buildInitArgs(this.repository));
    const alreadyInitialized =
      !result.success && ALREADY_INITIALIZED_PATTERNS.some(pattern => pattern.test(result.output));

    if (alreadyInitialized) {
      this.logger.warn('Repository is already initialized, continuing');
    } else {
      this.logger.logCommandResult('Repository initialization', result);
    }
    return { ...result, alreadyInitialized };
  }

  async runBackup(source: string, useFilesystemSnapshot: boolean): Promise<CommandResult> {
    this.logger.logRunStart(source, this.repository);
    const result = await this.execute(
      buildBackupArgs(this.repository, source, useFilesystemSnapshot)
    );
    this.logger.logCommandResult('Backup', result);
    return result;
  }

  async getStats(): Promise<string | null> {
    const result = await this.execute(buildStatsArgs(this.repository));
    if (!result.success) {
      this.logger.logCommandResult('Stats', result);
      return null;
    }

    const totalSize = parseTotalSize(result.output);
    if (totalSize === null) {
      this.logger.warn('Could not parse total size from stats output');
    } else {
      this.logger.info(`Repository total size: ${totalSize}`);
    }
    return totalSize;
  }

  async forget(policy: RetentionPolicy): Promise<CommandResult> {
    const args = buildForgetArgs(this.repository, policy);
    this.logger.info(`Applying retention policy: ${args.slice(3).join(' ')}`);
    const result = await this.execute(args);
    this.logger.logCommandResult('Retention', result);
    return result;
  }

  async listSnapshots(): Promise<CommandResult> {
    const result = await this.execute(buildSnapshotsArgs(this.repository));
    this.logger.logCommandResult('Snapshot listing', result);
    return result;
  }

  /**
   * Run the tool once. Spawn failures become a failed result with exit code -1.
   */
  private async execute(args: string[]): Promise<CommandResult> {
    this.logger.debug(`Executing ${this.toolPath} ${args.join(' ')}`);
    const startTime = Date.now();

    try {
      const result = await this.executor(this.toolPath, args, {
        env: this.secretScope.childEnvironment(),
        timeoutMs: this.timeoutMs,
      });
      return {
        success: result.exitCode === 0 && !result.timedOut,
        exitCode: result.exitCode,
        output: result.output,
        duration: result.duration,
        timedOut: result.timedOut,
      };
    } catch (error) {
      this.logger.error(`Failed to run ${this.toolPath}`, error instanceof Error ? error : undefined);
      return {
        success: false,
        exitCode: -1,
        output: formatError(error),
        duration: Date.now() - startTime,
        timedOut: false,
      };
    }
  }
}
