import { RetentionPolicy } from './BackupConfig';

/**
 * Outcome of a single backup tool invocation
 */
export interface CommandResult {
  /** True when the tool exited with code 0 */
  success: boolean;

  /** Exit code of the tool, -1 when it could not be started or was killed */
  exitCode: number;

  /** Combined stdout and stderr */
  output: string;

  /** Duration of the invocation in milliseconds */
  duration: number;

  /** Whether the invocation was killed after exceeding its timeout */
  timedOut: boolean;
}

/**
 * present: the repository answered a listing call
 * absent: the tool reported that no repository exists at the location
 * unreachable: any other failure (credentials, network, lock, ...)
 */
export type RepositoryState = 'present' | 'absent' | 'unreachable';

export interface InitResult extends CommandResult {
  /** The repository was already initialized, which is not treated as a failure */
  alreadyInitialized: boolean;
}

/**
 * Interface for invoking the external backup tool against one repository
 */
export interface CommandRunner {
  checkRepository(): Promise<RepositoryState>;
  initRepository(): Promise<InitResult>;
  runBackup(source: string, useFilesystemSnapshot: boolean): Promise<CommandResult>;

  /** Total repository size as printed by the tool, null when it cannot be parsed */
  getStats(): Promise<string | null>;

  forget(policy: RetentionPolicy): Promise<CommandResult>;
  listSnapshots(): Promise<CommandResult>;
}
