import { CommandResult, InitResult } from './CommandRunner';
import { ScheduledTaskDefinition } from './TaskScheduler';

export type RunStatus = 'Success' | 'Failure';

/**
 * Report of a single backup run, consumed by the notifier
 */
export interface RunResult {
  projectName: string;
  status: RunStatus;

  /** Repository size reported by the tool after the backup */
  totalSize: string | null;

  /** Duration of the run in milliseconds */
  duration: number;

  startedAt: Date;
  logFilePath: string;

  /** One line per non-fatal failure recorded during the run */
  failures: string[];
}

/**
 * Outcome of a configuration check
 */
export interface ValidationReport {
  valid: boolean;
  checks: Array<{ name: string; passed: boolean; detail?: string }>;
}

/**
 * Interface for the backup run orchestration
 */
export interface BackupOrchestrator {
  /** Execute the full backup state machine for the given config file */
  runBackup(target?: string): Promise<RunResult>;

  listSnapshots(target?: string): Promise<CommandResult>;

  initRepository(target?: string): Promise<InitResult>;

  scheduleDailyRun(definition: ScheduledTaskDefinition): Promise<void>;

  validateConfiguration(target?: string): Promise<ValidationReport>;
}
