import { CommandResult } from './CommandRunner';
import { RunResult } from './BackupOrchestrator';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  /** Register values that must never reach a log line */
  addSecrets(values: string[]): void;

  /** Path of the file this logger appends to, if any */
  getLogFilePath(): string | null;

  /** Flush and close all transports */
  close(): Promise<void>;

  // Specialized logging methods for backup runs
  logRunStart(source: string, repository: string): void;
  logCommandResult(operation: string, result: CommandResult): void;
  logRunComplete(result: RunResult): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
