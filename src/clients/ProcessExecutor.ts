import { spawn } from 'child_process';

const FORCE_KILL_DELAY_MS = 10000;

export interface ProcessOptions {
  env?: NodeJS.ProcessEnv;

  /** Written to stdin, which is then closed */
  input?: string;

  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
}

export interface ProcessResult {
  /** Exit code, -1 when the process was terminated by a signal */
  exitCode: number;

  /** Combined stdout and stderr in arrival order */
  output: string;

  timedOut: boolean;
  duration: number;
}

export type ProcessExecutor = (
  command: string,
  args: string[],
  options?: ProcessOptions
) => Promise<ProcessResult>;

export class ProcessSpawnError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ProcessSpawnError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Analyze spawn errors
 */
function describeSpawnError(command: string, error: Error): string {
  const errorMessage = error.message.toLowerCase();

  if (errorMessage.includes('enoent')) {
    return `${command} not found. Please check the configured executable path.`;
  }

  if (errorMessage.includes('eacces') || errorMessage.includes('permission denied')) {
    return `Permission denied executing ${command}. Please check file permissions.`;
  }

  return `Failed to execute ${command}: ${error.message}`;
}

/**
 * Run a command with an argument list (no shell) and capture its merged output.
 * Resolves for every exit code; rejects only when the process cannot be started.
 */
export const executeProcess: ProcessExecutor = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const startTime = Date.now();
    let output = '';
    let timedOut = false;
    let settled = false;
    let timeout: NodeJS.Timeout | undefined;
    let forceKill: NodeJS.Timeout | undefined;

    const child = spawn(command, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: options.env ?? { ...process.env },
      shell: false,
    });

    const clearTimers = () => {
      if (timeout) clearTimeout(timeout);
      if (forceKill) clearTimeout(forceKill);
    };

    child.stdout.on('data', (data: Buffer) => {
      output += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      output += data.toString();
    });

    child.on('error', error => {
      clearTimers();
      if (settled) {
        return;
      }
      settled = true;
      reject(new ProcessSpawnError(describeSpawnError(command, error), command, error));
    });

    child.on('close', code => {
      clearTimers();
      if (settled) {
        return;
      }
      settled = true;
      resolve({
        exitCode: code ?? -1,
        output,
        timedOut,
        duration: Date.now() - startTime,
      });
    });

    if (options.timeoutMs !== undefined) {
      timeout = setTimeout(() => {
        timedOut = true;
        output += `\nProcess timed out after ${options.timeoutMs}ms, terminating...\n`;

        // Try graceful termination first
        child.kill('SIGTERM');

        forceKill = setTimeout(() => {
          if (child.exitCode === null) {
            child.kill('SIGKILL');
          }
        }, FORCE_KILL_DELAY_MS);
      }, options.timeoutMs);
    }

    if (options.input !== undefined) {
      child.stdin.write(options.input);
    }
    child.stdin.end();
  });
};
