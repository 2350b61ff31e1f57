import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { CommandResult } from '../interfaces/CommandRunner';
import { RunResult } from '../interfaces/BackupOrchestrator';
import { formatCompactTimestamp, formatDuration, formatError } from '../utils/formatting';

const REDACTED = '[REDACTED]';

const SENSITIVE_KEYS = ['password', 'secret', 'accesskey', 'token', 'credential'];

export interface LoggerOptions {
  projectName: string;
  level?: LogLevel;

  /** File the run log is appended to; console only when omitted */
  logFilePath?: string;

  /** Disable the console transport (file only) */
  silentConsole?: boolean;
}

/**
 * Build the per-run log file path: <prefix>-<YYYYMMDDHHMMSS>.log
 */
export function buildLogFilePath(prefix: string, startedAt: Date): string {
  return `${prefix}-${formatCompactTimestamp(startedAt)}.log`;
}

/**
 * Render one log line: <timestamp> [<LEVEL>] <project>: <message>
 */
export function formatLogLine(
  timestamp: string,
  level: string,
  projectName: string,
  message: string
): string {
  return `${timestamp} [${level.toUpperCase()}] ${projectName}: ${message}`;
}

/**
 * Replace every occurrence of each secret value with a redaction marker
 */
export function redactSecrets(text: string, secrets: Iterable<string>): string {
  let redacted = text;
  for (const secret of secrets) {
    if (secret.length > 0) {
      redacted = redacted.split(secret).join(REDACTED);
    }
  }
  return redacted;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  const match = Object.values(LogLevel).find(level => level === normalized);
  return match ?? LogLevel.INFO;
}

export class Logger implements ILogger {
  private winston: winston.Logger;
  private projectName: string;
  private logFilePath: string | null;
  private secrets = new Set<string>();

  constructor(options: LoggerOptions) {
    this.projectName = options.projectName;
    this.logFilePath = options.logFilePath ?? null;

    // winston opens log files in append mode
    const transports = [
      ...(options.silentConsole ? [] : [new winston.transports.Console()]),
      ...(options.logFilePath ? [new winston.transports.File({ filename: options.logFilePath })] : []),
    ];

    this.winston = winston.createLogger({
      level: options.level ?? LogLevel.INFO,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(info =>
          formatLogLine(
            String(info.timestamp),
            info.level,
            this.projectName,
            this.renderMessage(info)
          )
        )
      ),
      transports,
    });

    // Transport failures, such as a log file that became unwritable
    this.winston.on('error', error => {
      console.error(`Log transport error for ${this.projectName}: ${formatError(error)}`);
    });
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(this.redact(message), this.sanitizeMeta(meta));
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(this.redact(message), this.sanitizeMeta(meta));
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta: LogMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
        },
      }),
    };
    this.winston.error(this.redact(message), this.sanitizeMeta(errorMeta));
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(this.redact(message), this.sanitizeMeta(meta));
  }

  addSecrets(values: string[]): void {
    for (const value of values) {
      if (value.length > 0) {
        this.secrets.add(value);
      }
    }
  }

  getLogFilePath(): string | null {
    return this.logFilePath;
  }

  close(): Promise<void> {
    return new Promise(resolve => {
      this.winston.once('finish', () => resolve());
      this.winston.once('error', () => resolve());
      this.winston.end();
    });
  }

  logRunStart(source: string, repository: string): void {
    this.info(`Starting backup of ${source} to ${repository}`, {
      operation: 'run_start',
    });
  }

  logCommandResult(operation: string, result: CommandResult): void {
    const output = result.output.trim();
    if (output) {
      this.debug(`${operation} output:\n${output}`);
    }

    if (result.success) {
      this.info(`${operation} completed in ${formatDuration(result.duration)}`);
      return;
    }

    const reason = result.timedOut ? 'timed out' : `failed with exit code ${result.exitCode}`;
    this.error(`${operation} ${reason}${output ? `: ${output}` : ''}`);
  }

  logRunComplete(result: RunResult): void {
    const message =
      `Backup run finished with status ${result.status} in ${formatDuration(result.duration)}` +
      (result.totalSize ? `, repository size ${result.totalSize}` : '');

    if (result.status === 'Success') {
      this.info(message);
    } else {
      this.error(`${message} (${result.failures.length} failure(s))`);
    }
  }

  private redact(text: string): string {
    return redactSecrets(text, this.secrets);
  }

  /**
   * Render the message with error details and remaining metadata appended
   */
  private renderMessage(info: winston.Logform.TransformableInfo): string {
    const { timestamp, level, message, error, ...meta } = info;
    let rendered = String(message);

    if (typeof error === 'object' && error !== null && 'message' in error) {
      const errorMessage = String(error.message);
      if (!rendered.includes(errorMessage)) {
        rendered += ` (${errorMessage})`;
      }
    }

    if (Object.keys(meta).length > 0) {
      rendered += ` ${JSON.stringify(meta)}`;
    }
    return rendered;
  }

  /**
   * Sanitize metadata to remove sensitive information
   */
  private sanitizeMeta(meta?: LogMeta): LogMeta | undefined {
    if (!meta) {
      return undefined;
    }

    const sanitized: LogMeta = {};
    for (const [key, value] of Object.entries(meta)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

      if (isSensitive) {
        sanitized[key] = REDACTED;
      } else if (typeof value === 'string') {
        sanitized[key] = this.redact(value);
      } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
        sanitized[key] = this.sanitizeMeta(Object.fromEntries(Object.entries(value)));
      } else {
        sanitized[key] = value;
      }
    }
    return sanitized;
  }
}
