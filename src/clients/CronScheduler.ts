import * as cron from 'node-cron';
import { CronScheduler as ICronScheduler, CronSchedulerConfig } from '../interfaces/CronScheduler';
import { RunResult } from '../interfaces/BackupOrchestrator';
import { Logger } from '../interfaces/Logger';
import { formatError } from '../utils/formatting';
import { parseDailyTime } from './TaskScheduler';

export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

/**
 * Convert a 24h HH:MM time into a daily cron expression
 */
export function dailyCronExpression(dailyTime: string): string {
  const time = parseDailyTime(dailyTime);
  if (!time) {
    throw new CronValidationError(`Invalid daily time: ${dailyTime}`, dailyTime);
  }
  return `${time.minute} ${time.hour} * * *`;
}

export type ScheduledJob = () => Promise<RunResult>;

/**
 * In-process daily scheduler using node-cron, with overlap prevention
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private config: CronSchedulerConfig;
  private job: ScheduledJob;
  private isJobRunning = false;
  private logger: Logger;

  constructor(config: CronSchedulerConfig, job: ScheduledJob, logger: Logger) {
    this.config = config;
    this.job = job;
    this.logger = logger;
  }

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    const expression = dailyCronExpression(this.config.dailyTime);
    if (!this.validateCronExpression(expression)) {
      throw new CronValidationError(`Invalid cron expression: ${expression}`, expression);
    }

    this.logger.info(
      `Starting daily scheduler at ${this.config.dailyTime} (${expression}, timezone: ${this.config.timezone ?? 'local'})`
    );

    try {
      this.task = cron.schedule(
        expression,
        async () => {
          await this.executeScheduledRun();
        },
        {
          scheduled: false, // Don't start immediately
          timezone: this.config.timezone,
        }
      );
      this.task.start();
    } catch (error) {
      this.task = null;
      const startError = new CronSchedulerError(
        `Failed to start cron scheduler: ${formatError(error)}`,
        'start',
        error instanceof Error ? error : undefined
      );
      this.logger.error(startError.message, startError);
      throw startError;
    }

    this.logger.info('CronScheduler started successfully');

    if (this.config.runOnInit) {
      this.logger.info('Running initial backup due to runOnInit configuration');
      setImmediate(() => {
        void this.executeScheduledRun();
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped successfully');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  validateCronExpression(expression: string): boolean {
    return cron.validate(expression);
  }

  /**
   * Run the job unless the previous run is still in progress. Never rejects.
   */
  async executeScheduledRun(): Promise<void> {
    if (this.isJobRunning) {
      this.logger.warn('Backup is already running, skipping this scheduled execution');
      return;
    }

    this.isJobRunning = true;
    try {
      const result = await this.job();
      this.logger.info(`Scheduled backup finished with status ${result.status}`);
    } catch (error) {
      this.logger.error(
        `Scheduled backup execution failed: ${formatError(error)}`,
        error instanceof Error ? error : undefined
      );
    } finally {
      this.isJobRunning = false;
    }
  }
}
