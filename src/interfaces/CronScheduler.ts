/**
 * Interface for the in-process daily scheduler
 */
export interface CronScheduler {
  /** Start the cron scheduler */
  start(): void;

  /** Stop the cron scheduler */
  stop(): void;

  /** Check if the scheduler is currently running */
  isRunning(): boolean;

  /** Validate a cron expression */
  validateCronExpression(expression: string): boolean;
}

/**
 * Configuration for the cron scheduler
 */
export interface CronSchedulerConfig {
  /** Time of day in 24h HH:MM format */
  dailyTime: string;

  /** Timezone for cron execution (defaults to the host timezone) */
  timezone?: string;

  /** Whether to run immediately on start */
  runOnInit?: boolean;
}
