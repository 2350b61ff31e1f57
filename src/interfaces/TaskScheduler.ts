/**
 * A recurring daily invocation registered with the operating system
 */
export interface ScheduledTaskDefinition {
  name: string;

  /** Executable to run */
  command: string;
  args: string[];

  /** Time of day in 24h HH:MM format */
  dailyTime: string;

  runAsUser?: string;
  workingDirectory: string;
  description: string;
}

/**
 * Interface for OS-level task registration
 */
export interface TaskScheduler {
  register(definition: ScheduledTaskDefinition): Promise<void>;
}
