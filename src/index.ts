#!/usr/bin/env node
import { resolve } from 'path';
import { Command } from 'commander';
import { ConfigurationError, ConfigurationManager } from './config/ConfigurationManager';
import { BackupOrchestrator, ToolNotFoundError } from './clients/BackupOrchestrator';
import { CronScheduler, CronSchedulerError } from './clients/CronScheduler';
import { Logger, parseLogLevel } from './clients/Logger';
import { ScheduleError } from './clients/TaskScheduler';
import { BackupOrchestrator as IBackupOrchestrator } from './interfaces/BackupOrchestrator';
import { CronSchedulerConfig } from './interfaces/CronScheduler';
import { Logger as ILogger } from './interfaces/Logger';
import { ScheduledTaskDefinition } from './interfaces/TaskScheduler';

const APP_NAME = 'restic-backup';
const VERSION = '1.0.0';

export const EXIT_CODES = {
  SUCCESS: 0,
  RUN_FAILED: 1,
  CONFIGURATION_ERROR: 2,
  TOOL_NOT_FOUND: 3,
  SCHEDULE_ERROR: 4,
  UNEXPECTED_ERROR: 5,
} as const;

export interface ScheduleOptions {
  time: string;
  name: string;
  user?: string;
  workdir: string;
  description?: string;
}

/**
 * Command-line application: maps orchestrator outcomes to output and exit codes
 */
class ResticBackupApplication {
  private orchestrator: IBackupOrchestrator;
  private logger: ILogger;
  private output: (line: string) => void;

  constructor(
    orchestrator: IBackupOrchestrator,
    logger: ILogger,
    output: (line: string) => void = line => console.log(line)
  ) {
    this.orchestrator = orchestrator;
    this.logger = logger;
    this.output = output;
  }

  async runBackup(target?: string): Promise<number> {
    try {
      const result = await this.orchestrator.runBackup(target);
      return result.status === 'Success' ? EXIT_CODES.SUCCESS : EXIT_CODES.RUN_FAILED;
    } catch (error) {
      return this.handleError(error);
    }
  }

  async listSnapshots(target?: string): Promise<number> {
    try {
      const result = await this.orchestrator.listSnapshots(target);
      this.output(result.output.trimEnd());
      return result.success ? EXIT_CODES.SUCCESS : EXIT_CODES.RUN_FAILED;
    } catch (error) {
      return this.handleError(error);
    }
  }

  async initRepository(target?: string): Promise<number> {
    try {
      const result = await this.orchestrator.initRepository(target);
      return result.success || result.alreadyInitialized
        ? EXIT_CODES.SUCCESS
        : EXIT_CODES.RUN_FAILED;
    } catch (error) {
      return this.handleError(error);
    }
  }

  async validateConfiguration(target?: string): Promise<number> {
    try {
      const report = await this.orchestrator.validateConfiguration(target);
      for (const check of report.checks) {
        const status = check.passed ? 'PASS' : 'FAIL';
        this.output(`[${status}] ${check.name}${check.detail ? `: ${check.detail}` : ''}`);
      }
      return report.valid ? EXIT_CODES.SUCCESS : EXIT_CODES.RUN_FAILED;
    } catch (error) {
      return this.handleError(error);
    }
  }

  async scheduleDailyRun(target: string | undefined, options: ScheduleOptions): Promise<number> {
    const configPath = ConfigurationManager.resolveConfigPath(target);
    const definition: ScheduledTaskDefinition = {
      name: options.name,
      command: process.execPath,
      args: [resolve(process.argv[1] ?? 'index.js'), 'run', configPath],
      dailyTime: options.time,
      runAsUser: options.user,
      workingDirectory: resolve(options.workdir),
      description: options.description ?? `Daily restic backup using ${configPath}`,
    };

    try {
      await this.orchestrator.scheduleDailyRun(definition);
      this.output(`Scheduled ${definition.name} daily at ${definition.dailyTime}`);
      return EXIT_CODES.SUCCESS;
    } catch (error) {
      return this.handleError(error);
    }
  }

  /**
   * Start the in-process scheduler; the returned scheduler keeps the process alive
   */
  startDaemon(target: string | undefined, config: CronSchedulerConfig): CronScheduler {
    const scheduler = new CronScheduler(
      config,
      () => this.orchestrator.runBackup(target),
      this.logger
    );
    scheduler.start();
    return scheduler;
  }

  handleError(error: unknown): number {
    if (error instanceof ConfigurationError) {
      return EXIT_CODES.CONFIGURATION_ERROR;
    }
    if (error instanceof ToolNotFoundError) {
      return EXIT_CODES.TOOL_NOT_FOUND;
    }
    if (error instanceof ScheduleError || error instanceof CronSchedulerError) {
      this.logger.error('Scheduling failed', error);
      return EXIT_CODES.SCHEDULE_ERROR;
    }

    this.logger.error('Unexpected error', error instanceof Error ? error : new Error(String(error)));
    return EXIT_CODES.UNEXPECTED_ERROR;
  }
}

function buildProgram(app: ResticBackupApplication): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description('Scheduled restic backups with retention and email reports')
    .version(VERSION);

  program
    .command('run')
    .description('Run a backup, apply retention and send the report')
    .argument('[config]', 'Path to the JSON configuration file')
    .action(async (config?: string) => {
      process.exitCode = await app.runBackup(config);
    });

  program
    .command('snapshots')
    .description('List snapshots in the repository')
    .argument('[config]', 'Path to the JSON configuration file')
    .action(async (config?: string) => {
      process.exitCode = await app.listSnapshots(config);
    });

  program
    .command('init')
    .description('Initialize the repository')
    .argument('[config]', 'Path to the JSON configuration file')
    .action(async (config?: string) => {
      process.exitCode = await app.initRepository(config);
    });

  program
    .command('check')
    .description('Validate configuration, tool path and repository access')
    .argument('[config]', 'Path to the JSON configuration file')
    .action(async (config?: string) => {
      process.exitCode = await app.validateConfiguration(config);
    });

  program
    .command('schedule')
    .description('Register a daily run with the operating system scheduler')
    .argument('[config]', 'Path to the JSON configuration file')
    .requiredOption('-t, --time <HH:MM>', 'Time of day (24h)')
    .option('-n, --name <name>', 'Task name', APP_NAME)
    .option('-u, --user <user>', 'Account the task runs as')
    .option('-w, --workdir <path>', 'Working directory', process.cwd())
    .option('-d, --description <text>', 'Task description')
    .action(async (config: string | undefined, options: ScheduleOptions) => {
      process.exitCode = await app.scheduleDailyRun(config, options);
    });

  program
    .command('daemon')
    .description('Stay in the foreground and run a backup every day')
    .argument('[config]', 'Path to the JSON configuration file')
    .requiredOption('-t, --time <HH:MM>', 'Time of day (24h)')
    .option('--timezone <tz>', 'IANA timezone, host timezone by default')
    .option('--run-now', 'Also run a backup immediately')
    .action((config: string | undefined, options: { time: string; timezone?: string; runNow?: boolean }) => {
      try {
        const scheduler = app.startDaemon(config, {
          dailyTime: options.time,
          timezone: options.timezone,
          runOnInit: options.runNow ?? false,
        });
        const shutdown = () => {
          scheduler.stop();
          process.exit(EXIT_CODES.SUCCESS);
        };
        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
      } catch (error) {
        process.exitCode = app.handleError(error);
      }
    });

  return program;
}

/**
 * Main application entry point
 */
async function main(argv: string[] = process.argv): Promise<void> {
  const logger = new Logger({
    projectName: APP_NAME,
    level: parseLogLevel(process.env.LOG_LEVEL),
  });
  const orchestrator = new BackupOrchestrator({ consoleLogger: logger });
  const app = new ResticBackupApplication(orchestrator, logger);

  await buildProgram(app).parseAsync(argv);
}

// Export for testing
export { ResticBackupApplication, buildProgram, main };

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error:', error);
    process.exit(EXIT_CODES.UNEXPECTED_ERROR);
  });
}
