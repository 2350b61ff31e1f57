import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../interfaces/Logger';
import { ScheduledTaskDefinition, TaskScheduler } from '../interfaces/TaskScheduler';
import { formatError } from '../utils/formatting';
import { ProcessExecutor, ProcessResult, executeProcess } from './ProcessExecutor';

const SCHEDULER_COMMAND_TIMEOUT_MS = 60 * 1000;
const DAILY_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const TASK_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9 ._-]*$/;
const TRIGGER_START_DATE = '2000-01-01';
const SYSTEM_ACCOUNT_PATTERN = /^(NT AUTHORITY\\)?SYSTEM$/i;

export class ScheduleError extends Error {
  constructor(
    message: string,
    public readonly taskName: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ScheduleError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export interface DailyTime {
  hour: number;
  minute: number;
}

/**
 * Parse a 24h HH:MM time of day
 */
export function parseDailyTime(value: string): DailyTime | null {
  const match = DAILY_TIME_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

function validateDefinition(definition: ScheduledTaskDefinition): DailyTime {
  if (!TASK_NAME_PATTERN.test(definition.name)) {
    throw new ScheduleError(
      `Invalid task name "${definition.name}": use letters, digits, spaces, dots, dashes or underscores`,
      definition.name
    );
  }

  const time = parseDailyTime(definition.dailyTime);
  if (!time) {
    throw new ScheduleError(
      `Invalid daily time "${definition.dailyTime}": expected HH:MM (24h)`,
      definition.name
    );
  }
  return time;
}

function singleQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_\/.:=@%+-]+$/.test(value)) {
    return value;
  }
  return singleQuote(value);
}

function windowsQuote(value: string): string {
  if (value.length > 0 && !/[\s"]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '\\"')}"`;
}

function xmlEscape(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function singleLine(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Crontab line for the task, tagged with its name so it can be replaced later
 */
export function buildCrontabEntry(definition: ScheduledTaskDefinition): string {
  const time = validateDefinition(definition);
  const command = [definition.command, ...definition.args].map(shellQuote).join(' ');
  return (
    `${time.minute} ${time.hour} * * * cd ${singleQuote(definition.workingDirectory)} && ${command}` +
    ` # ${definition.name}: ${singleLine(definition.description)}`
  );
}

/**
 * Replace any previous entry for the task and append the new one
 */
export function mergeCrontab(existing: string, definition: ScheduledTaskDefinition): string {
  const tag = ` # ${definition.name}:`;
  const kept = existing
    .split('\n')
    .map(line => line.replace(/\r$/, ''))
    .filter(line => line.trim().length > 0 && !line.includes(tag));
  return [...kept, buildCrontabEntry(definition)].join('\n') + '\n';
}

/**
 * Task Scheduler definition running the command once a day
 */
export function buildTaskXml(definition: ScheduledTaskDefinition): string {
  const time = validateDefinition(definition);
  const startBoundary =
    `${TRIGGER_START_DATE}T${String(time.hour).padStart(2, '0')}:` +
    `${String(time.minute).padStart(2, '0')}:00`;

  let principal = '      <LogonType>InteractiveToken</LogonType>';
  if (definition.runAsUser) {
    const logonType = SYSTEM_ACCOUNT_PATTERN.test(definition.runAsUser) ? 'ServiceAccount' : 'S4U';
    principal =
      `      <UserId>${xmlEscape(definition.runAsUser)}</UserId>\n` +
      `      <LogonType>${logonType}</LogonType>`;
  }

  return [
    '<?xml version="1.0" encoding="UTF-16"?>',
    '<Task version="1.2" xmlns="http://schemas.microsoft.com/windows/2004/02/mit/task">',
    '  <RegistrationInfo>',
    `    <Description>${xmlEscape(definition.description)}</Description>`,
    '  </RegistrationInfo>',
    '  <Triggers>',
    '    <CalendarTrigger>',
    `      <StartBoundary>${startBoundary}</StartBoundary>`,
    '      <Enabled>true</Enabled>',
    '      <ScheduleByDay>',
    '        <DaysInterval>1</DaysInterval>',
    '      </ScheduleByDay>',
    '    </CalendarTrigger>',
    '  </Triggers>',
    '  <Principals>',
    '    <Principal id="Author">',
    principal,
    '      <RunLevel>HighestAvailable</RunLevel>',
    '    </Principal>',
    '  </Principals>',
    '  <Settings>',
    '    <MultipleInstancesPolicy>IgnoreNew</MultipleInstancesPolicy>',
    '    <StartWhenAvailable>true</StartWhenAvailable>',
    '    <Enabled>true</Enabled>',
    '  </Settings>',
    '  <Actions Context="Author">',
    '    <Exec>',
    `      <Command>${xmlEscape(definition.command)}</Command>`,
    `      <Arguments>${xmlEscape(definition.args.map(windowsQuote).join(' '))}</Arguments>`,
    `      <WorkingDirectory>${xmlEscape(definition.workingDirectory)}</WorkingDirectory>`,
    '    </Exec>',
    '  </Actions>',
    '</Task>',
    '',
  ].join('\r\n');
}

/**
 * Registers the task in the user's crontab
 */
export class CrontabTaskScheduler implements TaskScheduler {
  private logger: Logger;
  private executor: ProcessExecutor;

  constructor(logger: Logger, executor: ProcessExecutor = executeProcess) {
    this.logger = logger;
    this.executor = executor;
  }

  async register(definition: ScheduledTaskDefinition): Promise<void> {
    const entry = buildCrontabEntry(definition);
    const userArgs = definition.runAsUser ? ['-u', definition.runAsUser] : [];

    const current = await this.run(definition, [...userArgs, '-l']);
    let existing = '';
    if (current.exitCode === 0) {
      existing = current.output;
    } else if (!/no crontab for/i.test(current.output)) {
      throw new ScheduleError(
        `Failed to read crontab (exit code ${current.exitCode}): ${current.output.trim()}`,
        definition.name
      );
    }

    const written = await this.run(definition, [...userArgs, '-'], mergeCrontab(existing, definition));
    if (written.exitCode !== 0) {
      throw new ScheduleError(
        `Failed to write crontab (exit code ${written.exitCode}): ${written.output.trim()}`,
        definition.name
      );
    }

    this.logger.info(`Registered daily task ${definition.name}: ${entry}`);
  }

  private async run(
    definition: ScheduledTaskDefinition,
    args: string[],
    input?: string
  ): Promise<ProcessResult> {
    try {
      return await this.executor('crontab', args, {
        input,
        timeoutMs: SCHEDULER_COMMAND_TIMEOUT_MS,
      });
    } catch (error) {
      throw new ScheduleError(
        `Failed to run crontab: ${formatError(error)}`,
        definition.name,
        error instanceof Error ? error : undefined
      );
    }
  }
}

/**
 * Registers the task with the Windows Task Scheduler through an XML definition
 */
export class WindowsTaskScheduler implements TaskScheduler {
  private logger: Logger;
  private executor: ProcessExecutor;

  constructor(logger: Logger, executor: ProcessExecutor = executeProcess) {
    this.logger = logger;
    this.executor = executor;
  }

  async register(definition: ScheduledTaskDefinition): Promise<void> {
    const xml = buildTaskXml(definition);
    const xmlPath = join(tmpdir(), `${uuidv4()}-task.xml`);

    try {
      await fs.writeFile(xmlPath, `\ufeff${xml}`, 'utf16le');

      const result = await this.runSchtasks(definition, xmlPath);
      if (result.exitCode !== 0) {
        throw new ScheduleError(
          `schtasks failed with exit code ${result.exitCode}: ${result.output.trim()}`,
          definition.name
        );
      }

      this.logger.info(
        `Registered daily task ${definition.name} at ${definition.dailyTime}` +
          (definition.runAsUser ? ` as ${definition.runAsUser}` : '')
      );
    } finally {
      await fs.unlink(xmlPath).catch(cleanupError => {
        this.logger.warn(`Failed to remove task definition ${xmlPath}: ${formatError(cleanupError)}`);
      });
    }
  }

  private async runSchtasks(
    definition: ScheduledTaskDefinition,
    xmlPath: string
  ): Promise<ProcessResult> {
    try {
      return await this.executor(
        'schtasks',
        ['/Create', '/TN', definition.name, '/XML', xmlPath, '/F'],
        { timeoutMs: SCHEDULER_COMMAND_TIMEOUT_MS }
      );
    } catch (error) {
      throw new ScheduleError(
        `Failed to run schtasks: ${formatError(error)}`,
        definition.name,
        error instanceof Error ? error : undefined
      );
    }
  }
}

/**
 * Pick the scheduler matching the host operating system
 */
export function createTaskScheduler(
  logger: Logger,
  platform: NodeJS.Platform = process.platform,
  executor: ProcessExecutor = executeProcess
): TaskScheduler {
  if (platform === 'win32') {
    return new WindowsTaskScheduler(logger, executor);
  }
  return new CrontabTaskScheduler(logger, executor);
}
