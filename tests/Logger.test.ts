import winston from 'winston';
import {
  Logger,
  buildLogFilePath,
  formatLogLine,
  parseLogLevel,
  redactSecrets,
} from '../src/clients/Logger';
import { LogLevel } from '../src/interfaces/Logger';
import { RunResult } from '../src/interfaces/BackupOrchestrator';

const mockWinstonLogger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
  on: jest.fn(),
  once: jest.fn(),
  end: jest.fn(),
};

// Mock winston to capture log calls
jest.mock('winston', () => ({
  createLogger: jest.fn(() => mockWinstonLogger),
  format: {
    combine: jest.fn(),
    timestamp: jest.fn(),
    printf: jest.fn(),
  },
  transports: {
    Console: jest.fn(),
    File: jest.fn(),
  },
}));

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger({ projectName: 'nas', level: LogLevel.DEBUG });
  });

  describe('Transports', () => {
    it('should log to the console only when no file is given', () => {
      expect(winston.transports.Console).toHaveBeenCalledTimes(1);
      expect(winston.transports.File).not.toHaveBeenCalled();
      expect(logger.getLogFilePath()).toBeNull();
    });

    it('should append to the run log file', () => {
      jest.clearAllMocks();

      const fileLogger = new Logger({
        projectName: 'nas',
        logFilePath: '/var/log/restic/nas-20240115143045.log',
      });

      expect(winston.transports.File).toHaveBeenCalledWith({
        filename: '/var/log/restic/nas-20240115143045.log',
      });
      expect(winston.transports.Console).toHaveBeenCalledTimes(1);
      expect(fileLogger.getLogFilePath()).toBe('/var/log/restic/nas-20240115143045.log');
    });

    it('should skip the console when silenced', () => {
      jest.clearAllMocks();

      new Logger({ projectName: 'nas', logFilePath: '/tmp/nas.log', silentConsole: true });

      expect(winston.transports.Console).not.toHaveBeenCalled();
      expect(winston.transports.File).toHaveBeenCalledTimes(1);
    });

    it('should default to the info level', () => {
      jest.clearAllMocks();

      new Logger({ projectName: 'nas' });

      expect(winston.createLogger).toHaveBeenCalledWith(
        expect.objectContaining({ level: LogLevel.INFO })
      );
    });
  });

  describe('Line format', () => {
    it('should render timestamp, level, project and message', () => {
      const render = jest.mocked(winston.format.printf).mock.calls[0][0];

      const line = render({
        level: 'info',
        message: 'Backup started',
        timestamp: '2024-01-15 14:30:45',
      });

      expect(line).toBe('2024-01-15 14:30:45 [INFO] nas: Backup started');
    });

    it('should append error details carried in metadata', () => {
      const render = jest.mocked(winston.format.printf).mock.calls[0][0];

      const line = render({
        level: 'error',
        message: 'Notification failed',
        timestamp: '2024-01-15 14:30:45',
        error: { name: 'Error', message: 'connection refused' },
      });

      expect(line).toBe('2024-01-15 14:30:45 [ERROR] nas: Notification failed (connection refused)');
    });

    it('should not repeat an error message the line already contains', () => {
      const render = jest.mocked(winston.format.printf).mock.calls[0][0];

      const line = render({
        level: 'error',
        message: 'Backup tool not found at /opt/restic/restic',
        timestamp: '2024-01-15 14:30:45',
        error: { name: 'ToolNotFoundError', message: 'Backup tool not found at /opt/restic/restic' },
      });

      expect(line).toBe('2024-01-15 14:30:45 [ERROR] nas: Backup tool not found at /opt/restic/restic');
    });

    it('should append remaining metadata as JSON', () => {
      const render = jest.mocked(winston.format.printf).mock.calls[0][0];

      const line = render({
        level: 'error',
        message: 'Configuration error',
        timestamp: '2024-01-15 14:30:45',
        error: { name: 'ConfigurationError', message: 'Missing required configuration field: repository' },
        configPath: '/etc/restic/nas.json',
        kind: 'Malformed',
      });

      expect(line).toBe(
        '2024-01-15 14:30:45 [ERROR] nas: Configuration error ' +
          '(Missing required configuration field: repository) ' +
          '{"configPath":"/etc/restic/nas.json","kind":"Malformed"}'
      );
    });
  });

  describe('Basic logging methods', () => {
    it('should log info messages', () => {
      logger.info('Test info message', { key: 'value' });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Test info message', { key: 'value' });
    });

    it('should log warning and debug messages', () => {
      logger.warn('Test warning message');
      logger.debug('Test debug message');

      expect(mockWinstonLogger.warn).toHaveBeenCalledWith('Test warning message', undefined);
      expect(mockWinstonLogger.debug).toHaveBeenCalledWith('Test debug message', undefined);
    });

    it('should log error messages with error object', () => {
      const error = new Error('Test error');

      logger.error('Test error message', error, { key: 'value' });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Test error message', {
        key: 'value',
        error: {
          name: 'Error',
          message: 'Test error',
        },
      });
    });

    it('should log error messages without error object', () => {
      logger.error('Test error message');

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Test error message', {});
    });
  });

  describe('Secret redaction', () => {
    it('should redact registered secrets from messages', () => {
      logger.addSecrets(['test-secret']);

      logger.info('Using password test-secret for test-secret');

      expect(mockWinstonLogger.info).toHaveBeenCalledWith(
        'Using password [REDACTED] for [REDACTED]',
        undefined
      );
    });

    it('should redact sensitive metadata keys and secret values', () => {
      logger.addSecrets(['test-secret']);

      logger.info('Configuration loaded', {
        repositoryPassword: 'anything',
        note: 'contains test-secret',
        cloud: { accessKeyId: 'test-access-key', region: 'eu-central-1' },
        retries: 3,
      });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Configuration loaded', {
        repositoryPassword: '[REDACTED]',
        note: 'contains [REDACTED]',
        cloud: { accessKeyId: '[REDACTED]', region: 'eu-central-1' },
        retries: 3,
      });
    });

    it('should ignore empty secret values', () => {
      logger.addSecrets(['']);

      logger.info('nothing to hide');

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('nothing to hide', undefined);
    });
  });

  describe('Backup-specific logging methods', () => {
    const baseResult = { exitCode: 0, duration: 65000, timedOut: false };

    it('should log run start', () => {
      logger.logRunStart('/srv/data', 'sftp:backup@host:/srv/restic');

      expect(mockWinstonLogger.info).toHaveBeenCalledWith(
        'Starting backup of /srv/data to sftp:backup@host:/srv/restic',
        { operation: 'run_start' }
      );
    });

    it('should log command output at debug and success at info', () => {
      logger.logCommandResult('backup', { ...baseResult, success: true, output: 'snapshot saved\n' });

      expect(mockWinstonLogger.debug).toHaveBeenCalledWith(
        'backup output:\nsnapshot saved',
        undefined
      );
      expect(mockWinstonLogger.info).toHaveBeenCalledWith('backup completed in 00:01:05', undefined);
    });

    it('should log command failures with exit code and output', () => {
      logger.logCommandResult('forget', {
        ...baseResult,
        success: false,
        exitCode: 1,
        output: 'Fatal: unable to open repository',
      });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith(
        'forget failed with exit code 1: Fatal: unable to open repository',
        {}
      );
    });

    it('should log timeouts', () => {
      logger.logCommandResult('backup', {
        ...baseResult,
        success: false,
        exitCode: -1,
        output: '',
        timedOut: true,
      });

      expect(mockWinstonLogger.debug).not.toHaveBeenCalled();
      expect(mockWinstonLogger.error).toHaveBeenCalledWith('backup timed out', {});
    });

    it('should log a successful run at info', () => {
      const result: RunResult = {
        projectName: 'nas',
        status: 'Success',
        totalSize: '1.500 GiB',
        duration: 3723000,
        startedAt: new Date(2024, 0, 15, 14, 30, 45),
        logFilePath: '/var/log/restic/nas-20240115143045.log',
        failures: [],
      };

      logger.logRunComplete(result);

      expect(mockWinstonLogger.info).toHaveBeenCalledWith(
        'Backup run finished with status Success in 01:02:03, repository size 1.500 GiB',
        undefined
      );
    });

    it('should log a failed run at error with the failure count', () => {
      const result: RunResult = {
        projectName: 'nas',
        status: 'Failure',
        totalSize: null,
        duration: 10000,
        startedAt: new Date(2024, 0, 15, 14, 30, 45),
        logFilePath: '/var/log/restic/nas-20240115143045.log',
        failures: ['backup failed with exit code 1', 'stats failed with exit code 1'],
      };

      logger.logRunComplete(result);

      expect(mockWinstonLogger.error).toHaveBeenCalledWith(
        'Backup run finished with status Failure in 00:00:10 (2 failure(s))',
        {}
      );
    });
  });

  describe('Transport errors', () => {
    it('should report transport failures on stderr', () => {
      const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const registration = mockWinstonLogger.on.mock.calls.find(([event]) => event === 'error');
      if (!registration) {
        throw new Error('Expected an error listener');
      }

      registration[1](new Error('ENOTDIR: not a directory'));

      expect(consoleError).toHaveBeenCalledWith(
        'Log transport error for nas: Error: ENOTDIR: not a directory'
      );
      consoleError.mockRestore();
    });
  });

  describe('close', () => {
    it('should end winston and wait for the finish event', async () => {
      mockWinstonLogger.once.mockImplementation((_event: string, listener: () => void) => {
        listener();
        return mockWinstonLogger;
      });

      await logger.close();

      expect(mockWinstonLogger.once).toHaveBeenCalledWith('finish', expect.any(Function));
      expect(mockWinstonLogger.end).toHaveBeenCalled();
    });

    it('should settle when ending fails', async () => {
      mockWinstonLogger.once.mockImplementation((event: string, listener: () => void) => {
        if (event === 'error') {
          listener();
        }
        return mockWinstonLogger;
      });

      await expect(logger.close()).resolves.toBeUndefined();
    });
  });
});

describe('Logger helpers', () => {
  it('should build the per-run log file path from the start time', () => {
    expect(buildLogFilePath('/var/log/restic/nas', new Date(2024, 0, 5, 4, 3, 2))).toBe(
      '/var/log/restic/nas-20240105040302.log'
    );
  });

  it('should format a log line', () => {
    expect(formatLogLine('2024-01-15 14:30:45', 'warn', 'office', 'Slow upload')).toBe(
      '2024-01-15 14:30:45 [WARN] office: Slow upload'
    );
  });

  it('should redact every occurrence of every secret', () => {
    expect(redactSecrets('a=test-secret b=test-key a=test-secret', ['test-secret', 'test-key'])).toBe(
      'a=[REDACTED] b=[REDACTED] a=[REDACTED]'
    );
  });

  it('should parse log levels case-insensitively with an info fallback', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
  });
});
