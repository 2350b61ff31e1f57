import { Logger } from '../../src/interfaces/Logger';

export function createMockLogger(logFilePath: string | null = null): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    addSecrets: jest.fn(),
    getLogFilePath: jest.fn().mockReturnValue(logFilePath),
    close: jest.fn().mockResolvedValue(undefined),
    logRunStart: jest.fn(),
    logCommandResult: jest.fn(),
    logRunComplete: jest.fn(),
  };
}
