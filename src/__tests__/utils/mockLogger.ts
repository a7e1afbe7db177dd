import Logger from "bunyan";

export function createMockLogger(): Logger {
  const mockLogger = {
    child: () => mockLogger,
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    fatal: jest.fn(),
  } as unknown as Logger;
  return mockLogger;
}
