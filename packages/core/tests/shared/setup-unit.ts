// Setup for unit tests
import { beforeEach, afterEach, vi } from 'vitest';
import { Logger, LogLevel } from '@phystate/shared';

beforeEach(() => {
  // Keep console output out of test runs; entries stay in the log buffer
  vi.spyOn(console, 'log').mockImplementation(() => {});
  Logger.getInstance().setLogLevel(LogLevel.DEBUG);
});

afterEach(() => {
  Logger.getInstance().clearLogs();
  vi.restoreAllMocks();
});
