/**
 * Mock Logger for testing
 *
 * A ServiceLogger whose methods are vi.fn mocks. Every call is also recorded
 * as an entry so tests can assert on the messages per level.
 */

import { vi, type Mock } from 'vitest';
import type { HarnessLogLevel, OperationHandle, ServiceLogger } from '@clawharbor/core';

export interface MockLogEntry {
  level: HarnessLogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export interface MockServiceLogger extends ServiceLogger {
  debug: Mock<ServiceLogger['debug']>;
  info: Mock<ServiceLogger['info']>;
  ok: Mock<ServiceLogger['ok']>;
  warn: Mock<ServiceLogger['warn']>;
  error: Mock<ServiceLogger['error']>;
  startOperation: Mock<ServiceLogger['startOperation']>;
  /** Every logged line in call order, including operation results */
  entries: MockLogEntry[];
  getMessages: (level?: HarnessLogLevel) => string[];
  clearCalls: () => void;
}

/**
 * Create a mock service logger with startOperation support. Operation
 * success is recorded at `ok`, failure at `debug`, like the real logger.
 */
export function createMockServiceLogger(): MockServiceLogger {
  const entries: MockLogEntry[] = [];

  const record =
    (level: HarnessLogLevel) =>
    (message: string, meta?: Record<string, unknown>): void => {
      entries.push({ level, message, meta });
    };

  const startOperation = vi.fn<ServiceLogger['startOperation']>(
    (operation): OperationHandle => ({
      success: vi.fn((message?: string, meta?: Record<string, unknown>) =>
        record('ok')(message || `Completed ${operation}`, meta)
      ),
      failure: vi.fn((error: Error | string, meta?: Record<string, unknown>) =>
        record('debug')(
          `Failed ${operation}: ${error instanceof Error ? error.message : error}`,
          meta
        )
      ),
    })
  );

  return {
    debug: vi.fn<ServiceLogger['debug']>(record('debug')),
    info: vi.fn<ServiceLogger['info']>(record('info')),
    ok: vi.fn<ServiceLogger['ok']>(record('ok')),
    warn: vi.fn<ServiceLogger['warn']>(record('warn')),
    error: vi.fn<ServiceLogger['error']>(record('error')),
    startOperation,
    entries,
    getMessages: (level) =>
      entries.filter((entry) => !level || entry.level === level).map((entry) => entry.message),
    clearCalls: () => {
      entries.length = 0;
    },
  };
}
