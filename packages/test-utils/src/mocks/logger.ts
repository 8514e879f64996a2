/**
 * Mock Logger for testing
 *
 * A ServiceLogger that records entries and operations for assertions.
 * Children share the parent's records and add their context to each entry.
 */

import { vi, type Mock } from 'vitest';
import type { OperationLogger, ServiceLogger } from '@pgrotate/core';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevelName;
  message: string;
  meta: Record<string, unknown>;
}

export interface RecordedOperation {
  name: string;
  meta: Record<string, unknown>;
  outcome: 'pending' | 'success' | 'failure';
  message?: string;
  error?: unknown;
}

interface MockLoggerState {
  entries: LogEntry[];
  operations: RecordedOperation[];
}

export interface MockServiceLogger extends ServiceLogger {
  debug: Mock<ServiceLogger['debug']>;
  info: Mock<ServiceLogger['info']>;
  warn: Mock<ServiceLogger['warn']>;
  error: Mock<ServiceLogger['error']>;
  startOperation: Mock<ServiceLogger['startOperation']>;
  child: Mock<ServiceLogger['child']>;
  readonly entries: LogEntry[];
  readonly operations: RecordedOperation[];
  /** Messages logged at `level`, or at every level */
  messages: (level?: LogLevelName) => string[];
  clear: () => void;
}

function build(state: MockLoggerState, context: Record<string, unknown>): MockServiceLogger {
  const record =
    (level: LogLevelName) =>
    (message: string, meta?: Record<string, unknown>): void => {
      state.entries.push({ level, message, meta: { ...context, ...meta } });
    };

  return {
    debug: vi.fn<ServiceLogger['debug']>(record('debug')),
    info: vi.fn<ServiceLogger['info']>(record('info')),
    warn: vi.fn<ServiceLogger['warn']>(record('warn')),
    error: vi.fn<ServiceLogger['error']>(record('error')),
    startOperation: vi.fn<ServiceLogger['startOperation']>((name, meta): OperationLogger => {
      const operation: RecordedOperation = { name, meta: { ...context, ...meta }, outcome: 'pending' };
      state.operations.push(operation);
      return {
        success: (message) => {
          operation.outcome = 'success';
          operation.message = message;
        },
        failure: (error) => {
          operation.outcome = 'failure';
          operation.error = error;
        },
      };
    }),
    child: vi.fn<ServiceLogger['child']>((childContext) =>
      build(state, { ...context, ...childContext })
    ),
    get entries() {
      return state.entries;
    },
    get operations() {
      return state.operations;
    },
    messages: (level) =>
      state.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.message),
    clear: () => {
      state.entries.length = 0;
      state.operations.length = 0;
    },
  };
}

/**
 * Create a mock service logger
 */
export function createMockServiceLogger(context: Record<string, unknown> = {}): MockServiceLogger {
  return build({ entries: [], operations: [] }, context);
}
