/**
 * CLI Context
 *
 * What the commands need from the outside world, so they can run against
 * in-process fakes.
 */

import { configureRootLogger, describeError, getConfig } from '@pgrotate/core';
import { createRotationRuntime, type RotationRuntime } from '@pgrotate/rotation';

export interface CliContext {
  createRuntime: () => RotationRuntime;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export function createDefaultContext(): CliContext {
  return {
    createRuntime: () => {
      const config = getConfig();
      configureRootLogger({ level: config.logLevel, format: config.logFormat });
      return createRotationRuntime(config);
    },
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  };
}

/**
 * Run a command body, reporting any failure and setting exit code 1
 */
export async function runAction(context: CliContext, work: () => Promise<void>): Promise<void> {
  try {
    await work();
  } catch (error) {
    context.stderr(`✗ ${describeError(error)}`);
    process.exitCode = 1;
  }
}
