/**
 * @pgrotate/cli
 *
 * Main entry point for the CLI is in ./cli.ts
 * This file exports the program and its pieces for programmatic use.
 */

export { buildProgram, CLI_VERSION } from './program.js';
export { createDefaultContext, runAction, type CliContext } from './context.js';
export { formatOutcome, formatRotationFlag, formatStatus } from './format.js';
export { createRunCommand } from './commands/run.js';
export { createStatusCommand } from './commands/status.js';
export { createStepCommand } from './commands/step.js';
