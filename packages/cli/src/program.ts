import { Command } from 'commander';
import { createRunCommand } from './commands/run.js';
import { createStatusCommand } from './commands/status.js';
import { createStepCommand } from './commands/step.js';
import { createDefaultContext, type CliContext } from './context.js';

export const CLI_VERSION = '0.1.0';

export function buildProgram(context: CliContext = createDefaultContext()): Command {
  const program = new Command();

  program
    .name('pgrotate')
    .description('Rotate the password of a PostgreSQL role stored in AWS Secrets Manager')
    .version(CLI_VERSION);

  program.addCommand(createStepCommand(context));
  program.addCommand(createRunCommand(context));
  program.addCommand(createStatusCommand(context));

  return program;
}
