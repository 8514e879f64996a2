/**
 * Step Command
 *
 * Run a single rotation step for one secret version.
 */

import { Argument, Command } from 'commander';
import { parseRotationEvent, ROTATION_STEPS } from '@pgrotate/rotation';
import { runAction, type CliContext } from '../context.js';
import { formatOutcome } from '../format.js';

interface StepOptions {
  secretId: string;
  token: string;
}

export function createStepCommand(context: CliContext): Command {
  return new Command('step')
    .description('Run one rotation step')
    .addArgument(new Argument('<step>', 'Rotation step').choices(ROTATION_STEPS))
    .requiredOption('--secret-id <id>', 'Secret ARN or name')
    .requiredOption('--token <token>', 'Version token (ClientRequestToken) being rotated in')
    .action((step: string, options: StepOptions) =>
      runAction(context, async () => {
        const request = parseRotationEvent({
          SecretId: options.secretId,
          ClientRequestToken: options.token,
          Step: step,
        });
        const outcome = await context.createRuntime().stateMachine.run(request);
        context.stdout(formatOutcome(outcome));
      })
    );
}
