/**
 * Run Command
 *
 * Run all four rotation steps in order for a version already staged
 * AWSPENDING. Stops at the first failing step.
 */

import { Command } from 'commander';
import { ROTATION_STEPS } from '@pgrotate/rotation';
import { runAction, type CliContext } from '../context.js';
import { formatOutcome } from '../format.js';

interface RunOptions {
  secretId: string;
  token: string;
}

export function createRunCommand(context: CliContext): Command {
  return new Command('run')
    .description('Run createSecret, setSecret, testSecret and finishSecret in order')
    .requiredOption('--secret-id <id>', 'Secret ARN or name')
    .requiredOption('--token <token>', 'Version token (ClientRequestToken) being rotated in')
    .action((options: RunOptions) =>
      runAction(context, async () => {
        const { stateMachine } = context.createRuntime();
        for (const step of ROTATION_STEPS) {
          const outcome = await stateMachine.run({
            secretId: options.secretId,
            token: options.token,
            step,
          });
          context.stdout(formatOutcome(outcome));
        }
      })
    );
}
