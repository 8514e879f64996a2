/**
 * Status Command
 *
 * Show a secret's rotation flag and which version holds which stage.
 */

import { Command } from 'commander';
import { runAction, type CliContext } from '../context.js';
import { formatStatus } from '../format.js';

export function createStatusCommand(context: CliContext): Command {
  return new Command('status')
    .description('Show rotation status and version stages of a secret')
    .requiredOption('--secret-id <id>', 'Secret ARN or name')
    .action((options: { secretId: string }) =>
      runAction(context, async () => {
        const { vault } = context.createRuntime();
        const description = await vault.describeSecret(options.secretId);
        for (const line of formatStatus(options.secretId, description)) {
          context.stdout(line);
        }
      })
    );
}
