import { errorMessage } from '@tfcanvas/contracts';
import { DeploymentPipeline } from '@tfcanvas/runner';
import chalk from 'chalk';
import { Command } from 'commander';

import type { ContextFactory } from '../context';
import { confirmAction } from '../prompts';

interface DestroyOptions {
  yes?: boolean;
}

export function createDestroyCommand(getContext: ContextFactory) {
  return new Command('destroy')
    .description('Destroy the infrastructure managed in the output directory')
    .option('-y, --yes', 'Approve destruction automatically')
    .action(async (options: DestroyOptions) => {
      try {
        const context = await getContext();
        const pipeline = new DeploymentPipeline(context.runner, context.logger);
        const result = await pipeline.destroy({ confirm: (action, details) => confirmAction(action, details, options.yes ?? false) });

        if (result.outcome === 'declined') {
          console.log(chalk.yellow('Destroy cancelled.'));
          return;
        }
        if (result.outcome === 'failed') throw new Error(result.message);

        console.log(result.message);
        console.log(chalk.green('Destroy complete!'));
      } catch (error: unknown) {
        console.error(chalk.red('Destroy failed:'), errorMessage(error));
        process.exit(1);
      }
    });
}
