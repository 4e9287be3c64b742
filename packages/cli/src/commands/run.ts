import { errorMessage } from '@tfcanvas/contracts';
import { DeploymentPipeline } from '@tfcanvas/runner';
import chalk from 'chalk';
import { Command } from 'commander';

import { type ContextFactory, loadCanvas, writeDocument } from '../context';
import { confirmAction } from '../prompts';

interface RunOptions {
  yes?: boolean;
}

export function createRunCommand(getContext: ContextFactory) {
  return new Command('run')
    .description('Write main.tf, then init, plan and apply it')
    .option('-y, --yes', 'Approve changes automatically')
    .action(async (options: RunOptions) => {
      try {
        const context = await getContext();
        const filePath = await writeDocument(context, await loadCanvas(context));
        console.log(chalk.green(`✓ Wrote ${filePath}`));

        const pipeline = new DeploymentPipeline(context.runner, context.logger);
        const result = await pipeline.deploy({ confirm: (action, details) => confirmAction(action, details, options.yes ?? false) });

        if (result.outcome === 'declined') {
          console.log(chalk.yellow('Apply cancelled.'));
          return;
        }
        if (result.outcome === 'failed') throw new Error(result.message);

        console.log(result.message);
        console.log(chalk.green('Apply complete!'));
      } catch (error: unknown) {
        console.error(chalk.red('Run failed:'), errorMessage(error));
        process.exit(1);
      }
    });
}
