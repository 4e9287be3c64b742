import { errorMessage } from '@tfcanvas/contracts';
import chalk from 'chalk';
import { Command } from 'commander';

import { type ContextFactory, loadCanvas, warnMissingFields } from '../context';

export function createGenerateCommand(getContext: ContextFactory) {
  return new Command('generate').description('Print the Terraform configuration').action(async () => {
    try {
      const context = await getContext();
      const canvas = await loadCanvas(context);

      warnMissingFields(context, canvas);
      process.stdout.write(canvas.render({ requiredVersion: context.config.requiredVersion }));
    } catch (error: unknown) {
      console.error(chalk.red('Generate failed:'), errorMessage(error));
      process.exit(1);
    }
  });
}
