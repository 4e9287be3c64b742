import { errorMessage } from '@tfcanvas/contracts';
import { HclWriter } from '@tfcanvas/writer';
import chalk from 'chalk';
import { Command } from 'commander';

import { type ContextFactory, loadCanvas } from '../context';

export function createShowCommand(getContext: ContextFactory) {
  return new Command('show')
    .description('Print the block of one resource')
    .argument('<name>', 'Resource name')
    .action(async (name: string) => {
      try {
        const context = await getContext();
        const canvas = await loadCanvas(context);
        const resource = canvas.get(name);
        if (!resource) throw new Error(`No resource named "${name}"`);

        process.stdout.write(new HclWriter().renderResourceBlock(resource));

        const missing = canvas.missingFields(name);
        if (missing.length > 0) console.warn(chalk.yellow(`Missing required fields: ${missing.join(', ')}`));
      } catch (error: unknown) {
        console.error(chalk.red('Show failed:'), errorMessage(error));
        process.exit(1);
      }
    });
}
