import { errorMessage } from '@tfcanvas/contracts';
import chalk from 'chalk';
import { Command } from 'commander';

import { type ContextFactory, updateCanvas } from '../context';

export function createRmCommand(getContext: ContextFactory) {
  return new Command('rm')
    .description('Remove a resource from the canvas')
    .argument('<name>', 'Resource name')
    .action(async (name: string) => {
      try {
        const context = await getContext();
        await updateCanvas(context, (canvas) => {
          if (!canvas.remove(name)) throw new Error(`No resource named "${name}"`);
        });

        console.log(chalk.green(`✓ Removed ${name}`));
      } catch (error: unknown) {
        console.error(chalk.red('Remove failed:'), errorMessage(error));
        process.exit(1);
      }
    });
}
