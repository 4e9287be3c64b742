import { errorMessage } from '@tfcanvas/contracts';
import chalk from 'chalk';
import { Command } from 'commander';

import { type ContextFactory, loadCanvas, writeDocument } from '../context';

export function createSaveCommand(getContext: ContextFactory) {
  return new Command('save').description('Write main.tf into the output directory').action(async () => {
    try {
      const context = await getContext();
      const filePath = await writeDocument(context, await loadCanvas(context));

      console.log(chalk.green(`✓ Wrote ${filePath}`));
    } catch (error: unknown) {
      console.error(chalk.red('Save failed:'), errorMessage(error));
      process.exit(1);
    }
  });
}
