import { errorMessage } from '@tfcanvas/contracts';
import { defaultWorkspace } from '@tfcanvas/workspace';
import chalk from 'chalk';
import { Command } from 'commander';

import type { ContextFactory } from '../context';

export function createInitCommand(getContext: ContextFactory) {
  return new Command('init').description('Create a workspace with the default providers').action(async () => {
    try {
      const { store } = await getContext();

      if (await store.exists()) {
        console.log(chalk.yellow(`Workspace already exists at ${store.filePath}`));
        return;
      }

      await store.write(defaultWorkspace());
      console.log(chalk.green(`✓ Created ${store.filePath}`));
    } catch (error: unknown) {
      console.error(chalk.red('Init failed:'), errorMessage(error));
      process.exit(1);
    }
  });
}
