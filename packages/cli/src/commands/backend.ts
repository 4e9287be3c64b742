import { errorMessage, type HclMap } from '@tfcanvas/contracts';
import chalk from 'chalk';
import { Command } from 'commander';

import { applyAssignments } from '../assignments';
import { type ContextFactory, updateCanvas } from '../context';

interface BackendOptions {
  clear?: boolean;
}

export function createBackendCommand(getContext: ContextFactory) {
  return new Command('backend')
    .description('Configure the state backend written into the terraform block')
    .argument('[type]', 'Backend type, e.g. s3 or azurerm')
    .argument('[assignments...]', 'Settings as path=value')
    .option('--clear', 'Remove the backend and the terraform block')
    .action(async (backendType: string | undefined, assignments: string[] = [], options: BackendOptions) => {
      try {
        const context = await getContext();
        await updateCanvas(context, (canvas) => {
          if (options.clear) {
            canvas.setBackend(undefined);
            return;
          }
          if (!backendType) throw new Error('A backend type is required');

          // switching types starts from empty settings
          const current = canvas.toState().backend;
          const settings: HclMap = current?.backendType === backendType ? current.settings : new Map();
          canvas.setBackend({ backendType, settings: applyAssignments(settings, assignments) });
        });

        console.log(chalk.green(options.clear ? '✓ Removed backend' : `✓ Updated backend ${backendType}`));
      } catch (error: unknown) {
        console.error(chalk.red('Backend failed:'), errorMessage(error));
        process.exit(1);
      }
    });
}
