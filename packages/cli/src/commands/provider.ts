import { errorMessage, type HclMap } from '@tfcanvas/contracts';
import chalk from 'chalk';
import { Command } from 'commander';

import { applyAssignments } from '../assignments';
import { type ContextFactory, updateCanvas } from '../context';

interface ProviderOptions {
  remove?: boolean;
}

export function createProviderCommand(getContext: ContextFactory) {
  return new Command('provider')
    .description('Set or remove provider settings')
    .argument('<name>', 'Provider name, e.g. aws')
    .argument('[assignments...]', 'Settings as path=value')
    .option('--remove', 'Remove the provider block')
    .action(async (providerName: string, assignments: string[] = [], options: ProviderOptions) => {
      try {
        const context = await getContext();
        await updateCanvas(context, (canvas) => {
          if (options.remove) {
            if (!canvas.removeProvider(providerName)) throw new Error(`No provider named "${providerName}"`);
            return;
          }

          const current: HclMap = canvas.toState().providers.get(providerName) ?? new Map();
          canvas.setProvider(providerName, applyAssignments(current, assignments));
        });

        console.log(chalk.green(options.remove ? `✓ Removed provider ${providerName}` : `✓ Updated provider ${providerName}`));
      } catch (error: unknown) {
        console.error(chalk.red('Provider failed:'), errorMessage(error));
        process.exit(1);
      }
    });
}
