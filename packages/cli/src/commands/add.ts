import { errorMessage } from '@tfcanvas/contracts';
import chalk from 'chalk';
import { Command } from 'commander';

import { type ContextFactory, updateCanvas } from '../context';

export function createAddCommand(getContext: ContextFactory) {
  return new Command('add')
    .description('Add a resource from the catalog')
    .argument('<type>', 'Resource type, e.g. aws_s3_bucket')
    .argument('[name]', 'Resource name (generated when omitted)')
    .action(async (resourceType: string, name: string | undefined) => {
      try {
        const context = await getContext();
        const resource = await updateCanvas(context, (canvas) => {
          const result = canvas.add(resourceType, name);
          if (!result.ok) throw new Error(result.message);
          return result.resource;
        });

        console.log(chalk.green(`✓ Added ${resource.resourceType}.${resource.resourceName}`));
      } catch (error: unknown) {
        console.error(chalk.red('Add failed:'), errorMessage(error));
        process.exit(1);
      }
    });
}
