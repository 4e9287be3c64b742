import { errorMessage } from '@tfcanvas/contracts';
import chalk from 'chalk';
import { Command } from 'commander';

import { parseAssignments } from '../assignments';
import { type ContextFactory, updateCanvas } from '../context';

export function createSetCommand(getContext: ContextFactory) {
  return new Command('set')
    .description('Change fields of a resource')
    .argument('<name>', 'Resource name')
    .argument('<assignments...>', 'Fields as path=value, e.g. tags.Environment=Prod')
    .action(async (name: string, assignments: string[]) => {
      try {
        const context = await getContext();
        const changed = await updateCanvas(context, (canvas) => {
          const resource = canvas.get(name);
          if (!resource) throw new Error(`No resource named "${name}"`);

          const fields = parseAssignments(resource.config, assignments);
          const result = canvas.applyEdits(name, fields);
          if (!result.ok) throw new Error(result.message);
          return fields.size;
        });

        console.log(chalk.green(`✓ Updated ${changed} field${changed === 1 ? '' : 's'} of ${name}`));
      } catch (error: unknown) {
        console.error(chalk.red('Set failed:'), errorMessage(error));
        process.exit(1);
      }
    });
}
