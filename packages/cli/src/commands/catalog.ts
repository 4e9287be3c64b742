import type { ResourceCatalog } from '@tfcanvas/catalog';
import { errorMessage } from '@tfcanvas/contracts';
import chalk from 'chalk';
import { Command } from 'commander';

import type { ContextFactory } from '../context';

interface CatalogOptions {
  provider?: string;
  popular?: boolean | string;
  groups?: boolean;
}

function parseLimit(value: string): number {
  if (!/^\d+$/.test(value)) throw new Error(`Invalid limit "${value}"`);
  return Number(value);
}

function printTypes(catalog: ResourceCatalog, resourceTypes: string[]): void {
  for (const resourceType of resourceTypes) {
    const description = catalog.getTemplate(resourceType)?.description ?? '';
    console.log(description ? `  ${resourceType} ${chalk.gray(`- ${description}`)}` : `  ${resourceType}`);
  }
}

export function createCatalogCommand(getContext: ContextFactory) {
  return new Command('catalog')
    .description('List the resource types that can be added')
    .option('-p, --provider <name>', 'Only list types of one provider')
    .option('--popular [limit]', 'Only list popular types')
    .option('--groups', 'List provider groups')
    .action(async (options: CatalogOptions) => {
      try {
        const { catalog } = await getContext();

        if (options.groups) {
          for (const group of catalog.listGroups()) console.log(group);
          return;
        }

        if (options.popular !== undefined) {
          const resourceTypes = typeof options.popular === 'string' ? catalog.listPopular(parseLimit(options.popular)) : catalog.listPopular();
          printTypes(catalog, resourceTypes);
          return;
        }

        const groups = options.provider ? [options.provider] : catalog.listGroups();
        for (const group of groups) {
          const resourceTypes = Object.keys(catalog.listByProvider(group));
          if (resourceTypes.length === 0) {
            console.log(chalk.yellow(`No resource types for provider "${group}"`));
            continue;
          }

          console.log(chalk.bold(group));
          printTypes(catalog, resourceTypes);
        }
      } catch (error: unknown) {
        console.error(chalk.red('Catalog failed:'), errorMessage(error));
        process.exit(1);
      }
    });
}
