import { Command } from 'commander';

import { createAddCommand } from './commands/add';
import { createBackendCommand } from './commands/backend';
import { createCatalogCommand } from './commands/catalog';
import { createDestroyCommand } from './commands/destroy';
import { createEditCommand } from './commands/edit';
import { createGenerateCommand } from './commands/generate';
import { createInitCommand } from './commands/init';
import { createProviderCommand } from './commands/provider';
import { createRmCommand } from './commands/rm';
import { createRunCommand } from './commands/run';
import { createSaveCommand } from './commands/save';
import { createSetCommand } from './commands/set';
import { createShowCommand } from './commands/show';
import { loadConfig } from './config';
import { type AppContext, createContext } from './context';

const program = new Command();

program.name('tfcanvas').description('Compose Terraform resources from a catalog and deploy them').version('0.1.0').option('--verbose', 'Print debug output');

let context: Promise<AppContext> | undefined;
const getContext = () => {
  context ??= createContext(loadConfig(process.cwd(), process.env, { verbose: program.opts<{ verbose?: boolean }>().verbose }));
  return context;
};

program.addCommand(createInitCommand(getContext));
program.addCommand(createCatalogCommand(getContext));
program.addCommand(createAddCommand(getContext));
program.addCommand(createRmCommand(getContext));
program.addCommand(createShowCommand(getContext));
program.addCommand(createSetCommand(getContext));
program.addCommand(createEditCommand(getContext));
program.addCommand(createProviderCommand(getContext));
program.addCommand(createBackendCommand(getContext));
program.addCommand(createGenerateCommand(getContext));
program.addCommand(createSaveCommand(getContext));
program.addCommand(createRunCommand(getContext));
program.addCommand(createDestroyCommand(getContext));

await program.parseAsync();
