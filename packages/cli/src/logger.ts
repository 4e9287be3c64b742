import type { Logger } from '@tfcanvas/contracts';
import chalk from 'chalk';

export interface ConsoleLoggerOptions {
  /** Print debug messages too */
  verbose?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    debug: (message) => {
      if (options.verbose) console.log(chalk.gray(message));
    },
    info: (message) => console.log(chalk.blue(message)),
    warn: (message) => console.warn(chalk.yellow(message)),
    error: (message) => console.error(chalk.red(message)),
  };
}
