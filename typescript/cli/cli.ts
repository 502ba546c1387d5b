#!/usr/bin/env -S node --import tsx
import chalk from 'chalk';
import yargs from 'yargs';

import {
  logFormatCommandOption,
  logLevelCommandOption,
} from './src/commands/options.js';
import { simulateCommand } from './src/commands/simulate.js';
import { validateCommand } from './src/commands/validate.js';
import { configureLogger, errorRed } from './src/logger.js';
import { VERSION } from './src/version.js';

console.log(chalk.blue('Ferryline'), chalk.magentaBright('CLI'));

try {
  await yargs(process.argv.slice(2))
    .scriptName('ferry')
    .option('log', logFormatCommandOption)
    .option('verbosity', logLevelCommandOption)
    .global(['log', 'verbosity'])
    .middleware([
      (argv) => {
        configureLogger(
          typeof argv.log === 'string' ? argv.log : undefined,
          typeof argv.verbosity === 'string' ? argv.verbosity : undefined,
        );
      },
    ])
    .command(validateCommand)
    .command(simulateCommand)
    .version(VERSION)
    .demandCommand()
    .strict()
    .help()
    .showHelpOnFail(false)
    .parseAsync();
} catch (error) {
  errorRed('Error: ' + (error instanceof Error ? error.message : error));
  process.exitCode = 1;
}
