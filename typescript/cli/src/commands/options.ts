import { Options } from 'yargs';

import { LogFormat, LogLevel } from '@ferryline/utils';

import { ENV } from '../utils/env.js';

/* Global options */

export const logFormatCommandOption: Options = {
  type: 'string',
  description: 'Log output format',
  choices: Object.values(LogFormat),
};

export const logLevelCommandOption: Options = {
  type: 'string',
  description: 'Log verbosity level',
  choices: Object.values(LogLevel),
};

/* Command-specific options */

export const scenarioCommandOption: Options = {
  type: 'string',
  description: 'Path to a YAML or JSON scenario file',
  alias: 's',
  default: ENV.FERRY_SCENARIO,
  defaultDescription: 'process.env.FERRY_SCENARIO',
  demandOption: !ENV.FERRY_SCENARIO,
};

export const outputFileCommandOption = (
  defaultPath?: string,
  demandOption = false,
  description = 'Output file path',
): Options => ({
  type: 'string',
  description,
  default: defaultPath,
  alias: 'o',
  demandOption,
});
