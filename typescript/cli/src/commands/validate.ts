import { readScenario } from '../config/scenario.js';
import { logGreen } from '../logger.js';

import { scenarioCommandOption } from './options.js';
import { CommandModuleWithArgs } from './types.js';

export const validateCommand: CommandModuleWithArgs<{ scenario: string }> = {
  command: 'validate',
  describe: 'Validate a scenario file',
  builder: {
    scenario: scenarioCommandOption,
  },
  handler: ({ scenario: path }) => {
    const scenario = readScenario(path);
    logGreen(
      `Scenario ${scenario.name ?? path} is valid: ` +
        `${scenario.networks.length} networks, ` +
        `${Object.keys(scenario.relays).length} relays, ` +
        `${scenario.steps.length} steps`,
    );
  },
};
