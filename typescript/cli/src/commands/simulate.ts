import { readScenario } from '../config/scenario.js';
import { log, logBlue, logGreen, warnYellow } from '../logger.js';
import { runScenario } from '../simulation/runner.js';
import { logYamlIfUnderMaxLines, writeYamlOrJson } from '../utils/files.js';
import { ENV } from '../utils/env.js';

import { outputFileCommandOption, scenarioCommandOption } from './options.js';
import { CommandModuleWithArgs } from './types.js';

export const simulateCommand: CommandModuleWithArgs<{
  scenario: string;
  out?: string;
}> = {
  command: 'simulate',
  describe: 'Run a scenario against in-process networks and relays',
  builder: {
    scenario: scenarioCommandOption,
    out: outputFileCommandOption(
      ENV.FERRY_OUTPUT,
      false,
      'Write the report to a YAML or JSON file',
    ),
  },
  handler: ({ scenario: path, out }) => {
    const scenario = readScenario(path);
    logBlue(`Simulating ${scenario.name ?? path}`);
    const report = runScenario(scenario);

    const failed = report.messages.filter(({ status }) => status === 'failed');
    for (const message of failed) {
      warnYellow(`Message ${message.id} failed: ${message.error}`);
    }
    if (out) {
      writeYamlOrJson(out, report);
      log(`Report written to ${out}`);
    } else if (!logYamlIfUnderMaxLines(report)) {
      warnYellow('Report too long to print, use --out to write it to a file');
    }
    logGreen(
      `Simulation complete: ${report.messages.length} messages, ${failed.length} failed`,
    );
  },
};
