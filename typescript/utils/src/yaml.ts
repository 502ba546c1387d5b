import { parse as yamlParse, stringify as yamlStringify } from 'yaml';

import { rootLogger } from './logging.js';
import { Result, failure, success } from './result.js';

export function tryParseJsonOrYaml(input: string): Result<unknown> {
  try {
    if (input.trim().startsWith('{')) {
      return success(JSON.parse(input));
    } else {
      return success(yamlParse(input));
    }
  } catch (error) {
    rootLogger.error({ err: error }, 'Error parsing JSON or YAML');
    return failure('Input is not valid JSON or YAML');
  }
}

export function toYamlString(data: unknown): string {
  return yamlStringify(data, { indent: 2 });
}
