import { LineCounter, parse as yamlParse } from 'yaml';

import { toYamlString } from '@ferryline/utils';
import { readYamlOrJson, writeYamlOrJson } from '@ferryline/utils/fs';

import { log } from '../logger.js';

export { readYamlOrJson, writeYamlOrJson };

export const MAX_READ_LINE_OUTPUT = 250;

/**
 * Logs the YAML form of an object unless it runs past `maxLines`
 * @returns whether the object was logged
 */
export function logYamlIfUnderMaxLines(
  obj: unknown,
  maxLines: number = MAX_READ_LINE_OUTPUT,
): boolean {
  const asYamlString = toYamlString(obj);
  const lineCounter = new LineCounter();
  yamlParse(asYamlString, { lineCounter });
  if (lineCounter.lineStarts.length >= maxLines) return false;
  log(asYamlString);
  return true;
}
