import fs from 'fs';
import path from 'path';
import { parse as yamlParse } from 'yaml';

import { bigintSerializer } from './logging.js';
import { toYamlString } from './yaml.js';

export type FileFormat = 'yaml' | 'json';

export function isFile(filepath: string): boolean {
  if (!filepath) return false;
  try {
    return fs.existsSync(filepath) && fs.lstatSync(filepath).isFile();
  } catch {
    return false;
  }
}

export function readFileAtPath(filepath: string): string {
  if (!isFile(filepath)) {
    throw new Error(`File doesn't exist at ${filepath}`);
  }
  return fs.readFileSync(filepath, 'utf8');
}

export function writeFileAtPath(filepath: string, value: string): void {
  fs.mkdirSync(path.dirname(filepath), { recursive: true });
  fs.writeFileSync(filepath, value);
}

export function readJson(filepath: string): unknown {
  return JSON.parse(readFileAtPath(filepath));
}

export function readYaml(filepath: string): unknown {
  return yamlParse(readFileAtPath(filepath));
}

export function resolveFileFormat(
  filepath: string,
  format?: FileFormat,
): FileFormat | undefined {
  if (format) return format;
  const extension = path.extname(filepath).toLowerCase();
  if (extension === '.json') return 'json';
  if (extension === '.yaml' || extension === '.yml') return 'yaml';
  return undefined;
}

/** Reads a file as JSON or YAML, chosen by `format` or the file extension */
export function readYamlOrJson(filepath: string, format?: FileFormat): unknown {
  const resolved = resolveFileFormat(filepath, format);
  if (resolved === 'json') return readJson(filepath);
  if (resolved === 'yaml') return readYaml(filepath);
  throw new Error(`Invalid file format for ${filepath}`);
}

export function writeYamlOrJson(
  filepath: string,
  value: unknown,
  format?: FileFormat,
): void {
  const resolved = resolveFileFormat(filepath, format);
  if (resolved === 'json') {
    writeFileAtPath(
      filepath,
      JSON.stringify(value, bigintSerializer, 2) + '\n',
    );
  } else if (resolved === 'yaml') {
    writeFileAtPath(filepath, toYamlString(value));
  } else {
    throw new Error(`Invalid file format for ${filepath}`);
  }
}
