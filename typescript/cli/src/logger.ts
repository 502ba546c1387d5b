import chalk, { ChalkInstance } from 'chalk';
import { pino } from 'pino';

import {
  LogFormat,
  LogLevel,
  configureRootLogger,
  getLogFormat,
  rootLogger,
  safelyAccessEnvVar,
} from '@ferryline/utils';

let logger = rootLogger.child({ module: 'cli' });

function parseLogFormat(value?: string): LogFormat | undefined {
  return Object.values(LogFormat).find((format) => format === value);
}

function parseLogLevel(value?: string): LogLevel | undefined {
  return Object.values(LogLevel).find((level) => level === value);
}

export function configureLogger(logFormat?: string, logLevel?: string) {
  const format =
    parseLogFormat(logFormat) ||
    parseLogFormat(safelyAccessEnvVar('LOG_FORMAT', true)) ||
    LogFormat.Pretty;
  const level =
    parseLogLevel(logLevel) ||
    parseLogLevel(safelyAccessEnvVar('LOG_LEVEL', true)) ||
    LogLevel.Info;
  logger = configureRootLogger(format, level).child({ module: 'cli' });
  return logger;
}

export const log = (msg: string) => logger.info(msg);

export function logColor(
  level: pino.Level,
  chalkInstance: ChalkInstance,
  ...args: unknown[]
) {
  const message = args.map(String).join(' ');
  // Only use color when pretty is enabled
  if (getLogFormat() === LogFormat.Pretty) {
    logger[level](chalkInstance(message));
  } else {
    logger[level](message);
  }
}
export const logBlue = (...args: unknown[]) =>
  logColor('info', chalk.blue, ...args);
export const logGreen = (...args: unknown[]) =>
  logColor('info', chalk.green, ...args);
export const warnYellow = (...args: unknown[]) =>
  logColor('warn', chalk.yellow, ...args);
export const errorRed = (...args: unknown[]) =>
  logColor('error', chalk.red, ...args);
