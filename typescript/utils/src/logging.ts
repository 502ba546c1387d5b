import { LevelWithSilent, Logger, pino } from 'pino';

import { safelyAccessEnvVar } from './env.js';

// A custom enum definition because pino does not export an enum
// and because we use 'off' instead of 'silent' in env and CLI options
export enum LogLevel {
  Trace = 'trace',
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Off = 'off',
}

let logLevel: LevelWithSilent =
  toPinoLevel(safelyAccessEnvVar('LOG_LEVEL', true)) || 'info';

export function toPinoLevel(level?: string): LevelWithSilent | undefined {
  if (level === 'none' || level === 'off' || level === 'silent')
    return 'silent';
  switch (level) {
    case 'trace':
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
      return level;
    default:
      return undefined;
  }
}

export function getLogLevel() {
  return logLevel;
}

export enum LogFormat {
  Pretty = 'pretty',
  JSON = 'json',
}

function toLogFormat(format?: string): LogFormat | undefined {
  if (format === LogFormat.Pretty) return LogFormat.Pretty;
  if (format === LogFormat.JSON) return LogFormat.JSON;
  return undefined;
}

let logFormat: LogFormat =
  toLogFormat(safelyAccessEnvVar('LOG_FORMAT', true)) ?? LogFormat.JSON;

export function getLogFormat() {
  return logFormat;
}

// Note, for brevity and convenience, the rootLogger is exported directly
export let rootLogger = createFerrylinePinoLogger(logLevel, logFormat);

export function getRootLogger() {
  return rootLogger;
}

export function configureRootLogger(
  newLogFormat: LogFormat,
  newLogLevel: LogLevel,
) {
  logFormat = newLogFormat;
  logLevel = toPinoLevel(newLogLevel) || logLevel;
  rootLogger = createFerrylinePinoLogger(logLevel, logFormat);
  return rootLogger;
}

export function setRootLogger(logger: Logger) {
  rootLogger = logger;
  return rootLogger;
}

export function createFerrylinePinoLogger(
  logLevel: LevelWithSilent,
  logFormat: LogFormat,
) {
  return pino({
    level: logLevel,
    name: 'ferryline',
    formatters: {
      // Remove pino's default bindings of hostname but keep pid
      bindings: (defaultBindings) => ({ pid: defaultBindings.pid }),
    },
    hooks: {
      logMethod(inputArgs, method, level) {
        // pino-pretty is not meant for production, so when pretty is
        // enabled we circumvent pino and log directly to console
        if (
          logFormat === LogFormat.Pretty &&
          level >= pino.levels.values[logLevel]
        ) {
          // eslint-disable-next-line no-console
          console.log(...inputArgs);
          return;
        }
        return method.apply(this, inputArgs);
      },
    },
  });
}

/**
 * JSON.stringify replacer for log payloads carrying bigint amounts.
 */
export function bigintSerializer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
