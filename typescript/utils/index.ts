export {
  ZERO_ADDRESS_EVM,
  addressFromLabel,
  eqAddressEvm,
  isAddressEvm,
  isValidAddressEvm,
  isZeroishAddress,
  normalizeAddressEvm,
} from './src/addresses.js';
export { fromWei, toWei, tryParseAmount } from './src/amount.js';
export { safelyAccessEnvVar } from './src/env.js';
export {
  LogFormat,
  LogLevel,
  bigintSerializer,
  configureRootLogger,
  createFerrylinePinoLogger,
  getLogFormat,
  getLogLevel,
  getRootLogger,
  rootLogger,
  setRootLogger,
} from './src/logging.js';
export type { Result } from './src/result.js';
export { failure, success } from './src/result.js';
export type { Address, HexString, Numberish } from './src/types.js';
export { assert } from './src/validation.js';
export { toYamlString, tryParseJsonOrYaml } from './src/yaml.js';
