import { BigNumber } from 'bignumber.js';
import { utils as ethersUtils } from 'ethers';

import { Numberish } from './types.js';

const DEFAULT_TOKEN_DECIMALS = 18;

function toBigNumberValue(value: Numberish | BigNumber): BigNumber.Value {
  return typeof value === 'bigint' ? value.toString(10) : value;
}

/**
 * Convert the given base unit value to its display value
 * @returns Converted value in string type.
 */
export function fromWei(
  value: Numberish | null | undefined,
  decimals = DEFAULT_TOKEN_DECIMALS,
): string {
  if (!value) return (0).toString();
  const flooredValue = BigNumber(toBigNumberValue(value)).toFixed(
    0,
    BigNumber.ROUND_FLOOR,
  );
  return parseFloat(ethersUtils.formatUnits(flooredValue, decimals)).toString();
}

/**
 * Convert the given display value to base units.
 * Fraction digits beyond the token decimals are dropped.
 */
export function toWei(
  value: Numberish | null | undefined,
  decimals = DEFAULT_TOKEN_DECIMALS,
): bigint {
  if (!value) return 0n;
  // `toString` with the explicit radix 10 avoids scientific notation
  const valueString = BigNumber(toBigNumberValue(value)).toString(10).trim();
  const components = valueString.split('.');
  if (components.length === 1) {
    return ethersUtils.parseUnits(valueString, decimals).toBigInt();
  } else if (components.length === 2) {
    const trimmedFraction = components[1].substring(0, decimals);
    const normalized = trimmedFraction
      ? `${components[0]}.${trimmedFraction}`
      : components[0];
    return ethersUtils.parseUnits(normalized, decimals).toBigInt();
  } else {
    throw new Error(`Cannot convert ${valueString} to wei`);
  }
}

/**
 * Try to parse the given value into a non-negative integer amount
 * @returns The amount, or null when the value is not an integer >= 0.
 */
export function tryParseAmount(value: Numberish | null | undefined) {
  if (value === null || value === undefined || value === '') return null;
  try {
    const parsed = BigInt(typeof value === 'string' ? value.trim() : value);
    return parsed >= 0n ? parsed : null;
  } catch {
    return null;
  }
}
