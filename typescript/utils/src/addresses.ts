import { utils as ethersUtils } from 'ethers';

import { Address } from './types.js';

const EVM_ADDRESS_REGEX = /^0x[a-fA-F0-9]{40}$/;
const EVM_ZEROISH_ADDRESS_REGEX = /^(0x)?0*$/;

export const ZERO_ADDRESS_EVM: Address = ethersUtils.hexZeroPad('0x', 20);

// Only checks the shape, see isValidAddressEvm for checksum validation
export function isAddressEvm(address: Address) {
  return EVM_ADDRESS_REGEX.test(address);
}

// Slower than isAddressEvm above but actually validates content and checksum
export function isValidAddressEvm(address: Address) {
  // Need to catch because ethers' isAddress throws in some cases (bad checksum)
  try {
    const isValid = address && ethersUtils.isAddress(address);
    return !!isValid;
  } catch {
    return false;
  }
}

export function normalizeAddressEvm(address: Address) {
  if (isZeroishAddress(address)) return ZERO_ADDRESS_EVM;
  try {
    return ethersUtils.getAddress(address);
  } catch {
    return address;
  }
}

export function eqAddressEvm(a1: Address, a2: Address) {
  return normalizeAddressEvm(a1) === normalizeAddressEvm(a2);
}

export function isZeroishAddress(address: Address) {
  return EVM_ZEROISH_ADDRESS_REGEX.test(address);
}

/**
 * Derives a deterministic address from a human readable label.
 * Used to name simulated accounts and assets.
 */
export function addressFromLabel(label: string): Address {
  return ethersUtils.getAddress(
    ethersUtils.hexDataSlice(ethersUtils.id(label), 12),
  );
}
