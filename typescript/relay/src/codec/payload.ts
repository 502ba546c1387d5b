import { utils } from 'ethers';

import { HexString, normalizeAddressEvm } from '@ferryline/utils';

import { InvalidPayload } from '../errors.js';
import type { TransferInstruction } from '../types.js';

const INSTRUCTION_WITH_DATA = ['address', 'address', 'uint256', 'bytes'];
const INSTRUCTION_WITHOUT_DATA = ['address', 'address', 'uint256'];
const EMPTY_DATA: HexString = '0x';

export function encodeTransferInstruction(
  instruction: TransferInstruction,
  includeData: boolean,
): HexString {
  if (!utils.isHexString(instruction.data)) {
    throw new InvalidPayload(`Payload data ${instruction.data} is not hex`);
  }
  if (!includeData && utils.hexDataLength(instruction.data) > 0) {
    throw new InvalidPayload('This relay does not carry payload data');
  }
  const values = [
    instruction.recipient,
    instruction.asset,
    instruction.amount.toString(),
  ];
  return includeData
    ? utils.defaultAbiCoder.encode(INSTRUCTION_WITH_DATA, [
        ...values,
        instruction.data,
      ])
    : utils.defaultAbiCoder.encode(INSTRUCTION_WITHOUT_DATA, values);
}

export function decodeTransferInstruction(
  payload: HexString,
  includeData: boolean,
): TransferInstruction {
  let decoded: utils.Result;
  try {
    decoded = utils.defaultAbiCoder.decode(
      includeData ? INSTRUCTION_WITH_DATA : INSTRUCTION_WITHOUT_DATA,
      payload,
    );
  } catch (error) {
    throw new InvalidPayload(`Cannot decode payload ${payload}`, {
      cause: error,
    });
  }
  const [recipient, asset, amount, data] = decoded;
  return {
    recipient: normalizeAddressEvm(String(recipient)),
    asset: normalizeAddressEvm(String(asset)),
    amount: BigInt(String(amount)),
    data: includeData ? String(data) : EMPTY_DATA,
  };
}
