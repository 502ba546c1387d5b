import { utils } from 'ethers';

import type { HexString } from '@ferryline/utils';

import type { MessageDraft, MessageId, NetworkId } from '../types.js';

const MESSAGE_ENCODING = [
  'string sourceNetwork',
  'string destinationNetwork',
  'uint256 nonce',
  'address sender',
  'address receiver',
  'bytes payload',
  'tuple(address asset, uint256 amount)[] assetTransfers',
  'string feeSettlement',
  'address feeAsset',
];

export function encodeMessage(
  sourceNetwork: NetworkId,
  nonce: bigint,
  draft: MessageDraft,
): HexString {
  return utils.defaultAbiCoder.encode(MESSAGE_ENCODING, [
    sourceNetwork,
    draft.destinationNetwork,
    nonce.toString(),
    draft.sender,
    draft.receiver,
    draft.payload,
    draft.assetTransfers.map(({ asset, amount }) => [asset, amount.toString()]),
    draft.feeSettlement,
    draft.feeAsset,
  ]);
}

/**
 * Derives the id correlating a dispatch with its delivery.
 * Unique per source network thanks to the nonce.
 */
export function messageId(
  sourceNetwork: NetworkId,
  nonce: bigint,
  draft: MessageDraft,
): MessageId {
  return utils.keccak256(encodeMessage(sourceNetwork, nonce, draft));
}

/** Size in bytes of the payload, used for fee schedules */
export function payloadSize(draft: MessageDraft): number {
  return utils.hexDataLength(draft.payload);
}
