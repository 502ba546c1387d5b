import type { Address, HexString } from '@ferryline/utils';

export type NetworkId = string;
export type MessageId = HexString;
/** Address of the token contract, or the native asset's zero address */
export type AssetType = Address;

export enum FeeSettlement {
  PrefundedReserve = 'prefunded-reserve',
  CallerAttachedPayment = 'caller-attached-payment',
}

export enum AllowlistKind {
  DestinationNetwork = 'destinationNetwork',
  SourceNetwork = 'sourceNetwork',
  Asset = 'asset',
  Sender = 'sender',
}

export interface AssetTransfer {
  asset: AssetType;
  amount: bigint;
}

/**
 * A message as built by the sending relay, before the transport
 * assigns it an id.
 */
export interface MessageDraft {
  destinationNetwork: NetworkId;
  /** The sending relay's address */
  sender: Address;
  /** The receiving relay's address on the destination network */
  receiver: Address;
  payload: HexString;
  assetTransfers: AssetTransfer[];
  feeSettlement: FeeSettlement;
  feeAsset: AssetType;
}

export interface Message extends MessageDraft {
  id: MessageId;
  sourceNetwork: NetworkId;
}

export interface FeeQuote {
  asset: AssetType;
  amount: bigint;
}

/** Decoded form of a message payload */
export interface TransferInstruction {
  recipient: Address;
  asset: AssetType;
  amount: bigint;
  data: HexString;
}

export interface SendRequest {
  destinationNetwork: NetworkId;
  /** Relay on the destination network that receives the message */
  receiver: Address;
  /** Final beneficiary of the transfer on the destination network */
  recipient: Address;
  asset: AssetType;
  amount: bigint;
  settlement: FeeSettlement;
  data?: HexString;
}

export interface LastReceived {
  messageId: MessageId;
  sourceNetwork: NetworkId;
  sender: Address;
  payload: HexString;
  recipient: Address;
  asset: AssetType;
  amount: bigint;
  data: HexString;
}

export interface ProtocolVariant {
  replayProtection: boolean;
  payloadData: boolean;
  settlementModes: readonly FeeSettlement[];
}

export const ProtocolVariants = {
  standard: {
    replayProtection: true,
    payloadData: true,
    settlementModes: [
      FeeSettlement.PrefundedReserve,
      FeeSettlement.CallerAttachedPayment,
    ],
  },
  tokenOnly: {
    replayProtection: true,
    payloadData: false,
    settlementModes: [
      FeeSettlement.PrefundedReserve,
      FeeSettlement.CallerAttachedPayment,
    ],
  },
  // Legacy deployments without a replay ledger; never the default
  unprotected: {
    replayProtection: false,
    payloadData: true,
    settlementModes: [FeeSettlement.PrefundedReserve],
  },
} as const satisfies Record<string, ProtocolVariant>;

export type ProtocolVariantName = keyof typeof ProtocolVariants;
