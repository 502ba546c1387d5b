import type { Address, HexString } from '@ferryline/utils';

import type {
  AllowlistKind,
  AssetType,
  MessageId,
  NetworkId,
} from './types.js';

export type AssetEvent =
  | {
      type: 'Transfer';
      asset: AssetType;
      from: Address;
      to: Address;
      amount: bigint;
    }
  | {
      type: 'Approval';
      asset: AssetType;
      owner: Address;
      spender: Address;
      amount: bigint;
    };

/**
 * Relay events, emitted on the relay's network for auditability
 */
export type RelayEvent =
  | {
      type: 'MessageSent';
      messageId: MessageId;
      destinationNetwork: NetworkId;
      receiver: Address;
      asset: AssetType;
      amount: bigint;
      feeAsset: AssetType;
      feeAmount: bigint;
    }
  | {
      type: 'MessageReceived';
      messageId: MessageId;
      sourceNetwork: NetworkId;
      sender: Address;
      payload: HexString;
      recipient: Address;
      asset: AssetType;
      amount: bigint;
      data: HexString;
    }
  | {
      type: 'AllowlistUpdated';
      list: AllowlistKind;
      id: string;
      allowed: boolean;
    }
  | { type: 'FundsWithdrawn'; asset: AssetType; to: Address; amount: bigint }
  | { type: 'AdminGranted'; holder: Address }
  | { type: 'AdminRevoked'; holder: Address }
  | { type: 'FeeAssetUpdated'; previous: AssetType; current: AssetType }
  | { type: 'TransportUpdated'; previous: Address; current: Address };

export type NetworkEvent = AssetEvent | RelayEvent;
export type NetworkEventType = NetworkEvent['type'];
export type NetworkEventOf<T extends NetworkEventType> = Extract<
  NetworkEvent,
  { type: T }
>;

export interface LogEntry<E extends NetworkEvent = NetworkEvent> {
  network: NetworkId;
  emitter: Address;
  /** Position in the network's committed log */
  index: number;
  event: E;
}

export function isEventOfType<T extends NetworkEventType>(
  event: NetworkEvent,
  type: T,
): event is NetworkEventOf<T> {
  return event.type === type;
}
