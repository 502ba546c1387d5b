import type { Address } from '@ferryline/utils';

import type { CallContext, Network } from '../ledger/Network.js';
import type {
  FeeQuote,
  Message,
  MessageDraft,
  MessageId,
  NetworkId,
} from '../types.js';

/**
 * External service carrying messages between networks.
 * Trusted to deliver each dispatched message to its receiver.
 */
export interface Transport {
  readonly address: Address;
  /**
   * Whether dispatch pulls the transferred assets from the sender,
   * who must approve them beforehand
   */
  readonly pullsAssets: boolean;

  /** Pure query, valid for the current state only */
  quote(
    sourceNetwork: NetworkId,
    destinationNetwork: NetworkId,
    draft: MessageDraft,
  ): bigint;

  /**
   * Collects the fee and queues the message for delivery.
   * Native fees arrive as `ctx.value`, token fees through an allowance.
   */
  dispatch(
    ctx: CallContext,
    destinationNetwork: NetworkId,
    draft: MessageDraft,
    fee: FeeQuote,
  ): MessageId;
}

/** Receiving side of the transport on one network */
export interface MessageRecipient {
  readonly address: Address;
  readonly network: Network;
  handle(ctx: CallContext, message: Message): void;
}

export type DeliveryStatus = 'pending' | 'delivered' | 'failed';

export interface QueuedMessage {
  message: Message;
  fee: FeeQuote;
  status: DeliveryStatus;
  queuedAt: number;
  error?: Error;
}

/**
 * Transport events, useful for metrics and monitoring
 */
export type TransportEvent =
  | {
      type: 'messageQueued';
      message: Message;
      fee: FeeQuote;
    }
  | {
      type: 'messageDelivered';
      message: Message;
      durationMs: number;
    }
  | {
      type: 'messageFailed';
      message: Message;
      error: Error;
    }
  | { type: 'backlog'; size: number };

export interface TransportObserver {
  onEvent?: (event: TransportEvent) => void;
}
