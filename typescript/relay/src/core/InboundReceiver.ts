import { Logger } from 'pino';

import { rootLogger } from '@ferryline/utils';

import { decodeTransferInstruction } from '../codec/payload.js';
import {
  ChainNotAllowed,
  ReplayedMessage,
  SenderNotAllowed,
  TokenNotAllowed,
} from '../errors.js';
import type { CallContext } from '../ledger/Network.js';
import { AllowlistKind, LastReceived, Message } from '../types.js';

import type { AllowlistRegistry } from './AllowlistRegistry.js';
import type { Custody } from './Custody.js';
import type { ProcessedMessageLedger } from './ProcessedMessageLedger.js';
import type { RelayState } from './RelayState.js';

/**
 * Applies a message delivered by the transport.
 *
 * The id is marked processed before custody is released, so a delivery
 * re-entered from the recipient's side fails as a replay.
 */
export class InboundReceiver {
  private readonly logger: Logger;

  constructor(
    private readonly state: RelayState,
    private readonly allowlist: AllowlistRegistry,
    private readonly ledger: ProcessedMessageLedger,
    private readonly custody: Custody,
    logger?: Logger,
  ) {
    this.logger = (logger || rootLogger).child({ module: 'InboundReceiver' });
  }

  deliver(ctx: CallContext, message: Message): LastReceived {
    const { id, sourceNetwork, sender } = message;

    if (!this.allowlist.isSourceAllowed(sourceNetwork)) {
      throw new ChainNotAllowed(sourceNetwork, AllowlistKind.SourceNetwork);
    }
    if (!this.allowlist.isSenderAllowed(sender)) {
      throw new SenderNotAllowed(sender);
    }
    if (this.state.variant.replayProtection) {
      if (this.ledger.hasProcessed(id)) {
        this.logger.warn({ messageId: id }, 'Rejected replayed message');
        throw new ReplayedMessage(id);
      }
      this.ledger.markProcessed(id);
    }

    const instruction = decodeTransferInstruction(
      message.payload,
      this.state.variant.payloadData,
    );
    if (!this.allowlist.isAssetAllowed(instruction.asset)) {
      throw new TokenNotAllowed(instruction.asset);
    }

    this.custody.transferOut(
      instruction.asset,
      instruction.recipient,
      instruction.amount,
    );

    const received: LastReceived = {
      messageId: id,
      sourceNetwork,
      sender,
      payload: message.payload,
      ...instruction,
    };
    this.state.lastReceived.set(received);
    ctx.network.emit(this.state.address, {
      type: 'MessageReceived',
      ...received,
    });
    this.logger.info(
      {
        messageId: id,
        sourceNetwork,
        recipient: instruction.recipient,
        amount: instruction.amount.toString(),
      },
      'Message received',
    );
    return received;
  }
}
