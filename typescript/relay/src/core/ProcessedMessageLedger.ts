import type { Network } from '../ledger/Network.js';
import { JournaledSet } from '../ledger/journaled.js';
import type { MessageId } from '../types.js';

/**
 * Append-only set of delivered message ids, the relay's replay protection.
 * There is no removal and no expiry: the ledger grows with all-time
 * inbound volume.
 */
export class ProcessedMessageLedger {
  private readonly ids: JournaledSet<MessageId>;

  constructor(network: Network) {
    this.ids = new JournaledSet(network.journal);
  }

  get size(): number {
    return this.ids.size;
  }

  hasProcessed(id: MessageId): boolean {
    return this.ids.has(id.toLowerCase());
  }

  /** @returns whether the id was newly inserted */
  markProcessed(id: MessageId): boolean {
    return this.ids.add(id.toLowerCase());
  }
}
