import type { Address } from '@ferryline/utils';

import type { Network } from '../ledger/Network.js';
import { JournaledValue } from '../ledger/journaled.js';
import type { Transport } from '../transport/types.js';
import type { AssetType, LastReceived, ProtocolVariant } from '../types.js';

/**
 * Configuration and observability state shared by the relay's components.
 * Mutable values are journaled so a failed operation reverts them.
 */
export class RelayState {
  readonly transport: JournaledValue<Transport>;
  readonly feeAsset: JournaledValue<AssetType>;
  readonly lastReceived: JournaledValue<LastReceived | undefined>;

  constructor(
    readonly network: Network,
    readonly address: Address,
    readonly variant: ProtocolVariant,
    transport: Transport,
    feeAsset: AssetType,
  ) {
    this.transport = new JournaledValue(network.journal, transport);
    this.feeAsset = new JournaledValue(network.journal, feeAsset);
    this.lastReceived = new JournaledValue<LastReceived | undefined>(
      network.journal,
      undefined,
    );
  }
}
