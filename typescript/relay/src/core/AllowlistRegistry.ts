import { Logger } from 'pino';

import {
  Address,
  assert,
  normalizeAddressEvm,
  rootLogger,
} from '@ferryline/utils';

import type { Network } from '../ledger/Network.js';
import { JournaledSet } from '../ledger/journaled.js';
import { AllowlistKind, AssetType, NetworkId } from '../types.js';

/** Read-only membership queries, safe to hand to observers */
export interface AllowlistView {
  isDestinationAllowed(network: NetworkId): boolean;
  isSourceAllowed(network: NetworkId): boolean;
  isAssetAllowed(asset: AssetType): boolean;
  isSenderAllowed(sender: Address): boolean;
  entries(list: AllowlistKind): string[];
}

const ADDRESS_LISTS: ReadonlySet<AllowlistKind> = new Set([
  AllowlistKind.Asset,
  AllowlistKind.Sender,
]);

function toKey(list: AllowlistKind, id: string): string {
  return ADDRESS_LISTS.has(list) ? normalizeAddressEvm(id) : id;
}

/**
 * Four independent default-deny sets: destination networks, source
 * networks, assets and senders. Mutated through AdminControl only.
 */
export class AllowlistRegistry implements AllowlistView {
  private readonly lists: Record<AllowlistKind, JournaledSet<string>>;
  private readonly logger: Logger;

  constructor(
    private readonly network: Network,
    private readonly emitter: Address,
    logger?: Logger,
  ) {
    const { journal } = network;
    this.lists = {
      [AllowlistKind.DestinationNetwork]: new JournaledSet(journal),
      [AllowlistKind.SourceNetwork]: new JournaledSet(journal),
      [AllowlistKind.Asset]: new JournaledSet(journal),
      [AllowlistKind.Sender]: new JournaledSet(journal),
    };
    this.logger = (logger || rootLogger).child({ module: 'AllowlistRegistry' });
  }

  isDestinationAllowed(network: NetworkId): boolean {
    return this.isAllowed(AllowlistKind.DestinationNetwork, network);
  }

  isSourceAllowed(network: NetworkId): boolean {
    return this.isAllowed(AllowlistKind.SourceNetwork, network);
  }

  isAssetAllowed(asset: AssetType): boolean {
    return this.isAllowed(AllowlistKind.Asset, asset);
  }

  isSenderAllowed(sender: Address): boolean {
    return this.isAllowed(AllowlistKind.Sender, sender);
  }

  isAllowed(list: AllowlistKind, id: string): boolean {
    return this.lists[list].has(toKey(list, id));
  }

  entries(list: AllowlistKind): string[] {
    return this.lists[list].values();
  }

  /**
   * Records the new membership of `id` and emits AllowlistUpdated,
   * whether or not membership changed
   */
  set(list: AllowlistKind, id: string, allowed: boolean): void {
    assert(id, `Empty identifier for ${list} allowlist`);
    const key = toKey(list, id);
    if (allowed) this.lists[list].add(key);
    else this.lists[list].delete(key);
    this.network.emit(this.emitter, {
      type: 'AllowlistUpdated',
      list,
      id: key,
      allowed,
    });
    this.logger.debug({ list, id: key, allowed }, 'Allowlist updated');
  }
}
