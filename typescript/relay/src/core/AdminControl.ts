import { Logger } from 'pino';

import {
  Address,
  isValidAddressEvm,
  isZeroishAddress,
  normalizeAddressEvm,
  rootLogger,
} from '@ferryline/utils';

import {
  InvalidReceiver,
  NothingToWithdraw,
  Unauthorized,
} from '../errors.js';
import type { CallContext } from '../ledger/Network.js';
import { JournaledSet } from '../ledger/journaled.js';
import type { Transport } from '../transport/types.js';
import { AllowlistKind, AssetType, NetworkId } from '../types.js';

import type { AllowlistRegistry } from './AllowlistRegistry.js';
import type { Custody } from './Custody.js';
import type { RelayState } from './RelayState.js';

/**
 * Proof of administrator authority over one relay.
 * Only capabilities issued by that relay's AdminControl are accepted.
 */
export interface AdminCapability {
  readonly relay: Address;
  readonly holder: Address;
}

export class AdminControl {
  private readonly capabilities: JournaledSet<AdminCapability>;
  private readonly logger: Logger;

  constructor(
    private readonly state: RelayState,
    private readonly allowlist: AllowlistRegistry,
    private readonly custody: Custody,
    logger?: Logger,
  ) {
    this.capabilities = new JournaledSet(state.network.journal);
    this.logger = (logger || rootLogger).child({ module: 'AdminControl' });
  }

  /**
   * Issues the first capability. Only possible while none exists.
   */
  bootstrap(holder: Address): AdminCapability {
    if (this.capabilities.size > 0) {
      throw new Unauthorized('Relay already has an administrator');
    }
    return this.issue(holder);
  }

  isAdmin(cap: AdminCapability): boolean {
    return this.capabilities.has(cap);
  }

  holders(): Address[] {
    return this.capabilities.values().map((cap) => cap.holder);
  }

  grant(cap: AdminCapability, holder: Address): AdminCapability {
    return this.run(cap, () => this.issue(holder));
  }

  revoke(cap: AdminCapability, target: AdminCapability): void {
    this.run(cap, (ctx) => {
      if (!this.capabilities.has(target)) return;
      if (this.capabilities.size === 1) {
        throw new Unauthorized('Cannot revoke the last administrator');
      }
      this.capabilities.delete(target);
      ctx.network.emit(this.state.address, {
        type: 'AdminRevoked',
        holder: target.holder,
      });
      this.logger.info({ holder: target.holder }, 'Revoked administrator');
    });
  }

  setDestinationAllowed(
    cap: AdminCapability,
    network: NetworkId,
    allowed: boolean,
  ): void {
    this.setAllowed(cap, AllowlistKind.DestinationNetwork, network, allowed);
  }

  setSourceAllowed(
    cap: AdminCapability,
    network: NetworkId,
    allowed: boolean,
  ): void {
    this.setAllowed(cap, AllowlistKind.SourceNetwork, network, allowed);
  }

  setAssetAllowed(
    cap: AdminCapability,
    asset: AssetType,
    allowed: boolean,
  ): void {
    this.setAllowed(cap, AllowlistKind.Asset, asset, allowed);
  }

  setSenderAllowed(
    cap: AdminCapability,
    sender: Address,
    allowed: boolean,
  ): void {
    this.setAllowed(cap, AllowlistKind.Sender, sender, allowed);
  }

  setAllowed(
    cap: AdminCapability,
    list: AllowlistKind,
    id: string,
    allowed: boolean,
  ): void {
    this.run(cap, () => this.allowlist.set(list, id, allowed));
  }

  setFeeAsset(cap: AdminCapability, asset: AssetType): void {
    this.run(cap, (ctx) => {
      if (!isValidAddressEvm(asset)) {
        throw new Error(`Invalid fee asset ${asset}`);
      }
      const previous = this.state.feeAsset.get();
      const current = normalizeAddressEvm(asset);
      this.state.feeAsset.set(current);
      ctx.network.emit(this.state.address, {
        type: 'FeeAssetUpdated',
        previous,
        current,
      });
      this.logger.info({ previous, current }, 'Fee asset updated');
    });
  }

  setTransport(cap: AdminCapability, transport: Transport): void {
    this.run(cap, (ctx) => {
      const previous = this.state.transport.get().address;
      this.state.transport.set(transport);
      ctx.network.emit(this.state.address, {
        type: 'TransportUpdated',
        previous,
        current: transport.address,
      });
      this.logger.info(
        { previous, current: transport.address },
        'Transport updated',
      );
    });
  }

  /** Withdraws the relay's entire fee asset balance */
  withdrawFeeAsset(cap: AdminCapability, to: Address): bigint {
    return this.withdrawAsset(cap, this.state.feeAsset.get(), to);
  }

  /** Withdraws the relay's entire balance of `asset` */
  withdrawAsset(cap: AdminCapability, asset: AssetType, to: Address): bigint {
    return this.run(cap, (ctx) => {
      if (!isValidAddressEvm(to) || isZeroishAddress(to)) {
        throw new InvalidReceiver(to);
      }
      const amount = this.custody.balanceOf(asset);
      if (amount === 0n) throw new NothingToWithdraw(asset);
      this.custody.transferOut(asset, to, amount);
      ctx.network.emit(this.state.address, {
        type: 'FundsWithdrawn',
        asset: normalizeAddressEvm(asset),
        to: normalizeAddressEvm(to),
        amount,
      });
      this.logger.info(
        { asset, to, amount: amount.toString() },
        'Withdrew funds',
      );
      return amount;
    });
  }

  /** Runs `fn` as one operation sent by the capability holder */
  private run<T>(cap: AdminCapability, fn: (ctx: CallContext) => T): T {
    if (!this.isAdmin(cap)) {
      this.logger.warn({ holder: cap.holder }, 'Rejected administrator call');
      throw new Unauthorized(
        `${cap.holder} holds no administrator capability for this relay`,
      );
    }
    return this.state.network.transact(
      { from: cap.holder, to: this.state.address },
      fn,
    );
  }

  private issue(holder: Address): AdminCapability {
    if (!isValidAddressEvm(holder) || isZeroishAddress(holder)) {
      throw new Error(`Invalid administrator ${holder}`);
    }
    const cap: AdminCapability = Object.freeze({
      relay: this.state.address,
      holder: normalizeAddressEvm(holder),
    });
    this.capabilities.add(cap);
    this.state.network.emit(this.state.address, {
      type: 'AdminGranted',
      holder: cap.holder,
    });
    this.logger.info({ holder: cap.holder }, 'Granted administrator');
    return cap;
  }
}
