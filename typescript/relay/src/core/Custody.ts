import { Address } from '@ferryline/utils';

import { TransferFailed } from '../errors.js';
import type { Network } from '../ledger/Network.js';
import type { AssetType } from '../types.js';

/**
 * Asset balances held by the relay. Every transfer that does not report
 * success raises TransferFailed.
 */
export class Custody {
  constructor(
    private readonly network: Network,
    readonly holder: Address,
  ) {}

  balanceOf(asset: AssetType): bigint {
    return this.network.assets.balanceOf(asset, this.holder);
  }

  /** Pulls `amount` from `from`, who must have approved the relay */
  transferIn(asset: AssetType, from: Address, amount: bigint): void {
    const { assets } = this.network;
    if (!assets.transferFrom(asset, this.holder, from, this.holder, amount)) {
      throw new TransferFailed(asset, from, this.holder, amount);
    }
  }

  transferOut(asset: AssetType, to: Address, amount: bigint): void {
    if (!this.network.assets.transfer(asset, this.holder, to, amount)) {
      throw new TransferFailed(asset, this.holder, to, amount);
    }
  }

  approve(asset: AssetType, spender: Address, amount: bigint): void {
    this.network.assets.approve(asset, this.holder, spender, amount);
  }
}
