import { Logger } from 'pino';

import {
  Address,
  ZERO_ADDRESS_EVM,
  normalizeAddressEvm,
  rootLogger,
} from '@ferryline/utils';

import type { AssetEvent } from '../events.js';
import type { AssetType } from '../types.js';

import { StateJournal } from './StateJournal.js';
import { JournaledMap } from './journaled.js';

/** The network's own currency, used for attached payments */
export const NATIVE_ASSET: AssetType = ZERO_ADDRESS_EVM;

export interface ReceivedTransfer {
  asset: AssetType;
  from: Address;
  to: Address;
  amount: bigint;
}

/**
 * Code run on the receiving side of a transfer, inside the same operation.
 * Throwing aborts the transfer.
 */
export type ReceiveHook = (transfer: ReceivedTransfer) => void;

type EmitFn = (emitter: Address, event: AssetEvent) => void;

/**
 * Balances, allowances and supply of every asset on one network.
 *
 * Transfers report failure by returning false; callers decide how to
 * surface it.
 */
export class AssetLedger {
  private readonly balances: JournaledMap<string, bigint>;
  private readonly allowances: JournaledMap<string, bigint>;
  private readonly supply: JournaledMap<AssetType, bigint>;
  private readonly hooks = new Map<Address, ReceiveHook[]>();
  private readonly logger: Logger;

  constructor(
    private readonly journal: StateJournal,
    private readonly emit: EmitFn,
    logger?: Logger,
  ) {
    this.balances = new JournaledMap(journal);
    this.allowances = new JournaledMap(journal);
    this.supply = new JournaledMap(journal);
    this.logger = (logger || rootLogger).child({ module: 'AssetLedger' });
  }

  balanceOf(asset: AssetType, account: Address): bigint {
    return this.balances.get(balanceKey(asset, account)) ?? 0n;
  }

  allowance(asset: AssetType, owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(asset, owner, spender)) ?? 0n;
  }

  totalSupply(asset: AssetType): bigint {
    return this.supply.get(normalizeAddressEvm(asset)) ?? 0n;
  }

  mint(asset: AssetType, to: Address, amount: bigint): void {
    if (amount <= 0n) throw new Error(`Cannot mint ${amount}`);
    const token = normalizeAddressEvm(asset);
    this.supply.set(token, this.totalSupply(token) + amount);
    this.credit(token, to, amount);
    this.emit(token, {
      type: 'Transfer',
      asset: token,
      from: ZERO_ADDRESS_EVM,
      to: normalizeAddressEvm(to),
      amount,
    });
  }

  burn(asset: AssetType, from: Address, amount: bigint): boolean {
    const token = normalizeAddressEvm(asset);
    if (amount <= 0n || this.balanceOf(token, from) < amount) return false;
    this.debit(token, from, amount);
    this.supply.set(token, this.totalSupply(token) - amount);
    this.emit(token, {
      type: 'Transfer',
      asset: token,
      from: normalizeAddressEvm(from),
      to: ZERO_ADDRESS_EVM,
      amount,
    });
    return true;
  }

  approve(
    asset: AssetType,
    owner: Address,
    spender: Address,
    amount: bigint,
  ): void {
    if (amount < 0n) throw new Error(`Cannot approve ${amount}`);
    const token = normalizeAddressEvm(asset);
    this.allowances.set(allowanceKey(token, owner, spender), amount);
    this.emit(token, {
      type: 'Approval',
      asset: token,
      owner: normalizeAddressEvm(owner),
      spender: normalizeAddressEvm(spender),
      amount,
    });
  }

  transfer(
    asset: AssetType,
    from: Address,
    to: Address,
    amount: bigint,
  ): boolean {
    const token = normalizeAddressEvm(asset);
    if (amount <= 0n || this.balanceOf(token, from) < amount) {
      this.logger.debug(
        { asset: token, from, to, amount: amount.toString() },
        'Transfer rejected',
      );
      return false;
    }
    // Hooks may throw, the nested frame reverts the partial transfer
    this.journal.atomic(() => {
      this.debit(token, from, amount);
      this.credit(token, to, amount);
      this.emit(token, {
        type: 'Transfer',
        asset: token,
        from: normalizeAddressEvm(from),
        to: normalizeAddressEvm(to),
        amount,
      });
      this.runReceiveHooks({
        asset: token,
        from: normalizeAddressEvm(from),
        to: normalizeAddressEvm(to),
        amount,
      });
    });
    return true;
  }

  transferFrom(
    asset: AssetType,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): boolean {
    const token = normalizeAddressEvm(asset);
    const allowed = this.allowance(token, from, spender);
    if (
      amount <= 0n ||
      allowed < amount ||
      this.balanceOf(token, from) < amount
    ) {
      this.logger.debug(
        { asset: token, spender, from, amount: amount.toString() },
        'Delegated transfer rejected',
      );
      return false;
    }
    return this.journal.atomic(() => {
      this.allowances.set(allowanceKey(token, from, spender), allowed - amount);
      return this.transfer(token, from, to, amount);
    });
  }

  /**
   * Registers a hook run after `account` is credited by a transfer.
   * @returns a function removing the hook
   */
  onReceive(account: Address, hook: ReceiveHook): () => void {
    const key = normalizeAddressEvm(account);
    const hooks = this.hooks.get(key) ?? [];
    hooks.push(hook);
    this.hooks.set(key, hooks);
    return () => {
      const remaining = (this.hooks.get(key) ?? []).filter((h) => h !== hook);
      this.hooks.set(key, remaining);
    };
  }

  private runReceiveHooks(transfer: ReceivedTransfer): void {
    for (const hook of this.hooks.get(transfer.to) ?? []) hook(transfer);
  }

  private credit(asset: AssetType, account: Address, amount: bigint): void {
    const key = balanceKey(asset, account);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  private debit(asset: AssetType, account: Address, amount: bigint): void {
    const key = balanceKey(asset, account);
    this.balances.set(key, (this.balances.get(key) ?? 0n) - amount);
  }
}

function balanceKey(asset: AssetType, account: Address): string {
  return `${normalizeAddressEvm(asset)}/${normalizeAddressEvm(account)}`;
}

function allowanceKey(
  asset: AssetType,
  owner: Address,
  spender: Address,
): string {
  return `${normalizeAddressEvm(asset)}/${normalizeAddressEvm(
    owner,
  )}/${normalizeAddressEvm(spender)}`;
}
