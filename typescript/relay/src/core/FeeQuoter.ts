import { Logger } from 'pino';

import { rootLogger } from '@ferryline/utils';

import {
  InsufficientFeeBalance,
  TransportError,
  UnexpectedPayment,
  isRelayError,
} from '../errors.js';
import { NATIVE_ASSET } from '../ledger/AssetLedger.js';
import type { CallContext } from '../ledger/Network.js';
import {
  AssetType,
  FeeQuote,
  FeeSettlement,
  MessageDraft,
  NetworkId,
} from '../types.js';

import type { Custody } from './Custody.js';
import type { RelayState } from './RelayState.js';

/**
 * Prices messages through the current transport and checks the fee can
 * be covered. Quotes are never cached.
 */
export class FeeQuoter {
  private readonly logger: Logger;

  constructor(
    private readonly state: RelayState,
    private readonly custody: Custody,
    logger?: Logger,
  ) {
    this.logger = (logger || rootLogger).child({ module: 'FeeQuoter' });
  }

  feeAssetFor(settlement: FeeSettlement): AssetType {
    return settlement === FeeSettlement.CallerAttachedPayment
      ? NATIVE_ASSET
      : this.state.feeAsset.get();
  }

  quote(destination: NetworkId, draft: MessageDraft): FeeQuote {
    const transport = this.state.transport.get();
    try {
      const amount = transport.quote(this.state.network.id, destination, draft);
      return { asset: draft.feeAsset, amount };
    } catch (error) {
      if (isRelayError(error)) throw error;
      throw new TransportError(`Transport could not quote ${destination}`, {
        cause: error,
      });
    }
  }

  /**
   * Checks the fee can be paid under `settlement`.
   *
   * A prefunded fee comes out of the relay's shared reserve; `reserved` is
   * the part of that balance already committed to the current message.
   * An attached payment must cover the fee and its excess is refunded to
   * the caller here.
   */
  ensureFeeCoverage(
    ctx: CallContext,
    quote: FeeQuote,
    settlement: FeeSettlement,
    reserved = 0n,
  ): void {
    if (settlement === FeeSettlement.PrefundedReserve) {
      if (ctx.value > 0n) throw new UnexpectedPayment(ctx.value);
      const available = this.custody.balanceOf(quote.asset) - reserved;
      if (available < quote.amount) {
        throw new InsufficientFeeBalance(quote.amount, available, settlement);
      }
      return;
    }

    if (ctx.value < quote.amount) {
      throw new InsufficientFeeBalance(quote.amount, ctx.value, settlement);
    }
    const excess = ctx.value - quote.amount;
    if (excess > 0n) {
      this.custody.transferOut(NATIVE_ASSET, ctx.sender, excess);
      this.logger.debug(
        { caller: ctx.sender, excess: excess.toString() },
        'Refunded excess fee payment',
      );
    }
  }
}
