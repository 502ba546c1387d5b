import { Logger } from 'pino';

import {
  Address,
  isValidAddressEvm,
  isZeroishAddress,
  normalizeAddressEvm,
  rootLogger,
} from '@ferryline/utils';

import { encodeTransferInstruction } from '../codec/payload.js';
import {
  ChainNotAllowed,
  InvalidAmount,
  InvalidReceiver,
  TokenNotAllowed,
  TransportError,
  UnsupportedSettlement,
  isRelayError,
} from '../errors.js';
import { NATIVE_ASSET } from '../ledger/AssetLedger.js';
import type { CallContext } from '../ledger/Network.js';
import {
  AllowlistKind,
  AssetType,
  FeeQuote,
  MessageDraft,
  MessageId,
  SendRequest,
} from '../types.js';

import type { AllowlistRegistry } from './AllowlistRegistry.js';
import type { Custody } from './Custody.js';
import type { FeeQuoter } from './FeeQuoter.js';
import type { RelayState } from './RelayState.js';

const EMPTY_DATA = '0x';

function isValidReceiver(address: Address): boolean {
  return isValidAddressEvm(address) && !isZeroishAddress(address);
}

/**
 * Validates a send, takes custody of the asset, settles the fee and hands
 * the message to the transport. Any failure aborts the whole send.
 */
export class OutboundDispatcher {
  private readonly logger: Logger;

  constructor(
    private readonly state: RelayState,
    private readonly allowlist: AllowlistRegistry,
    private readonly feeQuoter: FeeQuoter,
    private readonly custody: Custody,
    logger?: Logger,
  ) {
    this.logger = (logger || rootLogger).child({
      module: 'OutboundDispatcher',
    });
  }

  send(ctx: CallContext, request: SendRequest): MessageId {
    const { destinationNetwork, receiver, recipient, asset, amount } = request;

    if (!this.allowlist.isDestinationAllowed(destinationNetwork)) {
      throw new ChainNotAllowed(
        destinationNetwork,
        AllowlistKind.DestinationNetwork,
      );
    }
    if (!this.allowlist.isAssetAllowed(asset)) {
      throw new TokenNotAllowed(asset);
    }
    if (!isValidReceiver(receiver)) throw new InvalidReceiver(receiver);
    if (!isValidReceiver(recipient)) throw new InvalidReceiver(recipient);
    if (amount <= 0n) throw new InvalidAmount(amount);
    if (!this.state.variant.settlementModes.includes(request.settlement)) {
      throw new UnsupportedSettlement(request.settlement);
    }

    this.custody.transferIn(asset, ctx.sender, amount);

    const draft = this.buildDraft(request);
    const quote = this.feeQuoter.quote(destinationNetwork, draft);
    const reserved = draft.assetTransfers
      .filter((transfer) => transfer.asset === quote.asset)
      .reduce((sum, transfer) => sum + transfer.amount, 0n);
    this.feeQuoter.ensureFeeCoverage(ctx, quote, request.settlement, reserved);

    const messageId = this.dispatch(ctx, draft, quote);

    ctx.network.emit(this.state.address, {
      type: 'MessageSent',
      messageId,
      destinationNetwork,
      receiver: draft.receiver,
      asset: normalizeAddressEvm(asset),
      amount,
      feeAsset: quote.asset,
      feeAmount: quote.amount,
    });
    this.logger.info(
      {
        messageId,
        destinationNetwork,
        caller: ctx.sender,
        amount: amount.toString(),
        fee: quote.amount.toString(),
      },
      'Message sent',
    );
    return messageId;
  }

  /** The message a send would dispatch, without any validation */
  buildDraft(request: SendRequest): MessageDraft {
    const asset = normalizeAddressEvm(request.asset);
    const payload = encodeTransferInstruction(
      {
        recipient: normalizeAddressEvm(request.recipient),
        asset,
        amount: request.amount,
        data: request.data ?? EMPTY_DATA,
      },
      this.state.variant.payloadData,
    );
    return {
      destinationNetwork: request.destinationNetwork,
      sender: this.state.address,
      receiver: normalizeAddressEvm(request.receiver),
      payload,
      assetTransfers: [{ asset, amount: request.amount }],
      feeSettlement: request.settlement,
      feeAsset: this.feeQuoter.feeAssetFor(request.settlement),
    };
  }

  private dispatch(
    ctx: CallContext,
    draft: MessageDraft,
    quote: FeeQuote,
  ): MessageId {
    const transport = this.state.transport.get();
    const paysNative = quote.asset === NATIVE_ASSET;

    const approvals = new Map<AssetType, bigint>();
    if (!paysNative) approvals.set(quote.asset, quote.amount);
    if (transport.pullsAssets) {
      for (const { asset, amount } of draft.assetTransfers) {
        approvals.set(asset, (approvals.get(asset) ?? 0n) + amount);
      }
    }
    for (const [asset, amount] of approvals) {
      this.custody.approve(asset, transport.address, amount);
    }

    try {
      return ctx.network.transact(
        {
          from: this.state.address,
          to: transport.address,
          value: paysNative ? quote.amount : 0n,
        },
        (transportCtx) =>
          transport.dispatch(
            transportCtx,
            draft.destinationNetwork,
            draft,
            quote,
          ),
      );
    } catch (error) {
      if (isRelayError(error)) throw error;
      throw new TransportError(
        `Transport rejected message to ${draft.destinationNetwork}`,
        { cause: error },
      );
    }
  }
}
