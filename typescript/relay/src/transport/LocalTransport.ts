import { Logger } from 'pino';

import {
  Address,
  eqAddressEvm,
  normalizeAddressEvm,
  rootLogger,
} from '@ferryline/utils';

import { messageId, payloadSize } from '../codec/message.js';
import { NATIVE_ASSET } from '../ledger/AssetLedger.js';
import type { CallContext, Network } from '../ledger/Network.js';
import { JournaledValue } from '../ledger/journaled.js';
import type {
  AssetType,
  FeeQuote,
  Message,
  MessageDraft,
  MessageId,
  NetworkId,
} from '../types.js';

import type {
  MessageRecipient,
  QueuedMessage,
  Transport,
  TransportEvent,
  TransportObserver,
} from './types.js';

export interface FeeSchedule {
  baseFee: bigint;
  feePerByte: bigint;
  feePerTransfer: bigint;
}

export interface LocalTransportOptions {
  address: Address;
  /** Fee schedule per supported destination network */
  routes: Record<NetworkId, FeeSchedule>;
  /**
   * Fee multiplier per accepted fee token, per source network.
   * The native asset is always accepted, at 1 unless listed.
   */
  feeAssets?: Record<NetworkId, Record<AssetType, bigint>>;
  /**
   * Burn transferred assets on the source network and mint them to the
   * receiver on delivery. Otherwise the receiver pays out of its own
   * holdings.
   */
  carryAssets?: boolean;
}

const DEFAULT_MAX_FLUSH_ROUNDS = 100;

/**
 * In-process transport connecting several networks.
 *
 * Dispatch is part of the sending operation; delivery happens later,
 * when the backlog is processed. Each message is delivered at most once:
 * a delivery that fails is recorded as failed and never retried.
 */
export class LocalTransport implements Transport {
  readonly address: Address;
  readonly pullsAssets: boolean;
  private readonly routes: Map<NetworkId, FeeSchedule>;
  private readonly feeAssets: Map<NetworkId, Map<AssetType, bigint>>;
  private readonly endpoints = new Map<string, MessageRecipient>();
  private readonly nonces = new Map<NetworkId, JournaledValue<bigint>>();
  private backlog: QueuedMessage[] = [];
  private readonly processed = new Map<MessageId, QueuedMessage>();
  private readonly logger: Logger;
  private isProcessing = false;
  private processingInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    options: LocalTransportOptions,
    private readonly observer: TransportObserver = {},
    logger?: Logger,
  ) {
    this.address = normalizeAddressEvm(options.address);
    this.pullsAssets = options.carryAssets ?? true;
    this.routes = new Map(Object.entries(options.routes));
    this.feeAssets = new Map(
      Object.entries(options.feeAssets ?? {}).map(([network, assets]) => [
        network,
        new Map(
          Object.entries(assets).map(([asset, multiplier]) => [
            normalizeAddressEvm(asset),
            multiplier,
          ]),
        ),
      ]),
    );
    this.logger = (logger || rootLogger).child({ module: 'LocalTransport' });
  }

  /**
   * Binds the receiver of messages addressed to `endpoint.address`
   * on `endpoint.network`
   */
  registerEndpoint(endpoint: MessageRecipient): void {
    const key = endpointKey(endpoint.network.id, endpoint.address);
    if (this.endpoints.has(key)) {
      throw new Error(`Endpoint ${key} is already registered`);
    }
    this.endpoints.set(key, endpoint);
    this.logger.info(
      { network: endpoint.network.id, address: endpoint.address },
      'Registered endpoint',
    );
  }

  quote(
    sourceNetwork: NetworkId,
    destinationNetwork: NetworkId,
    draft: MessageDraft,
  ): bigint {
    const schedule = this.routes.get(destinationNetwork);
    if (!schedule) {
      throw new Error(`Unsupported destination network ${destinationNetwork}`);
    }
    const multiplier = this.feeMultiplier(sourceNetwork, draft.feeAsset);
    const units =
      schedule.baseFee +
      schedule.feePerByte * BigInt(payloadSize(draft)) +
      schedule.feePerTransfer * BigInt(draft.assetTransfers.length);
    return units * multiplier;
  }

  dispatch(
    ctx: CallContext,
    destinationNetwork: NetworkId,
    draft: MessageDraft,
    fee: FeeQuote,
  ): MessageId {
    const sourceNetwork = ctx.network.id;
    if (!eqAddressEvm(fee.asset, draft.feeAsset)) {
      throw new Error(
        `Fee asset ${fee.asset} does not match the message fee asset ${draft.feeAsset}`,
      );
    }
    const required = this.quote(sourceNetwork, destinationNetwork, draft);
    if (fee.amount < required) {
      throw new Error(`Fee ${fee.amount} is below the required ${required}`);
    }

    this.collectFee(ctx, fee.asset, required);
    if (this.pullsAssets) this.pullAssets(ctx, draft);

    const nonce = this.nonceOf(ctx.network);
    const id = messageId(sourceNetwork, nonce.get(), draft);
    nonce.set(nonce.get() + 1n);

    const message: Message = { ...draft, id, sourceNetwork };
    // Queued only once the sending operation commits
    ctx.network.journal.afterCommit(() =>
      this.enqueue(message, { asset: fee.asset, amount: required }),
    );
    return id;
  }

  /**
   * Delivers every message pending at the time of the call
   * @returns the number of messages handled
   */
  processNextBatch(): number {
    if (this.isProcessing) return 0;
    this.isProcessing = true;
    try {
      const batch = this.backlog.filter(
        (queued) => queued.status === 'pending',
      );
      if (batch.length === 0) return 0;
      this.logger.debug(`Processing ${batch.length} messages`);
      for (const queued of batch) this.deliver(queued);
      this.cleanupBacklog();
      return batch.length;
    } finally {
      this.isProcessing = false;
    }
  }

  /**
   * Processes batches until the backlog is empty, including messages
   * sent by the deliveries themselves
   */
  flush(maxRounds = DEFAULT_MAX_FLUSH_ROUNDS): number {
    let handled = 0;
    for (let round = 0; round < maxRounds; round++) {
      const count = this.processNextBatch();
      if (count === 0) return handled;
      handled += count;
    }
    this.logger.warn(
      { backlog: this.backlog.length },
      `Backlog not drained after ${maxRounds} rounds`,
    );
    return handled;
  }

  start(intervalMs = 1000): void {
    if (this.processingInterval) {
      this.logger.warn('Transport already started');
      return;
    }
    this.logger.info('Starting transport');
    this.processingInterval = setInterval(() => {
      try {
        this.processNextBatch();
      } catch (err) {
        this.logger.error({ err }, 'Error processing message batch');
      }
    }, intervalMs);
  }

  stop(): void {
    if (!this.processingInterval) {
      this.logger.warn('Transport not started');
      return;
    }
    this.logger.info('Stopping transport');
    clearInterval(this.processingInterval);
    this.processingInterval = null;
  }

  getBacklog(): QueuedMessage[] {
    return this.backlog.map((queued) => ({ ...queued }));
  }

  getMessage(id: MessageId): QueuedMessage | undefined {
    const queued =
      this.processed.get(id) ??
      this.backlog.find((entry) => entry.message.id === id);
    return queued && { ...queued };
  }

  private feeMultiplier(network: NetworkId, asset: AssetType): bigint {
    const token = normalizeAddressEvm(asset);
    const multiplier = this.feeAssets.get(network)?.get(token);
    if (multiplier !== undefined) return multiplier;
    if (token === NATIVE_ASSET) return 1n;
    throw new Error(`Fee asset ${token} is not accepted on ${network}`);
  }

  private collectFee(ctx: CallContext, asset: AssetType, amount: bigint) {
    const { assets } = ctx.network;
    if (normalizeAddressEvm(asset) === NATIVE_ASSET) {
      if (ctx.value < amount) {
        throw new Error(`Attached ${ctx.value} does not cover fee ${amount}`);
      }
      const excess = ctx.value - amount;
      if (
        excess > 0n &&
        !assets.transfer(NATIVE_ASSET, this.address, ctx.sender, excess)
      ) {
        throw new Error(`Cannot return excess payment ${excess}`);
      }
      return;
    }
    if (ctx.value > 0n) {
      throw new Error('Native value attached to a token-paid dispatch');
    }
    if (
      !assets.transferFrom(
        asset,
        this.address,
        ctx.sender,
        this.address,
        amount,
      )
    ) {
      throw new Error(`Cannot collect fee of ${amount} ${asset}`);
    }
  }

  private pullAssets(ctx: CallContext, draft: MessageDraft) {
    const { assets } = ctx.network;
    for (const { asset, amount } of draft.assetTransfers) {
      if (
        !assets.transferFrom(
          asset,
          this.address,
          ctx.sender,
          this.address,
          amount,
        ) ||
        !assets.burn(asset, this.address, amount)
      ) {
        throw new Error(`Cannot take custody of ${amount} ${asset}`);
      }
    }
  }

  private nonceOf(network: Network): JournaledValue<bigint> {
    let nonce = this.nonces.get(network.id);
    if (!nonce) {
      nonce = new JournaledValue(network.journal, 0n);
      this.nonces.set(network.id, nonce);
    }
    return nonce;
  }

  private enqueue(message: Message, fee: FeeQuote) {
    this.backlog.push({
      message,
      fee,
      status: 'pending',
      queuedAt: Date.now(),
    });
    this.logger.info(
      {
        messageId: message.id,
        origin: message.sourceNetwork,
        destination: message.destinationNetwork,
      },
      `Queued message (${this.backlog.length} in backlog)`,
    );
    this.notify({ type: 'messageQueued', message, fee });
    this.notify({ type: 'backlog', size: this.backlog.length });
  }

  private deliver(queued: QueuedMessage) {
    const { message } = queued;
    const endpoint = this.endpoints.get(
      endpointKey(message.destinationNetwork, message.receiver),
    );
    try {
      if (!endpoint) {
        throw new Error(
          `No endpoint ${message.receiver} on ${message.destinationNetwork}`,
        );
      }
      const { network } = endpoint;
      network.transact({ from: this.address, to: endpoint.address }, (ctx) => {
        if (this.pullsAssets) {
          for (const { asset, amount } of message.assetTransfers) {
            network.assets.mint(asset, endpoint.address, amount);
          }
        }
        endpoint.handle(ctx, message);
      });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      queued.status = 'failed';
      queued.error = error;
      this.logger.warn(
        { messageId: message.id, err: error },
        'Delivery failed, message will not be retried',
      );
      this.notify({ type: 'messageFailed', message, error });
      return;
    }
    queued.status = 'delivered';
    this.logger.info({ messageId: message.id }, 'Delivered message');
    this.notify({
      type: 'messageDelivered',
      message,
      durationMs: Date.now() - queued.queuedAt,
    });
  }

  // Observers see committed outcomes and cannot undo them
  private notify(event: TransportEvent) {
    try {
      this.observer.onEvent?.(event);
    } catch (err) {
      this.logger.error({ err, type: event.type }, 'Transport observer failed');
    }
  }

  private cleanupBacklog(): void {
    const done = this.backlog.filter((queued) => queued.status !== 'pending');
    this.backlog = this.backlog.filter((queued) => queued.status === 'pending');
    for (const queued of done) this.processed.set(queued.message.id, queued);
    if (done.length > 0) {
      this.logger.debug(`Removed ${done.length} processed messages from backlog`);
      this.notify({ type: 'backlog', size: this.backlog.length });
    }
  }
}

function endpointKey(network: NetworkId, address: Address): string {
  return `${network}/${normalizeAddressEvm(address)}`;
}
