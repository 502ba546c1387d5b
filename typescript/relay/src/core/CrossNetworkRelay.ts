import { Logger } from 'pino';

import {
  Address,
  isValidAddressEvm,
  normalizeAddressEvm,
  rootLogger,
} from '@ferryline/utils';

import type { CallContext, Network } from '../ledger/Network.js';
import type { MessageRecipient, Transport } from '../transport/types.js';
import {
  AssetType,
  FeeQuote,
  LastReceived,
  Message,
  MessageId,
  ProtocolVariant,
  ProtocolVariants,
  SendRequest,
} from '../types.js';

import { AdminCapability, AdminControl } from './AdminControl.js';
import { AllowlistRegistry, AllowlistView } from './AllowlistRegistry.js';
import { Custody } from './Custody.js';
import { FeeQuoter } from './FeeQuoter.js';
import { InboundReceiver } from './InboundReceiver.js';
import { OutboundDispatcher } from './OutboundDispatcher.js';
import { ProcessedMessageLedger } from './ProcessedMessageLedger.js';
import { RelayState } from './RelayState.js';

export interface RelayOptions {
  /** Address the relay is deployed at on its network */
  address: Address;
  /** Holder of the first administrator capability */
  owner: Address;
  transport: Transport;
  /** Fee token used by prefunded sends */
  feeAsset: AssetType;
  variant?: ProtocolVariant;
}

export interface RelayCall {
  from: Address;
  /** Native payment attached to the call */
  value?: bigint;
}

export interface DeployedRelay {
  relay: CrossNetworkRelay;
  capability: AdminCapability;
}

/**
 * Cross-network asset and data relay deployed on one network.
 *
 * Every public operation runs as one atomic operation on the relay's
 * network: it either takes full effect or none.
 */
export class CrossNetworkRelay implements MessageRecipient {
  readonly address: Address;
  readonly admin: AdminControl;
  private readonly state: RelayState;
  private readonly registry: AllowlistRegistry;
  private readonly ledger: ProcessedMessageLedger;
  private readonly custody: Custody;
  private readonly feeQuoter: FeeQuoter;
  private readonly outbound: OutboundDispatcher;
  private readonly inbound: InboundReceiver;
  private readonly logger: Logger;

  /**
   * Deploys a relay and issues the owner's administrator capability
   */
  static deploy(
    network: Network,
    options: RelayOptions,
    logger?: Logger,
  ): DeployedRelay {
    const relay = new CrossNetworkRelay(network, options, logger);
    const capability = relay.admin.bootstrap(options.owner);
    return { relay, capability };
  }

  protected constructor(
    readonly network: Network,
    options: RelayOptions,
    logger?: Logger,
  ) {
    if (!isValidAddressEvm(options.address)) {
      throw new Error(`Invalid relay address ${options.address}`);
    }
    this.address = normalizeAddressEvm(options.address);
    const relayLogger = (logger || rootLogger).child({
      network: network.id,
      relay: this.address,
    });
    this.logger = relayLogger.child({ module: 'CrossNetworkRelay' });

    this.state = new RelayState(
      network,
      this.address,
      options.variant ?? ProtocolVariants.standard,
      options.transport,
      normalizeAddressEvm(options.feeAsset),
    );
    this.registry = new AllowlistRegistry(network, this.address, relayLogger);
    this.ledger = new ProcessedMessageLedger(network);
    this.custody = new Custody(network, this.address);
    this.feeQuoter = new FeeQuoter(this.state, this.custody, relayLogger);
    this.outbound = new OutboundDispatcher(
      this.state,
      this.registry,
      this.feeQuoter,
      this.custody,
      relayLogger,
    );
    this.inbound = new InboundReceiver(
      this.state,
      this.registry,
      this.ledger,
      this.custody,
      relayLogger,
    );
    this.admin = new AdminControl(
      this.state,
      this.registry,
      this.custody,
      relayLogger,
    );
    this.logger.info(
      { variant: this.state.variant, feeAsset: this.state.feeAsset.get() },
      'Relay deployed',
    );
  }

  get allowlist(): AllowlistView {
    return this.registry;
  }

  get variant(): ProtocolVariant {
    return this.state.variant;
  }

  get feeAsset(): AssetType {
    return this.state.feeAsset.get();
  }

  get transport(): Transport {
    return this.state.transport.get();
  }

  /**
   * Sends `request.amount` of `request.asset` to `request.recipient` on
   * the destination network. The caller must have approved the amount.
   * @returns the transport's message id
   */
  send(call: RelayCall, request: SendRequest): MessageId {
    return this.network.transact(
      { from: call.from, to: this.address, value: call.value },
      (ctx) => this.outbound.send(ctx, request),
    );
  }

  /** Fee a send would currently cost */
  quote(request: SendRequest): FeeQuote {
    const draft = this.outbound.buildDraft(request);
    return this.feeQuoter.quote(request.destinationNetwork, draft);
  }

  /**
   * Inbound entry point, invoked by the transport.
   * The invoker is trusted; only the source and sender are checked.
   */
  deliver(message: Message, from: Address): LastReceived {
    return this.network.transact({ from, to: this.address }, (ctx) =>
      this.inbound.deliver(ctx, message),
    );
  }

  handle(ctx: CallContext, message: Message): void {
    this.inbound.deliver(ctx, message);
  }

  hasProcessed(id: MessageId): boolean {
    return this.ledger.hasProcessed(id);
  }

  processedCount(): number {
    return this.ledger.size;
  }

  getLastReceived(): LastReceived | undefined {
    return this.state.lastReceived.get();
  }

  custodyBalance(asset: AssetType): bigint {
    return this.custody.balanceOf(asset);
  }
}
