import { Logger } from 'pino';

import {
  AllowlistKind,
  DeployedRelay,
  LocalTransport,
  MessageId,
  NATIVE_ASSET,
  Network,
  NetworkId,
  RelayConfigSchema,
  TransportConfigSchema,
  TransportEvent,
  deployRelay,
  isRelayError,
} from '@ferryline/relay';
import {
  Address,
  addressFromLabel,
  fromWei,
  isValidAddressEvm,
  normalizeAddressEvm,
  rootLogger,
  toWei,
} from '@ferryline/utils';

import {
  NATIVE_DECIMALS,
  NATIVE_SYMBOL,
  Scenario,
  ScenarioRelay,
  ScenarioStep,
} from '../config/scenario.js';

export interface StepOutcome {
  index: number;
  action: ScenarioStep['action'];
  /** Name of the error the step failed with, when it was expected to */
  failedWith?: string;
  messageId?: MessageId;
  /** Messages handled by a flush, or the amount withdrawn */
  result?: string;
}

export interface MessageSummary {
  id: MessageId;
  origin: NetworkId;
  destination: NetworkId;
  status: string;
  error?: string;
}

export interface SimulationReport {
  name?: string;
  steps: StepOutcome[];
  messages: MessageSummary[];
  /** Display balances by network, account label and asset symbol */
  balances: Record<NetworkId, Record<string, Record<string, string>>>;
  /** Relay event counts by network and event type */
  events: Record<NetworkId, Record<string, number>>;
}

interface ResolvedAsset {
  symbol: string;
  address: Address;
  decimals: number;
}

export class ScenarioStepError extends Error {
  constructor(
    public readonly index: number,
    public readonly action: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Step ${index} (${action}) ${message}`, options);
    this.name = 'ScenarioStepError';
  }
}

/**
 * Builds the networks, transport and relays a scenario describes and
 * runs its steps against them, one atomic operation per step.
 */
export class ScenarioRunner {
  readonly networks = new Map<NetworkId, Network>();
  readonly relays = new Map<NetworkId, DeployedRelay>();
  readonly transport: LocalTransport;
  readonly transportEvents: TransportEvent[] = [];
  private readonly assets = new Map<string, ResolvedAsset>();
  private readonly labels = new Map<Address, string>();
  private readonly messageIds: MessageId[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly scenario: Scenario,
    logger?: Logger,
  ) {
    const baseLogger = logger || rootLogger;
    this.logger = baseLogger.child({ module: 'ScenarioRunner' });

    this.assets.set(NATIVE_SYMBOL, {
      symbol: NATIVE_SYMBOL,
      address: NATIVE_ASSET,
      decimals: NATIVE_DECIMALS,
    });
    for (const [symbol, { decimals }] of Object.entries(scenario.assets)) {
      this.assets.set(symbol, {
        symbol,
        address: addressFromLabel(`asset:${symbol}`),
        decimals,
      });
    }

    for (const id of scenario.networks) {
      this.networks.set(id, new Network(id, baseLogger));
    }

    const { transport } = scenario;
    const transportConfig = TransportConfigSchema.parse({
      address: this.resolveAccount(transport.address),
      carryAssets: transport.carryAssets,
      routes: transport.routes,
      feeAssets: Object.fromEntries(
        Object.entries(transport.feeAssets).map(([network, multipliers]) => [
          network,
          Object.fromEntries(
            Object.entries(multipliers).map(([symbol, multiplier]) => [
              this.resolveAsset(symbol).address,
              multiplier,
            ]),
          ),
        ]),
      ),
    });
    this.transport = new LocalTransport(
      transportConfig,
      { onEvent: (event) => this.transportEvents.push(event) },
      baseLogger,
    );

    for (const [networkId, relay] of Object.entries(scenario.relays)) {
      const deployed = this.deploy(this.network(networkId), relay, baseLogger);
      this.relays.set(networkId, deployed);
      this.transport.registerEndpoint(deployed.relay);
    }
  }

  run(): SimulationReport {
    const steps = this.scenario.steps.map((step, index) =>
      this.runStep(step, index),
    );
    // Deliver whatever the last steps left queued
    this.transport.flush();
    this.logger.info(
      { steps: steps.length, messages: this.messageIds.length },
      'Scenario complete',
    );
    return {
      name: this.scenario.name,
      steps,
      messages: this.messageSummaries(),
      balances: this.balances(),
      events: this.eventCounts(),
    };
  }

  resolveAccount(ref: string): Address {
    if (isValidAddressEvm(ref)) return normalizeAddressEvm(ref);
    const address = addressFromLabel(ref);
    this.labels.set(address, ref);
    return address;
  }

  resolveAsset(symbol: string): ResolvedAsset {
    const asset = this.assets.get(symbol);
    if (!asset) throw new Error(`Unknown asset ${symbol}`);
    return asset;
  }

  private deploy(
    network: Network,
    relay: ScenarioRelay,
    logger: Logger,
  ): DeployedRelay {
    const { allowlists } = relay;
    const config = RelayConfigSchema.parse({
      address: this.resolveAccount(relay.address),
      owner: this.resolveAccount(relay.owner),
      feeAsset: this.resolveAsset(relay.feeAsset).address,
      variant: relay.variant,
      allowlists: {
        destinationNetworks: allowlists.destinationNetworks,
        sourceNetworks: allowlists.sourceNetworks,
        assets: allowlists.assets.map(
          (symbol) => this.resolveAsset(symbol).address,
        ),
        senders: allowlists.senders.map((sender) =>
          this.resolveAccount(sender),
        ),
      },
    });
    return deployRelay(network, this.transport, config, logger);
  }

  private runStep(step: ScenarioStep, index: number): StepOutcome {
    const outcome: StepOutcome = { index, action: step.action };
    try {
      Object.assign(outcome, this.execute(step));
    } catch (error) {
      const name = error instanceof Error ? error.name : String(error);
      const message = error instanceof Error ? error.message : String(error);
      if (step.expectError !== name) {
        throw new ScenarioStepError(index, step.action, `failed: ${message}`, {
          cause: error,
        });
      }
      this.logger.debug({ index, error: name }, 'Step failed as expected');
      return { ...outcome, failedWith: name };
    }
    if (step.expectError) {
      throw new ScenarioStepError(
        index,
        step.action,
        `succeeded but was expected to fail with ${step.expectError}`,
      );
    }
    return outcome;
  }

  private execute(step: ScenarioStep): Partial<StepOutcome> {
    switch (step.action) {
      case 'mint': {
        const asset = this.resolveAsset(step.asset);
        this.network(step.network).assets.mint(
          asset.address,
          this.resolveAccount(step.to),
          toWei(step.amount, asset.decimals),
        );
        return {};
      }
      case 'approve': {
        const asset = this.resolveAsset(step.asset);
        const spender = step.spender
          ? this.resolveAccount(step.spender)
          : this.relay(step.network).relay.address;
        this.network(step.network).assets.approve(
          asset.address,
          this.resolveAccount(step.owner),
          spender,
          toWei(step.amount, asset.decimals),
        );
        return {};
      }
      case 'allow': {
        const { relay, capability } = this.relay(step.network);
        relay.admin.setAllowed(
          capability,
          step.list,
          this.resolveListEntry(step.list, step.id),
          step.allowed,
        );
        return {};
      }
      case 'send': {
        const asset = this.resolveAsset(step.asset);
        const messageId = this.relay(step.network).relay.send(
          {
            from: this.resolveAccount(step.from),
            value: step.value ? toWei(step.value, NATIVE_DECIMALS) : 0n,
          },
          {
            destinationNetwork: step.destination,
            receiver: this.relay(step.destination).relay.address,
            recipient: this.resolveAccount(step.recipient),
            asset: asset.address,
            amount: toWei(step.amount, asset.decimals),
            settlement: step.settlement,
            data: step.data,
          },
        );
        this.messageIds.push(messageId);
        return { messageId };
      }
      case 'flush':
        return { result: this.transport.flush().toString() };
      case 'withdraw': {
        const { relay, capability } = this.relay(step.network);
        const to = this.resolveAccount(step.to);
        const amount = step.asset
          ? relay.admin.withdrawAsset(
              capability,
              this.resolveAsset(step.asset).address,
              to,
            )
          : relay.admin.withdrawFeeAsset(capability, to);
        return { result: amount.toString() };
      }
    }
  }

  private resolveListEntry(list: AllowlistKind, id: string): string {
    switch (list) {
      case AllowlistKind.Asset:
        return this.resolveAsset(id).address;
      case AllowlistKind.Sender:
        return this.resolveAccount(id);
      default:
        return id;
    }
  }

  private network(id: NetworkId): Network {
    const network = this.networks.get(id);
    if (!network) throw new Error(`Unknown network ${id}`);
    return network;
  }

  private relay(network: NetworkId): DeployedRelay {
    const deployed = this.relays.get(network);
    if (!deployed) throw new Error(`No relay on network ${network}`);
    return deployed;
  }

  private label(address: Address): string {
    return this.labels.get(address) ?? address;
  }

  private messageSummaries(): MessageSummary[] {
    const summaries: MessageSummary[] = [];
    for (const id of this.messageIds) {
      const queued = this.transport.getMessage(id);
      if (!queued) continue;
      const summary: MessageSummary = {
        id,
        origin: queued.message.sourceNetwork,
        destination: queued.message.destinationNetwork,
        status: queued.status,
      };
      if (queued.error) {
        summary.error = isRelayError(queued.error)
          ? `${queued.error.name}: ${queued.error.message}`
          : queued.error.message;
      }
      summaries.push(summary);
    }
    return summaries;
  }

  private balances(): SimulationReport['balances'] {
    const accounts = new Set<Address>(
      this.scenario.report.map((ref) => this.resolveAccount(ref)),
    );
    for (const { relay } of this.relays.values()) accounts.add(relay.address);

    const balances: SimulationReport['balances'] = {};
    for (const [id, network] of this.networks) {
      const byAccount: Record<string, Record<string, string>> = {};
      for (const account of accounts) {
        const holdings: Record<string, string> = {};
        for (const asset of this.assets.values()) {
          const balance = network.assets.balanceOf(asset.address, account);
          if (balance > 0n) {
            holdings[asset.symbol] = fromWei(balance, asset.decimals);
          }
        }
        byAccount[this.label(account)] = holdings;
      }
      balances[id] = byAccount;
    }
    return balances;
  }

  private eventCounts(): SimulationReport['events'] {
    const counts: SimulationReport['events'] = {};
    for (const [id, { relay }] of this.relays) {
      const byType: Record<string, number> = {};
      for (const entry of this.network(id).logs) {
        if (entry.emitter !== relay.address) continue;
        byType[entry.event.type] = (byType[entry.event.type] ?? 0) + 1;
      }
      counts[id] = byType;
    }
    return counts;
  }
}

export function runScenario(
  scenario: Scenario,
  logger?: Logger,
): SimulationReport {
  return new ScenarioRunner(scenario, logger).run();
}
