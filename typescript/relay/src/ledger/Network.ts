import { Logger } from 'pino';

import { Address, normalizeAddressEvm, rootLogger } from '@ferryline/utils';

import { TransferFailed } from '../errors.js';
import {
  LogEntry,
  NetworkEvent,
  NetworkEventOf,
  NetworkEventType,
  isEventOfType,
} from '../events.js';
import type { NetworkId } from '../types.js';

import { AssetLedger, NATIVE_ASSET } from './AssetLedger.js';
import { StateJournal } from './StateJournal.js';

export interface TransactionRequest {
  from: Address;
  to: Address;
  /** Native asset moved from `from` to `to` before the call runs */
  value?: bigint;
}

export interface CallContext {
  network: Network;
  sender: Address;
  /** Address receiving the call */
  self: Address;
  value: bigint;
}

export type LogListener = (entry: LogEntry) => void;

export interface LogFilter<T extends NetworkEventType> {
  type: T;
  emitter?: Address;
}

/**
 * One ledger participating in cross-network transfers.
 * Each `transact` call is a single atomic operation.
 */
export class Network {
  readonly journal = new StateJournal();
  readonly assets: AssetLedger;
  private readonly committed: LogEntry[] = [];
  private readonly listeners = new Set<LogListener>();
  protected readonly logger: Logger;

  constructor(
    public readonly id: NetworkId,
    logger?: Logger,
  ) {
    const networkLogger = (logger || rootLogger).child({ network: id });
    this.logger = networkLogger.child({ module: 'Network' });
    this.assets = new AssetLedger(
      this.journal,
      (emitter, event) => this.emit(emitter, event),
      networkLogger,
    );
  }

  get logs(): readonly LogEntry[] {
    return this.committed;
  }

  transact<T>(request: TransactionRequest, fn: (ctx: CallContext) => T): T {
    const sender = normalizeAddressEvm(request.from);
    const self = normalizeAddressEvm(request.to);
    const value = request.value ?? 0n;
    if (value < 0n) throw new Error(`Negative value ${value}`);

    return this.journal.atomic(() => {
      if (
        value > 0n &&
        !this.assets.transfer(NATIVE_ASSET, sender, self, value)
      ) {
        throw new TransferFailed(NATIVE_ASSET, sender, self, value);
      }
      return fn({ network: this, sender, self, value });
    });
  }

  /**
   * Appends an event to the current operation's log.
   * Events of an operation that fails are discarded.
   */
  emit(emitter: Address, event: NetworkEvent): void {
    const source = normalizeAddressEvm(emitter);
    this.journal.afterCommit(() => this.publish(source, event));
  }

  getLogs<T extends NetworkEventType>(
    filter: LogFilter<T>,
  ): Array<LogEntry<NetworkEventOf<T>>> {
    const emitter = filter.emitter && normalizeAddressEvm(filter.emitter);
    const matches: Array<LogEntry<NetworkEventOf<T>>> = [];
    for (const entry of this.committed) {
      const { event } = entry;
      if (!isEventOfType(event, filter.type)) continue;
      if (emitter && entry.emitter !== emitter) continue;
      matches.push({ ...entry, event });
    }
    return matches;
  }

  /**
   * Subscribes to committed events
   * @returns a function removing the listener
   */
  on(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private publish(emitter: Address, event: NetworkEvent): void {
    const entry: LogEntry = {
      network: this.id,
      emitter,
      index: this.committed.length,
      event,
    };
    this.committed.push(entry);
    this.logger.trace({ emitter, type: event.type }, 'Event committed');
    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (error) {
        this.logger.error(
          { err: error, type: event.type },
          'Log listener failed',
        );
      }
    }
  }
}
