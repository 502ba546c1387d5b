import type { Address } from '@ferryline/utils';

import type {
  AllowlistKind,
  FeeSettlement,
  MessageId,
  NetworkId,
} from './types.js';

export enum RelayErrorCode {
  ChainNotAllowed = 'CHAIN_NOT_ALLOWED',
  TokenNotAllowed = 'TOKEN_NOT_ALLOWED',
  SenderNotAllowed = 'SENDER_NOT_ALLOWED',
  InvalidReceiver = 'INVALID_RECEIVER',
  InvalidAmount = 'INVALID_AMOUNT',
  InsufficientFeeBalance = 'INSUFFICIENT_FEE_BALANCE',
  ReplayedMessage = 'REPLAYED_MESSAGE',
  TransferFailed = 'TRANSFER_FAILED',
  NothingToWithdraw = 'NOTHING_TO_WITHDRAW',
  Unauthorized = 'UNAUTHORIZED',
  UnsupportedSettlement = 'UNSUPPORTED_SETTLEMENT',
  UnexpectedPayment = 'UNEXPECTED_PAYMENT',
  InvalidPayload = 'INVALID_PAYLOAD',
  TransportError = 'TRANSPORT_ERROR',
}

/**
 * Base class for every failure raised by the relay.
 * Each one aborts the operation that raised it; none is retried.
 */
export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ChainNotAllowed extends RelayError {
  readonly code = RelayErrorCode.ChainNotAllowed;

  constructor(
    public readonly network: NetworkId,
    public readonly list:
      | AllowlistKind.DestinationNetwork
      | AllowlistKind.SourceNetwork,
  ) {
    super(`Network ${network} is not allowed (${list})`);
  }
}

export class TokenNotAllowed extends RelayError {
  readonly code = RelayErrorCode.TokenNotAllowed;

  constructor(public readonly asset: Address) {
    super(`Asset ${asset} is not allowed`);
  }
}

export class SenderNotAllowed extends RelayError {
  readonly code = RelayErrorCode.SenderNotAllowed;

  constructor(public readonly sender: Address) {
    super(`Sender ${sender} is not allowed`);
  }
}

export class InvalidReceiver extends RelayError {
  readonly code = RelayErrorCode.InvalidReceiver;

  constructor(public readonly receiver: string) {
    super(`Invalid receiver '${receiver}'`);
  }
}

export class InvalidAmount extends RelayError {
  readonly code = RelayErrorCode.InvalidAmount;

  constructor(public readonly amount: bigint) {
    super(`Invalid amount ${amount}`);
  }
}

export class InsufficientFeeBalance extends RelayError {
  readonly code = RelayErrorCode.InsufficientFeeBalance;

  constructor(
    public readonly required: bigint,
    public readonly available: bigint,
    public readonly settlement: FeeSettlement,
  ) {
    super(
      `Fee of ${required} exceeds the ${available} available under ${settlement}`,
    );
  }
}

export class ReplayedMessage extends RelayError {
  readonly code = RelayErrorCode.ReplayedMessage;

  constructor(public readonly messageId: MessageId) {
    super(`Message ${messageId} was already processed`);
  }
}

export class TransferFailed extends RelayError {
  readonly code = RelayErrorCode.TransferFailed;

  constructor(
    public readonly asset: Address,
    public readonly from: Address,
    public readonly to: Address,
    public readonly amount: bigint,
  ) {
    super(`Transfer of ${amount} ${asset} from ${from} to ${to} failed`);
  }
}

export class NothingToWithdraw extends RelayError {
  readonly code = RelayErrorCode.NothingToWithdraw;

  constructor(public readonly asset: Address) {
    super(`No balance of ${asset} to withdraw`);
  }
}

export class Unauthorized extends RelayError {
  readonly code = RelayErrorCode.Unauthorized;
}

export class UnsupportedSettlement extends RelayError {
  readonly code = RelayErrorCode.UnsupportedSettlement;

  constructor(public readonly settlement: FeeSettlement) {
    super(`Fee settlement ${settlement} is not supported by this relay`);
  }
}

export class UnexpectedPayment extends RelayError {
  readonly code = RelayErrorCode.UnexpectedPayment;

  constructor(public readonly value: bigint) {
    super(`Unexpected payment of ${value} attached to a prefunded send`);
  }
}

export class InvalidPayload extends RelayError {
  readonly code = RelayErrorCode.InvalidPayload;
}

export class TransportError extends RelayError {
  readonly code = RelayErrorCode.TransportError;
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}
