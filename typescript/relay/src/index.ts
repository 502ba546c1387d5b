export {
  decodeTransferInstruction,
  encodeTransferInstruction,
} from './codec/payload.js';
export { encodeMessage, messageId, payloadSize } from './codec/message.js';
export { deployRelay } from './config/deploy.js';
export { ZAddress, ZAmount, ZNetworkId } from './config/customZodTypes.js';
export {
  AllowlistConfigSchema,
  FeeScheduleSchema,
  ProtocolVariantNameSchema,
  RelayConfigSchema,
  TransportConfigSchema,
} from './config/schema.js';
export type {
  AllowlistConfig,
  FeeScheduleConfig,
  RelayConfig,
  TransportConfig,
} from './config/schema.js';
export { AdminControl } from './core/AdminControl.js';
export type { AdminCapability } from './core/AdminControl.js';
export type { AllowlistView } from './core/AllowlistRegistry.js';
export { CrossNetworkRelay } from './core/CrossNetworkRelay.js';
export type {
  DeployedRelay,
  RelayCall,
  RelayOptions,
} from './core/CrossNetworkRelay.js';
export {
  ChainNotAllowed,
  InsufficientFeeBalance,
  InvalidAmount,
  InvalidPayload,
  InvalidReceiver,
  NothingToWithdraw,
  RelayError,
  RelayErrorCode,
  ReplayedMessage,
  SenderNotAllowed,
  TokenNotAllowed,
  TransferFailed,
  TransportError,
  Unauthorized,
  UnexpectedPayment,
  UnsupportedSettlement,
  isRelayError,
} from './errors.js';
export { isEventOfType } from './events.js';
export type {
  AssetEvent,
  LogEntry,
  NetworkEvent,
  NetworkEventOf,
  NetworkEventType,
  RelayEvent,
} from './events.js';
export { AssetLedger, NATIVE_ASSET } from './ledger/AssetLedger.js';
export type { ReceiveHook, ReceivedTransfer } from './ledger/AssetLedger.js';
export { Network } from './ledger/Network.js';
export type {
  CallContext,
  LogFilter,
  LogListener,
  TransactionRequest,
} from './ledger/Network.js';
export { StateJournal } from './ledger/StateJournal.js';
export {
  JournaledMap,
  JournaledSet,
  JournaledValue,
} from './ledger/journaled.js';
export { LocalTransport } from './transport/LocalTransport.js';
export type {
  FeeSchedule,
  LocalTransportOptions,
} from './transport/LocalTransport.js';
export type {
  DeliveryStatus,
  MessageRecipient,
  QueuedMessage,
  Transport,
  TransportEvent,
  TransportObserver,
} from './transport/types.js';
export {
  AllowlistKind,
  FeeSettlement,
  ProtocolVariants,
} from './types.js';
export type {
  AssetTransfer,
  AssetType,
  FeeQuote,
  LastReceived,
  Message,
  MessageDraft,
  MessageId,
  NetworkId,
  ProtocolVariant,
  ProtocolVariantName,
  SendRequest,
  TransferInstruction,
} from './types.js';
