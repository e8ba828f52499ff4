/**
 * @sotto/engine: client engine for the end-to-end encrypted messaging and
 * calling service.
 */

export { MessagingEngine } from "./engine.js";
export type { MessagingEngineOptions, EngineEvents } from "./engine.js";

export { loadConfig } from "./config.js";
export type { EngineConfig, LogLevel, Platform } from "./config.js";
export { createLogger, silentLogger, REDACT_PATHS } from "./logger.js";
export type { Logger } from "./logger.js";
export { TypedEmitter } from "./events.js";
export type { Unsubscribe } from "./events.js";

export {
  EngineError,
  ProtocolError,
  InvalidTimestampError,
  CryptoError,
  KeyChangedError,
  ConnectionLostError,
  NotConnectedError,
  RequestTimeoutError,
  SessionError,
  StorageError,
  UnresolvedContactError,
  isAuthFailureCode,
  isPermanentServerCode,
} from "./errors.js";
export type { ErrorKind, CryptoErrorCode, SessionErrorCode } from "./errors.js";

export * from "./protocol/constants.js";
export { decodeFrame, encodeFrame, versionFields } from "./protocol/frames.js";
export type { OutboundFrame, OutboundFrameType, DecodeResult, VersionFields } from "./protocol/frames.js";
export type {
  MessageType,
  AttachmentPointer,
  DirectMessage,
  GroupMessage,
  GroupRecipient,
  ReceivedMessage,
  CallSignalPayload,
  CallEndReason,
  InboundFrame,
  InboundFrameType,
  InboundFrameOf,
} from "./protocol/schema.js";

export { WebSocketTransport, webSocketTransportFactory } from "./transport/transport.js";
export type { Transport, TransportFactory, TransportHandlers } from "./transport/transport.js";
export { ConnectionManager } from "./connection/connection-manager.js";
export type { ConnectionState, ConnectionManagerOptions } from "./connection/connection-manager.js";
export { computeBackoff } from "./connection/backoff.js";

export { SessionManager } from "./session/session-manager.js";
export type { Session } from "./session/session-manager.js";
export type { AuthPhase } from "./session/session-state.js";

export { openDatabase, databasePath } from "./storage/database.js";
export type { Db } from "./storage/database.js";
export { SecureKeyValueStore, STORE_KEY_BYTES } from "./identity/key-store.js";
export { IdentityManager } from "./identity/identity-manager.js";
export type { LocalIdentity } from "./identity/identity-manager.js";

export { ContactStore, isResolved } from "./contacts/contact-store.js";
export type { Contact } from "./contacts/contact-store.js";
export { KeyDirectory } from "./contacts/key-directory.js";
export { ContactsBackupService } from "./contacts/contacts-backup.js";
export { ApiClient } from "./http/api-client.js";

export { Outbox } from "./messaging/outbox.js";
export type { OutboxEntry, OutboxStatus, DeliveryState } from "./messaging/outbox-store.js";
export { MessagePipeline } from "./messaging/message-pipeline.js";
export type { InboundMessage, InboundResult, SendOptions } from "./messaging/message-pipeline.js";
export { AttachmentService } from "./attachments/attachment-service.js";
export { GroupFanout } from "./groups/group-fanout.js";
export type { GroupSendResult } from "./groups/group-fanout.js";

export { TurnCredentialCache } from "./calls/turn-credentials.js";
export type { TurnCredentials } from "./calls/turn-credentials.js";
export { sealCallSignal, openCallSignal } from "./calls/call-signaling.js";
export { CallCoordinator } from "./calls/call-coordinator.js";
export type {
  PlatformCallBridge,
  MediaNegotiator,
  ActiveCall,
  IncomingCallInfo,
} from "./calls/call-coordinator.js";
