/**
 * MessagingEngine: wires the engine modules together and exposes the
 * public client API.
 *
 * After every successful authentication the outbox resumes and the
 * offline queue is drained. Frames the connection does not hand to a
 * request waiter are routed here.
 *
 * @module engine
 */
import type { AxiosAdapter } from "axios";
import type { Logger } from "pino";
import type { EngineConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { TypedEmitter } from "./events.js";
import type { Unsubscribe } from "./events.js";
import { SessionError, isAuthFailureCode } from "./errors.js";
import { openDatabase, databasePath } from "./storage/database.js";
import type { Db } from "./storage/database.js";
import { webSocketTransportFactory } from "./transport/transport.js";
import type { TransportFactory } from "./transport/transport.js";
import { ConnectionManager } from "./connection/connection-manager.js";
import type { ConnectionState } from "./connection/connection-manager.js";
import { SessionManager } from "./session/session-manager.js";
import { SecureKeyValueStore } from "./identity/key-store.js";
import { IdentityManager } from "./identity/identity-manager.js";
import type { LocalIdentity } from "./identity/identity-manager.js";
import { ContactStore } from "./contacts/contact-store.js";
import type { Contact } from "./contacts/contact-store.js";
import { KeyDirectory } from "./contacts/key-directory.js";
import { ContactsBackupService } from "./contacts/contacts-backup.js";
import { ApiClient } from "./http/api-client.js";
import type { BackupPutResponse } from "./http/api-client.js";
import { OutboxStore } from "./messaging/outbox-store.js";
import type { OutboxEntry } from "./messaging/outbox-store.js";
import { Outbox } from "./messaging/outbox.js";
import type { OutboxEvents } from "./messaging/outbox.js";
import { PendingRequestStore } from "./messaging/pending-request-store.js";
import { MessagePipeline } from "./messaging/message-pipeline.js";
import type {
  InboundMessage,
  InboundResult,
  SendOptions,
} from "./messaging/message-pipeline.js";
import { AttachmentService } from "./attachments/attachment-service.js";
import type { SendAttachmentOptions } from "./attachments/attachment-service.js";
import { GroupFanout } from "./groups/group-fanout.js";
import type { GroupSendOptions, GroupSendResult } from "./groups/group-fanout.js";
import { TurnCredentialCache } from "./calls/turn-credentials.js";
import { CallCoordinator, isCallFrame } from "./calls/call-coordinator.js";
import type { MediaNegotiator, PlatformCallBridge } from "./calls/call-coordinator.js";
import { PENDING_TTL_MS } from "./protocol/constants.js";
import type { AttachmentPointer, InboundFrame } from "./protocol/schema.js";

export interface MessagingEngineOptions {
  config: EngineConfig;
  /** 32-byte key from the platform keystore; seals identity material at rest. */
  storeKey: Uint8Array;
  logger?: Logger;
  /** Defaults to the database file under `config.dataDir`. */
  db?: Db;
  transportFactory?: TransportFactory;
  httpAdapter?: AxiosAdapter;
  /** Both are needed for calls; without them call frames are ignored. */
  callBridge?: PlatformCallBridge;
  media?: MediaNegotiator;
  now?: () => number;
  random?: () => number;
}

export interface EngineEvents {
  message: InboundMessage;
  pendingRequest: { sender: string; messageId: string };
  sent: OutboxEvents["sent"];
  failed: OutboxEvents["failed"];
  delivery: OutboxEvents["delivery"];
  connection: ConnectionState;
  authenticated: { accountId: string };
  error: { context: string; error: unknown };
}

export class MessagingEngine {
  readonly connection: ConnectionManager;
  readonly session: SessionManager;
  readonly identity: IdentityManager;
  readonly contacts: ContactStore;
  readonly keyDirectory: KeyDirectory;
  readonly contactsBackup: ContactsBackupService;
  readonly api: ApiClient;
  readonly outbox: Outbox;
  readonly pipeline: MessagePipeline;
  readonly attachments: AttachmentService;
  readonly groups: GroupFanout;
  readonly turn: TurnCredentialCache;
  readonly calls: CallCoordinator | null;

  private readonly db: Db;
  private readonly ownsDb: boolean;
  private readonly log: Logger;
  private readonly events: TypedEmitter<EngineEvents>;
  /** Inbound messages are handled one at a time, in arrival order. */
  private inbound: Promise<void> = Promise.resolve();

  constructor(options: MessagingEngineOptions) {
    const { config } = options;
    const now = options.now ?? Date.now;
    const logger = options.logger ?? createLogger(config);
    this.log = logger.child({ module: "engine" });
    this.events = new TypedEmitter<EngineEvents>((err, event) => {
      this.log.error({ err, event }, "Engine listener failed");
    });

    this.ownsDb = options.db === undefined;
    this.db = options.db ?? openDatabase(databasePath(config.dataDir));

    const secure = new SecureKeyValueStore(this.db, options.storeKey);
    this.identity = new IdentityManager(secure, logger);
    this.contacts = new ContactStore(this.db, now);

    this.connection = new ConnectionManager({
      url: config.serverUrl,
      transportFactory: options.transportFactory ?? webSocketTransportFactory,
      logger,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      pongTimeoutMs: config.pongTimeoutMs,
      reconnectBaseMs: config.reconnectBaseMs,
      reconnectMaxMs: config.reconnectMaxMs,
      reconnectMaxAttempts: config.reconnectMaxAttempts,
      requestTimeoutMs: config.requestTimeoutMs,
      random: options.random,
      now,
    });
    this.session = new SessionManager({
      connection: this.connection,
      identity: this.identity,
      platform: config.platform,
      authTimeoutMs: config.authTimeoutMs,
      logger,
      now,
    });

    this.api = new ApiClient({
      baseUrl: config.apiBaseUrl,
      logger,
      timeoutMs: config.requestTimeoutMs,
      getToken: () => this.session.session?.sessionToken ?? null,
      onUnauthorized: () => {
        this.recoverSession("http 401");
      },
      adapter: options.httpAdapter,
    });
    this.keyDirectory = new KeyDirectory(this.api, this.contacts, logger);
    this.contactsBackup = new ContactsBackupService(this.api, this.contacts, this.identity, logger);

    this.outbox = new Outbox({
      store: new OutboxStore(this.db, now),
      connection: this.connection,
      session: this.session,
      logger,
      ackTimeoutMs: config.ackTimeoutMs,
      maxAttempts: config.outboxMaxAttempts,
      baseDelayMs: config.outboxBaseDelayMs,
      maxDelayMs: config.outboxMaxDelayMs,
      random: options.random,
      now,
    });
    this.pipeline = new MessagePipeline({
      connection: this.connection,
      session: this.session,
      identity: this.identity,
      contacts: this.contacts,
      pending: new PendingRequestStore(this.db, now),
      outbox: this.outbox,
      logger,
      dedupeWindow: config.dedupeWindow,
      seenStore: secure,
      now,
    });
    this.attachments = new AttachmentService(
      this.api,
      this.contacts,
      this.identity,
      this.pipeline,
      logger,
    );
    this.groups = new GroupFanout({
      identity: this.identity,
      contacts: this.contacts,
      session: this.session,
      outbox: this.outbox,
      logger,
    });
    this.turn = new TurnCredentialCache({
      connection: this.connection,
      session: this.session,
      logger,
      now,
    });
    this.calls =
      options.callBridge && options.media
        ? new CallCoordinator({
            connection: this.connection,
            session: this.session,
            identity: this.identity,
            contacts: this.contacts,
            turn: this.turn,
            bridge: options.callBridge,
            media: options.media,
            logger,
          })
        : null;

    this.wire();
  }

  /** Create an engine and load any persisted identity. */
  static async open(options: MessagingEngineOptions): Promise<MessagingEngine> {
    const engine = new MessagingEngine(options);
    await engine.identity.load();
    await engine.pipeline.restoreSeen();
    return engine;
  }

  on<K extends keyof EngineEvents>(
    event: K,
    handler: (payload: EngineEvents[K]) => void,
  ): Unsubscribe {
    return this.events.on(event, handler);
  }

  // ========== Lifecycle ==========

  /** Connect to the relay. Requires an installed identity. */
  start(): void {
    this.identity.current();
    this.connection.connect();
  }

  /** Disconnect and cancel every timer. Persisted state is kept. */
  stop(): void {
    this.connection.disconnect("engine stopped");
    this.outbox.stop();
    if (this.ownsDb) this.db.close();
  }

  notifyForeground(): void {
    this.connection.notifyForeground();
  }

  setNetworkAvailable(available: boolean): void {
    this.connection.setNetworkAvailable(available);
  }

  /** Invalidate the session server-side, then disconnect. */
  async logout(): Promise<void> {
    try {
      await this.session.logout();
    } finally {
      this.connection.disconnect("logout");
      this.outbox.stop();
    }
  }

  // ========== Identity ==========

  createIdentity(): Promise<string> {
    return this.identity.createIdentity();
  }

  restoreIdentity(mnemonic: string, accountId?: string): Promise<LocalIdentity> {
    return this.identity.restoreIdentity(mnemonic, accountId);
  }

  // ========== Contacts ==========

  /** Add a contact and resolve its keys from the directory. */
  async addContact(accountId: string, displayName: string | null = null): Promise<Contact> {
    this.contacts.addUnresolved(accountId, displayName);
    return this.keyDirectory.ensureResolved(accountId);
  }

  /** Resolve the sender's keys, then replay what they sent while unknown. */
  async acceptPendingRequest(sender: string): Promise<InboundResult[]> {
    await this.keyDirectory.ensureResolved(sender);
    return this.pipeline.acceptPendingRequest(sender);
  }

  blockSender(sender: string): number {
    return this.pipeline.blockSender(sender);
  }

  backupContacts(): Promise<BackupPutResponse> {
    return this.contactsBackup.upload();
  }

  restoreContacts(): Promise<number | null> {
    return this.contactsBackup.restore();
  }

  // ========== Messaging ==========

  sendText(to: string, text: string, options?: SendOptions): Promise<OutboxEntry> {
    return this.pipeline.sendText(to, text, options);
  }

  sendAttachment(
    to: string,
    data: Uint8Array,
    contentType: string,
    options?: SendAttachmentOptions,
  ): Promise<OutboxEntry> {
    return this.attachments.send(to, data, contentType, options);
  }

  downloadAttachment(pointer: AttachmentPointer, from: string): Promise<Uint8Array> {
    return this.attachments.download(pointer, from);
  }

  sendGroupText(
    groupId: string,
    members: readonly string[],
    text: string,
    options?: GroupSendOptions,
  ): Promise<GroupSendResult> {
    return this.groups.send(groupId, members, text, options);
  }

  markRead(messageId: string, sender: string): boolean {
    return this.pipeline.markRead(messageId, sender);
  }

  retryFailed(messageId: string): boolean {
    return this.outbox.retryFailed(messageId);
  }

  // --- Wiring ---

  private wire(): void {
    this.connection.on("state", (state) => {
      this.events.emit("connection", state);
    });
    this.connection.on("open", () => {
      this.session.authenticate().catch((err: unknown) => {
        this.onAuthenticationError(err);
      });
    });
    this.connection.on("close", () => {
      this.inbound = Promise.resolve();
      this.outbox.handleConnectionLost();
    });
    this.connection.on("frame", ({ frame }) => {
      this.route(frame);
    });

    this.session.on("authenticated", (session) => {
      this.outbox.resume();
      this.events.emit("authenticated", { accountId: session.accountId });
      this.afterAuthentication().catch((err: unknown) => {
        this.log.warn({ err }, "Post-authentication sync failed");
        this.events.emit("error", { context: "sync", error: err });
      });
    });

    this.outbox.on("authFailed", () => {
      this.recoverSession("session rejected on send");
    });
    this.outbox.on("sent", (e) => {
      this.events.emit("sent", e);
    });
    this.outbox.on("failed", (e) => {
      this.events.emit("failed", e);
    });
    this.outbox.on("delivery", (e) => {
      this.events.emit("delivery", e);
    });

    this.pipeline.on("message", (message) => {
      this.events.emit("message", message);
    });
    this.pipeline.on("pendingRequest", (request) => {
      this.events.emit("pendingRequest", request);
    });
  }

  private route(frame: InboundFrame): void {
    switch (frame.type) {
      case "message_accepted":
        this.outbox.handleAccepted(frame.payload.messageId);
        return;
      case "message_delivered":
        this.outbox.handleDeliveryUpdate(frame.payload.messageId, frame.payload.status);
        return;
      case "message_received": {
        const payload = frame.payload;
        this.inbound = this.inbound
          .then(() => this.pipeline.handleIncoming(payload, "live"))
          .then(
            () => undefined,
            (err: unknown) => {
              this.log.error({ err, messageId: payload.messageId }, "Inbound message failed");
            },
          );
        return;
      }
      case "error": {
        const requestId = frame.requestId ?? frame.payload.requestId;
        const { code, message } = frame.payload;
        if (requestId && this.outbox.handleError(requestId, code, message)) return;
        if (isAuthFailureCode(code)) {
          this.recoverSession(`server error ${code}`);
          return;
        }
        this.log.warn({ code, requestId }, "Unhandled server error");
        return;
      }
      default:
        if (isCallFrame(frame)) {
          if (!this.calls) {
            this.log.debug({ type: frame.type }, "Call frame ignored; calls not configured");
            return;
          }
          this.calls.handleSignal(frame).catch((err: unknown) => {
            this.log.error({ err, type: frame.type }, "Call signal failed");
          });
          return;
        }
        this.log.debug({ type: frame.type }, "Unsolicited frame ignored");
    }
  }

  private async afterAuthentication(): Promise<void> {
    this.outbox.purgeSent(PENDING_TTL_MS);
    this.pipeline.purgeExpiredRequests(PENDING_TTL_MS);
    await this.pipeline.fetchPending();
  }

  private recoverSession(reason: string): void {
    this.outbox.pause();
    this.log.warn({ reason }, "Re-authenticating");
    this.session.handleAuthFailure().catch((err: unknown) => {
      this.onAuthenticationError(err);
    });
  }

  private onAuthenticationError(err: unknown): void {
    this.events.emit("error", { context: "authentication", error: err });
    if (err instanceof SessionError && err.code === "AUTH_FAILED") {
      this.log.error({ code: err.code }, "Authentication refused; staying disconnected");
      this.connection.disconnect("authentication refused");
      return;
    }
    if (err instanceof SessionError && err.code === "AUTH_TIMEOUT") {
      this.connection.forceReconnect("authentication timeout");
      return;
    }
    this.log.warn({ err }, "Authentication did not complete");
  }
}
