/**
 * Message pipeline: outbound envelope construction and inbound
 * verification.
 *
 * Outbound: encrypt with crypto_box for the recipient, sign the canonical
 * form, hand the envelope to the outbox.
 *
 * Inbound, in this order:
 *   1. drop if the sender is blocked
 *   2. timestamp within ±10 minutes of server time (live frames only)
 *   3. unknown sender → buffer as a pending request
 *   4. verify the canonical signature
 *   5. decrypt
 *   6. dedupe by messageId (the window survives restarts)
 *   7. deliver and send a `delivered` receipt
 *
 * Messages fetched from the server's offline queue, and buffered requests
 * replayed after the user accepts a sender, skip step 2: the server
 * checked their timestamps when they were sent.
 *
 * @module messaging/message-pipeline
 */
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { Logger } from "pino";
import {
  boxOpen,
  boxSeal,
  DecryptionError,
  fromBase64Strict,
  NONCE_BYTES,
  ReplayGuard,
  signCanonical,
  toBase64,
  verifyCanonical,
} from "@sotto/crypto";
import type { ConnectionManager } from "../connection/connection-manager.js";
import type { SessionManager } from "../session/session-manager.js";
import type { IdentityManager } from "../identity/identity-manager.js";
import type { ContactStore } from "../contacts/contact-store.js";
import type { SecureKeyValueStore } from "../identity/key-store.js";
import { isResolved } from "../contacts/contact-store.js";
import { TypedEmitter } from "../events.js";
import type { Unsubscribe } from "../events.js";
import { EngineError, ProtocolError } from "../errors.js";
import {
  FETCH_PENDING_LIMIT,
  MAX_TEXT_BYTES,
  isTimestampFresh,
  isValidAccountId,
} from "../protocol/constants.js";
import type {
  AttachmentPointer,
  DirectMessage,
  MessageType,
  ReceivedMessage,
} from "../protocol/schema.js";
import type { Outbox } from "./outbox.js";
import type { OutboxEntry } from "./outbox-store.js";
import type { PendingRequestStore, PendingSender } from "./pending-request-store.js";

export type InboundResult =
  | "delivered"
  | "duplicate"
  | "pending"
  | "dropped_blocked"
  | "rejected_timestamp"
  | "rejected_signature"
  | "rejected_decrypt";

/** Where an inbound message came from. */
export type InboundSource = "live" | "stored";

export interface InboundMessage {
  messageId: string;
  from: string;
  to: string;
  groupId: string | null;
  msgType: MessageType;
  timestamp: number;
  text: string;
  replyTo: string | null;
  attachment: AttachmentPointer | null;
}

export interface SendOptions {
  messageId?: string;
  msgType?: MessageType;
  replyTo?: string;
  attachment?: AttachmentPointer;
}

export interface FetchPendingSummary {
  fetched: number;
  delivered: number;
  pages: number;
}

export interface PipelineEvents {
  message: InboundMessage;
  pendingRequest: { sender: string; messageId: string };
  rejected: { messageId: string; from: string; result: InboundResult };
}

export interface MessagePipelineOptions {
  connection: ConnectionManager;
  session: SessionManager;
  identity: IdentityManager;
  contacts: ContactStore;
  pending: PendingRequestStore;
  outbox: Outbox;
  logger: Logger;
  dedupeWindow: number;
  /** Where the dedupe window is kept between runs. */
  seenStore?: SecureKeyValueStore;
  now?: () => number;
}

export const SEEN_MESSAGES_SLOT = "pipeline.seenMessageIds";

const seenIdsSchema = z.array(z.string());

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export class MessagePipeline {
  private readonly log: Logger;
  private seen: ReplayGuard;
  private readonly now: () => number;
  private readonly events: TypedEmitter<PipelineEvents>;

  constructor(private readonly options: MessagePipelineOptions) {
    this.log = options.logger.child({ module: "pipeline" });
    this.seen = new ReplayGuard(options.dedupeWindow);
    this.now = options.now ?? Date.now;
    this.events = new TypedEmitter<PipelineEvents>((err, event) => {
      this.log.error({ err, event }, "Pipeline listener failed");
    });
  }

  on<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void,
  ): Unsubscribe {
    return this.events.on(event, handler);
  }

  /** Reload the dedupe window saved by an earlier run. */
  async restoreSeen(): Promise<void> {
    const store = this.options.seenStore;
    if (!store) return;
    const saved = await store.getString(SEEN_MESSAGES_SLOT);
    if (saved === null) return;
    let seen: string[];
    try {
      seen = seenIdsSchema.parse(JSON.parse(saved));
    } catch (err) {
      this.log.warn({ err }, "Discarding unreadable dedupe window");
      store.delete(SEEN_MESSAGES_SLOT);
      return;
    }
    this.seen = ReplayGuard.import({ seen, maxSize: this.options.dedupeWindow });
    this.log.debug({ count: this.seen.size }, "Dedupe window restored");
  }

  // ========== Outbound ==========

  /**
   * Encrypt, sign and enqueue a direct message.
   *
   * @throws UnresolvedContactError when the recipient's keys are unknown.
   * @throws ProtocolError INVALID_PAYLOAD when the text exceeds 8000 bytes.
   */
  async sendText(to: string, text: string, options: SendOptions = {}): Promise<OutboxEntry> {
    if (!isValidAccountId(to)) {
      throw new ProtocolError("INVALID_PAYLOAD", `Invalid recipient ${to}`);
    }
    const plaintext = textEncoder.encode(text);
    if (plaintext.length > MAX_TEXT_BYTES) {
      throw new ProtocolError(
        "INVALID_PAYLOAD",
        `Message text is ${plaintext.length} bytes; the limit is ${MAX_TEXT_BYTES}`,
      );
    }
    const contact = this.options.contacts.requireResolved(to);
    const identity = this.options.identity.current();
    const from = this.options.identity.requireAccountId();
    const messageId = options.messageId ?? uuidv4();

    const sealed = await boxSeal(
      plaintext,
      contact.encPublicKey,
      identity.keys.encryption.privateKey,
    );
    const nonce = toBase64(sealed.nonce);
    const ciphertext = toBase64(sealed.ciphertext);
    const timestamp = this.options.session.serverNow();
    const sig = await signCanonical(
      { messageType: "send_message", messageId, from, toOrGroupId: to, timestamp, nonce, ciphertext },
      identity.keys.signing.privateKey,
    );

    const envelope: DirectMessage = {
      messageId,
      from,
      to,
      msgType: options.msgType ?? (options.attachment ? "file" : "text"),
      timestamp,
      nonce,
      ciphertext,
      sig,
      ...(options.replyTo ? { replyTo: options.replyTo } : {}),
      ...(options.attachment ? { attachment: options.attachment } : {}),
    };
    return this.options.outbox.enqueue({
      frameType: "send_message",
      messageId,
      peer: to,
      payload: envelope,
    });
  }

  // ========== Inbound ==========

  async handleIncoming(message: ReceivedMessage, source: InboundSource = "live"): Promise<InboundResult> {
    const { contacts, pending, session, identity } = this.options;
    const meta = { messageId: message.messageId, from: message.from };

    const contact = contacts.get(message.from);
    if (contact?.blocked) {
      this.log.debug(meta, "Dropped message from blocked sender");
      return "dropped_blocked";
    }

    if (source === "live" && !isTimestampFresh(message.timestamp, session.serverNow())) {
      this.log.warn(meta, "Message timestamp outside allowed skew");
      return this.reject(message, "rejected_timestamp");
    }

    if (!contact || !isResolved(contact)) {
      if (pending.add(message)) {
        this.log.info(meta, "Message from unknown sender buffered");
        this.events.emit("pendingRequest", { sender: message.from, messageId: message.messageId });
      }
      return "pending";
    }

    const me = identity.requireAccountId();
    const valid =
      message.to === me &&
      (await verifyCanonical(
        {
          messageType: message.groupId ? "group_send_message" : "send_message",
          messageId: message.messageId,
          from: message.from,
          toOrGroupId: message.groupId ?? message.to,
          timestamp: message.timestamp,
          nonce: message.nonce,
          ciphertext: message.ciphertext,
        },
        message.sig,
        contact.signPublicKey,
      ));
    if (!valid) {
      this.log.warn(meta, "Signature verification failed");
      return this.reject(message, "rejected_signature");
    }

    const plaintext = await this.decrypt(message, contact.encPublicKey);
    if (!plaintext) {
      this.log.warn(meta, "Decryption failed");
      return this.reject(message, "rejected_decrypt");
    }

    if (!this.seen.accept(message.messageId)) {
      this.log.debug(meta, "Duplicate message");
      this.sendReceipt(message.messageId, message.from, "delivered");
      return "duplicate";
    }

    this.events.emit("message", {
      messageId: message.messageId,
      from: message.from,
      to: message.to,
      groupId: message.groupId ?? null,
      msgType: message.msgType,
      timestamp: message.timestamp,
      text: textDecoder.decode(plaintext),
      replyTo: message.replyTo ?? null,
      attachment: message.attachment ?? null,
    });
    this.sendReceipt(message.messageId, message.from, "delivered");
    await this.saveSeen();
    return "delivered";
  }

  /**
   * Page through the server's offline queue and run every message through
   * the inbound path.
   */
  async fetchPending(): Promise<FetchPendingSummary> {
    const { connection, session } = this.options;
    const summary: FetchPendingSummary = { fetched: 0, delivered: 0, pages: 0 };
    const cursors = new Set<string>();
    let cursor: string | undefined;

    for (;;) {
      const response = await connection.request({
        type: "fetch_pending",
        payload: session.privileged({
          ...(cursor ? { cursor } : {}),
          limit: FETCH_PENDING_LIMIT,
        }),
      });
      if (response.type !== "pending_messages") {
        throw new ProtocolError("INVALID_PAYLOAD", `Expected pending_messages, got ${response.type}`);
      }
      summary.pages += 1;
      for (const message of response.payload.messages) {
        summary.fetched += 1;
        if ((await this.handleIncoming(message, "stored")) === "delivered") {
          summary.delivered += 1;
        }
      }

      const next = response.payload.nextCursor;
      if (!next || cursors.has(next)) break;
      cursors.add(next);
      cursor = next;
    }

    this.log.info(summary, "Offline queue drained");
    return summary;
  }

  // ========== Pending requests ==========

  pendingSenders(): PendingSender[] {
    return this.options.pending.senders();
  }

  /**
   * Replay a sender's buffered messages. The sender must already be a
   * resolved contact.
   */
  async acceptPendingRequest(sender: string): Promise<InboundResult[]> {
    this.options.contacts.requireResolved(sender);
    const results: InboundResult[] = [];
    for (const request of this.options.pending.listBySender(sender)) {
      results.push(await this.handleIncoming(request.message, "stored"));
      this.options.pending.remove(request.messageId);
    }
    this.log.info({ sender, count: results.length }, "Pending request accepted");
    return results;
  }

  /** Block a sender and discard everything buffered from them. */
  blockSender(sender: string): number {
    this.options.contacts.setBlocked(sender, true);
    const discarded = this.options.pending.removeSender(sender);
    this.log.info({ sender, discarded }, "Sender blocked");
    return discarded;
  }

  purgeExpiredRequests(ttlMs: number): number {
    const purged = this.options.pending.purgeOlderThan(this.now() - ttlMs);
    if (purged > 0) this.log.info({ purged }, "Expired pending requests purged");
    return purged;
  }

  // ========== Receipts ==========

  markRead(messageId: string, sender: string): boolean {
    return this.sendReceipt(messageId, sender, "read");
  }

  /** Best effort: a receipt that cannot be sent now is not retried. */
  private sendReceipt(messageId: string, sender: string, status: "delivered" | "read"): boolean {
    const { connection, session, identity } = this.options;
    try {
      connection.send({
        type: "delivery_receipt",
        payload: session.privileged({
          messageId,
          from: identity.requireAccountId(),
          to: sender,
          status,
          timestamp: session.serverNow(),
        }),
      });
      return true;
    } catch (err) {
      if (err instanceof EngineError) {
        this.log.debug({ messageId, status, code: err.code }, "Receipt not sent");
        return false;
      }
      throw err;
    }
  }

  // --- Internals ---

  private async decrypt(
    message: ReceivedMessage,
    senderPublicKey: Uint8Array,
  ): Promise<Uint8Array | null> {
    const nonce = fromBase64Strict(message.nonce, NONCE_BYTES);
    const ciphertext = fromBase64Strict(message.ciphertext);
    if (!nonce || !ciphertext) return null;
    try {
      return await boxOpen(
        ciphertext,
        nonce,
        senderPublicKey,
        this.options.identity.current().keys.encryption.privateKey,
      );
    } catch (err) {
      if (err instanceof DecryptionError) return null;
      throw err;
    }
  }

  private async saveSeen(): Promise<void> {
    const store = this.options.seenStore;
    if (!store) return;
    try {
      await store.putString(SEEN_MESSAGES_SLOT, JSON.stringify(this.seen.export().seen));
    } catch (err) {
      this.log.warn({ err }, "Dedupe window not saved");
    }
  }

  private reject(message: ReceivedMessage, result: InboundResult): InboundResult {
    this.events.emit("rejected", { messageId: message.messageId, from: message.from, result });
    return result;
  }
}
