/**
 * Outbox: ordered, durable, at-least-once transmission of signed envelopes.
 *
 * - Per peer, entries go out strictly in enqueue order with at most one
 *   in flight. A failed entry stops blocking its peer.
 * - The messageId doubles as the requestId and is never re-minted, so the
 *   server can dedupe a retransmission.
 * - Nothing is transmitted while paused. The outbox starts paused and is
 *   resumed after each successful authentication.
 * - `message_accepted` moves an entry to `sent`. Transient errors and ack
 *   timeouts back off and retry up to `maxAttempts`; permanent errors fail
 *   the entry immediately; session errors pause the outbox and leave the
 *   entry pending.
 *
 * @module messaging/outbox
 */
import type { Logger } from "pino";
import { TypedEmitter } from "../events.js";
import type { Unsubscribe } from "../events.js";
import type { ConnectionManager } from "../connection/connection-manager.js";
import type { SessionManager } from "../session/session-manager.js";
import { computeBackoff } from "../connection/backoff.js";
import { NotConnectedError, isAuthFailureCode, isPermanentServerCode } from "../errors.js";
import type { DeliveryState, OutboxEntry, OutboxPayload, OutboxStore } from "./outbox-store.js";

export interface OutboxOptions {
  store: OutboxStore;
  connection: ConnectionManager;
  session: SessionManager;
  logger: Logger;
  ackTimeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  random?: () => number;
  now?: () => number;
}

export interface OutboxEvents {
  sent: { messageId: string; peer: string };
  failed: { messageId: string; peer: string; reason: string };
  delivery: { messageId: string; peer: string; state: DeliveryState };
  /** The server rejected the session while an entry was in flight. */
  authFailed: { messageId: string };
}

const RETRY_JITTER = 0.1;

type Timer = ReturnType<typeof setTimeout>;

export class Outbox {
  private readonly store: OutboxStore;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly events: TypedEmitter<OutboxEvents>;

  private paused = true;
  /** peer → entry awaiting message_accepted */
  private readonly inflight = new Map<string, { messageId: string; timer: Timer }>();
  /** peer → backoff timer */
  private readonly retryTimers = new Map<string, Timer>();

  constructor(private readonly options: OutboxOptions) {
    this.store = options.store;
    this.log = options.logger.child({ module: "outbox" });
    this.now = options.now ?? Date.now;
    this.events = new TypedEmitter<OutboxEvents>((err, event) => {
      this.log.error({ err, event }, "Outbox listener failed");
    });
  }

  on<K extends keyof OutboxEvents>(
    event: K,
    handler: (payload: OutboxEvents[K]) => void,
  ): Unsubscribe {
    return this.events.on(event, handler);
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /**
   * Persist an envelope as pending and try to send it. Enqueueing the same
   * messageId twice keeps the first entry.
   */
  enqueue(item: OutboxPayload & { messageId: string; peer: string }): OutboxEntry {
    const { entry, created } = this.store.insert(item);
    if (created) {
      this.log.debug({ messageId: entry.messageId, peer: entry.peer }, "Enqueued");
      this.drainPeer(entry.peer);
    }
    return entry;
  }

  /** Start (or restart) transmission. Called once a session is authenticated. */
  resume(): void {
    this.paused = false;
    if (this.inflight.size === 0) {
      const reset = this.store.resetSending();
      if (reset > 0) this.log.info({ count: reset }, "Re-queued entries interrupted mid-send");
    }
    for (const peer of this.store.peersWithPending()) this.drainPeer(peer);
  }

  pause(): void {
    this.paused = true;
  }

  /**
   * The connection is gone: nothing in flight will be acknowledged. Entries
   * go back to pending without counting as a failed attempt.
   */
  handleConnectionLost(): void {
    this.paused = true;
    for (const { timer } of this.inflight.values()) clearTimeout(timer);
    this.inflight.clear();
    for (const timer of this.retryTimers.values()) clearTimeout(timer);
    this.retryTimers.clear();
    this.store.resetSending();
  }

  handleAccepted(messageId: string): boolean {
    const entry = this.store.get(messageId);
    if (!entry || entry.status !== "sending") return false;
    this.clearInflight(entry.peer, messageId);
    this.store.markSent(messageId);
    this.log.debug({ messageId, peer: entry.peer }, "Accepted by server");
    this.events.emit("sent", { messageId, peer: entry.peer });
    this.drainPeer(entry.peer);
    return true;
  }

  /**
   * Apply a server error frame whose requestId names an outbox entry.
   * Returns false when the id is not an in-flight entry.
   */
  handleError(messageId: string, code: string, message: string): boolean {
    const entry = this.store.get(messageId);
    if (!entry || entry.status !== "sending") return false;
    this.clearInflight(entry.peer, messageId);

    if (isAuthFailureCode(code)) {
      this.store.markPending(messageId);
      this.paused = true;
      this.log.warn({ messageId, code }, "Session rejected; outbox paused");
      this.events.emit("authFailed", { messageId });
      return true;
    }
    if (isPermanentServerCode(code)) {
      this.fail(entry, `${code}: ${message}`);
      return true;
    }
    this.scheduleRetry(entry, `${code}: ${message}`);
    return true;
  }

  /** Receipts only move forward: none → delivered → read. */
  handleDeliveryUpdate(messageId: string, state: DeliveryState): boolean {
    const entry = this.store.get(messageId);
    if (!entry) return false;
    if (entry.delivery === state || entry.delivery === "read") return false;
    this.store.setDelivery(messageId, state);
    this.events.emit("delivery", { messageId, peer: entry.peer, state });
    return true;
  }

  /** Give a failed entry a fresh set of attempts. */
  retryFailed(messageId: string): boolean {
    const entry = this.store.get(messageId);
    if (!entry || !this.store.resetFailed(messageId)) return false;
    this.log.info({ messageId }, "Failed entry re-queued");
    this.drainPeer(entry.peer);
    return true;
  }

  purgeSent(olderThanMs: number): number {
    return this.store.purgeSent(this.now() - olderThanMs);
  }

  get(messageId: string): OutboxEntry | null {
    return this.store.get(messageId);
  }

  /** Cancel every timer. Rows stay as they are. */
  stop(): void {
    this.handleConnectionLost();
  }

  // --- Internals ---

  private drainPeer(peer: string): void {
    if (this.paused || !this.options.session.isAuthenticated) return;
    if (this.inflight.has(peer) || this.retryTimers.has(peer)) return;

    const entry = this.store.nextForPeer(peer);
    if (!entry || entry.status !== "pending") return;

    const wait = entry.nextAttemptAt - this.now();
    if (wait > 0) {
      this.armRetryTimer(peer, wait);
      return;
    }

    // In flight before the write, so an immediate ack finds it.
    this.store.markSending(entry.messageId);
    const timer = setTimeout(() => {
      this.onAckTimeout(peer, entry.messageId);
    }, this.options.ackTimeoutMs);
    this.inflight.set(peer, { messageId: entry.messageId, timer });

    try {
      this.options.connection.send({
        type: entry.frameType,
        requestId: entry.messageId,
        payload: this.options.session.privileged(entry.payload),
      });
    } catch (err) {
      this.clearInflight(peer, entry.messageId);
      if (err instanceof NotConnectedError) {
        this.store.markPending(entry.messageId);
        this.log.debug({ messageId: entry.messageId }, "Not connected; entry stays pending");
        return;
      }
      this.log.warn({ err, messageId: entry.messageId }, "Entry cannot be sent");
      this.fail(entry, err instanceof Error ? err.message : String(err));
    }
  }

  private onAckTimeout(peer: string, messageId: string): void {
    const current = this.inflight.get(peer);
    if (current?.messageId !== messageId) return;
    this.inflight.delete(peer);
    const entry = this.store.get(messageId);
    if (!entry || entry.status !== "sending") return;
    this.log.warn({ messageId }, "No message_accepted before timeout");
    this.scheduleRetry(entry, "ack timeout");
  }

  private scheduleRetry(entry: OutboxEntry, reason: string): void {
    const retryCount = entry.retryCount + 1;
    if (retryCount >= this.options.maxAttempts) {
      this.fail(entry, reason);
      return;
    }
    const delay = computeBackoff(retryCount - 1, {
      baseMs: this.options.baseDelayMs,
      maxMs: this.options.maxDelayMs,
      jitter: RETRY_JITTER,
      random: this.options.random,
    });
    this.store.markPending(entry.messageId, {
      retryCount,
      nextAttemptAt: this.now() + delay,
      lastError: reason,
    });
    this.log.info({ messageId: entry.messageId, retryCount, delay }, "Retry scheduled");
    this.armRetryTimer(entry.peer, delay);
  }

  private armRetryTimer(peer: string, delay: number): void {
    if (this.retryTimers.has(peer)) return;
    const timer = setTimeout(() => {
      this.retryTimers.delete(peer);
      this.drainPeer(peer);
    }, delay);
    this.retryTimers.set(peer, timer);
  }

  private fail(entry: OutboxEntry, reason: string): void {
    this.store.markFailed(entry.messageId, reason);
    this.log.warn({ messageId: entry.messageId, peer: entry.peer, reason }, "Entry failed");
    this.events.emit("failed", { messageId: entry.messageId, peer: entry.peer, reason });
    this.drainPeer(entry.peer);
  }

  private clearInflight(peer: string, messageId: string): void {
    const current = this.inflight.get(peer);
    if (current?.messageId !== messageId) return;
    clearTimeout(current.timer);
    this.inflight.delete(peer);
  }
}
