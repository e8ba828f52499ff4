/**
 * Durable outbox rows (`outbox` table).
 *
 * The stored payload is the signed envelope without session fields; the
 * session token is added at transmit time and never reaches disk.
 *
 * @module messaging/outbox-store
 */
import type { Db } from "../storage/database.js";
import { StorageError } from "../errors.js";
import { directMessageSchema, groupMessageSchema } from "../protocol/schema.js";
import type { DirectMessage, GroupMessage } from "../protocol/schema.js";

export type OutboxStatus = "pending" | "sending" | "sent" | "failed";
export type DeliveryState = "delivered" | "read";

export type OutboxPayload =
  | { frameType: "send_message"; payload: DirectMessage }
  | { frameType: "group_send_message"; payload: GroupMessage };

export type OutboxEntry = OutboxPayload & {
  seq: number;
  messageId: string;
  /** Recipient account id, or the group id for group messages. */
  peer: string;
  status: OutboxStatus;
  retryCount: number;
  nextAttemptAt: number;
  lastError: string | null;
  delivery: DeliveryState | null;
  enqueuedAt: number;
  updatedAt: number;
};

interface OutboxRow {
  seq: number;
  message_id: string;
  peer: string;
  frame_type: string;
  payload: string;
  status: string;
  retry_count: number;
  next_attempt_at: number;
  last_error: string | null;
  delivery: string | null;
  enqueued_at: number;
  updated_at: number;
}

const STATUSES: readonly OutboxStatus[] = ["pending", "sending", "sent", "failed"];

export class OutboxStore {
  constructor(
    private readonly db: Db,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Insert a new entry. An existing row with the same messageId is left
   * untouched and returned with `created: false`.
   */
  insert(item: OutboxPayload & { messageId: string; peer: string }): {
    entry: OutboxEntry;
    created: boolean;
  } {
    const now = this.now();
    const info = this.db
      .prepare<[string, string, string, string, number, number]>(
        `INSERT OR IGNORE INTO outbox
           (message_id, peer, frame_type, payload, status, retry_count, next_attempt_at, enqueued_at, updated_at)
         VALUES (?, ?, ?, ?, 'pending', 0, 0, ?, ?)`,
      )
      .run(item.messageId, item.peer, item.frameType, JSON.stringify(item.payload), now, now);
    const entry = this.get(item.messageId);
    if (!entry) throw new StorageError(`Outbox entry ${item.messageId} vanished after insert`);
    return { entry, created: info.changes > 0 };
  }

  get(messageId: string): OutboxEntry | null {
    const row = this.db
      .prepare<[string], OutboxRow>("SELECT * FROM outbox WHERE message_id = ?")
      .get(messageId);
    return row ? fromRow(row) : null;
  }

  /** Oldest entry for the peer that still has to go out. Failed entries do not block. */
  nextForPeer(peer: string): OutboxEntry | null {
    const row = this.db
      .prepare<[string], OutboxRow>(
        `SELECT * FROM outbox WHERE peer = ? AND status IN ('pending', 'sending')
         ORDER BY seq LIMIT 1`,
      )
      .get(peer);
    return row ? fromRow(row) : null;
  }

  /** Peers with pending entries, in order of their oldest entry. */
  peersWithPending(): string[] {
    return this.db
      .prepare<[], { peer: string }>(
        `SELECT peer FROM outbox WHERE status = 'pending'
         GROUP BY peer ORDER BY MIN(seq)`,
      )
      .all()
      .map((row) => row.peer);
  }

  list(status?: OutboxStatus): OutboxEntry[] {
    const rows = status
      ? this.db
          .prepare<[string], OutboxRow>("SELECT * FROM outbox WHERE status = ? ORDER BY seq")
          .all(status)
      : this.db.prepare<[], OutboxRow>("SELECT * FROM outbox ORDER BY seq").all();
    return rows.map(fromRow);
  }

  markSending(messageId: string): void {
    this.setStatus(messageId, "sending");
  }

  markSent(messageId: string): void {
    this.setStatus(messageId, "sent");
  }

  markPending(
    messageId: string,
    retry?: { retryCount: number; nextAttemptAt: number; lastError: string },
  ): void {
    if (!retry) {
      this.setStatus(messageId, "pending");
      return;
    }
    this.db
      .prepare<[number, number, string, number, string]>(
        `UPDATE outbox SET status = 'pending', retry_count = ?, next_attempt_at = ?,
           last_error = ?, updated_at = ? WHERE message_id = ?`,
      )
      .run(retry.retryCount, retry.nextAttemptAt, retry.lastError, this.now(), messageId);
  }

  markFailed(messageId: string, error: string): void {
    this.db
      .prepare<[string, number, string]>(
        "UPDATE outbox SET status = 'failed', last_error = ?, updated_at = ? WHERE message_id = ?",
      )
      .run(error, this.now(), messageId);
  }

  /** Give a failed entry a fresh set of attempts. */
  resetFailed(messageId: string): boolean {
    const info = this.db
      .prepare<[number, string]>(
        `UPDATE outbox SET status = 'pending', retry_count = 0, next_attempt_at = 0,
           last_error = NULL, updated_at = ? WHERE message_id = ? AND status = 'failed'`,
      )
      .run(this.now(), messageId);
    return info.changes > 0;
  }

  /** Entries caught mid-transmission go back to pending. The retry count is kept. */
  resetSending(): number {
    return this.db
      .prepare<[number]>("UPDATE outbox SET status = 'pending', updated_at = ? WHERE status = 'sending'")
      .run(this.now()).changes;
  }

  setDelivery(messageId: string, delivery: DeliveryState): void {
    this.db
      .prepare<[string, number, string]>(
        "UPDATE outbox SET delivery = ?, updated_at = ? WHERE message_id = ?",
      )
      .run(delivery, this.now(), messageId);
  }

  /** Delete sent entries last touched before `before`. */
  purgeSent(before: number): number {
    return this.db
      .prepare<[number]>("DELETE FROM outbox WHERE status = 'sent' AND updated_at < ?")
      .run(before).changes;
  }

  private setStatus(messageId: string, status: OutboxStatus): void {
    this.db
      .prepare<[string, number, string]>(
        "UPDATE outbox SET status = ?, updated_at = ? WHERE message_id = ?",
      )
      .run(status, this.now(), messageId);
  }
}

function fromRow(row: OutboxRow): OutboxEntry {
  const status = STATUSES.find((s) => s === row.status);
  if (!status) throw new StorageError(`Outbox row ${row.message_id} has status ${row.status}`);
  const delivery: DeliveryState | null =
    row.delivery === "delivered" || row.delivery === "read" ? row.delivery : null;
  const common = {
    seq: row.seq,
    messageId: row.message_id,
    peer: row.peer,
    status,
    retryCount: row.retry_count,
    nextAttemptAt: row.next_attempt_at,
    lastError: row.last_error,
    delivery,
    enqueuedAt: row.enqueued_at,
    updatedAt: row.updated_at,
  };

  let json: unknown;
  try {
    json = JSON.parse(row.payload);
  } catch (err) {
    throw new StorageError(`Outbox row ${row.message_id} has unreadable payload`, { cause: err });
  }
  if (row.frame_type === "send_message") {
    const parsed = directMessageSchema.safeParse(json);
    if (parsed.success) return { ...common, frameType: "send_message", payload: parsed.data };
  } else if (row.frame_type === "group_send_message") {
    const parsed = groupMessageSchema.safeParse(json);
    if (parsed.success) return { ...common, frameType: "group_send_message", payload: parsed.data };
  }
  throw new StorageError(`Outbox row ${row.message_id} has an invalid ${row.frame_type} payload`);
}
