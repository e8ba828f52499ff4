/**
 * Messages from senders whose keys are not known yet.
 *
 * They wait here, unverified and undecrypted, until the user accepts
 * the sender (keys get resolved, messages are replayed through the
 * inbound pipeline) or blocks them. Entries expire after the pending TTL.
 *
 * @module messaging/pending-request-store
 */
import type { Db } from "../storage/database.js";
import { receivedMessageSchema } from "../protocol/schema.js";
import type { ReceivedMessage } from "../protocol/schema.js";

export interface PendingRequest {
  messageId: string;
  sender: string;
  message: ReceivedMessage;
  receivedAt: number;
}

export interface PendingSender {
  sender: string;
  count: number;
  firstReceivedAt: number;
}

interface PendingRow {
  message_id: string;
  sender: string;
  payload: string;
  received_at: number;
}

export class PendingRequestStore {
  constructor(
    private readonly db: Db,
    private readonly now: () => number = Date.now,
  ) {}

  /** Returns false if the message was already buffered. */
  add(message: ReceivedMessage): boolean {
    const info = this.db
      .prepare<[string, string, string, number]>(
        `INSERT OR IGNORE INTO pending_requests (message_id, sender, payload, received_at)
         VALUES (?, ?, ?, ?)`,
      )
      .run(message.messageId, message.from, JSON.stringify(message), this.now());
    return info.changes > 0;
  }

  listBySender(sender: string): PendingRequest[] {
    return this.db
      .prepare<[string], PendingRow>(
        "SELECT * FROM pending_requests WHERE sender = ? ORDER BY received_at, rowid",
      )
      .all(sender)
      .flatMap((row) => {
        const request = fromRow(row);
        return request ? [request] : [];
      });
  }

  senders(): PendingSender[] {
    return this.db
      .prepare<[], { sender: string; count: number; first: number }>(
        `SELECT sender, COUNT(*) AS count, MIN(received_at) AS first
         FROM pending_requests GROUP BY sender ORDER BY first`,
      )
      .all()
      .map((row) => ({ sender: row.sender, count: row.count, firstReceivedAt: row.first }));
  }

  remove(messageId: string): void {
    this.db.prepare<[string]>("DELETE FROM pending_requests WHERE message_id = ?").run(messageId);
  }

  removeSender(sender: string): number {
    return this.db
      .prepare<[string]>("DELETE FROM pending_requests WHERE sender = ?")
      .run(sender).changes;
  }

  purgeOlderThan(before: number): number {
    return this.db
      .prepare<[number]>("DELETE FROM pending_requests WHERE received_at < ?")
      .run(before).changes;
  }
}

// Rows are written by `add` only; a row that no longer parses is skipped.
function fromRow(row: PendingRow): PendingRequest | null {
  let json: unknown;
  try {
    json = JSON.parse(row.payload);
  } catch {
    return null;
  }
  const parsed = receivedMessageSchema.safeParse(json);
  if (!parsed.success) return null;
  return {
    messageId: row.message_id,
    sender: row.sender,
    message: parsed.data,
    receivedAt: row.received_at,
  };
}
