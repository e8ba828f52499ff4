/**
 * Contact list persisted in the `contacts` table.
 *
 * A contact whose public keys are all zero bytes is "unresolved": it was
 * added by account id alone and cannot be messaged until the key
 * directory fills in its keys.
 *
 * @module contacts/contact-store
 */
import { isPlaceholderKey, KEY_BYTES } from "@sotto/crypto";
import type { Db } from "../storage/database.js";
import { ProtocolError, UnresolvedContactError } from "../errors.js";
import { isValidAccountId } from "../protocol/constants.js";

export interface Contact {
  accountId: string;
  encPublicKey: Uint8Array;
  signPublicKey: Uint8Array;
  displayName: string | null;
  blocked: boolean;
  updatedAt: number;
}

interface ContactRow {
  account_id: string;
  enc_public_key: string;
  sign_public_key: string;
  display_name: string | null;
  blocked: number;
  updated_at: number;
}

export function isResolved(contact: Contact): boolean {
  return !isPlaceholderKey(contact.encPublicKey) && !isPlaceholderKey(contact.signPublicKey);
}

export function placeholderKey(): Uint8Array {
  return new Uint8Array(KEY_BYTES);
}

export class ContactStore {
  constructor(
    private readonly db: Db,
    private readonly now: () => number = Date.now,
  ) {}

  get(accountId: string): Contact | null {
    const row = this.db
      .prepare<[string], ContactRow>("SELECT * FROM contacts WHERE account_id = ?")
      .get(accountId);
    return row ? fromRow(row) : null;
  }

  list(): Contact[] {
    return this.db
      .prepare<[], ContactRow>("SELECT * FROM contacts ORDER BY account_id")
      .all()
      .map(fromRow);
  }

  /**
   * The contact, if its keys are known.
   *
   * @throws UnresolvedContactError
   */
  requireResolved(accountId: string): Contact {
    const contact = this.get(accountId);
    if (!contact || !isResolved(contact)) {
      throw new UnresolvedContactError(accountId);
    }
    return contact;
  }

  /** Add a contact by account id only. Keys stay placeholders until resolved. */
  addUnresolved(accountId: string, displayName: string | null = null): Contact {
    const existing = this.get(accountId);
    if (existing) return existing;
    return this.upsert({
      accountId,
      encPublicKey: placeholderKey(),
      signPublicKey: placeholderKey(),
      displayName,
      blocked: false,
    });
  }

  upsert(contact: Omit<Contact, "updatedAt">): Contact {
    if (!isValidAccountId(contact.accountId)) {
      throw new ProtocolError("INVALID_PAYLOAD", `Invalid account id ${contact.accountId}`);
    }
    if (contact.encPublicKey.length !== KEY_BYTES || contact.signPublicKey.length !== KEY_BYTES) {
      throw new ProtocolError("INVALID_PAYLOAD", "Public keys must be 32 bytes");
    }
    const updatedAt = this.now();
    this.db
      .prepare<[string, string, string, string | null, number, number]>(
        `INSERT INTO contacts (account_id, enc_public_key, sign_public_key, display_name, blocked, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(account_id) DO UPDATE SET
           enc_public_key = excluded.enc_public_key,
           sign_public_key = excluded.sign_public_key,
           display_name = excluded.display_name,
           blocked = excluded.blocked,
           updated_at = excluded.updated_at`,
      )
      .run(
        contact.accountId,
        encodeKey(contact.encPublicKey),
        encodeKey(contact.signPublicKey),
        contact.displayName,
        contact.blocked ? 1 : 0,
        updatedAt,
      );
    return { ...contact, updatedAt };
  }

  setKeys(accountId: string, encPublicKey: Uint8Array, signPublicKey: Uint8Array): Contact {
    const existing = this.get(accountId);
    return this.upsert({
      accountId,
      encPublicKey,
      signPublicKey,
      displayName: existing?.displayName ?? null,
      blocked: existing?.blocked ?? false,
    });
  }

  /** Block (or unblock) an account, creating an unresolved contact if needed. */
  setBlocked(accountId: string, blocked: boolean): Contact {
    const existing = this.get(accountId) ?? this.addUnresolved(accountId);
    return this.upsert({ ...existing, blocked });
  }

  isBlocked(accountId: string): boolean {
    return this.get(accountId)?.blocked ?? false;
  }

  remove(accountId: string): void {
    this.db.prepare<[string]>("DELETE FROM contacts WHERE account_id = ?").run(accountId);
  }

  /** Replace the whole list in one transaction. */
  replaceAll(contacts: Omit<Contact, "updatedAt">[]): void {
    const replace = this.db.transaction((list: Omit<Contact, "updatedAt">[]) => {
      this.db.prepare("DELETE FROM contacts").run();
      for (const contact of list) this.upsert(contact);
    });
    replace(contacts);
  }
}

function encodeKey(key: Uint8Array): string {
  return Buffer.from(key).toString("base64");
}

function decodeKey(encoded: string): Uint8Array {
  return new Uint8Array(Buffer.from(encoded, "base64"));
}

function fromRow(row: ContactRow): Contact {
  return {
    accountId: row.account_id,
    encPublicKey: decodeKey(row.enc_public_key),
    signPublicKey: decodeKey(row.sign_public_key),
    displayName: row.display_name,
    blocked: row.blocked === 1,
    updatedAt: row.updated_at,
  };
}
