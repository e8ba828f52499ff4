/**
 * Contacts backup on the server, sealed under the identity's contacts key.
 *
 * Restore is last-write-wins: the local list is replaced by the backup.
 *
 * @module contacts/contacts-backup
 */
import type { Logger } from "pino";
import {
  DecryptionError,
  fromBase64Strict,
  initSodium,
  KEY_BYTES,
  openContactsBackup,
  sealContactsBackup,
  toBase64,
} from "@sotto/crypto";
import type { BackupContact, BackupData } from "@sotto/crypto";
import type { ApiClient, BackupPutResponse } from "../http/api-client.js";
import type { IdentityManager } from "../identity/identity-manager.js";
import { CryptoError } from "../errors.js";
import type { Contact, ContactStore } from "./contact-store.js";

export class ContactsBackupService {
  private readonly log: Logger;

  constructor(
    private readonly api: ApiClient,
    private readonly contacts: ContactStore,
    private readonly identity: IdentityManager,
    logger: Logger,
  ) {
    this.log = logger.child({ module: "contacts-backup" });
  }

  async upload(): Promise<BackupPutResponse> {
    await initSodium();
    const list: BackupContact[] = this.contacts.list().map(toBackupContact);
    const payload = await sealContactsBackup(list, this.identity.current().keys.contactsKey);
    const result = await this.api.putContactsBackup(payload);
    this.log.info({ count: list.length, sizeBytes: result.sizeBytes }, "Contacts backup uploaded");
    return result;
  }

  /**
   * Replace the local contact list with the server backup.
   * Returns the number of restored contacts, or null when no backup exists.
   */
  async restore(): Promise<number | null> {
    const stored = await this.api.getContactsBackup();
    if (!stored) {
      this.log.info("No contacts backup on server");
      return null;
    }

    let data: BackupData;
    try {
      data = await openContactsBackup(
        { nonce: stored.nonce, ciphertext: stored.ciphertext },
        this.identity.current().keys.contactsKey,
      );
    } catch (err) {
      if (err instanceof DecryptionError) {
        throw new CryptoError("DECRYPT_FAILED", "Contacts backup cannot be opened with this identity", {
          cause: err,
        });
      }
      throw new CryptoError("MALFORMED", "Contacts backup is malformed", { cause: err });
    }

    const restored = data.contacts.map(fromBackupContact);
    this.contacts.replaceAll(restored);
    this.log.info({ count: restored.length }, "Contacts restored from backup");
    return restored.length;
  }

  /** Returns false when there was no backup to delete. */
  async remove(): Promise<boolean> {
    const deleted = await this.api.deleteContactsBackup();
    this.log.info({ deleted }, "Contacts backup deleted");
    return deleted;
  }
}

function toBackupContact(contact: Contact): BackupContact {
  return {
    accountId: contact.accountId,
    encPublicKey: toBase64(contact.encPublicKey),
    signPublicKey: toBase64(contact.signPublicKey),
    ...(contact.displayName !== null ? { displayName: contact.displayName } : {}),
    blocked: contact.blocked,
  };
}

function fromBackupContact(entry: BackupContact): Omit<Contact, "updatedAt"> {
  const encPublicKey = fromBase64Strict(entry.encPublicKey, KEY_BYTES);
  const signPublicKey = fromBase64Strict(entry.signPublicKey, KEY_BYTES);
  if (!encPublicKey || !signPublicKey) {
    throw new CryptoError("MALFORMED", `Backup entry ${entry.accountId} has invalid keys`);
  }
  return {
    accountId: entry.accountId,
    encPublicKey,
    signPublicKey,
    displayName: entry.displayName ?? null,
    blocked: entry.blocked,
  };
}
