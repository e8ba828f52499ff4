/**
 * Key directory: resolves contacts to their published public keys.
 *
 * Keys are immutable per identity. Once a contact is resolved, different
 * keys from the directory are refused rather than silently adopted.
 *
 * @module contacts/key-directory
 */
import type { Logger } from "pino";
import { fromBase64Strict, initSodium, KEY_BYTES } from "@sotto/crypto";
import type { ApiClient } from "../http/api-client.js";
import { KeyChangedError, ProtocolError } from "../errors.js";
import { isResolved } from "./contact-store.js";
import type { Contact, ContactStore } from "./contact-store.js";

export class KeyDirectory {
  private readonly log: Logger;

  constructor(
    private readonly api: ApiClient,
    private readonly contacts: ContactStore,
    logger: Logger,
  ) {
    this.log = logger.child({ module: "key-directory" });
  }

  /** The contact with known keys, fetching them only when missing. */
  async ensureResolved(accountId: string): Promise<Contact> {
    const existing = this.contacts.get(accountId);
    if (existing && isResolved(existing)) return existing;
    return this.resolve(accountId);
  }

  /**
   * Fetch the account's keys and store them on the contact.
   *
   * @throws ProtocolError USER_BANNED for banned accounts.
   * @throws KeyChangedError when a resolved contact's keys differ.
   */
  async resolve(accountId: string): Promise<Contact> {
    const keys = await this.api.getUserKeys(accountId);
    if (keys.accountId !== accountId) {
      throw new ProtocolError("INVALID_PAYLOAD", "Key directory answered for another account");
    }
    if (keys.status === "banned") {
      this.log.warn({ accountId }, "Key lookup for banned account");
      throw new ProtocolError("USER_BANNED", `Account ${accountId} is banned`);
    }

    await initSodium();
    const encPublicKey = fromBase64Strict(keys.encPublicKey, KEY_BYTES);
    const signPublicKey = fromBase64Strict(keys.signPublicKey, KEY_BYTES);
    if (!encPublicKey || !signPublicKey) {
      throw new ProtocolError("INVALID_PAYLOAD", "Directory keys must be 32 bytes of base64");
    }

    const existing = this.contacts.get(accountId);
    if (existing && isResolved(existing)) {
      if (
        sameBytes(existing.encPublicKey, encPublicKey) &&
        sameBytes(existing.signPublicKey, signPublicKey)
      ) {
        return existing;
      }
      this.log.error({ accountId }, "Directory keys differ from stored keys; refusing");
      throw new KeyChangedError(accountId);
    }

    this.log.info({ accountId }, "Contact resolved");
    return this.contacts.setKeys(accountId, encPublicKey, signPublicKey);
  }
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.from(a).equals(Buffer.from(b));
}
