/**
 * Identity manager: the only writer of identity key material.
 *
 * Keys are derived from the recovery phrase and sealed in `secure_kv`.
 * The device id is minted once per installation and survives identity
 * restores; the account id is whatever the server assigned on the first
 * successful registration.
 *
 * @module identity/identity-manager
 */
import { v4 as uuidv4 } from "uuid";
import type { Logger } from "pino";
import {
  deriveIdentityKeys,
  generateMnemonic,
  requireValidMnemonic,
  wipe,
} from "@sotto/crypto";
import type { IdentityKeys } from "@sotto/crypto";
import type { SecureKeyValueStore } from "./key-store.js";
import { isValidAccountId } from "../protocol/constants.js";
import { ProtocolError, SessionError } from "../errors.js";

export interface LocalIdentity {
  deviceId: string;
  /** Null until the server has assigned one. */
  accountId: string | null;
  keys: IdentityKeys;
}

const SLOT = {
  DEVICE_ID: "device.id",
  ACCOUNT_ID: "identity.accountId",
  ENC_PUBLIC: "identity.enc.publicKey",
  ENC_PRIVATE: "identity.enc.privateKey",
  SIGN_PUBLIC: "identity.sign.publicKey",
  SIGN_PRIVATE: "identity.sign.privateKey",
  CONTACTS_KEY: "identity.contactsKey",
} as const;

export class IdentityManager {
  private identity: LocalIdentity | null = null;
  private readonly log: Logger;

  constructor(
    private readonly store: SecureKeyValueStore,
    logger: Logger,
  ) {
    this.log = logger.child({ module: "identity" });
  }

  /** Returns the device id, minting and persisting it on first use. */
  async deviceId(): Promise<string> {
    const existing = await this.store.getString(SLOT.DEVICE_ID);
    if (existing) return existing;
    const deviceId = uuidv4();
    await this.store.putString(SLOT.DEVICE_ID, deviceId);
    return deviceId;
  }

  /**
   * Create a new identity. Returns the recovery phrase; it is not stored.
   */
  async createIdentity(): Promise<string> {
    const mnemonic = generateMnemonic();
    await this.install(mnemonic, null);
    this.log.info("New identity created");
    return mnemonic;
  }

  /**
   * Restore an identity from its recovery phrase.
   *
   * @throws InvalidMnemonicError before anything is written.
   */
  async restoreIdentity(mnemonic: string, accountId?: string): Promise<LocalIdentity> {
    requireValidMnemonic(mnemonic);
    if (accountId !== undefined && !isValidAccountId(accountId)) {
      throw new ProtocolError("INVALID_PAYLOAD", "Invalid account id");
    }
    const identity = await this.install(mnemonic, accountId ?? null);
    this.log.info({ accountId: identity.accountId }, "Identity restored");
    return identity;
  }

  /** Load the persisted identity, if any. */
  async load(): Promise<LocalIdentity | null> {
    const [encPublic, encPrivate, signPublic, signPrivate, contactsKey] =
      await Promise.all([
        this.store.get(SLOT.ENC_PUBLIC),
        this.store.get(SLOT.ENC_PRIVATE),
        this.store.get(SLOT.SIGN_PUBLIC),
        this.store.get(SLOT.SIGN_PRIVATE),
        this.store.get(SLOT.CONTACTS_KEY),
      ]);
    if (!encPublic || !encPrivate || !signPublic || !signPrivate || !contactsKey) {
      this.identity = null;
      return null;
    }
    this.identity = {
      deviceId: await this.deviceId(),
      accountId: await this.store.getString(SLOT.ACCOUNT_ID),
      keys: {
        encryption: { publicKey: encPublic, privateKey: encPrivate },
        signing: { publicKey: signPublic, privateKey: signPrivate },
        contactsKey,
      },
    };
    return this.identity;
  }

  hasIdentity(): boolean {
    return this.identity !== null;
  }

  /**
   * @throws SessionError NOT_AUTHENTICATED when no identity is installed.
   */
  current(): LocalIdentity {
    if (!this.identity) {
      throw new SessionError("NOT_AUTHENTICATED", "No identity installed");
    }
    return this.identity;
  }

  /** The assigned account id, required for anything that signs. */
  requireAccountId(): string {
    const accountId = this.current().accountId;
    if (!accountId) {
      throw new SessionError("NOT_AUTHENTICATED", "Identity is not registered yet");
    }
    return accountId;
  }

  async recordAccountId(accountId: string): Promise<void> {
    const identity = this.current();
    if (identity.accountId === accountId) return;
    if (identity.accountId !== null) {
      this.log.warn(
        { previous: identity.accountId, accountId },
        "Server assigned a different account id",
      );
    }
    await this.store.putString(SLOT.ACCOUNT_ID, accountId);
    this.identity = { ...identity, accountId };
  }

  /** Remove all identity material. The device id is kept. */
  wipeIdentity(): void {
    for (const slot of [
      SLOT.ACCOUNT_ID,
      SLOT.ENC_PUBLIC,
      SLOT.ENC_PRIVATE,
      SLOT.SIGN_PUBLIC,
      SLOT.SIGN_PRIVATE,
      SLOT.CONTACTS_KEY,
    ]) {
      this.store.delete(slot);
    }
    if (this.identity) {
      const { keys } = this.identity;
      wipe(keys.encryption.privateKey, keys.signing.privateKey, keys.contactsKey);
    }
    this.identity = null;
    this.log.info("Identity wiped");
  }

  private async install(mnemonic: string, accountId: string | null): Promise<LocalIdentity> {
    const keys = await deriveIdentityKeys(mnemonic);
    await this.store.put(SLOT.ENC_PUBLIC, keys.encryption.publicKey);
    await this.store.put(SLOT.ENC_PRIVATE, keys.encryption.privateKey);
    await this.store.put(SLOT.SIGN_PUBLIC, keys.signing.publicKey);
    await this.store.put(SLOT.SIGN_PRIVATE, keys.signing.privateKey);
    await this.store.put(SLOT.CONTACTS_KEY, keys.contactsKey);
    if (accountId) {
      await this.store.putString(SLOT.ACCOUNT_ID, accountId);
    } else {
      this.store.delete(SLOT.ACCOUNT_ID);
    }
    this.identity = { deviceId: await this.deviceId(), accountId, keys };
    return this.identity;
  }
}
