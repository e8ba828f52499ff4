import { describe, it, expect, beforeEach } from "vitest";
import {
  deriveIdentityKeys,
  generateMnemonic,
  InvalidMnemonicError,
  MNEMONIC_WORD_COUNT,
} from "@sotto/crypto";
import { IdentityManager } from "../src/identity/identity-manager.js";
import { SecureKeyValueStore } from "../src/identity/key-store.js";
import { ProtocolError, SessionError, StorageError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { openDatabase } from "../src/storage/database.js";
import type { Db } from "../src/storage/database.js";
import { STORE_KEY } from "./helpers/clients.js";

describe("SecureKeyValueStore", () => {
  let db: Db;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  it("refuses a store key of the wrong length", () => {
    expect(() => new SecureKeyValueStore(db, new Uint8Array(16))).toThrow(StorageError);
  });

  it("keeps values sealed at rest", async () => {
    const store = new SecureKeyValueStore(db, STORE_KEY);
    await store.putString("greeting", "hello hello hello");

    const row = db
      .prepare<[string], { ciphertext: Buffer }>("SELECT ciphertext FROM secure_kv WHERE key = ?")
      .get("greeting");
    expect(row).toBeDefined();
    expect(Buffer.from(row?.ciphertext ?? []).toString("utf8")).not.toContain("hello");
    await expect(store.getString("greeting")).resolves.toBe("hello hello hello");
    await expect(store.getString("missing")).resolves.toBeNull();
  });

  it("fails loudly under another store key", async () => {
    await new SecureKeyValueStore(db, STORE_KEY).putString("greeting", "hello");
    const other = new SecureKeyValueStore(db, new Uint8Array(32).fill(9));
    await expect(other.getString("greeting")).rejects.toBeInstanceOf(StorageError);
  });
});

describe("IdentityManager", () => {
  let db: Db;
  let identity: IdentityManager;

  function manager(key: Uint8Array = STORE_KEY): IdentityManager {
    return new IdentityManager(new SecureKeyValueStore(db, key), silentLogger());
  }

  beforeEach(() => {
    db = openDatabase(":memory:");
    identity = manager();
  });

  it("has no identity until one is created", async () => {
    await expect(identity.load()).resolves.toBeNull();
    expect(identity.hasIdentity()).toBe(false);
    expect(() => identity.current()).toThrow(SessionError);
  });

  it("creates an identity and returns its recovery phrase", async () => {
    const mnemonic = await identity.createIdentity();

    expect(mnemonic.split(" ")).toHaveLength(MNEMONIC_WORD_COUNT);
    const expected = await deriveIdentityKeys(mnemonic);
    expect(identity.current().keys.signing.publicKey).toEqual(expected.signing.publicKey);
    expect(identity.current().accountId).toBeNull();
    expect(() => identity.requireAccountId()).toThrow("Identity is not registered yet");
  });

  it("reloads the same identity from storage", async () => {
    await identity.createIdentity();
    await identity.recordAccountId("WSP-AAAA-BBBB-CCCC");
    const before = identity.current();

    const reloaded = await manager().load();

    expect(reloaded?.deviceId).toBe(before.deviceId);
    expect(reloaded?.accountId).toBe("WSP-AAAA-BBBB-CCCC");
    expect(reloaded?.keys.encryption.privateKey).toEqual(before.keys.encryption.privateKey);
    expect(reloaded?.keys.contactsKey).toEqual(before.keys.contactsKey);
  });

  it("derives the same keys on restore and keeps the device id", async () => {
    const mnemonic = generateMnemonic();
    const deviceId = await identity.deviceId();

    const restored = await identity.restoreIdentity(mnemonic, "WSP-AAAA-BBBB-CCCC");
    const expected = await deriveIdentityKeys(mnemonic);

    expect(restored.deviceId).toBe(deviceId);
    expect(restored.accountId).toBe("WSP-AAAA-BBBB-CCCC");
    expect(restored.keys.encryption.publicKey).toEqual(expected.encryption.publicKey);
  });

  it("rejects an invalid phrase before writing anything", async () => {
    const err = await identity.restoreIdentity("apple banana cherry").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InvalidMnemonicError);
    expect(err).toMatchObject({ reason: "word_count" });
    await expect(manager().load()).resolves.toBeNull();
  });

  it("rejects a malformed account id on restore", async () => {
    await expect(identity.restoreIdentity(generateMnemonic(), "alice")).rejects.toBeInstanceOf(
      ProtocolError,
    );
  });

  it("does not open under a different store key", async () => {
    await identity.createIdentity();
    await expect(manager(new Uint8Array(32).fill(9)).load()).rejects.toBeInstanceOf(StorageError);
  });

  it("wipes identity material but keeps the device id", async () => {
    await identity.createIdentity();
    const deviceId = identity.current().deviceId;
    const privateKey = identity.current().keys.signing.privateKey;

    identity.wipeIdentity();

    expect(identity.hasIdentity()).toBe(false);
    expect(privateKey.every((b) => b === 0)).toBe(true);
    const fresh = manager();
    await expect(fresh.load()).resolves.toBeNull();
    await expect(fresh.deviceId()).resolves.toBe(deviceId);
  });
});
