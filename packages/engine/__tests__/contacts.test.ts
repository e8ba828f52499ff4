import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { deriveIdentityKeys, generateMnemonic } from "@sotto/crypto";
import type { IdentityKeys } from "@sotto/crypto";
import { ContactStore, isResolved, placeholderKey } from "../src/contacts/contact-store.js";
import {
  CryptoError,
  KeyChangedError,
  ProtocolError,
  UnresolvedContactError,
} from "../src/errors.js";
import { openDatabase } from "../src/storage/database.js";
import { FakeApi } from "./helpers/fake-api.js";
import type { ApiReply } from "./helpers/fake-api.js";
import { FakeRelay } from "./helpers/fake-relay.js";
import { createClient } from "./helpers/clients.js";
import type { TestClient } from "./helpers/clients.js";

const BOB = "WSP-BBBB-BBBB-BBBB";
const CAROL = "WSP-CCCC-CCCC-CCCC";

function b64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

describe("ContactStore", () => {
  let now: number;
  let store: ContactStore;

  beforeEach(() => {
    now = 1000;
    store = new ContactStore(openDatabase(":memory:"), () => now);
  });

  it("adds unresolved contacts with placeholder keys", () => {
    const contact = store.addUnresolved(BOB, "Bob");

    expect(contact).toEqual({
      accountId: BOB,
      encPublicKey: placeholderKey(),
      signPublicKey: placeholderKey(),
      displayName: "Bob",
      blocked: false,
      updatedAt: 1000,
    });
    expect(isResolved(contact)).toBe(false);
    expect(() => store.requireResolved(BOB)).toThrow(UnresolvedContactError);
  });

  it("keeps an existing contact when added again", () => {
    store.setKeys(BOB, new Uint8Array(32).fill(1), new Uint8Array(32).fill(2));
    now = 2000;

    const again = store.addUnresolved(BOB, "Someone else");

    expect(isResolved(again)).toBe(true);
    expect(again.displayName).toBeNull();
    expect(again.updatedAt).toBe(1000);
  });

  it("validates account ids and key lengths", () => {
    const keys = { encPublicKey: new Uint8Array(32), signPublicKey: new Uint8Array(32) };
    expect(() =>
      store.upsert({ accountId: "bob", ...keys, displayName: null, blocked: false }),
    ).toThrow(ProtocolError);
    expect(() =>
      store.upsert({
        accountId: BOB,
        encPublicKey: new Uint8Array(31),
        signPublicKey: new Uint8Array(32),
        displayName: null,
        blocked: false,
      }),
    ).toThrow("Public keys must be 32 bytes");
  });

  it("blocks accounts it has never seen", () => {
    store.setBlocked(CAROL, true);

    expect(store.isBlocked(CAROL)).toBe(true);
    expect(store.get(CAROL)?.encPublicKey).toEqual(placeholderKey());

    store.setBlocked(CAROL, false);
    expect(store.isBlocked(CAROL)).toBe(false);
  });

  it("replaces the whole list at once", () => {
    store.addUnresolved(BOB);
    store.replaceAll([
      {
        accountId: CAROL,
        encPublicKey: new Uint8Array(32).fill(3),
        signPublicKey: new Uint8Array(32).fill(4),
        displayName: "Carol",
        blocked: true,
      },
    ]);

    expect(store.list().map((c) => [c.accountId, c.displayName, c.blocked])).toEqual([
      [CAROL, "Carol", true],
    ]);
  });
});

describe("key directory and contacts backup", () => {
  let relay: FakeRelay;
  let api: FakeApi;
  let client: TestClient;
  let bob: IdentityKeys;
  let bobStatus: "active" | "banned";
  let stored: { nonce: string; ciphertext: string } | null;

  beforeEach(async () => {
    relay = new FakeRelay();
    api = new FakeApi();
    bob = await deriveIdentityKeys(generateMnemonic());
    bobStatus = "active";
    stored = null;

    api.on("GET", `/users/${BOB}/keys`, () => ({
      status: 200,
      data: {
        accountId: BOB,
        encPublicKey: b64(bob.encryption.publicKey),
        signPublicKey: b64(bob.signing.publicKey),
        status: bobStatus,
      },
    }));
    api.on("PUT", "/backup/contacts", (request): ApiReply => {
      const body = request.body;
      if (
        typeof body !== "object" ||
        body === null ||
        !("nonce" in body) ||
        !("ciphertext" in body) ||
        typeof body.nonce !== "string" ||
        typeof body.ciphertext !== "string"
      ) {
        return { status: 400 };
      }
      const created = stored === null;
      stored = { nonce: body.nonce, ciphertext: body.ciphertext };
      return {
        status: 200,
        data: { success: true, created, sizeBytes: body.ciphertext.length, updatedAt: 5000 },
      };
    });
    api.on("GET", "/backup/contacts", () =>
      stored
        ? { status: 200, data: { ...stored, sizeBytes: stored.ciphertext.length, updatedAt: 5000 } }
        : { status: 404, data: { error: "NOT_FOUND", message: "no backup" } },
    );

    client = await createClient(relay, { extra: { httpAdapter: api.adapter } });
  });

  afterEach(() => {
    client.engine.stop();
  });

  it("resolves a contact's keys from the directory", async () => {
    const contact = await client.engine.addContact(BOB, "Bob");

    expect(contact.encPublicKey).toEqual(bob.encryption.publicKey);
    expect(contact.signPublicKey).toEqual(bob.signing.publicKey);
    expect(contact.displayName).toBe("Bob");
    expect(client.engine.contacts.requireResolved(BOB).accountId).toBe(BOB);
  });

  it("does not ask the directory again for a resolved contact", async () => {
    await client.engine.addContact(BOB);
    await client.engine.keyDirectory.ensureResolved(BOB);

    expect(api.requests.filter((r) => r.path === `/users/${BOB}/keys`)).toHaveLength(1);
  });

  it("refuses banned accounts", async () => {
    bobStatus = "banned";
    await expect(client.engine.addContact(BOB)).rejects.toMatchObject({ code: "USER_BANNED" });
    expect(client.engine.contacts.get(BOB)?.signPublicKey).toEqual(placeholderKey());
  });

  it("refuses keys that differ from the stored ones", async () => {
    await client.engine.addContact(BOB);
    bob = await deriveIdentityKeys(generateMnemonic());

    const err = await client.engine.keyDirectory.resolve(BOB).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(KeyChangedError);
    expect(client.engine.contacts.get(BOB)?.signPublicKey).not.toEqual(bob.signing.publicKey);
  });

  it("refuses an answer for another account", async () => {
    api.on("GET", `/users/${CAROL}/keys`, () => ({
      status: 200,
      data: {
        accountId: BOB,
        encPublicKey: b64(bob.encryption.publicKey),
        signPublicKey: b64(bob.signing.publicKey),
        status: "active",
      },
    }));

    await expect(client.engine.addContact(CAROL)).rejects.toMatchObject({
      code: "INVALID_PAYLOAD",
      message: "Key directory answered for another account",
    });
  });

  it("refuses keys that are not 32 bytes", async () => {
    api.on("GET", `/users/${CAROL}/keys`, () => ({
      status: 200,
      data: {
        accountId: CAROL,
        encPublicKey: b64(new Uint8Array(16)),
        signPublicKey: b64(bob.signing.publicKey),
        status: "active",
      },
    }));

    await expect(client.engine.addContact(CAROL)).rejects.toMatchObject({
      code: "INVALID_PAYLOAD",
      message: "Directory keys must be 32 bytes of base64",
    });
  });

  it("restores the uploaded list over local changes", async () => {
    await client.engine.addContact(BOB, "Bob");
    client.engine.contacts.setBlocked(CAROL, true);

    const uploaded = await client.engine.backupContacts();
    expect(uploaded).toMatchObject({ success: true, created: true });

    client.engine.contacts.remove(BOB);
    client.engine.contacts.setBlocked(CAROL, false);

    await expect(client.engine.restoreContacts()).resolves.toBe(2);
    const list = client.engine.contacts.list();
    expect(list.map((c) => [c.accountId, c.displayName, c.blocked])).toEqual([
      [BOB, "Bob", false],
      [CAROL, null, true],
    ]);
    expect(list[0]?.signPublicKey).toEqual(bob.signing.publicKey);
  });

  it("returns null when there is no backup", async () => {
    await expect(client.engine.restoreContacts()).resolves.toBeNull();
  });

  it("cannot open another identity's backup", async () => {
    await client.engine.addContact(BOB);
    await client.engine.backupContacts();

    const other = await createClient(relay, { extra: { httpAdapter: api.adapter } });
    const err = await other.engine.restoreContacts().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CryptoError);
    expect(err).toMatchObject({ code: "DECRYPT_FAILED" });
    expect(other.engine.contacts.list()).toEqual([]);
    other.engine.stop();
  });
});
