/**
 * Canonical signing, box/secretbox, attachment codec, contacts backup
 * and replay guard tests.
 */
import { describe, it, expect, beforeAll } from "vitest";
import {
  initSodium,
  toBase64,
  fromBase64,
  buildCanonicalString,
  signCanonical,
  verifyCanonical,
  signChallenge,
  verifyChallenge,
  boxSeal,
  boxOpen,
  secretboxSeal,
  secretboxOpen,
  randomBytes,
  DecryptionError,
  encryptAttachment,
  decryptAttachment,
  sealContactsBackup,
  openContactsBackup,
  ReplayGuard,
  deriveIdentityKeys,
  generateMnemonic,
} from "../src/index.js";
import type { CanonicalFields, IdentityKeys } from "../src/index.js";

let alice: IdentityKeys;
let bob: IdentityKeys;

beforeAll(async () => {
  await initSodium();
  alice = await deriveIdentityKeys(generateMnemonic());
  bob = await deriveIdentityKeys(generateMnemonic());
});

const fields: CanonicalFields = {
  messageType: "send_message",
  messageId: "m-1",
  from: "WSP-AAAA-BBBB-CCCC",
  toOrGroupId: "WSP-DDDD-EEEE-FFFF",
  timestamp: 1700000000000,
  nonce: "bm9uY2U=",
  ciphertext: "Y3Q=",
};

describe("canonical codec", () => {
  it("should build the newline-terminated v1 string", () => {
    expect(buildCanonicalString(fields)).toBe(
      "v1\nsend_message\nm-1\nWSP-AAAA-BBBB-CCCC\nWSP-DDDD-EEEE-FFFF\n" +
        "1700000000000\nbm9uY2U=\nY3Q=\n",
    );
  });

  it("should verify its own signature", async () => {
    const sig = await signCanonical(fields, alice.signing.privateKey);
    expect(fromBase64(sig)).toHaveLength(64);
    expect(await verifyCanonical(fields, sig, alice.signing.publicKey)).toBe(
      true,
    );
  });

  it("should reject a tampered ciphertext", async () => {
    const sig = await signCanonical(fields, alice.signing.privateKey);
    const tampered = { ...fields, ciphertext: "Y3R4" };
    expect(
      await verifyCanonical(tampered, sig, alice.signing.publicKey),
    ).toBe(false);
  });

  it("should reject a substituted sender or recipient", async () => {
    const sig = await signCanonical(fields, alice.signing.privateKey);
    expect(
      await verifyCanonical(
        { ...fields, from: "WSP-ZZZZ-BBBB-CCCC" },
        sig,
        alice.signing.publicKey,
      ),
    ).toBe(false);
    expect(
      await verifyCanonical(
        { ...fields, toOrGroupId: "WSP-ZZZZ-EEEE-FFFF" },
        sig,
        alice.signing.publicKey,
      ),
    ).toBe(false);
  });

  it("should reject a different message type with identical fields", async () => {
    const sig = await signCanonical(fields, alice.signing.privateKey);
    expect(
      await verifyCanonical(
        { ...fields, messageType: "call_initiate" },
        sig,
        alice.signing.publicKey,
      ),
    ).toBe(false);
  });

  it("should reject the wrong key and malformed signatures", async () => {
    const sig = await signCanonical(fields, alice.signing.privateKey);
    expect(await verifyCanonical(fields, sig, bob.signing.publicKey)).toBe(
      false,
    );
    expect(await verifyCanonical(fields, "abc", alice.signing.publicKey)).toBe(
      false,
    );
    expect(
      await verifyCanonical(fields, sig, new Uint8Array(16)),
    ).toBe(false);
  });

  it("should sign and verify auth challenges", async () => {
    const challenge = await randomBytes(32);
    const sig = await signChallenge(challenge, alice.signing.privateKey);
    expect(
      await verifyChallenge(challenge, sig, alice.signing.publicKey),
    ).toBe(true);
    const other = await randomBytes(32);
    expect(await verifyChallenge(other, sig, alice.signing.publicKey)).toBe(
      false,
    );
  });
});

describe("box / secretbox", () => {
  const text = new TextEncoder().encode("hello bob");

  it("should open a box with the counterpart keys", async () => {
    const sealed = await boxSeal(
      text,
      bob.encryption.publicKey,
      alice.encryption.privateKey,
    );
    expect(sealed.nonce).toHaveLength(24);
    const opened = await boxOpen(
      sealed.ciphertext,
      sealed.nonce,
      alice.encryption.publicKey,
      bob.encryption.privateKey,
    );
    expect(new TextDecoder().decode(opened)).toBe("hello bob");
  });

  it("should throw DecryptionError on a flipped byte", async () => {
    const sealed = await boxSeal(
      text,
      bob.encryption.publicKey,
      alice.encryption.privateKey,
    );
    const corrupted = new Uint8Array(sealed.ciphertext);
    corrupted[0] = (corrupted[0] ?? 0) ^ 0xff;
    await expect(
      boxOpen(
        corrupted,
        sealed.nonce,
        alice.encryption.publicKey,
        bob.encryption.privateKey,
      ),
    ).rejects.toBeInstanceOf(DecryptionError);
  });

  it("should use a fresh nonce per seal", async () => {
    const a = await secretboxSeal(text, alice.contactsKey);
    const b = await secretboxSeal(text, alice.contactsKey);
    expect(toBase64(a.nonce)).not.toBe(toBase64(b.nonce));
    const opened = await secretboxOpen(a.ciphertext, a.nonce, alice.contactsKey);
    expect(opened).toEqual(text);
  });

  it("should refuse a secretbox under the wrong key", async () => {
    const sealed = await secretboxSeal(text, alice.contactsKey);
    await expect(
      secretboxOpen(sealed.ciphertext, sealed.nonce, bob.contactsKey),
    ).rejects.toBeInstanceOf(DecryptionError);
  });
});

describe("attachment codec", () => {
  const file = new Uint8Array(4096).map((_, i) => i % 251);

  it("should round-trip a file for the recipient", async () => {
    const enc = await encryptAttachment({
      plaintext: file,
      senderPrivateKey: alice.encryption.privateKey,
      recipientPublicKey: bob.encryption.publicKey,
    });
    expect(enc.ciphertext).toHaveLength(file.length + 16);
    expect(fromBase64(enc.fileNonce)).toHaveLength(24);

    const plain = await decryptAttachment({
      ciphertext: enc.ciphertext,
      fileNonce: enc.fileNonce,
      fileKeyBox: enc.fileKeyBox,
      senderPublicKey: alice.encryption.publicKey,
      recipientPrivateKey: bob.encryption.privateKey,
    });
    expect(plain).toEqual(file);
  });

  it("should not open for a third party", async () => {
    const mallory = await deriveIdentityKeys(generateMnemonic());
    const enc = await encryptAttachment({
      plaintext: file,
      senderPrivateKey: alice.encryption.privateKey,
      recipientPublicKey: bob.encryption.publicKey,
    });
    await expect(
      decryptAttachment({
        ...enc,
        senderPublicKey: alice.encryption.publicKey,
        recipientPrivateKey: mallory.encryption.privateKey,
      }),
    ).rejects.toBeInstanceOf(DecryptionError);
  });

  it("should reject a malformed file nonce", async () => {
    const enc = await encryptAttachment({
      plaintext: file,
      senderPrivateKey: alice.encryption.privateKey,
      recipientPublicKey: bob.encryption.publicKey,
    });
    await expect(
      decryptAttachment({
        ...enc,
        fileNonce: "AAAA",
        senderPublicKey: alice.encryption.publicKey,
        recipientPrivateKey: bob.encryption.privateKey,
      }),
    ).rejects.toThrow("Malformed attachment pointer");
  });
});

describe("contacts backup", () => {
  const contacts = [
    {
      accountId: "WSP-ZZZZ-ZZZZ-ZZZZ",
      encPublicKey: "ZW5j",
      signPublicKey: "c2ln",
      blocked: true,
    },
    {
      accountId: "WSP-AAAA-AAAA-AAAA",
      encPublicKey: "ZW5j",
      signPublicKey: "c2ln",
      displayName: "Ada",
      blocked: false,
    },
  ];

  it("should restore contacts sorted by account id", async () => {
    const payload = await sealContactsBackup(contacts, alice.contactsKey);
    const data = await openContactsBackup(payload, alice.contactsKey);
    expect(data.version).toBe(1);
    expect(data.contacts.map((c) => c.accountId)).toEqual([
      "WSP-AAAA-AAAA-AAAA",
      "WSP-ZZZZ-ZZZZ-ZZZZ",
    ]);
    expect(data.contacts[0]?.displayName).toBe("Ada");
  });

  it("should fail under another identity's contacts key", async () => {
    const payload = await sealContactsBackup(contacts, alice.contactsKey);
    await expect(
      openContactsBackup(payload, bob.contactsKey),
    ).rejects.toBeInstanceOf(DecryptionError);
  });

  it("should reject a malformed payload", async () => {
    await expect(
      openContactsBackup({ nonce: "AAAA", ciphertext: "AAAA" }, alice.contactsKey),
    ).rejects.toThrow("Malformed contacts backup payload");
  });
});

describe("ReplayGuard", () => {
  it("should accept once and reject repeats", () => {
    const guard = new ReplayGuard(100);
    expect(guard.accept("a")).toBe(true);
    expect(guard.accept("a")).toBe(false);
    expect(guard.hasSeen("a")).toBe(true);
    expect(guard.size).toBe(1);
  });

  it("should evict the oldest id when the window is full", () => {
    const guard = new ReplayGuard(3);
    for (const id of ["a", "b", "c", "d"]) guard.accept(id);
    expect(guard.hasSeen("a")).toBe(false);
    expect(guard.hasSeen("d")).toBe(true);
    expect(guard.accept("a")).toBe(true);
  });

  it("should survive export and import", () => {
    const guard = new ReplayGuard(10);
    guard.accept("x");
    guard.accept("y");
    const restored = ReplayGuard.import(guard.export());
    expect(restored.accept("x")).toBe(false);
    expect(restored.accept("z")).toBe(true);
  });

  it("should refuse an empty window", () => {
    expect(() => new ReplayGuard(0)).toThrow(RangeError);
  });
});
