/**
 * Identity derivation, mnemonic handling and KDF tests.
 */
import { describe, it, expect, beforeAll } from "vitest";
import sodium from "libsodium-wrappers-sumo";
import {
  initSodium,
  toBase64,
  fromBase64,
  fromBase64Strict,
  base64Length,
  hkdfSha256,
  mnemonicToSeed,
  normalizeMnemonic,
  checkMnemonic,
  isValidMnemonic,
  requireValidMnemonic,
  generateMnemonic,
  InvalidMnemonicError,
  deriveSeeds,
  deriveIdentityKeys,
  isPlaceholderKey,
  HKDF_INFO,
} from "../src/index.js";

const ABANDON =
  "abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon about";

const hex = (bytes: Uint8Array) => sodium.to_hex(bytes);

beforeAll(async () => {
  await initSodium();
});

describe("initSodium", () => {
  it("should be idempotent", async () => {
    const a = await initSodium();
    const b = await initSodium();
    expect(a).toBe(b);
  });

  it("should hand concurrent callers the same readiness promise", () => {
    expect(initSodium()).toBe(initSodium());
  });
});

describe("wire encoding", () => {
  it("should round-trip base64 encoding", () => {
    const data = new Uint8Array([1, 2, 3, 255, 0, 128]);
    expect(fromBase64(toBase64(data))).toEqual(data);
  });

  it("should decode canonical padded base64 strictly", () => {
    expect(fromBase64Strict("AAAA")).toEqual(new Uint8Array([0, 0, 0]));
    expect(fromBase64Strict("AAAA", 3)).toEqual(new Uint8Array([0, 0, 0]));
    expect(fromBase64Strict("AA==", 1)).toEqual(new Uint8Array([0]));
  });

  it("should size padded base64 text", () => {
    expect(base64Length(0)).toBe(0);
    expect(base64Length(1)).toBe(4);
    expect(base64Length(24)).toBe(32);
    expect(base64Length(32)).toBe(44);
    expect(base64Length(64)).toBe(88);
  });

  it("should reject the url-safe alphabet and stray padding bits", () => {
    expect(fromBase64Strict("-_-_")).toBeNull();
    expect(fromBase64Strict("AB==")).toBeNull();
    expect(fromBase64Strict("AA")).toBeNull();
  });

  it("should reject wrong lengths and non-canonical input", () => {
    expect(fromBase64Strict("AAAA", 4)).toBeNull();
    expect(fromBase64Strict("AAA")).toBeNull();
    expect(fromBase64Strict("not base64!")).toBeNull();
  });
});

describe("hkdfSha256", () => {
  it("should match RFC 5869 test case 1", () => {
    const ikm = new Uint8Array(22).fill(0x0b);
    const salt = sodium.from_hex("000102030405060708090a0b0c");
    const info = sodium.from_hex("f0f1f2f3f4f5f6f7f8f9");
    expect(hex(hkdfSha256(ikm, salt, info, 42))).toBe(
      "3cb25f25faacd57a90434f64d0362f2a2d2d0a90cf1a5a4c5db02d56ecc4c5bf34007208d5b887185865",
    );
  });

  it("should separate outputs by info string", () => {
    const ikm = new Uint8Array(64).fill(7);
    const a = hkdfSha256(ikm, "whisper", HKDF_INFO.ENCRYPTION, 32);
    const b = hkdfSha256(ikm, "whisper", HKDF_INFO.SIGNING, 32);
    expect(hex(a)).not.toBe(hex(b));
  });
});

describe("mnemonic", () => {
  it("should normalize case and whitespace", () => {
    expect(normalizeMnemonic("  Abandon \t  ABOUT\n")).toBe("abandon about");
  });

  it("should accept the reference phrase regardless of case", () => {
    expect(isValidMnemonic(ABANDON)).toBe(true);
    expect(isValidMnemonic(ABANDON.toUpperCase())).toBe(true);
  });

  it("should report a wrong word count", () => {
    const eleven = ABANDON.split(" ").slice(0, 11).join(" ");
    expect(checkMnemonic(eleven)).toBe("word_count");
    expect(checkMnemonic("")).toBe("word_count");
    expect(checkMnemonic(`${ABANDON} abandon`)).toBe("word_count");
  });

  it("should report an unknown word", () => {
    const words = ABANDON.split(" ");
    words[3] = "zzzzzz";
    expect(checkMnemonic(words.join(" "))).toBe("unknown_word");
  });

  it("should report a bad checksum", () => {
    const twelve = Array.from({ length: 12 }, () => "abandon").join(" ");
    expect(checkMnemonic(twelve)).toBe("checksum");
  });

  it("should throw InvalidMnemonicError with a reason", () => {
    try {
      requireValidMnemonic("abandon about");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidMnemonicError);
      if (err instanceof InvalidMnemonicError) {
        expect(err.reason).toBe("word_count");
        expect(err.code).toBe("INVALID_MNEMONIC");
        expect(err.retryable).toBe(false);
      }
    }
  });

  it("should generate valid 12-word phrases", () => {
    const phrase = generateMnemonic();
    expect(phrase.split(" ")).toHaveLength(12);
    expect(isValidMnemonic(phrase)).toBe(true);
    expect(generateMnemonic()).not.toBe(phrase);
  });

  it("should produce the BIP39 reference seed", () => {
    expect(hex(mnemonicToSeed(ABANDON))).toBe(
      "5eb00bbddcf069084889a8ab9155568165f5c453ccb85e70811aaed6f6da5fc1" +
        "9a5ac40b389cd370d086206dec8aa6c43daea6690f20ad3d8d48b2d2ce9e38e4",
    );
  });
});

describe("identity derivation", () => {
  it("should derive the fixed HKDF subkeys", () => {
    const seeds = deriveSeeds(mnemonicToSeed(ABANDON));
    expect(hex(seeds.encSeed)).toBe(
      "08851144b1bdf8b99c563bd408f4a613943fef2d9120397573932bd9833e0149",
    );
    expect(hex(seeds.signSeed)).toBe(
      "457f5c29bc4ab25ea84b9d076fee560db80b9994725106594400e28672f3e5be",
    );
    expect(hex(seeds.contactsKey)).toBe(
      "de3d0fda0659df936a71ee48cf6519da84b285344916511b5244d2ac36c23ff2",
    );
  });

  it("should derive the reference public keys", async () => {
    const keys = await deriveIdentityKeys(ABANDON);
    expect(toBase64(keys.encryption.publicKey)).toBe(
      "GcbQ+YaCf46Gpe1KIz8u0clzVVNtDSbErjsrkINpwFA=",
    );
    expect(toBase64(keys.signing.publicKey)).toBe(
      "vZMMu/hWu3bywlxkBiopRMxgZbpUua9yQtK/veXXyVs=",
    );
    expect(keys.encryption.privateKey).toHaveLength(32);
    expect(keys.signing.privateKey).toHaveLength(64);
    expect(keys.contactsKey).toHaveLength(32);
  });

  it("should be deterministic across calls", async () => {
    const a = await deriveIdentityKeys(ABANDON);
    const b = await deriveIdentityKeys(`  ${ABANDON.toUpperCase()} `);
    expect(toBase64(a.encryption.privateKey)).toBe(
      toBase64(b.encryption.privateKey),
    );
    expect(toBase64(a.contactsKey)).toBe(toBase64(b.contactsKey));
  });

  it("should reject an invalid phrase before deriving anything", async () => {
    await expect(deriveIdentityKeys("abandon abandon")).rejects.toBeInstanceOf(
      InvalidMnemonicError,
    );
  });

  it("should reject a seed of the wrong length", () => {
    expect(() => deriveSeeds(new Uint8Array(32))).toThrow(/64 bytes/);
  });
});

describe("isPlaceholderKey", () => {
  it("should flag all-zero keys only", () => {
    expect(isPlaceholderKey(new Uint8Array(32))).toBe(true);
    const k = new Uint8Array(32);
    k[31] = 1;
    expect(isPlaceholderKey(k)).toBe(false);
    expect(isPlaceholderKey(new Uint8Array(16))).toBe(false);
  });
});
