/**
 * Identity derivation: mnemonic → BIP39 seed → HKDF subkeys → keypairs.
 *
 * The salt and info strings are frozen. Changing any of them breaks
 * recovery on every other client.
 *
 * @module identity
 */
import { hkdfSha256 } from "./kdf.js";
import { mnemonicToSeed } from "./mnemonic.js";
import {
  boxKeypairFromSeed,
  signingKeypairFromSeed,
  KEY_BYTES,
} from "./keys.js";
import type { BoxKeypair, SigningKeypair } from "./keys.js";

export const HKDF_SALT = "whisper";

export const HKDF_INFO = {
  ENCRYPTION: "whisper/enc",
  SIGNING: "whisper/sign",
  CONTACTS: "whisper/contacts",
} as const;

/** All key material recoverable from a mnemonic. */
export interface IdentityKeys {
  encryption: BoxKeypair;
  signing: SigningKeypair;
  /** Symmetric key for the encrypted contacts backup. */
  contactsKey: Uint8Array;
}

/** The three HKDF outputs before they are turned into keypairs. */
export interface DerivedSeeds {
  encSeed: Uint8Array;
  signSeed: Uint8Array;
  contactsKey: Uint8Array;
}

export function deriveSeeds(seed: Uint8Array): DerivedSeeds {
  if (seed.length !== 64) {
    throw new Error(`BIP39 seed must be 64 bytes, got ${seed.length}`);
  }
  return {
    encSeed: hkdfSha256(seed, HKDF_SALT, HKDF_INFO.ENCRYPTION, KEY_BYTES),
    signSeed: hkdfSha256(seed, HKDF_SALT, HKDF_INFO.SIGNING, KEY_BYTES),
    contactsKey: hkdfSha256(seed, HKDF_SALT, HKDF_INFO.CONTACTS, KEY_BYTES),
  };
}

/**
 * Derive the full identity from a recovery phrase.
 *
 * @throws InvalidMnemonicError before any derivation work when the phrase is malformed.
 */
export async function deriveIdentityKeys(mnemonic: string): Promise<IdentityKeys> {
  const seed = mnemonicToSeed(mnemonic);
  const { encSeed, signSeed, contactsKey } = deriveSeeds(seed);
  const encryption = await boxKeypairFromSeed(encSeed);
  const signing = await signingKeypairFromSeed(signSeed);
  seed.fill(0);
  encSeed.fill(0);
  signSeed.fill(0);
  return { encryption, signing, contactsKey };
}
