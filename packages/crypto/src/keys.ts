/**
 * Deterministic keypairs from 32-byte seeds.
 *
 * X25519 via crypto_box_seed_keypair and Ed25519 via crypto_sign_seed_keypair.
 * Both hash the seed internally, which is what every client does, so the
 * public keys match across platforms.
 *
 * @module keys
 */
import sodium from "libsodium-wrappers-sumo";
import { initSodium } from "./encoding.js";

/** X25519 keypair used for crypto_box. */
export interface BoxKeypair {
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

/** Ed25519 keypair. `privateKey` is the 64-byte libsodium secret key. */
export interface SigningKeypair {
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

export const KEY_BYTES = 32;

export async function boxKeypairFromSeed(seed: Uint8Array): Promise<BoxKeypair> {
  await initSodium();
  if (seed.length !== KEY_BYTES) {
    throw new Error(`Box seed must be ${KEY_BYTES} bytes, got ${seed.length}`);
  }
  const kp = sodium.crypto_box_seed_keypair(seed);
  return { publicKey: kp.publicKey, privateKey: kp.privateKey };
}

export async function signingKeypairFromSeed(
  seed: Uint8Array,
): Promise<SigningKeypair> {
  await initSodium();
  if (seed.length !== KEY_BYTES) {
    throw new Error(`Signing seed must be ${KEY_BYTES} bytes, got ${seed.length}`);
  }
  const kp = sodium.crypto_sign_seed_keypair(seed);
  return { publicKey: kp.publicKey, privateKey: kp.privateKey };
}

/** A public key made only of zero bytes marks a contact with no known key. */
export function isPlaceholderKey(key: Uint8Array): boolean {
  return key.length === KEY_BYTES && key.every((b) => b === 0);
}
