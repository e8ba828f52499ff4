/**
 * Authenticated encryption: crypto_box (X25519 + XSalsa20-Poly1305) for
 * pairwise payloads and crypto_secretbox for symmetric ones.
 *
 * Each seal draws a fresh 24-byte nonce; the caller transmits it next to
 * the ciphertext.
 *
 * @module box
 */
import sodium from "libsodium-wrappers-sumo";
import { initSodium } from "./encoding.js";

export const NONCE_BYTES = 24;

/** Error raised when authenticated decryption fails. */
export class DecryptionError extends Error {
  constructor(message = "Decryption failed: ciphertext or keys do not match") {
    super(message);
    this.name = "DecryptionError";
  }
}

export interface Sealed {
  nonce: Uint8Array;
  ciphertext: Uint8Array;
}

export async function randomBytes(length: number): Promise<Uint8Array> {
  await initSodium();
  return sodium.randombytes_buf(length);
}

/**
 * box(plaintext, nonce, recipientPub, senderPriv)
 */
export async function boxSeal(
  plaintext: Uint8Array,
  recipientPublicKey: Uint8Array,
  senderPrivateKey: Uint8Array,
): Promise<Sealed> {
  await initSodium();
  const nonce = sodium.randombytes_buf(NONCE_BYTES);
  const ciphertext = sodium.crypto_box_easy(
    plaintext,
    nonce,
    recipientPublicKey,
    senderPrivateKey,
  );
  return { nonce, ciphertext };
}

/**
 * box.open(ciphertext, nonce, senderPub, recipientPriv)
 *
 * @throws DecryptionError
 */
export async function boxOpen(
  ciphertext: Uint8Array,
  nonce: Uint8Array,
  senderPublicKey: Uint8Array,
  recipientPrivateKey: Uint8Array,
): Promise<Uint8Array> {
  await initSodium();
  try {
    return sodium.crypto_box_open_easy(
      ciphertext,
      nonce,
      senderPublicKey,
      recipientPrivateKey,
    );
  } catch {
    throw new DecryptionError();
  }
}

export async function secretboxSeal(
  plaintext: Uint8Array,
  key: Uint8Array,
): Promise<Sealed> {
  await initSodium();
  const nonce = sodium.randombytes_buf(NONCE_BYTES);
  return { nonce, ciphertext: sodium.crypto_secretbox_easy(plaintext, nonce, key) };
}

/**
 * @throws DecryptionError
 */
export async function secretboxOpen(
  ciphertext: Uint8Array,
  nonce: Uint8Array,
  key: Uint8Array,
): Promise<Uint8Array> {
  await initSodium();
  try {
    return sodium.crypto_secretbox_open_easy(ciphertext, nonce, key);
  } catch {
    throw new DecryptionError();
  }
}

/** Best-effort wipe of key material. */
export function wipe(...buffers: Uint8Array[]): void {
  for (const buf of buffers) sodium.memzero(buf);
}
