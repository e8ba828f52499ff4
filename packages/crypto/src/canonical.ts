/**
 * Canonical signing: the exact byte sequence every client signs.
 *
 *   "v1\n" + messageType + "\n" + messageId + "\n" + from + "\n" +
 *   toOrGroupId + "\n" + timestampMillis + "\n" + base64(nonce) + "\n" +
 *   base64(ciphertext) + "\n"
 *
 * signature = Ed25519(SHA-256(utf8(canonical)))
 *
 * Never sign JSON. Verification always rebuilds the string from the
 * fields as received, so substituting any of them breaks the signature.
 *
 * @module canonical
 */
import sodium from "libsodium-wrappers-sumo";
import { initSodium, toBase64, fromBase64Strict } from "./encoding.js";

export const CANONICAL_VERSION = "v1";
export const SIGNATURE_BYTES = 64;
export const SIGN_PUBLIC_KEY_BYTES = 32;

/** Frame types whose payloads carry a canonical signature. */
export const SIGNED_MESSAGE_TYPES = [
  "send_message",
  "group_send_message",
  "call_initiate",
  "call_answer",
  "call_ice_candidate",
  "call_end",
] as const;

export type SignedMessageType = (typeof SIGNED_MESSAGE_TYPES)[number];

/** Fields covered by a signature. `nonce` and `ciphertext` are base64. */
export interface CanonicalFields {
  messageType: SignedMessageType;
  messageId: string;
  from: string;
  toOrGroupId: string;
  timestamp: number;
  nonce: string;
  ciphertext: string;
}

export function buildCanonicalString(fields: CanonicalFields): string {
  return (
    `${CANONICAL_VERSION}\n` +
    `${fields.messageType}\n` +
    `${fields.messageId}\n` +
    `${fields.from}\n` +
    `${fields.toOrGroupId}\n` +
    `${fields.timestamp}\n` +
    `${fields.nonce}\n` +
    `${fields.ciphertext}\n`
  );
}

export function buildCanonicalBytes(fields: CanonicalFields): Uint8Array {
  return new TextEncoder().encode(buildCanonicalString(fields));
}

export async function sha256(data: Uint8Array): Promise<Uint8Array> {
  await initSodium();
  return sodium.crypto_hash_sha256(data);
}

/**
 * Sign the canonical form of an envelope. Returns the base64 signature.
 */
export async function signCanonical(
  fields: CanonicalFields,
  signPrivateKey: Uint8Array,
): Promise<string> {
  const digest = await sha256(buildCanonicalBytes(fields));
  return toBase64(sodium.crypto_sign_detached(digest, signPrivateKey));
}

/**
 * Verify a base64 signature over the received fields.
 * Malformed keys or signatures verify as false.
 */
export async function verifyCanonical(
  fields: CanonicalFields,
  signature: string,
  signPublicKey: Uint8Array,
): Promise<boolean> {
  await initSodium();
  const sig = fromBase64Strict(signature, SIGNATURE_BYTES);
  if (!sig || signPublicKey.length !== SIGN_PUBLIC_KEY_BYTES) return false;
  const digest = await sha256(buildCanonicalBytes(fields));
  try {
    return sodium.crypto_sign_verify_detached(sig, digest, signPublicKey);
  } catch {
    return false;
  }
}

/**
 * Sign an authentication challenge: Ed25519(SHA-256(challenge)), no wrapper.
 */
export async function signChallenge(
  challenge: Uint8Array,
  signPrivateKey: Uint8Array,
): Promise<string> {
  const digest = await sha256(challenge);
  return toBase64(sodium.crypto_sign_detached(digest, signPrivateKey));
}

export async function verifyChallenge(
  challenge: Uint8Array,
  signature: string,
  signPublicKey: Uint8Array,
): Promise<boolean> {
  await initSodium();
  const sig = fromBase64Strict(signature, SIGNATURE_BYTES);
  if (!sig || signPublicKey.length !== SIGN_PUBLIC_KEY_BYTES) return false;
  const digest = await sha256(challenge);
  try {
    return sodium.crypto_sign_verify_detached(sig, digest, signPublicKey);
  } catch {
    return false;
  }
}
