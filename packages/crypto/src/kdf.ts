/**
 * Key derivation primitives: HKDF-SHA256 (RFC 5869) and PBKDF2-HMAC-SHA512.
 *
 * libsodium's HMAC-SHA256 only takes 32-byte keys, and the identity chain
 * uses the 7-byte salt "whisper", so both KDFs come from @noble/hashes.
 *
 * @module kdf
 */
import { hkdf } from "@noble/hashes/hkdf";
import { pbkdf2 } from "@noble/hashes/pbkdf2";
import { sha256, sha512 } from "@noble/hashes/sha2";

const encoder = new TextEncoder();

/**
 * HKDF-SHA256 extract-then-expand.
 */
export function hkdfSha256(
  ikm: Uint8Array,
  salt: Uint8Array | string,
  info: Uint8Array | string,
  length: number,
): Uint8Array {
  const saltBytes = typeof salt === "string" ? encoder.encode(salt) : salt;
  const infoBytes = typeof info === "string" ? encoder.encode(info) : info;
  return hkdf(sha256, ikm, saltBytes, infoBytes, length);
}

/**
 * PBKDF2-HMAC-SHA512.
 */
export function pbkdf2Sha512(
  password: Uint8Array,
  salt: Uint8Array,
  iterations: number,
  length: number,
): Uint8Array {
  return pbkdf2(sha512, password, salt, { c: iterations, dkLen: length });
}
