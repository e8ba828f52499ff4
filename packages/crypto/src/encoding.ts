/**
 * libsodium readiness and the wire's byte encoding.
 *
 * Every binary field on the wire (keys, nonces, ciphertexts, signatures)
 * is standard padded base64. Strict decoding accepts only input that
 * re-encodes to the same string.
 *
 * @module encoding
 */
import sodium from "libsodium-wrappers-sumo";

let ready: Promise<typeof sodium> | null = null;

/** Resolves once libsodium has loaded. Concurrent callers share one wait. */
export function initSodium(): Promise<typeof sodium> {
  if (!ready) ready = sodium.ready.then(() => sodium);
  return ready;
}

export function toBase64(data: Uint8Array): string {
  return sodium.to_base64(data, sodium.base64_variants.ORIGINAL);
}

/** @throws when `encoded` is not base64. Prefer {@link fromBase64Strict} for wire input. */
export function fromBase64(encoded: string): Uint8Array {
  return sodium.from_base64(encoded, sodium.base64_variants.ORIGINAL);
}

/**
 * Decode a wire field. Null for malformed or non-canonical input, or when
 * `expectedBytes` is given and the decoded length differs.
 */
export function fromBase64Strict(encoded: string, expectedBytes?: number): Uint8Array | null {
  if (expectedBytes !== undefined && encoded.length !== base64Length(expectedBytes)) {
    return null;
  }
  let decoded: Uint8Array;
  try {
    decoded = fromBase64(encoded);
  } catch {
    return null;
  }
  if (toBase64(decoded) !== encoded) return null;
  if (expectedBytes !== undefined && decoded.length !== expectedBytes) return null;
  return decoded;
}

/** Length of the padded base64 text for `bytes` bytes. */
export function base64Length(bytes: number): number {
  return Math.ceil(bytes / 3) * 4;
}
