/**
 * Frozen wire contract values. These are shared with the server and every
 * other client; they are not configuration.
 *
 * @module protocol/constants
 */

export const PROTOCOL_VERSION = 1;
export const CRYPTO_VERSION = 1;

export const MAX_FRAME_BYTES = 512_000;
export const MAX_TEXT_BYTES = 8_000;
export const MAX_ATTACHMENT_BYTES = 100 * 1024 * 1024;

export const PENDING_TTL_MS = 72 * 60 * 60 * 1000;
export const SESSION_TTL_MS = 7 * 24 * 60 * 60 * 1000;
export const CHALLENGE_TTL_MS = 60_000;
export const TIMESTAMP_SKEW_MS = 10 * 60 * 1000;
export const FETCH_PENDING_LIMIT = 50;

/** Refresh once less than this much session validity remains. */
export const SESSION_REFRESH_THRESHOLD_MS = 24 * 60 * 60 * 1000;

/** TURN credentials are treated as expired this long before their ttl. */
export const TURN_EXPIRY_MARGIN_MS = 60_000;

/** `WSP-XXXX-XXXX-XXXX` over the Base32 alphabet A-Z, 2-7. */
export const ACCOUNT_ID_REGEX = /^WSP-[A-Z2-7]{4}-[A-Z2-7]{4}-[A-Z2-7]{4}$/;

export function isValidAccountId(value: string): boolean {
  return ACCOUNT_ID_REGEX.test(value);
}

/**
 * Whether a signed timestamp is within the allowed skew of server time.
 */
export function isTimestampFresh(timestamp: number, serverNow: number): boolean {
  return Math.abs(serverNow - timestamp) <= TIMESTAMP_SKEW_MS;
}
