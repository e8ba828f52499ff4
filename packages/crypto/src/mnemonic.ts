/**
 * BIP39 mnemonic handling (English wordlist, 12 words).
 *
 * Validation happens before anything else touches the phrase, so a typo
 * never reaches key derivation or the network.
 *
 * @module mnemonic
 */
import {
  generateMnemonic as bip39Generate,
  validateMnemonic as bip39Validate,
} from "@scure/bip39";
import { wordlist } from "@scure/bip39/wordlists/english";
import { pbkdf2Sha512 } from "./kdf.js";

export const MNEMONIC_WORD_COUNT = 12;
export const BIP39_SEED_LENGTH = 64;
const BIP39_ITERATIONS = 2048;

const WORDS = new Set(wordlist);

export type InvalidMnemonicReason = "word_count" | "unknown_word" | "checksum";

/** Raised for a malformed recovery phrase. Local error: never retried. */
export class InvalidMnemonicError extends Error {
  readonly kind = "local" as const;
  readonly code = "INVALID_MNEMONIC";
  readonly retryable = false;

  constructor(public readonly reason: InvalidMnemonicReason) {
    super(`Invalid mnemonic: ${reason.replace("_", " ")}`);
    this.name = "InvalidMnemonicError";
  }
}

/**
 * Trim, lowercase, collapse whitespace and apply NFKD.
 */
export function normalizeMnemonic(mnemonic: string): string {
  return mnemonic
    .normalize("NFKD")
    .trim()
    .toLowerCase()
    .split(/\s+/)
    .join(" ");
}

/**
 * Check a mnemonic and report the first problem found.
 * Returns null when the phrase is valid.
 */
export function checkMnemonic(mnemonic: string): InvalidMnemonicReason | null {
  const normalized = normalizeMnemonic(mnemonic);
  const words = normalized.length === 0 ? [] : normalized.split(" ");
  if (words.length !== MNEMONIC_WORD_COUNT) return "word_count";
  if (words.some((w) => !WORDS.has(w))) return "unknown_word";
  if (!bip39Validate(normalized, wordlist)) return "checksum";
  return null;
}

export function isValidMnemonic(mnemonic: string): boolean {
  return checkMnemonic(mnemonic) === null;
}

/**
 * @throws InvalidMnemonicError
 */
export function requireValidMnemonic(mnemonic: string): string {
  const reason = checkMnemonic(mnemonic);
  if (reason !== null) throw new InvalidMnemonicError(reason);
  return normalizeMnemonic(mnemonic);
}

/** Generate a fresh 12-word (128-bit entropy) mnemonic. */
export function generateMnemonic(): string {
  return bip39Generate(wordlist, 128);
}

/**
 * BIP39 seed: PBKDF2-HMAC-SHA512(mnemonic, "mnemonic" + passphrase, 2048, 64).
 *
 * @throws InvalidMnemonicError
 */
export function mnemonicToSeed(mnemonic: string, passphrase = ""): Uint8Array {
  const normalized = requireValidMnemonic(mnemonic);
  const encoder = new TextEncoder();
  return pbkdf2Sha512(
    encoder.encode(normalized),
    encoder.encode(`mnemonic${passphrase.normalize("NFKD")}`),
    BIP39_ITERATIONS,
    BIP39_SEED_LENGTH,
  );
}
