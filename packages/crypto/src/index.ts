/**
 * @sotto/crypto: client-side cryptography for the messaging engine.
 *
 * - BIP39 recovery phrase and deterministic identity derivation
 * - Canonical signing of envelopes and auth challenges
 * - crypto_box / crypto_secretbox payload encryption
 * - Attachment codec with per-file content keys
 * - Sealed contacts backup
 * - Replay protection
 */

export {
  initSodium,
  toBase64,
  fromBase64,
  fromBase64Strict,
  base64Length,
} from "./encoding.js";

export { hkdfSha256, pbkdf2Sha512 } from "./kdf.js";

export {
  MNEMONIC_WORD_COUNT,
  BIP39_SEED_LENGTH,
  InvalidMnemonicError,
  normalizeMnemonic,
  checkMnemonic,
  isValidMnemonic,
  requireValidMnemonic,
  generateMnemonic,
  mnemonicToSeed,
} from "./mnemonic.js";
export type { InvalidMnemonicReason } from "./mnemonic.js";

export {
  KEY_BYTES,
  boxKeypairFromSeed,
  signingKeypairFromSeed,
  isPlaceholderKey,
} from "./keys.js";
export type { BoxKeypair, SigningKeypair } from "./keys.js";

export {
  HKDF_SALT,
  HKDF_INFO,
  deriveSeeds,
  deriveIdentityKeys,
} from "./identity.js";
export type { IdentityKeys, DerivedSeeds } from "./identity.js";

export {
  CANONICAL_VERSION,
  SIGNATURE_BYTES,
  SIGNED_MESSAGE_TYPES,
  buildCanonicalString,
  buildCanonicalBytes,
  sha256,
  signCanonical,
  verifyCanonical,
  signChallenge,
  verifyChallenge,
} from "./canonical.js";
export type { CanonicalFields, SignedMessageType } from "./canonical.js";

export {
  NONCE_BYTES,
  DecryptionError,
  randomBytes,
  boxSeal,
  boxOpen,
  secretboxSeal,
  secretboxOpen,
  wipe,
} from "./box.js";
export type { Sealed } from "./box.js";

export {
  CONTENT_KEY_BYTES,
  encryptAttachment,
  decryptAttachment,
} from "./attachment.js";
export type { FileKeyBox, EncryptedAttachment } from "./attachment.js";

export {
  BACKUP_VERSION,
  MAX_BACKUP_BYTES,
  sealContactsBackup,
  openContactsBackup,
} from "./backup.js";
export type { BackupContact, BackupData, BackupPayload } from "./backup.js";

export { ReplayGuard } from "./replay.js";
