/**
 * Encrypted contacts backup blob.
 *
 * The contact list is serialised as JSON, sorted by account id so that
 * equal lists produce equal plaintexts, and sealed with crypto_secretbox
 * under the mnemonic-derived contacts key. The server only ever stores
 * `{ nonce, ciphertext }`.
 *
 * @module backup
 */
import { initSodium, toBase64, fromBase64Strict } from "./encoding.js";
import { secretboxSeal, secretboxOpen, NONCE_BYTES } from "./box.js";

export const BACKUP_VERSION = 1;
export const MAX_BACKUP_BYTES = 256 * 1024;

export interface BackupContact {
  accountId: string;
  encPublicKey: string; // base64
  signPublicKey: string; // base64
  displayName?: string;
  blocked: boolean;
}

export interface BackupData {
  version: number;
  contacts: BackupContact[];
}

/** What the server stores. */
export interface BackupPayload {
  nonce: string; // base64
  ciphertext: string; // base64
}

export async function sealContactsBackup(
  contacts: BackupContact[],
  contactsKey: Uint8Array,
): Promise<BackupPayload> {
  const sorted = [...contacts].sort((a, b) =>
    a.accountId < b.accountId ? -1 : a.accountId > b.accountId ? 1 : 0,
  );
  const data: BackupData = { version: BACKUP_VERSION, contacts: sorted };
  const plaintext = new TextEncoder().encode(JSON.stringify(data));
  if (plaintext.length > MAX_BACKUP_BYTES) {
    throw new Error(`Contacts backup exceeds ${MAX_BACKUP_BYTES} bytes`);
  }
  const { nonce, ciphertext } = await secretboxSeal(plaintext, contactsKey);
  return { nonce: toBase64(nonce), ciphertext: toBase64(ciphertext) };
}

/**
 * @throws DecryptionError if the key is wrong or the blob was modified.
 * @throws Error on a malformed or unsupported payload.
 */
export async function openContactsBackup(
  payload: BackupPayload,
  contactsKey: Uint8Array,
): Promise<BackupData> {
  await initSodium();
  const nonce = fromBase64Strict(payload.nonce, NONCE_BYTES);
  const ciphertext = fromBase64Strict(payload.ciphertext);
  if (!nonce || !ciphertext) {
    throw new Error("Malformed contacts backup payload");
  }
  const plaintext = await secretboxOpen(ciphertext, nonce, contactsKey);
  const parsed: unknown = JSON.parse(new TextDecoder().decode(plaintext));
  if (!isBackupData(parsed)) {
    throw new Error("Unsupported contacts backup format");
  }
  return parsed;
}

function isBackupData(value: unknown): value is BackupData {
  if (typeof value !== "object" || value === null) return false;
  if (!("version" in value) || value.version !== BACKUP_VERSION) return false;
  if (!("contacts" in value) || !Array.isArray(value.contacts)) return false;
  return value.contacts.every(
    (c: unknown) =>
      typeof c === "object" &&
      c !== null &&
      "accountId" in c &&
      typeof c.accountId === "string" &&
      "encPublicKey" in c &&
      typeof c.encPublicKey === "string" &&
      "signPublicKey" in c &&
      typeof c.signPublicKey === "string" &&
      "blocked" in c &&
      typeof c.blocked === "boolean",
  );
}
