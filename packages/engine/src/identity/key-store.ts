/**
 * Sealed key/value store on the `secure_kv` table.
 *
 * Values are sealed with crypto_secretbox under a 32-byte store key that
 * the host platform supplies (keychain, keystore). Nothing in this table
 * is readable without that key.
 *
 * @module identity/key-store
 */
import { secretboxSeal, secretboxOpen, DecryptionError } from "@sotto/crypto";
import type { Db } from "../storage/database.js";
import { StorageError } from "../errors.js";

export const STORE_KEY_BYTES = 32;

interface SealedRow {
  nonce: Buffer;
  ciphertext: Buffer;
}

export class SecureKeyValueStore {
  constructor(
    private readonly db: Db,
    private readonly storeKey: Uint8Array,
  ) {
    if (storeKey.length !== STORE_KEY_BYTES) {
      throw new StorageError(`Store key must be ${STORE_KEY_BYTES} bytes`);
    }
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    const { nonce, ciphertext } = await secretboxSeal(value, this.storeKey);
    this.db
      .prepare<[string, Buffer, Buffer]>(
        "INSERT OR REPLACE INTO secure_kv (key, nonce, ciphertext) VALUES (?, ?, ?)",
      )
      .run(key, Buffer.from(nonce), Buffer.from(ciphertext));
  }

  async get(key: string): Promise<Uint8Array | null> {
    const row = this.db
      .prepare<[string], SealedRow>("SELECT nonce, ciphertext FROM secure_kv WHERE key = ?")
      .get(key);
    if (!row) return null;
    try {
      return await secretboxOpen(
        new Uint8Array(row.ciphertext),
        new Uint8Array(row.nonce),
        this.storeKey,
      );
    } catch (err) {
      if (err instanceof DecryptionError) {
        throw new StorageError(`Secure entry "${key}" cannot be opened with this store key`, {
          cause: err,
        });
      }
      throw err;
    }
  }

  async putString(key: string, value: string): Promise<void> {
    await this.put(key, new TextEncoder().encode(value));
  }

  async getString(key: string): Promise<string | null> {
    const bytes = await this.get(key);
    return bytes ? new TextDecoder().decode(bytes) : null;
  }

  delete(key: string): void {
    this.db.prepare<[string]>("DELETE FROM secure_kv WHERE key = ?").run(key);
  }

  clear(): void {
    this.db.prepare("DELETE FROM secure_kv").run();
  }
}
