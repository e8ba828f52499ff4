/**
 * Engine database (better-sqlite3).
 *
 * One file per installation, WAL mode, idempotent migrations. Rows that
 * hold secrets live in `secure_kv` and are sealed before they reach disk.
 *
 * @module storage/database
 */
import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import path from "node:path";
import { StorageError } from "../errors.js";

export type Db = Database.Database;

export const DATABASE_FILE = "engine.db";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS outbox (
  seq             INTEGER PRIMARY KEY AUTOINCREMENT,
  message_id      TEXT    NOT NULL UNIQUE,
  peer            TEXT    NOT NULL,
  frame_type      TEXT    NOT NULL,
  payload         TEXT    NOT NULL,
  status          TEXT    NOT NULL,
  retry_count     INTEGER NOT NULL DEFAULT 0,
  next_attempt_at INTEGER NOT NULL DEFAULT 0,
  last_error      TEXT,
  delivery        TEXT,
  enqueued_at     INTEGER NOT NULL,
  updated_at      INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS outbox_peer_status ON outbox (peer, status, seq);

CREATE TABLE IF NOT EXISTS contacts (
  account_id      TEXT PRIMARY KEY,
  enc_public_key  TEXT    NOT NULL,
  sign_public_key TEXT    NOT NULL,
  display_name    TEXT,
  blocked         INTEGER NOT NULL DEFAULT 0,
  updated_at      INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS pending_requests (
  message_id  TEXT PRIMARY KEY,
  sender      TEXT    NOT NULL,
  payload     TEXT    NOT NULL,
  received_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS pending_requests_sender ON pending_requests (sender, received_at);

CREATE TABLE IF NOT EXISTS secure_kv (
  key        TEXT PRIMARY KEY,
  nonce      BLOB NOT NULL,
  ciphertext BLOB NOT NULL
);
`;

/**
 * Open (creating if needed) the engine database. Pass ":memory:" for an
 * in-process database.
 */
export function openDatabase(file: string): Db {
  let db: Db;
  try {
    if (file !== ":memory:") {
      mkdirSync(path.dirname(file), { recursive: true });
    }
    db = new Database(file);
  } catch (err) {
    throw new StorageError(`Cannot open database at ${file}`, { cause: err });
  }
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);
  return db;
}

export function databasePath(dataDir: string): string {
  return path.join(dataDir, DATABASE_FILE);
}
