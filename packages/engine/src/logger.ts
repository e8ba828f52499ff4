/**
 * Structured logging (pino).
 *
 * Metadata only: message ids, account ids, states and error codes. Tokens,
 * key material, mnemonics, plaintext and ciphertext are redacted if they
 * ever end up in a log object.
 *
 * @module logger
 */
import pino from "pino";
import type { Logger } from "pino";
import type { EngineConfig } from "./config.js";

export type { Logger };

export const REDACT_PATHS = [
  "sessionToken",
  "*.sessionToken",
  "token",
  "credential",
  "*.credential",
  "mnemonic",
  "privateKey",
  "*.privateKey",
  "contactsKey",
  "storeKey",
  "plaintext",
  "*.plaintext",
  "ciphertext",
  "*.ciphertext",
  "headers.Authorization",
  "headers.authorization",
];

export function createLogger(config: Pick<EngineConfig, "logLevel">): Logger {
  return pino({
    level: config.logLevel,
    base: { app: "sotto-engine" },
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
  });
}

/** A logger that drops everything. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
