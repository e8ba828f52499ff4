/**
 * Error taxonomy.
 *
 * Every engine error carries a `kind` (which layer failed), a stable
 * `code`, and whether retrying the same operation can succeed.
 *
 * @module errors
 */

export type ErrorKind = "protocol" | "crypto" | "transport" | "session" | "local";

export class EngineError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly code: string,
    public readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EngineError";
  }
}

/** Server error codes that will fail the same way on every retry. */
export const PERMANENT_SERVER_CODES: ReadonlySet<string> = new Set([
  "INVALID_PAYLOAD",
  "INVALID_TIMESTAMP",
  "NOT_FOUND",
  "FORBIDDEN",
  "USER_BANNED",
  "NOT_REGISTERED",
]);

/** Server error codes that invalidate the current session. */
export const AUTH_SERVER_CODES: ReadonlySet<string> = new Set([
  "AUTH_FAILED",
  "UNAUTHORIZED",
]);

/**
 * A server error frame, an HTTP error body, or a payload that failed
 * local validation.
 */
export class ProtocolError extends EngineError {
  constructor(
    code: string,
    message: string = code,
    public readonly requestId?: string,
  ) {
    super(
      message,
      "protocol",
      code,
      !PERMANENT_SERVER_CODES.has(code) && !AUTH_SERVER_CODES.has(code),
    );
    this.name = "ProtocolError";
  }
}

export class InvalidTimestampError extends ProtocolError {
  constructor(
    public readonly timestamp: number,
    public readonly serverNow: number,
  ) {
    super(
      "INVALID_TIMESTAMP",
      `Timestamp ${timestamp} is outside the allowed skew (server time ${serverNow})`,
    );
    this.name = "InvalidTimestampError";
  }
}

export type CryptoErrorCode = "BAD_SIGNATURE" | "DECRYPT_FAILED" | "MALFORMED";

export class CryptoError extends EngineError {
  constructor(code: CryptoErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, "crypto", code, false, options);
    this.name = "CryptoError";
  }
}

/** A resolved contact's keys differ from what the directory now returns. */
export class KeyChangedError extends EngineError {
  constructor(public readonly accountId: string) {
    super(
      `Public keys for ${accountId} changed; keys are immutable per identity`,
      "crypto",
      "KEY_CHANGED",
      false,
    );
    this.name = "KeyChangedError";
  }
}

export class ConnectionLostError extends EngineError {
  constructor(message = "Connection lost") {
    super(message, "transport", "CONNECTION_LOST", true);
    this.name = "ConnectionLostError";
  }
}

export class NotConnectedError extends EngineError {
  constructor() {
    super("Not connected", "transport", "NOT_CONNECTED", true);
    this.name = "NotConnectedError";
  }
}

export class RequestTimeoutError extends EngineError {
  constructor(what: string, timeoutMs: number) {
    super(`${what} timed out after ${timeoutMs}ms`, "transport", "REQUEST_TIMEOUT", true);
    this.name = "RequestTimeoutError";
  }
}

export type SessionErrorCode =
  | "AUTH_FAILED"
  | "AUTH_TIMEOUT"
  | "SESSION_EXPIRED"
  | "NOT_AUTHENTICATED";

export class SessionError extends EngineError {
  constructor(
    code: SessionErrorCode,
    message: string = code,
    options?: { cause?: unknown },
  ) {
    super(message, "session", code, code !== "AUTH_FAILED", options);
    this.name = "SessionError";
  }
}

export class StorageError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "local", "STORAGE", false, options);
    this.name = "StorageError";
  }
}

/** Outbound encryption needs a contact whose public keys are known. */
export class UnresolvedContactError extends EngineError {
  constructor(public readonly accountId: string) {
    super(`Contact ${accountId} has no known public keys`, "local", "UNRESOLVED_CONTACT", false);
    this.name = "UnresolvedContactError";
  }
}

export function isAuthFailureCode(code: string): boolean {
  return AUTH_SERVER_CODES.has(code);
}

export function isPermanentServerCode(code: string): boolean {
  return PERMANENT_SERVER_CODES.has(code);
}
