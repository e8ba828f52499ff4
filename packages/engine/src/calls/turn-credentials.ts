/**
 * TURN credential cache.
 *
 * Credentials are good until `receivedAt + ttl - 60s`. Concurrent callers
 * share one in-flight request.
 *
 * @module calls/turn-credentials
 */
import type { Logger } from "pino";
import type { ConnectionManager } from "../connection/connection-manager.js";
import type { SessionManager } from "../session/session-manager.js";
import { ProtocolError } from "../errors.js";
import { TURN_EXPIRY_MARGIN_MS } from "../protocol/constants.js";

export interface TurnCredentials {
  urls: string[];
  username: string;
  credential: string;
  /** Lifetime in seconds as issued by the server. */
  ttl: number;
  receivedAt: number;
  validUntil: number;
}

export interface TurnCredentialCacheOptions {
  connection: ConnectionManager;
  session: SessionManager;
  logger: Logger;
  now?: () => number;
}

export class TurnCredentialCache {
  private cached: TurnCredentials | null = null;
  private inflight: Promise<TurnCredentials> | null = null;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(private readonly options: TurnCredentialCacheOptions) {
    this.log = options.logger.child({ module: "turn" });
    this.now = options.now ?? Date.now;
  }

  /** Valid cached credentials, or null. */
  peek(): TurnCredentials | null {
    const cached = this.cached;
    return cached && this.now() < cached.validUntil ? cached : null;
  }

  /** Cached credentials if still valid, otherwise fresh ones from the server. */
  get(): Promise<TurnCredentials> {
    const cached = this.peek();
    if (cached) return Promise.resolve(cached);
    if (this.inflight) return this.inflight;
    const promise = this.fetch().finally(() => {
      if (this.inflight === promise) this.inflight = null;
    });
    this.inflight = promise;
    return promise;
  }

  invalidate(): void {
    this.cached = null;
  }

  private async fetch(): Promise<TurnCredentials> {
    const response = await this.options.connection.request({
      type: "get_turn_credentials",
      payload: this.options.session.privileged({}),
    });
    if (response.type !== "turn_credentials") {
      throw new ProtocolError("INVALID_PAYLOAD", `Expected turn_credentials, got ${response.type}`);
    }
    const receivedAt = this.now();
    const { urls, username, credential, ttl } = response.payload;
    const credentials: TurnCredentials = {
      urls,
      username,
      credential,
      ttl,
      receivedAt,
      validUntil: receivedAt + ttl * 1000 - TURN_EXPIRY_MARGIN_MS,
    };
    this.cached = credentials;
    this.log.debug({ validUntil: credentials.validUntil }, "TURN credentials refreshed");
    return credentials;
  }
}
