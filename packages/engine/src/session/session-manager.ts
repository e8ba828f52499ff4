/**
 * Session manager: challenge/response authentication per ConnectionInstance,
 * token refresh, logout and the server clock offset.
 *
 * Exactly one authentication attempt runs per ConnectionInstance. A caller
 * that arrives while one is in flight gets the same promise; nothing ever
 * sends a second register_begin on that connection. A new ConnectionInstance
 * always runs the full flow again: tokens are never carried across.
 *
 * @module session/session-manager
 */
import type { Logger } from "pino";
import { fromBase64Strict, signChallenge, toBase64 } from "@sotto/crypto";
import type { ConnectionManager } from "../connection/connection-manager.js";
import type { IdentityManager } from "../identity/identity-manager.js";
import type { Platform } from "../config.js";
import { TypedEmitter } from "../events.js";
import type { Unsubscribe } from "../events.js";
import {
  ConnectionLostError,
  NotConnectedError,
  ProtocolError,
  SessionError,
} from "../errors.js";
import { versionFields } from "../protocol/frames.js";
import type { VersionFields } from "../protocol/frames.js";
import { SESSION_REFRESH_THRESHOLD_MS } from "../protocol/constants.js";
import {
  canTransition,
  initialAuthState,
  transitionAuth,
} from "./session-state.js";
import type { AuthPhase, AuthState } from "./session-state.js";

export interface Session {
  sessionToken: string;
  expiresAt: number;
  accountId: string;
  deviceId: string;
  instanceId: string;
}

export interface SessionEvents {
  phase: AuthPhase;
  authenticated: Session;
  refreshed: Session;
  unauthenticated: { reason: string };
}

export interface SessionManagerOptions {
  connection: ConnectionManager;
  identity: IdentityManager;
  platform: Platform;
  authTimeoutMs: number;
  logger: Logger;
  refreshThresholdMs?: number;
  now?: () => number;
}

export type Privileged<T> = T & VersionFields & { sessionToken: string };

const CHALLENGE_BYTES = 32;
const MAX_TIMER_MS = 2 ** 31 - 1;
/** Floor between scheduled refreshes when the server issues short sessions. */
const MIN_REFRESH_DELAY_MS = 60_000;

/** Server codes that mean the credentials themselves were refused. */
const AUTH_REJECTION_CODES: ReadonlySet<string> = new Set([
  "AUTH_FAILED",
  "UNAUTHORIZED",
  "USER_BANNED",
  "NOT_REGISTERED",
  "FORBIDDEN",
]);

type Timer = ReturnType<typeof setTimeout>;

export class SessionManager {
  private readonly connection: ConnectionManager;
  private readonly identity: IdentityManager;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly events: TypedEmitter<SessionEvents>;
  private readonly refreshThresholdMs: number;

  private authState: AuthState;
  private _session: Session | null = null;
  private inflight: { instanceId: string; promise: Promise<Session> } | null = null;
  private refreshing: Promise<Session> | null = null;
  private attemptSeq = 0;
  private clockOffset = 0;
  private refreshTimer: Timer | null = null;

  constructor(private readonly options: SessionManagerOptions) {
    this.connection = options.connection;
    this.identity = options.identity;
    this.log = options.logger.child({ module: "session" });
    this.now = options.now ?? Date.now;
    this.refreshThresholdMs = options.refreshThresholdMs ?? SESSION_REFRESH_THRESHOLD_MS;
    this.authState = initialAuthState(null, this.now());
    this.events = new TypedEmitter<SessionEvents>((err, event) => {
      this.log.error({ err, event }, "Session listener failed");
    });

    this.connection.on("close", ({ instanceId, reason }) => {
      this.handleConnectionClosed(instanceId, reason);
    });
    this.connection.on("pong", ({ sentAt, serverTime, receivedAt }) => {
      this.clockOffset = serverTime - Math.round((sentAt + receivedAt) / 2);
    });
  }

  on<K extends keyof SessionEvents>(
    event: K,
    handler: (payload: SessionEvents[K]) => void,
  ): Unsubscribe {
    return this.events.on(event, handler);
  }

  get session(): Session | null {
    return this._session;
  }

  get phase(): AuthPhase {
    return this.authState.phase;
  }

  get isAuthenticated(): boolean {
    return this._session !== null;
  }

  get clockOffsetMs(): number {
    return this.clockOffset;
  }

  /** Local clock corrected by the last observed server time. */
  serverNow(): number {
    return Math.round(this.now() + this.clockOffset);
  }

  /**
   * Authenticate the current ConnectionInstance, or join the attempt that
   * is already running for it.
   */
  authenticate(): Promise<Session> {
    const instanceId = this.connection.instanceId;
    if (!instanceId) return Promise.reject(new NotConnectedError());

    const session = this._session;
    if (session && session.instanceId === instanceId) return Promise.resolve(session);

    if (this.inflight && this.inflight.instanceId === instanceId) {
      return this.inflight.promise;
    }

    const attempt = ++this.attemptSeq;
    const promise = this.runAuth(instanceId, attempt).finally(() => {
      if (this.inflight?.promise === promise) this.inflight = null;
    });
    this.inflight = { instanceId, promise };
    return promise;
  }

  /** Add version fields and the session token to a privileged payload. */
  privileged<T extends object>(payload: T): Privileged<T> {
    const session = this.requireSession();
    return { ...payload, ...versionFields(), sessionToken: session.sessionToken };
  }

  /** Exchange the current token for a new one. Concurrent calls share one request. */
  refresh(): Promise<Session> {
    if (this.refreshing) return this.refreshing;
    const promise = this.doRefresh().finally(() => {
      if (this.refreshing === promise) this.refreshing = null;
    });
    this.refreshing = promise;
    return promise;
  }

  /** Refresh only when less than the threshold of validity remains. */
  async refreshIfNeeded(): Promise<Session | null> {
    const session = this._session;
    if (!session) return null;
    if (session.expiresAt - this.serverNow() >= this.refreshThresholdMs) return session;
    return this.refresh();
  }

  /**
   * The server rejected the session on a privileged frame: drop it and run
   * the full flow again on the same connection.
   */
  handleAuthFailure(): Promise<Session> {
    const instanceId = this.connection.instanceId;
    if (this.inflight && this.inflight.instanceId === instanceId) {
      return this.inflight.promise;
    }
    if (this._session) {
      this.log.warn({ instanceId }, "Session rejected by server; re-authenticating");
      this.endSession("AUTH_FAILED");
    }
    return this.authenticate();
  }

  /**
   * Invalidate the token server-side, then tear the session down locally.
   * Local teardown happens even if the server call fails.
   */
  async logout(): Promise<void> {
    const session = this._session;
    try {
      if (session && this.connection.instanceId === session.instanceId) {
        const ack = await this.connection.request({
          type: "logout",
          payload: this.privileged({}),
        });
        if (ack.type !== "logout_ack") {
          throw new ProtocolError("INVALID_PAYLOAD", `Expected logout_ack, got ${ack.type}`);
        }
      }
    } finally {
      this.attemptSeq++;
      this.inflight = null;
      if (this._session) this.endSession("logout");
      this.log.info("Logged out");
    }
  }

  // --- Internals ---

  private async runAuth(instanceId: string, attempt: number): Promise<Session> {
    // A superseded attempt on this instance may have left the phase mid-handshake.
    if (
      this.authState.instanceId !== instanceId ||
      !canTransition(this.authState.phase, "challenge_requested")
    ) {
      this.authState = initialAuthState(instanceId, this.now());
    }
    this.setPhase("challenge_requested");

    let timer: Timer | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new SessionError(
            "AUTH_TIMEOUT",
            `Authentication timed out after ${this.options.authTimeoutMs}ms`,
          ),
        );
      }, this.options.authTimeoutMs);
    });

    try {
      return await Promise.race([this.handshake(instanceId, attempt), timeout]);
    } catch (err) {
      const current = attempt === this.attemptSeq;
      if (current) this.attemptSeq++;
      if (
        current &&
        this.authState.instanceId === instanceId &&
        canTransition(this.authState.phase, "failed")
      ) {
        this.setPhase("failed");
      }
      const error = toAuthError(err);
      this.log.warn(
        { instanceId, code: error instanceof SessionError || error instanceof ProtocolError ? error.code : undefined },
        "Authentication failed",
      );
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private async handshake(instanceId: string, attempt: number): Promise<Session> {
    const identity = this.identity.current();
    const recovery = identity.accountId ? { accountId: identity.accountId } : {};
    const platform = this.options.platform;

    const begin = await this.connection.request({
      type: "register_begin",
      payload: {
        ...versionFields(),
        deviceId: identity.deviceId,
        platform,
        ...recovery,
      },
    });
    this.assertCurrent(instanceId, attempt);
    if (begin.type !== "register_challenge") {
      throw new ProtocolError("INVALID_PAYLOAD", `Expected register_challenge, got ${begin.type}`);
    }
    const challenge = fromBase64Strict(begin.payload.challenge, CHALLENGE_BYTES);
    if (!challenge) {
      throw new ProtocolError("INVALID_PAYLOAD", "Challenge must be 32 bytes of base64");
    }

    const signature = await signChallenge(challenge, identity.keys.signing.privateKey);
    this.assertCurrent(instanceId, attempt);
    this.setPhase("proof_sent");

    const ack = await this.connection.request({
      type: "register_proof",
      payload: {
        ...versionFields(),
        challengeId: begin.payload.challengeId,
        deviceId: identity.deviceId,
        platform,
        ...recovery,
        encPublicKey: toBase64(identity.keys.encryption.publicKey),
        signPublicKey: toBase64(identity.keys.signing.publicKey),
        signature,
      },
    });
    this.assertCurrent(instanceId, attempt);
    if (ack.type !== "register_ack" || !ack.payload.success) {
      throw new SessionError("AUTH_FAILED", "Registration was not acknowledged");
    }

    this.clockOffset = ack.payload.serverTime - this.now();
    await this.identity.recordAccountId(ack.payload.accountId);
    this.assertCurrent(instanceId, attempt);

    const session: Session = {
      sessionToken: ack.payload.sessionToken,
      expiresAt: ack.payload.sessionExpiresAt,
      accountId: ack.payload.accountId,
      deviceId: identity.deviceId,
      instanceId,
    };
    this._session = session;
    this.setPhase("authenticated");
    this.scheduleRefresh();
    this.log.info({ accountId: session.accountId, instanceId }, "Authenticated");
    this.events.emit("authenticated", session);
    return session;
  }

  private async doRefresh(): Promise<Session> {
    const session = this.requireSession();
    const ack = await this.connection.request({
      type: "session_refresh",
      payload: this.privileged({}),
    });
    if (ack.type !== "session_refresh_ack") {
      throw new ProtocolError("INVALID_PAYLOAD", `Expected session_refresh_ack, got ${ack.type}`);
    }
    if (this._session?.instanceId !== session.instanceId) {
      throw new ConnectionLostError("Session ended during refresh");
    }
    this.clockOffset = ack.payload.serverTime - this.now();
    const next: Session = {
      ...session,
      sessionToken: ack.payload.sessionToken,
      expiresAt: ack.payload.sessionExpiresAt,
    };
    this._session = next;
    this.scheduleRefresh();
    this.log.info({ expiresAt: next.expiresAt }, "Session refreshed");
    this.events.emit("refreshed", next);
    return next;
  }

  private scheduleRefresh(): void {
    this.clearRefreshTimer();
    const session = this._session;
    if (!session) return;
    const delay = Math.max(
      MIN_REFRESH_DELAY_MS,
      session.expiresAt - this.refreshThresholdMs - this.serverNow(),
    );
    this.refreshTimer = setTimeout(() => {
      this.refreshTimer = null;
      this.refreshIfNeeded().catch((err: unknown) => {
        this.onRefreshError(err);
      });
    }, Math.min(delay, MAX_TIMER_MS));
  }

  private onRefreshError(err: unknown): void {
    if (err instanceof ProtocolError && AUTH_REJECTION_CODES.has(err.code)) {
      this.handleAuthFailure().catch((authErr: unknown) => {
        this.log.warn({ err: authErr }, "Re-authentication after refresh failure failed");
      });
      return;
    }
    this.log.warn({ err }, "Session refresh failed");
  }

  private handleConnectionClosed(instanceId: string, reason: string): void {
    this.clearRefreshTimer();
    if (this.inflight?.instanceId === instanceId) this.attemptSeq++;
    const hadSession = this._session !== null;
    this._session = null;
    this.authState = initialAuthState(null, this.now());
    this.events.emit("phase", "unauthenticated");
    if (hadSession) this.events.emit("unauthenticated", { reason });
  }

  private endSession(reason: string): void {
    this.clearRefreshTimer();
    this._session = null;
    if (canTransition(this.authState.phase, "unauthenticated")) {
      this.setPhase("unauthenticated");
    }
    this.events.emit("unauthenticated", { reason });
  }

  private requireSession(): Session {
    if (!this._session) {
      throw new SessionError("NOT_AUTHENTICATED", "No authenticated session");
    }
    return this._session;
  }

  /** Abort a handshake whose connection or attempt has been superseded. */
  private assertCurrent(instanceId: string, attempt: number): void {
    if (attempt !== this.attemptSeq || this.connection.instanceId !== instanceId) {
      throw new ConnectionLostError("Authentication superseded");
    }
  }

  private setPhase(phase: AuthPhase): void {
    this.authState = transitionAuth(this.authState, phase, this.now());
    this.events.emit("phase", phase);
  }

  private clearRefreshTimer(): void {
    if (this.refreshTimer) {
      clearTimeout(this.refreshTimer);
      this.refreshTimer = null;
    }
  }
}

function toAuthError(err: unknown): unknown {
  if (err instanceof ProtocolError && AUTH_REJECTION_CODES.has(err.code)) {
    return new SessionError("AUTH_FAILED", err.message, { cause: err });
  }
  return err;
}
