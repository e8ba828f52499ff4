/**
 * Connection manager: owns the relay transport, its heartbeat and the
 * reconnect loop.
 *
 *   disconnected → connecting → connected
 *        ↑              ↓           ↓
 *        └──────── reconnecting ←───┘
 *
 * - `connect()` does nothing unless the state is `disconnected`.
 * - Every successful open mints a fresh ConnectionInstance id. Anything
 *   scoped to a connection (authentication above all) is keyed by it.
 * - On close or error the heartbeat timers are cancelled first, pending
 *   request waits fail with ConnectionLostError, and exactly one reconnect
 *   is scheduled.
 * - The attempt counter is bounded. Once exhausted the manager stays
 *   `disconnected` until `notifyForeground()` or a network-restored signal.
 *   A successful open does not reset it.
 *
 * @module connection/connection-manager
 */
import { v4 as uuidv4 } from "uuid";
import type { Logger } from "pino";
import { TypedEmitter } from "../events.js";
import type { Unsubscribe } from "../events.js";
import {
  ConnectionLostError,
  NotConnectedError,
  ProtocolError,
} from "../errors.js";
import { decodeFrame, encodeFrame } from "../protocol/frames.js";
import type { OutboundFrame } from "../protocol/frames.js";
import type { InboundFrame } from "../protocol/schema.js";
import type { Transport, TransportFactory } from "../transport/transport.js";
import { computeBackoff } from "./backoff.js";
import { PendingRequests } from "./pending-requests.js";

export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "reconnecting";

export interface ConnectionManagerOptions {
  url: string;
  transportFactory: TransportFactory;
  logger: Logger;
  heartbeatIntervalMs: number;
  pongTimeoutMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  reconnectMaxAttempts: number;
  requestTimeoutMs: number;
  random?: () => number;
  now?: () => number;
}

export interface ConnectionEvents {
  state: ConnectionState;
  open: { instanceId: string };
  close: { instanceId: string; reason: string };
  frame: { frame: InboundFrame; instanceId: string };
  pong: { sentAt: number; serverTime: number; receivedAt: number };
}

const RECONNECT_JITTER = 0.5;

type Timer = ReturnType<typeof setTimeout>;

export class ConnectionManager {
  private readonly events: TypedEmitter<ConnectionEvents>;
  private readonly pending = new PendingRequests();
  private readonly log: Logger;
  private readonly now: () => number;

  private _state: ConnectionState = "disconnected";
  private transport: Transport | null = null;
  private _instanceId: string | null = null;
  private wanted = false;
  private networkAvailable = true;
  private attempts = 0;

  private reconnectTimer: Timer | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private pongTimer: Timer | null = null;

  constructor(private readonly options: ConnectionManagerOptions) {
    this.log = options.logger.child({ module: "connection" });
    this.now = options.now ?? Date.now;
    this.events = new TypedEmitter<ConnectionEvents>((err, event) => {
      this.log.error({ err, event }, "Connection listener failed");
    });
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** Current ConnectionInstance id, or null when not connected. */
  get instanceId(): string | null {
    return this._instanceId;
  }

  get reconnectAttempts(): number {
    return this.attempts;
  }

  on<K extends keyof ConnectionEvents>(
    event: K,
    handler: (payload: ConnectionEvents[K]) => void,
  ): Unsubscribe {
    return this.events.on(event, handler);
  }

  connect(): void {
    if (this._state !== "disconnected") return;
    this.wanted = true;
    this.open();
  }

  /** Close on request. No reconnect follows until `connect()`. */
  disconnect(reason = "client disconnect"): void {
    this.wanted = false;
    this.clearReconnectTimer();
    this.dropTransport(reason);
    this.setState("disconnected");
  }

  /** Tear down the current transport and go through the reconnect path. */
  forceReconnect(reason: string): void {
    if (!this.transport) return;
    this.handleLoss(reason);
  }

  notifyForeground(): void {
    this.attempts = 0;
    this.log.debug("Foreground signal, backoff reset");
    this.reconnectIfIdle();
  }

  setNetworkAvailable(available: boolean): void {
    const was = this.networkAvailable;
    this.networkAvailable = available;
    if (was === available) return;

    if (!available) {
      this.log.info({ state: this._state }, "Network unavailable");
      if (this._state === "reconnecting") {
        this.clearReconnectTimer();
        this.setState("disconnected");
      }
      return;
    }

    this.attempts = 0;
    this.log.info({ state: this._state }, "Network available");
    this.reconnectIfIdle();
  }

  /**
   * Send a frame on the current connection.
   *
   * @throws NotConnectedError
   */
  send(frame: OutboundFrame): void {
    const transport = this.transport;
    if (this._state !== "connected" || !transport) {
      throw new NotConnectedError();
    }
    const raw = encodeFrame(frame);
    try {
      transport.send(raw);
    } catch (err) {
      this.log.warn({ err, type: frame.type }, "Transport send failed");
      throw new NotConnectedError();
    }
  }

  /**
   * Send a frame and wait for the server frame carrying the same requestId.
   * An `error` frame for that id rejects with ProtocolError.
   */
  async request(frame: OutboundFrame, timeoutMs?: number): Promise<InboundFrame> {
    const requestId = frame.requestId ?? uuidv4();
    const response = this.pending.wait(
      requestId,
      frame.type,
      timeoutMs ?? this.options.requestTimeoutMs,
    );
    try {
      this.send({ ...frame, requestId });
    } catch (err) {
      this.pending.reject(
        requestId,
        err instanceof Error ? err : new Error(String(err)),
      );
    }
    return response;
  }

  // --- Transport lifecycle ---

  private open(): void {
    this.clearReconnectTimer();
    const transport = this.options.transportFactory(this.options.url);
    this.transport = transport;
    this.setState("connecting");

    transport.setHandlers({
      onOpen: () => {
        if (this.transport === transport) this.handleOpen();
      },
      onMessage: (data) => {
        if (this.transport === transport) this.handleMessage(data);
      },
      onError: (err) => {
        if (this.transport === transport) {
          this.handleLoss(`transport error: ${err.message}`);
        }
      },
      onClose: (code, reason) => {
        if (this.transport === transport) {
          this.handleLoss(reason ? `closed ${code}: ${reason}` : `closed ${code}`);
        }
      },
    });

    try {
      transport.connect();
    } catch (err) {
      this.log.warn({ err }, "Transport failed to start");
      if (this.transport === transport) this.handleLoss("connect failed");
    }
  }

  private handleOpen(): void {
    const instanceId = uuidv4();
    this._instanceId = instanceId;
    this.setState("connected");
    this.startHeartbeat();
    this.log.info({ instanceId }, "Connected");
    this.events.emit("open", { instanceId });
  }

  private handleLoss(reason: string): void {
    this.dropTransport(reason);
    this.scheduleReconnect();
  }

  /**
   * Cancel timers, detach and close the transport, fail pending waits.
   */
  private dropTransport(reason: string): void {
    this.clearConnectionTimers();

    const transport = this.transport;
    const instanceId = this._instanceId;
    this.transport = null;
    this._instanceId = null;

    if (transport) {
      transport.setHandlers({});
      transport.close(1000, reason);
    }

    this.pending.rejectAll(() => new ConnectionLostError(reason));

    if (instanceId) {
      this.log.info({ instanceId, reason }, "Disconnected");
      this.events.emit("close", { instanceId, reason });
    }
  }

  private scheduleReconnect(): void {
    if (!this.wanted || !this.networkAvailable) {
      this.setState("disconnected");
      return;
    }
    if (this.attempts >= this.options.reconnectMaxAttempts) {
      this.log.warn(
        { attempts: this.attempts },
        "Reconnect attempts exhausted; waiting for foreground or network signal",
      );
      this.setState("disconnected");
      return;
    }
    if (this.reconnectTimer) return;

    const delay = computeBackoff(this.attempts, {
      baseMs: this.options.reconnectBaseMs,
      maxMs: this.options.reconnectMaxMs,
      jitter: RECONNECT_JITTER,
      random: this.options.random,
    });
    this.attempts += 1;
    this.setState("reconnecting");
    this.log.debug({ attempt: this.attempts, delay }, "Reconnect scheduled");
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.open();
    }, delay);
  }

  private reconnectIfIdle(): void {
    if (!this.wanted || !this.networkAvailable) return;
    if (this._state === "disconnected" || this._state === "reconnecting") {
      this.open();
    }
  }

  // --- Frames ---

  private handleMessage(data: string): void {
    const instanceId = this._instanceId;
    if (!instanceId) return;

    const decoded = decodeFrame(data);
    if (!decoded.ok) {
      this.log.warn({ reason: decoded.reason }, "Dropping invalid frame");
      if (decoded.requestId) {
        this.pending.reject(
          decoded.requestId,
          new ProtocolError("INVALID_PAYLOAD", decoded.reason, decoded.requestId),
        );
      }
      return;
    }

    const frame = decoded.frame;
    if (frame.type === "pong") {
      this.clearPongTimer();
      this.events.emit("pong", {
        sentAt: frame.payload.timestamp,
        serverTime: frame.payload.serverTime,
        receivedAt: this.now(),
      });
      return;
    }

    const requestId =
      frame.requestId ?? (frame.type === "error" ? frame.payload.requestId : undefined);
    if (requestId && this.pending.has(requestId)) {
      if (frame.type === "error") {
        this.pending.reject(
          requestId,
          new ProtocolError(frame.payload.code, frame.payload.message, requestId),
        );
      } else {
        this.pending.resolve(requestId, frame);
      }
      return;
    }

    this.events.emit("frame", { frame, instanceId });
  }

  // --- Heartbeat ---

  private startHeartbeat(): void {
    this.heartbeatTimer = setInterval(() => {
      this.sendPing();
    }, this.options.heartbeatIntervalMs);
  }

  private sendPing(): void {
    try {
      this.send({ type: "ping", payload: { timestamp: this.now() } });
    } catch (err) {
      this.log.debug({ err }, "Ping not sent");
    }
    if (this.pongTimer) return;
    this.pongTimer = setTimeout(() => {
      this.pongTimer = null;
      this.log.warn("Pong timeout, closing transport");
      this.handleLoss("pong timeout");
    }, this.options.pongTimeoutMs);
  }

  // --- Timers ---

  private clearConnectionTimers(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    this.clearPongTimer();
  }

  private clearPongTimer(): void {
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = null;
    }
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private setState(next: ConnectionState): void {
    if (this._state === next) return;
    this._state = next;
    this.events.emit("state", next);
  }
}
