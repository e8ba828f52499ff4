/**
 * Call coordinator: turns relayed call signals into platform intents and
 * media operations, and user actions into signed signals.
 *
 *   outgoing: startCall → call_initiate → (call_answer) → connected
 *   incoming: call_incoming → announce → userAnswered → call_answer → connected
 *
 * Either side may send call_end at any point. A second incoming call while
 * one is active is answered with `busy`.
 *
 * The native call UI and the media stack are collaborators behind
 * PlatformCallBridge and MediaNegotiator.
 *
 * @module calls/call-coordinator
 */
import { v4 as uuidv4 } from "uuid";
import type { Logger } from "pino";
import type { ConnectionManager } from "../connection/connection-manager.js";
import type { SessionManager } from "../session/session-manager.js";
import type { IdentityManager } from "../identity/identity-manager.js";
import type { ContactStore } from "../contacts/contact-store.js";
import { isResolved } from "../contacts/contact-store.js";
import { EngineError, ProtocolError } from "../errors.js";
import type { CallEndReason, CallSignalPayload, InboundFrame } from "../protocol/schema.js";
import type { TurnCredentialCache, TurnCredentials } from "./turn-credentials.js";
import { openCallSignal, sealCallSignal, signalTypeOf } from "./call-signaling.js";
import type { CallSignalType } from "./call-signaling.js";

export interface IncomingCallInfo {
  callId: string;
  from: string;
  isVideo: boolean;
}

/** Native call UI (CallKit, ConnectionService). */
export interface PlatformCallBridge {
  announceIncomingCall(call: IncomingCallInfo): void;
  callConnected(callId: string): void;
  callEnded(callId: string, reason: CallEndReason): void;
}

/** WebRTC (or equivalent) session handling. SDP and candidates are opaque strings. */
export interface MediaNegotiator {
  createOffer(callId: string, options: { isVideo: boolean; turn: TurnCredentials }): Promise<string>;
  acceptOffer(
    callId: string,
    offer: string,
    options: { isVideo: boolean; turn: TurnCredentials },
  ): Promise<string>;
  applyAnswer(callId: string, answer: string): Promise<void>;
  addRemoteCandidate(callId: string, candidate: string): Promise<void>;
  setMuted(callId: string, muted: boolean): void;
  close(callId: string): void;
}

export type CallPhase = "outgoing" | "ringing" | "connected";

export interface ActiveCall {
  callId: string;
  peer: string;
  isVideo: boolean;
  direction: "outgoing" | "incoming";
  phase: CallPhase;
  /** Incoming offer held until the user answers. */
  offer: string | null;
}

export interface CallCoordinatorOptions {
  connection: ConnectionManager;
  session: SessionManager;
  identity: IdentityManager;
  contacts: ContactStore;
  turn: TurnCredentialCache;
  bridge: PlatformCallBridge;
  media: MediaNegotiator;
  logger: Logger;
}

type CallFrame = Extract<
  InboundFrame,
  { type: "call_incoming" | "call_answer" | "call_ice_candidate" | "call_end" }
>;

export function isCallFrame(frame: InboundFrame): frame is CallFrame {
  return signalTypeOf(frame.type) !== null;
}

export class CallCoordinator {
  private readonly calls = new Map<string, ActiveCall>();
  private readonly log: Logger;

  constructor(private readonly options: CallCoordinatorOptions) {
    this.log = options.logger.child({ module: "calls" });
  }

  get(callId: string): ActiveCall | null {
    return this.calls.get(callId) ?? null;
  }

  active(): ActiveCall[] {
    return [...this.calls.values()];
  }

  // ========== User actions ==========

  /** Place a call. Fresh TURN credentials are obtained before any signaling. */
  async startCall(peer: string, options: { isVideo: boolean }): Promise<string> {
    this.options.contacts.requireResolved(peer);
    const turn = await this.options.turn.get();
    const callId = uuidv4();
    const call: ActiveCall = {
      callId,
      peer,
      isVideo: options.isVideo,
      direction: "outgoing",
      phase: "outgoing",
      offer: null,
    };
    this.calls.set(callId, call);
    try {
      const offer = await this.options.media.createOffer(callId, { isVideo: options.isVideo, turn });
      await this.sendSignal("call_initiate", call, offer, { isVideo: options.isVideo });
    } catch (err) {
      this.teardown(call, "failed");
      throw err;
    }
    this.log.info({ callId, peer, isVideo: options.isVideo }, "Outgoing call started");
    return callId;
  }

  async userAnswered(callId: string): Promise<void> {
    const call = this.requireCall(callId);
    if (call.direction !== "incoming" || call.phase !== "ringing" || call.offer === null) {
      throw new ProtocolError("INVALID_PAYLOAD", `Call ${callId} is not ringing`);
    }
    const turn = await this.options.turn.get();
    try {
      const answer = await this.options.media.acceptOffer(callId, call.offer, {
        isVideo: call.isVideo,
        turn,
      });
      await this.sendSignal("call_answer", call, answer);
    } catch (err) {
      this.teardown(call, "failed");
      throw err;
    }
    call.offer = null;
    call.phase = "connected";
    this.options.bridge.callConnected(callId);
    this.log.info({ callId }, "Call answered");
  }

  async userDeclined(callId: string): Promise<void> {
    await this.endCall(callId, "declined");
  }

  userMuted(callId: string, muted: boolean): void {
    this.requireCall(callId);
    this.options.media.setMuted(callId, muted);
  }

  async sendIceCandidate(callId: string, candidate: string): Promise<void> {
    await this.sendSignal("call_ice_candidate", this.requireCall(callId), candidate);
  }

  /** Hang up. Local teardown happens even if the signal cannot be sent. */
  async endCall(callId: string, reason: CallEndReason = "ended"): Promise<void> {
    const call = this.requireCall(callId);
    try {
      await this.sendSignal("call_end", call, reason, { reason });
    } finally {
      this.teardown(call, reason);
    }
  }

  // ========== Relayed signals ==========

  /** Verify, decrypt and act on a relayed call frame. Invalid signals are dropped. */
  async handleSignal(frame: CallFrame): Promise<void> {
    const type = signalTypeOf(frame.type);
    if (!type) return;
    const signal = frame.payload;
    const meta = { callId: signal.callId, from: signal.from, type: frame.type };

    const existing = this.calls.get(signal.callId);
    if (type !== "call_initiate" && (!existing || existing.peer !== signal.from)) {
      this.log.debug(meta, "Signal for unknown call dropped");
      return;
    }

    let body: string;
    try {
      body = await this.open(type, signal);
    } catch (err) {
      if (err instanceof EngineError) {
        this.log.warn({ ...meta, code: err.code }, "Call signal rejected");
        return;
      }
      throw err;
    }

    switch (type) {
      case "call_initiate":
        await this.onIncoming(signal, body);
        return;
      case "call_answer":
        if (existing && existing.direction === "outgoing" && existing.phase === "outgoing") {
          await this.options.media.applyAnswer(existing.callId, body);
          existing.phase = "connected";
          this.options.bridge.callConnected(existing.callId);
          this.log.info(meta, "Call connected");
        }
        return;
      case "call_ice_candidate":
        if (existing) await this.options.media.addRemoteCandidate(existing.callId, body);
        return;
      case "call_end":
        if (existing) {
          this.teardown(existing, signal.reason ?? "ended");
          this.log.info({ ...meta, reason: signal.reason }, "Call ended by peer");
        }
        return;
    }
  }

  // --- Internals ---

  private async onIncoming(signal: CallSignalPayload, offer: string): Promise<void> {
    if (this.calls.has(signal.callId)) return;
    const call: ActiveCall = {
      callId: signal.callId,
      peer: signal.from,
      isVideo: signal.isVideo ?? false,
      direction: "incoming",
      phase: "ringing",
      offer,
    };

    if (this.calls.size > 0) {
      this.log.info({ callId: call.callId, from: call.peer }, "Busy; rejecting incoming call");
      try {
        await this.sendSignal("call_end", call, "busy", { reason: "busy" });
      } catch (err) {
        this.log.warn({ err, callId: call.callId }, "Busy signal not sent");
      }
      return;
    }

    this.calls.set(call.callId, call);
    this.options.bridge.announceIncomingCall({
      callId: call.callId,
      from: call.peer,
      isVideo: call.isVideo,
    });
    this.log.info({ callId: call.callId, from: call.peer }, "Incoming call");
  }

  private async open(type: CallSignalType, signal: CallSignalPayload): Promise<string> {
    const { contacts, identity, session } = this.options;
    const contact = contacts.get(signal.from);
    if (!contact || !isResolved(contact) || contact.blocked) {
      throw new ProtocolError("FORBIDDEN", "Call signal from unknown or blocked sender");
    }
    return openCallSignal({
      type,
      signal,
      me: identity.requireAccountId(),
      serverNow: session.serverNow(),
      senderEncPublicKey: contact.encPublicKey,
      senderSignPublicKey: contact.signPublicKey,
      recipientEncPrivateKey: identity.current().keys.encryption.privateKey,
    });
  }

  private async sendSignal(
    type: CallSignalType,
    call: ActiveCall,
    body: string,
    extra: { isVideo?: boolean; reason?: CallEndReason } = {},
  ): Promise<void> {
    const { contacts, identity, session, connection } = this.options;
    const contact = contacts.requireResolved(call.peer);
    const keys = identity.current().keys;
    const sealed = await sealCallSignal({
      type,
      callId: call.callId,
      from: identity.requireAccountId(),
      to: call.peer,
      body,
      timestamp: session.serverNow(),
      senderEncPrivateKey: keys.encryption.privateKey,
      senderSignPrivateKey: keys.signing.privateKey,
      recipientEncPublicKey: contact.encPublicKey,
    });
    connection.send({ type, payload: session.privileged({ ...sealed, ...extra }) });
  }

  private teardown(call: ActiveCall, reason: CallEndReason): void {
    if (!this.calls.delete(call.callId)) return;
    this.options.media.close(call.callId);
    this.options.bridge.callEnded(call.callId, reason);
  }

  private requireCall(callId: string): ActiveCall {
    const call = this.calls.get(callId);
    if (!call) throw new ProtocolError("NOT_FOUND", `No active call ${callId}`);
    return call;
  }
}
