/**
 * Frame encoding and decoding.
 *
 * @module protocol/frames
 */
import { CRYPTO_VERSION, MAX_FRAME_BYTES, PROTOCOL_VERSION } from "./constants.js";
import { inboundFrameSchema } from "./schema.js";
import type { InboundFrame } from "./schema.js";
import { ProtocolError } from "../errors.js";

export type OutboundFrameType =
  | "register_begin"
  | "register_proof"
  | "session_refresh"
  | "logout"
  | "ping"
  | "send_message"
  | "group_send_message"
  | "delivery_receipt"
  | "fetch_pending"
  | "call_initiate"
  | "call_answer"
  | "call_ice_candidate"
  | "call_end"
  | "get_turn_credentials";

export interface OutboundFrame {
  type: OutboundFrameType;
  requestId?: string;
  payload: object;
}

export interface VersionFields {
  protocolVersion: number;
  cryptoVersion: number;
}

export function versionFields(): VersionFields {
  return { protocolVersion: PROTOCOL_VERSION, cryptoVersion: CRYPTO_VERSION };
}

export type DecodeResult =
  | { ok: true; frame: InboundFrame }
  | { ok: false; reason: string; requestId?: string };

/**
 * Parse and validate one server frame.
 */
export function decodeFrame(raw: string): DecodeResult {
  if (Buffer.byteLength(raw, "utf8") > MAX_FRAME_BYTES) {
    return { ok: false, reason: "frame too large" };
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, reason: "invalid JSON" };
  }
  const requestId = requestIdOf(json);
  const unsupported = unsupportedVersion(json);
  if (unsupported) return { ok: false, reason: unsupported, requestId };
  const result = inboundFrameSchema.safeParse(json);
  if (!result.success) {
    const first = result.error.issues[0];
    return {
      ok: false,
      reason: first ? `${first.path.join(".")}: ${first.message}` : "invalid frame",
      requestId,
    };
  }
  return { ok: true, frame: result.data };
}

function requestIdOf(json: unknown): string | undefined {
  if (typeof json !== "object" || json === null || !("requestId" in json)) {
    return undefined;
  }
  return typeof json.requestId === "string" ? json.requestId : undefined;
}

/** Payloads may echo version fields; any value other than ours is refused. */
function unsupportedVersion(json: unknown): string | null {
  if (typeof json !== "object" || json === null || !("payload" in json)) return null;
  const payload = json.payload;
  if (typeof payload !== "object" || payload === null) return null;
  if ("protocolVersion" in payload && payload.protocolVersion !== PROTOCOL_VERSION) {
    return "unsupported protocolVersion";
  }
  if ("cryptoVersion" in payload && payload.cryptoVersion !== CRYPTO_VERSION) {
    return "unsupported cryptoVersion";
  }
  return null;
}

/**
 * Serialise an outbound frame.
 *
 * @throws ProtocolError INVALID_PAYLOAD when it exceeds the frame limit.
 */
export function encodeFrame(frame: OutboundFrame): string {
  const raw = JSON.stringify(frame);
  if (Buffer.byteLength(raw, "utf8") > MAX_FRAME_BYTES) {
    throw new ProtocolError(
      "INVALID_PAYLOAD",
      `Frame ${frame.type} exceeds ${MAX_FRAME_BYTES} bytes`,
    );
  }
  return raw;
}
