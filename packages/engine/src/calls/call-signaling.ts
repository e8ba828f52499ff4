/**
 * Call signal crypto. Signals reuse the chat canonical codec with the
 * frame type as message type, the callId as messageId and the receiving
 * account as `toOrGroupId`; the signal body (SDP, ICE candidate, end
 * reason) is boxed for the peer.
 *
 * @module calls/call-signaling
 */
import {
  boxOpen,
  boxSeal,
  DecryptionError,
  fromBase64Strict,
  NONCE_BYTES,
  signCanonical,
  toBase64,
  verifyCanonical,
} from "@sotto/crypto";
import { CryptoError, InvalidTimestampError } from "../errors.js";
import { isTimestampFresh } from "../protocol/constants.js";
import type { CallSignalPayload, InboundFrameType } from "../protocol/schema.js";

export type CallSignalType = "call_initiate" | "call_answer" | "call_ice_candidate" | "call_end";

export interface SealedCallSignal {
  callId: string;
  from: string;
  to: string;
  timestamp: number;
  nonce: string;
  ciphertext: string;
  sig: string;
}

/** The signed message type of a relayed call frame. */
export function signalTypeOf(frameType: InboundFrameType): CallSignalType | null {
  switch (frameType) {
    case "call_incoming":
      return "call_initiate";
    case "call_answer":
    case "call_ice_candidate":
    case "call_end":
      return frameType;
    default:
      return null;
  }
}

export async function sealCallSignal(params: {
  type: CallSignalType;
  callId: string;
  from: string;
  to: string;
  body: string;
  timestamp: number;
  senderEncPrivateKey: Uint8Array;
  senderSignPrivateKey: Uint8Array;
  recipientEncPublicKey: Uint8Array;
}): Promise<SealedCallSignal> {
  const sealed = await boxSeal(
    new TextEncoder().encode(params.body),
    params.recipientEncPublicKey,
    params.senderEncPrivateKey,
  );
  const nonce = toBase64(sealed.nonce);
  const ciphertext = toBase64(sealed.ciphertext);
  const sig = await signCanonical(
    {
      messageType: params.type,
      messageId: params.callId,
      from: params.from,
      toOrGroupId: params.to,
      timestamp: params.timestamp,
      nonce,
      ciphertext,
    },
    params.senderSignPrivateKey,
  );
  return {
    callId: params.callId,
    from: params.from,
    to: params.to,
    timestamp: params.timestamp,
    nonce,
    ciphertext,
    sig,
  };
}

/**
 * Check, verify and decrypt a relayed signal. Returns the body.
 *
 * @throws InvalidTimestampError
 * @throws CryptoError
 */
export async function openCallSignal(params: {
  type: CallSignalType;
  signal: CallSignalPayload;
  /** Receiving account: the relay does not echo `to`. */
  me: string;
  serverNow: number;
  senderEncPublicKey: Uint8Array;
  senderSignPublicKey: Uint8Array;
  recipientEncPrivateKey: Uint8Array;
}): Promise<string> {
  const { signal } = params;
  if (!isTimestampFresh(signal.timestamp, params.serverNow)) {
    throw new InvalidTimestampError(signal.timestamp, params.serverNow);
  }
  if (signal.to !== undefined && signal.to !== params.me) {
    throw new CryptoError("BAD_SIGNATURE", "Call signal addressed to another account");
  }

  const valid = await verifyCanonical(
    {
      messageType: params.type,
      messageId: signal.callId,
      from: signal.from,
      toOrGroupId: params.me,
      timestamp: signal.timestamp,
      nonce: signal.nonce,
      ciphertext: signal.ciphertext,
    },
    signal.sig,
    params.senderSignPublicKey,
  );
  if (!valid) throw new CryptoError("BAD_SIGNATURE", "Call signal signature is invalid");

  const nonce = fromBase64Strict(signal.nonce, NONCE_BYTES);
  const ciphertext = fromBase64Strict(signal.ciphertext);
  if (!nonce || !ciphertext) throw new CryptoError("MALFORMED", "Call signal encoding is invalid");

  try {
    const body = await boxOpen(
      ciphertext,
      nonce,
      params.senderEncPublicKey,
      params.recipientEncPrivateKey,
    );
    return new TextDecoder().decode(body);
  } catch (err) {
    if (err instanceof DecryptionError) {
      throw new CryptoError("DECRYPT_FAILED", "Call signal cannot be decrypted", { cause: err });
    }
    throw err;
  }
}
