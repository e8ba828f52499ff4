/**
 * Zod schemas for relay frames.
 *
 * Every frame is `{ type, requestId?, payload }`. Server frames are parsed
 * with `inboundFrameSchema` before any business logic sees them; unknown
 * types and malformed payloads are rejected here.
 *
 * Identifiers must not contain line breaks: they are joined with "\n"
 * in the canonical signing string.
 */
import { z } from "zod";
import { ACCOUNT_ID_REGEX } from "./constants.js";

const base64Pattern = /^[A-Za-z0-9+/]*={0,2}$/;
export const base64String = z.string().regex(base64Pattern, "Invalid base64 string");

export const idString = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[^\r\n]+$/, "Identifier must be a single line");

export const accountIdString = z.string().regex(ACCOUNT_ID_REGEX, "Invalid account id");

export const messageTypeSchema = z.enum(["text", "image", "voice", "file", "system"]);

export const attachmentPointerSchema = z.object({
  objectKey: z.string().min(1).max(512),
  contentType: z.string().min(1).max(128),
  ciphertextSize: z.number().int().nonnegative(),
  fileNonce: base64String.min(1),
  fileKeyBox: z.object({
    nonce: base64String.min(1),
    ciphertext: base64String.min(1),
  }),
});

// --- Outbound message bodies (persisted in the outbox) ---

export const directMessageSchema = z.object({
  messageId: idString,
  from: accountIdString,
  to: accountIdString,
  msgType: messageTypeSchema,
  timestamp: z.number().int().positive(),
  nonce: base64String.min(1),
  ciphertext: base64String.min(1),
  sig: base64String.min(1),
  replyTo: idString.optional(),
  attachment: attachmentPointerSchema.optional(),
});

export const groupRecipientSchema = z.object({
  to: accountIdString,
  nonce: base64String.min(1),
  ciphertext: base64String.min(1),
  sig: base64String.min(1),
});

export const groupMessageSchema = z.object({
  groupId: idString,
  messageId: idString,
  from: accountIdString,
  msgType: messageTypeSchema,
  timestamp: z.number().int().positive(),
  recipients: z.array(groupRecipientSchema).min(1),
  replyTo: idString.optional(),
});

// --- Server → client frames ---

function frame<T extends string, P extends z.ZodTypeAny>(type: T, payload: P) {
  return z.object({
    type: z.literal(type),
    requestId: z.string().optional(),
    payload,
  });
}

export const registerChallengeFrame = frame(
  "register_challenge",
  z.object({
    challengeId: idString,
    challenge: base64String.min(1),
    expiresAt: z.number().int(),
  }),
);

export const registerAckFrame = frame(
  "register_ack",
  z.object({
    success: z.boolean(),
    accountId: accountIdString,
    sessionToken: z.string().min(1),
    sessionExpiresAt: z.number().int(),
    serverTime: z.number().int(),
  }),
);

export const sessionRefreshAckFrame = frame(
  "session_refresh_ack",
  z.object({
    sessionToken: z.string().min(1),
    sessionExpiresAt: z.number().int(),
    serverTime: z.number().int(),
  }),
);

export const logoutAckFrame = frame("logout_ack", z.object({}).passthrough());

export const pongFrame = frame(
  "pong",
  z.object({ timestamp: z.number(), serverTime: z.number().int() }),
);

export const errorFrame = frame(
  "error",
  z.object({
    code: z.string().min(1),
    message: z.string(),
    requestId: z.string().optional(),
  }),
);

export const messageAcceptedFrame = frame(
  "message_accepted",
  z.object({ messageId: idString, status: z.literal("sent") }),
);

export const receivedMessageSchema = z.object({
  messageId: idString,
  groupId: idString.optional(),
  from: accountIdString,
  to: accountIdString,
  msgType: messageTypeSchema,
  timestamp: z.number().int(),
  nonce: base64String.min(1),
  ciphertext: base64String.min(1),
  sig: base64String.min(1),
  replyTo: idString.optional(),
  attachment: attachmentPointerSchema.nullish(),
});

export const messageReceivedFrame = frame("message_received", receivedMessageSchema);

export const messageDeliveredFrame = frame(
  "message_delivered",
  z.object({
    messageId: idString,
    status: z.enum(["delivered", "read"]),
    timestamp: z.number().int(),
  }),
);

export const pendingMessagesFrame = frame(
  "pending_messages",
  z.object({
    messages: z.array(receivedMessageSchema),
    nextCursor: z.string().optional(),
  }),
);

export const callEndReasonSchema = z.enum([
  "ended",
  "declined",
  "busy",
  "timeout",
  "failed",
  "cancelled",
]);

/** Relayed call signals. The relay omits `to`: it is always the receiver. */
export const callSignalSchema = z.object({
  callId: idString,
  from: accountIdString,
  to: accountIdString.optional(),
  timestamp: z.number().int(),
  nonce: base64String.min(1),
  ciphertext: base64String.min(1),
  sig: base64String.min(1),
  isVideo: z.boolean().optional(),
  reason: callEndReasonSchema.optional(),
});

export const callIncomingFrame = frame("call_incoming", callSignalSchema);
export const callAnswerFrame = frame("call_answer", callSignalSchema);
export const callIceCandidateFrame = frame("call_ice_candidate", callSignalSchema);
export const callEndFrame = frame("call_end", callSignalSchema);

export const turnCredentialsFrame = frame(
  "turn_credentials",
  z.object({
    urls: z.array(z.string().min(1)).min(1),
    username: z.string(),
    credential: z.string(),
    ttl: z.number().int().nonnegative(),
  }),
);

export const inboundFrameSchema = z.discriminatedUnion("type", [
  registerChallengeFrame,
  registerAckFrame,
  sessionRefreshAckFrame,
  logoutAckFrame,
  pongFrame,
  errorFrame,
  messageAcceptedFrame,
  messageReceivedFrame,
  messageDeliveredFrame,
  pendingMessagesFrame,
  callIncomingFrame,
  callAnswerFrame,
  callIceCandidateFrame,
  callEndFrame,
  turnCredentialsFrame,
]);

export type MessageType = z.infer<typeof messageTypeSchema>;
export type AttachmentPointer = z.infer<typeof attachmentPointerSchema>;
export type DirectMessage = z.infer<typeof directMessageSchema>;
export type GroupRecipient = z.infer<typeof groupRecipientSchema>;
export type GroupMessage = z.infer<typeof groupMessageSchema>;
export type ReceivedMessage = z.infer<typeof receivedMessageSchema>;
export type CallSignalPayload = z.infer<typeof callSignalSchema>;
export type CallEndReason = z.infer<typeof callEndReasonSchema>;
export type InboundFrame = z.infer<typeof inboundFrameSchema>;
export type InboundFrameType = InboundFrame["type"];

/** The inbound frame whose `type` is `T`. */
export type InboundFrameOf<T extends InboundFrameType> = Extract<InboundFrame, { type: T }>;
