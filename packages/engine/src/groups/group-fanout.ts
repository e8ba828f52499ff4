/**
 * Group fan-out: one envelope per member, one outbox entry per group
 * message.
 *
 * Every member copy is boxed for that member and signed with the group
 * id in the `toOrGroupId` slot, so a copy cannot be replayed as a direct
 * message. Members without known keys are skipped and logged.
 *
 * @module groups/group-fanout
 */
import { v4 as uuidv4 } from "uuid";
import type { Logger } from "pino";
import { boxSeal, signCanonical, toBase64 } from "@sotto/crypto";
import type { IdentityManager } from "../identity/identity-manager.js";
import type { ContactStore } from "../contacts/contact-store.js";
import { isResolved } from "../contacts/contact-store.js";
import type { SessionManager } from "../session/session-manager.js";
import type { Outbox } from "../messaging/outbox.js";
import type { OutboxEntry } from "../messaging/outbox-store.js";
import { ProtocolError } from "../errors.js";
import { MAX_TEXT_BYTES } from "../protocol/constants.js";
import { idString } from "../protocol/schema.js";
import type { GroupMessage, GroupRecipient, MessageType } from "../protocol/schema.js";

export type SkipReason = "self" | "unresolved";

export interface GroupSendResult {
  /** Null when no member could be addressed. */
  entry: OutboxEntry | null;
  recipients: string[];
  skipped: { accountId: string; reason: SkipReason }[];
}

export interface GroupSendOptions {
  messageId?: string;
  msgType?: MessageType;
  replyTo?: string;
}

export interface GroupFanoutOptions {
  identity: IdentityManager;
  contacts: ContactStore;
  session: SessionManager;
  outbox: Outbox;
  logger: Logger;
}

export class GroupFanout {
  private readonly log: Logger;

  constructor(private readonly options: GroupFanoutOptions) {
    this.log = options.logger.child({ module: "groups" });
  }

  async send(
    groupId: string,
    members: readonly string[],
    text: string,
    options: GroupSendOptions = {},
  ): Promise<GroupSendResult> {
    if (!idString.safeParse(groupId).success) {
      throw new ProtocolError("INVALID_PAYLOAD", "Invalid group id");
    }
    const plaintext = new TextEncoder().encode(text);
    if (plaintext.length > MAX_TEXT_BYTES) {
      throw new ProtocolError(
        "INVALID_PAYLOAD",
        `Message text is ${plaintext.length} bytes; the limit is ${MAX_TEXT_BYTES}`,
      );
    }

    const { identity, contacts, session } = this.options;
    const me = identity.requireAccountId();
    const keys = identity.current().keys;
    const messageId = options.messageId ?? uuidv4();
    const timestamp = session.serverNow();

    const recipients: GroupRecipient[] = [];
    const skipped: GroupSendResult["skipped"] = [];

    for (const member of new Set(members)) {
      if (member === me) {
        skipped.push({ accountId: member, reason: "self" });
        continue;
      }
      const contact = contacts.get(member);
      if (!contact || !isResolved(contact)) {
        this.log.warn({ groupId, messageId, member }, "Group member has no known keys; omitted");
        skipped.push({ accountId: member, reason: "unresolved" });
        continue;
      }

      const sealed = await boxSeal(plaintext, contact.encPublicKey, keys.encryption.privateKey);
      const nonce = toBase64(sealed.nonce);
      const ciphertext = toBase64(sealed.ciphertext);
      const sig = await signCanonical(
        {
          messageType: "group_send_message",
          messageId,
          from: me,
          toOrGroupId: groupId,
          timestamp,
          nonce,
          ciphertext,
        },
        keys.signing.privateKey,
      );
      recipients.push({ to: member, nonce, ciphertext, sig });
    }

    if (recipients.length === 0) {
      this.log.warn({ groupId, messageId }, "No addressable group members; nothing sent");
      return { entry: null, recipients: [], skipped };
    }

    const payload: GroupMessage = {
      groupId,
      messageId,
      from: me,
      msgType: options.msgType ?? "text",
      timestamp,
      recipients,
      ...(options.replyTo ? { replyTo: options.replyTo } : {}),
    };
    const entry = this.options.outbox.enqueue({
      frameType: "group_send_message",
      messageId,
      peer: groupId,
      payload,
    });
    return { entry, recipients: recipients.map((r) => r.to), skipped };
  }
}
