/**
 * Attachments end to end: encrypt, upload to a presigned URL, reference
 * from a message; and the reverse on download.
 *
 * The server only ever sees ciphertext. The content key travels inside
 * the attachment pointer, boxed for the recipient.
 *
 * @module attachments/attachment-service
 */
import type { Logger } from "pino";
import { DecryptionError, decryptAttachment, encryptAttachment } from "@sotto/crypto";
import type { ApiClient } from "../http/api-client.js";
import type { ContactStore } from "../contacts/contact-store.js";
import type { IdentityManager } from "../identity/identity-manager.js";
import type { MessagePipeline } from "../messaging/message-pipeline.js";
import type { OutboxEntry } from "../messaging/outbox-store.js";
import { CryptoError, ProtocolError } from "../errors.js";
import { MAX_ATTACHMENT_BYTES } from "../protocol/constants.js";
import type { AttachmentPointer, MessageType } from "../protocol/schema.js";

export interface SendAttachmentOptions {
  caption?: string;
  msgType?: MessageType;
  replyTo?: string;
}

export function messageTypeFor(contentType: string): MessageType {
  if (contentType.startsWith("image/")) return "image";
  if (contentType.startsWith("audio/")) return "voice";
  return "file";
}

export class AttachmentService {
  private readonly log: Logger;

  constructor(
    private readonly api: ApiClient,
    private readonly contacts: ContactStore,
    private readonly identity: IdentityManager,
    private readonly pipeline: MessagePipeline,
    logger: Logger,
  ) {
    this.log = logger.child({ module: "attachments" });
  }

  /** Encrypt for `to` and upload. The pointer goes into the message. */
  async upload(to: string, data: Uint8Array, contentType: string): Promise<AttachmentPointer> {
    if (data.length > MAX_ATTACHMENT_BYTES) {
      throw new ProtocolError(
        "INVALID_PAYLOAD",
        `Attachment is ${data.length} bytes; the limit is ${MAX_ATTACHMENT_BYTES}`,
      );
    }
    const contact = this.contacts.requireResolved(to);
    const encrypted = await encryptAttachment({
      plaintext: data,
      senderPrivateKey: this.identity.current().keys.encryption.privateKey,
      recipientPublicKey: contact.encPublicKey,
    });

    const presigned = await this.api.presignUpload({
      contentType,
      sizeBytes: encrypted.ciphertext.length,
    });
    await this.api.uploadBlob(presigned.uploadUrl, encrypted.ciphertext, presigned.headers);
    this.log.info(
      { objectKey: presigned.objectKey, size: encrypted.ciphertext.length },
      "Attachment uploaded",
    );

    return {
      objectKey: presigned.objectKey,
      contentType,
      ciphertextSize: encrypted.ciphertext.length,
      fileNonce: encrypted.fileNonce,
      fileKeyBox: encrypted.fileKeyBox,
    };
  }

  /** Upload, then send a message referencing the attachment. */
  async send(
    to: string,
    data: Uint8Array,
    contentType: string,
    options: SendAttachmentOptions = {},
  ): Promise<OutboxEntry> {
    const attachment = await this.upload(to, data, contentType);
    return this.pipeline.sendText(to, options.caption ?? "", {
      attachment,
      msgType: options.msgType ?? messageTypeFor(contentType),
      ...(options.replyTo ? { replyTo: options.replyTo } : {}),
    });
  }

  /**
   * Download and decrypt an attachment received from `from`.
   *
   * @throws CryptoError when the blob does not match its pointer.
   */
  async download(pointer: AttachmentPointer, from: string): Promise<Uint8Array> {
    const contact = this.contacts.requireResolved(from);
    const presigned = await this.api.presignDownload(pointer.objectKey);
    const ciphertext = await this.api.downloadBlob(presigned.downloadUrl);
    if (ciphertext.length !== pointer.ciphertextSize) {
      throw new CryptoError(
        "MALFORMED",
        `Attachment is ${ciphertext.length} bytes, pointer says ${pointer.ciphertextSize}`,
      );
    }

    try {
      return await decryptAttachment({
        ciphertext,
        fileNonce: pointer.fileNonce,
        fileKeyBox: pointer.fileKeyBox,
        senderPublicKey: contact.encPublicKey,
        recipientPrivateKey: this.identity.current().keys.encryption.privateKey,
      });
    } catch (err) {
      this.log.warn({ objectKey: pointer.objectKey, from }, "Attachment decryption failed");
      if (err instanceof DecryptionError) {
        throw new CryptoError("DECRYPT_FAILED", "Attachment cannot be decrypted", { cause: err });
      }
      throw new CryptoError("MALFORMED", "Attachment pointer is malformed", { cause: err });
    }
  }
}
