/**
 * Attachment codec: a per-file content key, wrapped for the recipient.
 *
 *   contentKey = random(32), fileNonce = random(24)
 *   ciphertext = secretbox(file, fileNonce, contentKey)
 *   fileKeyBox = box(contentKey, keyNonce, recipientPub, senderPriv)
 *
 * Only the ciphertext, the file nonce and the wrapped key leave the
 * device. The raw content key is wiped once it has been wrapped.
 *
 * @module attachment
 */
import sodium from "libsodium-wrappers-sumo";
import { initSodium, toBase64, fromBase64Strict } from "./encoding.js";
import { boxSeal, boxOpen, secretboxOpen, NONCE_BYTES } from "./box.js";

export const CONTENT_KEY_BYTES = 32;

/** Wrapped content key as carried in an attachment pointer. */
export interface FileKeyBox {
  nonce: string; // base64
  ciphertext: string; // base64
}

export interface EncryptedAttachment {
  ciphertext: Uint8Array;
  fileNonce: string; // base64
  fileKeyBox: FileKeyBox;
}

/**
 * Encrypt a file for one recipient.
 */
export async function encryptAttachment(params: {
  plaintext: Uint8Array;
  senderPrivateKey: Uint8Array;
  recipientPublicKey: Uint8Array;
}): Promise<EncryptedAttachment> {
  await initSodium();

  const contentKey = sodium.randombytes_buf(CONTENT_KEY_BYTES);
  const fileNonce = sodium.randombytes_buf(NONCE_BYTES);
  const ciphertext = sodium.crypto_secretbox_easy(
    params.plaintext,
    fileNonce,
    contentKey,
  );
  const wrapped = await boxSeal(
    contentKey,
    params.recipientPublicKey,
    params.senderPrivateKey,
  );
  sodium.memzero(contentKey);

  return {
    ciphertext,
    fileNonce: toBase64(fileNonce),
    fileKeyBox: {
      nonce: toBase64(wrapped.nonce),
      ciphertext: toBase64(wrapped.ciphertext),
    },
  };
}

/**
 * Unwrap the content key and open the file.
 *
 * @throws DecryptionError when either layer fails to authenticate.
 * @throws Error when the nonces are not 24-byte base64.
 */
export async function decryptAttachment(params: {
  ciphertext: Uint8Array;
  fileNonce: string;
  fileKeyBox: FileKeyBox;
  senderPublicKey: Uint8Array;
  recipientPrivateKey: Uint8Array;
}): Promise<Uint8Array> {
  await initSodium();

  const fileNonce = fromBase64Strict(params.fileNonce, NONCE_BYTES);
  const keyNonce = fromBase64Strict(params.fileKeyBox.nonce, NONCE_BYTES);
  const wrappedKey = fromBase64Strict(params.fileKeyBox.ciphertext);
  if (!fileNonce || !keyNonce || !wrappedKey) {
    throw new Error("Malformed attachment pointer");
  }

  const contentKey = await boxOpen(
    wrappedKey,
    keyNonce,
    params.senderPublicKey,
    params.recipientPrivateKey,
  );
  try {
    return await secretboxOpen(params.ciphertext, fileNonce, contentKey);
  } finally {
    sodium.memzero(contentKey);
  }
}
