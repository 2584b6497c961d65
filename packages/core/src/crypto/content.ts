/**
 * didseal: AES-256-GCM content encryption with a detached tag.
 */

import { gcm } from "@noble/ciphers/aes";
import { randomBytes } from "@noble/ciphers/webcrypto";
import { DidSealError, DidSealErrorCode } from "../types/errors.js";

export const CEK_LENGTH = 32;
export const IV_LENGTH = 12;
export const TAG_LENGTH = 16;

export interface SealedContent {
  ciphertext: Uint8Array;
  iv: Uint8Array;
  tag: Uint8Array;
}

/** Fresh random 256-bit content-encryption key. */
export function generateCek(): Uint8Array {
  return randomBytes(CEK_LENGTH);
}

/**
 * Encrypt under `cek` with a fresh random 96-bit IV.
 * @param aad - Associated data bound into the tag (empty when omitted).
 */
export function sealContent(
  cek: Uint8Array,
  plaintext: Uint8Array,
  aad: Uint8Array = new Uint8Array(0),
): SealedContent {
  if (cek.length !== CEK_LENGTH) {
    throw new DidSealError(
      DidSealErrorCode.INVALID_PARAMETER,
      `CEK must be ${CEK_LENGTH} bytes`,
    );
  }
  const iv = randomBytes(IV_LENGTH);
  const sealed = gcm(cek, iv, aad).encrypt(plaintext);
  return {
    ciphertext: sealed.slice(0, sealed.length - TAG_LENGTH),
    iv,
    tag: sealed.slice(sealed.length - TAG_LENGTH),
  };
}

/**
 * Decrypt and authenticate.
 * @throws {DidSealError} DECRYPTION_FAILED on a bad tag, key, IV or length.
 */
export function openContent(
  cek: Uint8Array,
  content: SealedContent,
  aad: Uint8Array = new Uint8Array(0),
): Uint8Array {
  if (
    cek.length !== CEK_LENGTH ||
    content.iv.length !== IV_LENGTH ||
    content.tag.length !== TAG_LENGTH
  ) {
    throw new DidSealError(DidSealErrorCode.DECRYPTION_FAILED, "decryption failed");
  }
  const sealed = new Uint8Array(content.ciphertext.length + TAG_LENGTH);
  sealed.set(content.ciphertext, 0);
  sealed.set(content.tag, content.ciphertext.length);
  try {
    return gcm(cek, content.iv, aad).decrypt(sealed);
  } catch {
    throw new DidSealError(DidSealErrorCode.DECRYPTION_FAILED, "decryption failed");
  }
}
