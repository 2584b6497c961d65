/**
 * Base64url encoding/decoding (RFC 4648 §5), no padding.
 */

import { DidSealError, DidSealErrorCode } from "../types/errors.js";

const BASE64URL_ALPHABET = /^[A-Za-z0-9_-]*$/;

/** Encode bytes to a base64url string (no padding). */
export function base64urlEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64url");
}

/**
 * Decode a base64url string to bytes.
 * @throws {DidSealError} INVALID_FORMAT if the input is not unpadded base64url.
 */
export function base64urlDecode(str: string): Uint8Array {
  if (!BASE64URL_ALPHABET.test(str) || str.length % 4 === 1) {
    throw new DidSealError(
      DidSealErrorCode.INVALID_FORMAT,
      "Value is not valid base64url",
    );
  }
  return new Uint8Array(Buffer.from(str, "base64url"));
}

/** Encode a UTF-8 string to base64url. */
export function base64urlEncodeString(str: string): string {
  return base64urlEncode(new TextEncoder().encode(str));
}

/** Decode base64url to a UTF-8 string. */
export function base64urlDecodeString(str: string): string {
  return new TextDecoder().decode(base64urlDecode(str));
}
