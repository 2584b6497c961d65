/**
 * didseal: AES-256 Key Wrap (RFC 3394).
 *
 * Wraps the JWE content-encryption key under a KDF-derived KEK. The 64-bit
 * integrity check value gives each recipient tamper evidence on its wrapped
 * key independently of the AES-GCM tag.
 */

import { aeskw } from "@noble/ciphers/aes";
import { DidSealError, DidSealErrorCode } from "../types/errors.js";

const KEK_LENGTH = 32;
const SEMIBLOCK = 8;

function assertKek(kek: Uint8Array): void {
  if (kek.length !== KEK_LENGTH) {
    throw new DidSealError(
      DidSealErrorCode.INVALID_PARAMETER,
      `KEK must be ${KEK_LENGTH} bytes`,
      { length: kek.length },
    );
  }
}

/**
 * Wrap `plaintextKey` under `kek`.
 * @returns The wrapped key, 8 bytes longer than the input.
 * @throws {DidSealError} INVALID_PARAMETER for a bad KEK or key length.
 */
export function wrapKeyAesKw(kek: Uint8Array, plaintextKey: Uint8Array): Uint8Array {
  assertKek(kek);
  if (plaintextKey.length < 16 || plaintextKey.length % SEMIBLOCK !== 0) {
    throw new DidSealError(
      DidSealErrorCode.INVALID_PARAMETER,
      "Key to wrap must be at least 16 bytes and a multiple of 8 bytes",
      { length: plaintextKey.length },
    );
  }
  return aeskw(kek).encrypt(plaintextKey);
}

/**
 * Unwrap `wrapped` under `kek`, verifying the integrity check value.
 * @throws {DidSealError} INVALID_PARAMETER for a bad KEK or input length,
 *   INTEGRITY_CHECK_FAILED when the check value does not match.
 */
export function unwrapKeyAesKw(kek: Uint8Array, wrapped: Uint8Array): Uint8Array {
  assertKek(kek);
  if (wrapped.length < 24 || wrapped.length % SEMIBLOCK !== 0) {
    throw new DidSealError(
      DidSealErrorCode.INVALID_PARAMETER,
      "Wrapped key must be at least 24 bytes and a multiple of 8 bytes",
      { length: wrapped.length },
    );
  }
  try {
    return aeskw(kek).decrypt(wrapped);
  } catch {
    throw new DidSealError(
      DidSealErrorCode.INTEGRITY_CHECK_FAILED,
      "Key unwrap integrity check failed",
    );
  }
}
