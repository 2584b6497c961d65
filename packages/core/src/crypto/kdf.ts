/**
 * didseal: Concat KDF (NIST SP 800-56A single-step, SHA-256).
 *
 * Derives the key-encryption key for ECDH-ES+A256KW from a raw ECDH shared
 * secret. OtherInfo follows RFC 7518 §4.6.2 so both ends derive the same
 * bytes independently.
 */

import { sha256 } from "@noble/hashes/sha256";
import { concatBytes, utf8ToBytes } from "@noble/hashes/utils";
import { DidSealError, DidSealErrorCode } from "../types/errors.js";

/** AlgorithmID used for every JWE key agreement in this package. */
export const ECDH_ES_A256KW = "ECDH-ES+A256KW";

const SHA256_LEN = 32;

function be32(n: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, n, false);
  return out;
}

/** 32-bit big-endian length prefix followed by the data. */
function lengthPrefixed(data: Uint8Array): Uint8Array {
  return concatBytes(be32(data.length), data);
}

/**
 * Derive `keyDataLenBits / 8` bytes of key material.
 * @param sharedSecret - The raw ECDH shared secret (Z).
 * @param apu - PartyUInfo, the sender identifier (may be empty).
 * @param apv - PartyVInfo, the recipient identifier (may be empty).
 * @param keyDataLenBits - Output length in bits; a positive multiple of 8.
 * @param algorithmId - AlgorithmID placed in OtherInfo.
 * @throws {DidSealError} INVALID_PARAMETER for a zero or unaligned length.
 */
export function deriveKeyEcdhEs(
  sharedSecret: Uint8Array,
  apu: Uint8Array,
  apv: Uint8Array,
  keyDataLenBits: number,
  algorithmId: string = ECDH_ES_A256KW,
): Uint8Array {
  if (!Number.isInteger(keyDataLenBits) || keyDataLenBits <= 0 || keyDataLenBits % 8 !== 0) {
    throw new DidSealError(
      DidSealErrorCode.INVALID_PARAMETER,
      "keyDataLenBits must be a positive multiple of 8",
      { keyDataLenBits },
    );
  }

  const otherInfo = concatBytes(
    lengthPrefixed(utf8ToBytes(algorithmId)),
    lengthPrefixed(apu),
    lengthPrefixed(apv),
    be32(keyDataLenBits),
  );

  const keyLen = keyDataLenBits / 8;
  const rounds = Math.ceil(keyLen / SHA256_LEN);
  const derived = new Uint8Array(rounds * SHA256_LEN);

  for (let counter = 1; counter <= rounds; counter++) {
    const digest = sha256(concatBytes(be32(counter), sharedSecret, otherInfo));
    derived.set(digest, (counter - 1) * SHA256_LEN);
  }

  return derived.slice(0, keyLen);
}
