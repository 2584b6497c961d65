/**
 * didseal: key pair generation and import for every supported key type.
 */

import { curveSuite } from "./curves.js";
import type { KeyType } from "../types/keys.js";
import { DidSealError, DidSealErrorCode } from "../types/errors.js";

/** A raw cryptographic key pair. */
export interface KeyPair {
  keyType: KeyType;
  /** Raw public key: 32 bytes for Ed25519, a 33-byte compressed point otherwise. */
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

/** Generate a key pair from the CSPRNG. */
export function generateKeyPair(keyType: KeyType): KeyPair {
  const suite = curveSuite(keyType);
  const privateKey = suite.generatePrivateKey();
  const publicKey = suite.getPublicKey(privateKey);
  return { keyType, publicKey, privateKey };
}

/**
 * Rebuild a key pair from raw private-key bytes (an Ed25519 seed or an EC scalar).
 * @throws {DidSealError} INVALID_KEY if the bytes are not a valid private key.
 */
export function keyPairFromPrivateKey(keyType: KeyType, privateKey: Uint8Array): KeyPair {
  const suite = curveSuite(keyType);
  if (!suite.isValidPrivateKey(privateKey)) {
    throw new DidSealError(
      DidSealErrorCode.INVALID_KEY,
      `Invalid ${keyType} private key`,
      { length: privateKey.length },
    );
  }
  const copy = privateKey.slice();
  return { keyType, publicKey: suite.getPublicKey(copy), privateKey: copy };
}
