/**
 * didseal: key types, JWK shapes and the capability interfaces of agent keys.
 *
 * Capabilities are separate interfaces so that a key's type decides, at
 * compile time, which operations can be requested from it. An Ed25519 key is
 * a `SigningKey` only; P-256 and secp256k1 keys also implement
 * `EncryptionKey` and `DecryptionKey`.
 */

import type {
  Jwe,
  JweAlgorithm,
  JweEncryption,
  Jws,
  JwsAlgorithm,
  JwsProtected,
} from "./messages.js";

/** Supported key algorithms. */
export type KeyType = "Ed25519" | "P-256" | "secp256k1";

/** Key types that support ECDH key agreement. */
export type EcKeyType = Exclude<KeyType, "Ed25519">;

export const KEY_TYPES: readonly KeyType[] = ["Ed25519", "P-256", "secp256k1"];

/** Ed25519 public key in JWK form. */
export interface OkpPublicJwk {
  kty: "OKP";
  crv: "Ed25519";
  x: string;
  kid?: string;
}

/** P-256 or secp256k1 public key in JWK form. */
export interface EcPublicJwk {
  kty: "EC";
  crv: EcKeyType;
  x: string;
  y: string;
  kid?: string;
}

export type PublicJwk = OkpPublicJwk | EcPublicJwk;

/** Public JWK plus the private scalar / seed `d`. */
export type PrivateJwk = PublicJwk & { d: string };

/** Output of the low-level single-recipient encryption. */
export interface EncryptedContent {
  ciphertext: Uint8Array;
  iv: Uint8Array;
  tag: Uint8Array;
  /** CEK wrapped for the recipient. */
  encryptedKey: Uint8Array;
  /** Ephemeral public key the KEK was agreed with. */
  epk: EcPublicJwk;
}

/** Properties every agent key has, whatever it can do. */
export interface AgentKey {
  readonly keyId: string;
  readonly did: string;
  readonly keyType: KeyType;
  publicKeyJwk(): PublicJwk;
}

/** A key that produces JWS signatures. */
export interface SigningKey extends AgentKey {
  sign(data: Uint8Array): Promise<Uint8Array>;
  recommendedJwsAlg(): JwsAlgorithm;
  createJws(payload: Uint8Array, protectedHeader?: Partial<JwsProtected>): Promise<Jws>;
}

/** A public key able to check signatures made by the matching `SigningKey`. */
export interface VerificationKey {
  readonly keyId: string;
  publicKeyJwk(): PublicJwk;
  /**
   * Check `signature` over `signingInput`. Resolves false on any mismatch,
   * including an `alg` that does not belong to this key's curve.
   */
  verifySignature(
    signingInput: Uint8Array,
    signature: Uint8Array,
    protectedHeader: JwsProtected,
  ): Promise<boolean>;
}

/** A key able to build JWEs for EC recipients. */
export interface EncryptionKey extends AgentKey {
  encrypt(
    plaintext: Uint8Array,
    recipient: VerificationKey,
    aad?: Uint8Array,
  ): Promise<EncryptedContent>;
  recommendedJweAlgEnc(): [JweAlgorithm, JweEncryption];
  createJwe(
    plaintext: Uint8Array,
    recipients: readonly VerificationKey[],
    protectedHeader?: { typ?: string },
  ): Promise<Jwe>;
}

/** A key able to open JWEs addressed to it. */
export interface DecryptionKey extends AgentKey {
  decrypt(
    content: EncryptedContent,
    aad?: Uint8Array,
    senderKey?: VerificationKey,
  ): Promise<Uint8Array>;
  unwrapJwe(jwe: Jwe): Promise<Uint8Array>;
}
