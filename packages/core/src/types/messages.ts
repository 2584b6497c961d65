/**
 * didseal: wire envelope types and protocol constants.
 */

import type { EcPublicJwk } from "./keys.js";

/** Media type of an unprotected message. */
export const DIDCOMM_PLAIN = "application/didcomm-plain+json";
/** Media type of a JWS-signed message. */
export const DIDCOMM_SIGNED = "application/didcomm-signed+json";
/** Media type of a JWE-encrypted message. */
export const DIDCOMM_ENCRYPTED = "application/didcomm-encrypted+json";

/** JWS signature algorithms, one per key type. */
export type JwsAlgorithm = "EdDSA" | "ES256" | "ES256K";

/** JWE key management algorithm. */
export type JweAlgorithm = "ECDH-ES+A256KW";

/** JWE content encryption algorithm. */
export type JweEncryption = "A256GCM";

/** Decoded JWS protected header. */
export interface JwsProtected {
  typ: string;
  alg: JwsAlgorithm;
  /** Present only in compact serialization, which has no unprotected header. */
  kid?: string;
}

export interface JwsSignature {
  /** base64url(JSON protected header) */
  protected: string;
  /** base64url(raw signature bytes) */
  signature: string;
  header: {
    kid: string;
  };
}

/** General JSON serialization of a JWS. */
export interface Jws {
  /** base64url of the canonical JSON payload. */
  payload: string;
  signatures: JwsSignature[];
}

/** Decoded JWE protected header. */
export interface JweProtected {
  epk: EcPublicJwk;
  /** base64url recipient-set context. */
  apv: string;
  /** base64url sender key id, present only when the sender is named. */
  apu?: string;
  typ: string;
  /** Media type of the plaintext when it is itself an envelope. */
  cty?: string;
  enc: JweEncryption;
  alg: JweAlgorithm;
}

export interface JweRecipient {
  /** base64url(AES-KW wrapped CEK) */
  encrypted_key: string;
  header: {
    kid: string;
    /** Unauthenticated hint naming the sender's key. */
    sender_kid?: string;
  };
}

/** General JSON serialization of a multi-recipient JWE. */
export interface Jwe {
  protected: string;
  recipients: JweRecipient[];
  iv: string;
  ciphertext: string;
  tag: string;
}

/** DIDComm-style plain message. */
export interface PlainMessage<T = unknown> {
  id: string;
  typ: typeof DIDCOMM_PLAIN;
  type: string;
  from?: string;
  to?: string[];
  thid?: string;
  created_time: number;
  expires_time?: number;
  body: T;
}

/** Size limits for envelopes. */
export const MESSAGE_LIMITS = {
  /** Default maximum transport string size in bytes (1 MiB). */
  MAX_ENVELOPE_SIZE: 1_048_576,
} as const;
