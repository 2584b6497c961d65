/**
 * didseal: DID types following the W3C DID Core specification.
 */

import type { PublicJwk } from "./keys.js";

/** Verification method carrying its key as a JWK. */
export interface JsonWebKey2020 {
  id: string;
  type: "JsonWebKey2020";
  controller: string;
  publicKeyJwk: PublicJwk;
}

/** Verification method carrying a multicodec-prefixed, multibase key. */
export interface Multikey {
  id: string;
  type: "Multikey";
  controller: string;
  publicKeyMultibase: string;
}

export type VerificationMethod = JsonWebKey2020 | Multikey;

/** The subset of a DID Document the envelope layer reads. */
export interface DIDDocument {
  "@context": string[];
  id: string;
  verificationMethod: VerificationMethod[];
  /** Verification method ids usable for signing. */
  authentication: string[];
  /** Verification method ids usable for key agreement. */
  keyAgreement: string[];
}
