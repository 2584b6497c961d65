/**
 * didseal: did:key identifiers and their DID Documents.
 *
 * A did:key embeds the public key itself: `did:key:z` + base58btc of the
 * multicodec prefix followed by the raw key (compressed point for EC keys).
 */

import { bytesToHex, concatBytes } from "@noble/hashes/utils";
import { base58btc } from "multiformats/bases/base58";
import type { DIDDocument } from "../types/did.js";
import { KEY_TYPES, type KeyType } from "../types/keys.js";
import { DidSealError, DidSealErrorCode } from "../types/errors.js";

/** Unsigned-varint multicodec prefixes of the public key codecs. */
const MULTICODEC_PREFIXES: Record<KeyType, Uint8Array> = {
  Ed25519: new Uint8Array([0xed, 0x01]),
  "P-256": new Uint8Array([0x80, 0x24]),
  secp256k1: new Uint8Array([0xe7, 0x01]),
};

const PUBLIC_KEY_LENGTHS: Record<KeyType, number> = {
  Ed25519: 32,
  "P-256": 33,
  secp256k1: 33,
};

const DID_KEY_PREFIX = "did:key:";

/** A public key recovered from a multibase value. */
export interface DecodedMultikey {
  keyType: KeyType;
  publicKey: Uint8Array;
}

/** Multibase (base58btc) encoding of a multicodec-prefixed public key. */
export function encodeMultikey(keyType: KeyType, publicKey: Uint8Array): string {
  return base58btc.encode(concatBytes(MULTICODEC_PREFIXES[keyType], publicKey));
}

/**
 * Decode a multibase public key, identifying its type by multicodec prefix.
 * @throws {DidSealError} INVALID_KEY for an unknown codec or wrong key length.
 */
export function decodeMultikey(multibase: string): DecodedMultikey {
  let decoded: Uint8Array;
  try {
    decoded = base58btc.decode(multibase);
  } catch {
    throw new DidSealError(DidSealErrorCode.INVALID_KEY, "Public key is not base58btc multibase");
  }

  for (const keyType of KEY_TYPES) {
    const prefix = MULTICODEC_PREFIXES[keyType];
    if (startsWith(decoded, prefix)) {
      const publicKey = decoded.slice(prefix.length);
      if (publicKey.length !== PUBLIC_KEY_LENGTHS[keyType]) {
        throw new DidSealError(
          DidSealErrorCode.INVALID_KEY,
          `${keyType} public key must be ${PUBLIC_KEY_LENGTHS[keyType]} bytes`,
        );
      }
      return { keyType, publicKey };
    }
  }

  throw new DidSealError(
    DidSealErrorCode.INVALID_KEY,
    `Unsupported multicodec prefix: ${bytesToHex(decoded.slice(0, 2))}`,
  );
}

/** The did:key for a public key. */
export function didKeyFromPublicKey(keyType: KeyType, publicKey: Uint8Array): string {
  return `${DID_KEY_PREFIX}${encodeMultikey(keyType, publicKey)}`;
}

/** The conventional verification method id of a did:key (`did#<multibase>`). */
export function didKeyVerificationMethodId(did: string): string {
  return `${did}#${did.slice(DID_KEY_PREFIX.length)}`;
}

export function isDidKey(did: string): boolean {
  return did.startsWith(`${DID_KEY_PREFIX}z`);
}

/**
 * Build the DID Document of a did:key: one Multikey method used for both
 * authentication and, for EC keys, key agreement.
 * @throws {DidSealError} INVALID_FORMAT if `did` is not a did:key.
 */
export function buildDidKeyDocument(did: string): DIDDocument {
  if (!isDidKey(did)) {
    throw new DidSealError(
      DidSealErrorCode.INVALID_FORMAT,
      `Invalid DID format: expected "did:key:z...", got "${did}"`,
    );
  }
  const multibase = did.slice(DID_KEY_PREFIX.length);
  const { keyType } = decodeMultikey(multibase);
  const methodId = didKeyVerificationMethodId(did);

  return {
    "@context": ["https://www.w3.org/ns/did/v1", "https://w3id.org/security/multikey/v1"],
    id: did,
    verificationMethod: [
      {
        id: methodId,
        type: "Multikey",
        controller: did,
        publicKeyMultibase: multibase,
      },
    ],
    authentication: [methodId],
    keyAgreement: keyType === "Ed25519" ? [] : [methodId],
  };
}

function startsWith(bytes: Uint8Array, prefix: Uint8Array): boolean {
  if (bytes.length < prefix.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (bytes[i] !== prefix[i]) return false;
  }
  return true;
}
