/**
 * didseal: per-algorithm key operations.
 *
 * A closed table keyed by `KeyType`. Everything that differs between Ed25519,
 * P-256 and secp256k1 (signature scheme, point encoding, JWK shape, ECDH) is
 * selected here and nowhere else.
 */

import { ed25519 } from "@noble/curves/ed25519";
import { p256 } from "@noble/curves/p256";
import { secp256k1 } from "@noble/curves/secp256k1";
import type { CurveFn } from "@noble/curves/abstract/weierstrass";
import { sha256 } from "@noble/hashes/sha256";
import { base64urlDecode, base64urlEncode } from "./base64url.js";
import type {
  EcKeyType,
  EcPublicJwk,
  KeyType,
  OkpPublicJwk,
  PublicJwk,
} from "../types/keys.js";
import type { JwsAlgorithm } from "../types/messages.js";
import { DidSealError, DidSealErrorCode } from "../types/errors.js";

export interface CurveSuite {
  readonly keyType: KeyType;
  readonly jwsAlg: JwsAlgorithm;
  generatePrivateKey(): Uint8Array;
  isValidPrivateKey(privateKey: Uint8Array): boolean;
  /** Raw public key: 32 bytes for Ed25519, a 33-byte compressed point otherwise. */
  getPublicKey(privateKey: Uint8Array): Uint8Array;
  sign(data: Uint8Array, privateKey: Uint8Array): Uint8Array;
  /** False on any failure, including malformed signatures or keys. */
  verify(signature: Uint8Array, data: Uint8Array, publicKey: Uint8Array): boolean;
  publicKeyToJwk(publicKey: Uint8Array): PublicJwk;
  /** @throws {DidSealError} INVALID_KEY when the JWK is not a point on this curve. */
  jwkToPublicKey(jwk: PublicJwk): Uint8Array;
}

export interface EcCurveSuite extends CurveSuite {
  readonly keyType: EcKeyType;
  publicKeyToJwk(publicKey: Uint8Array): EcPublicJwk;
  /** x-coordinate of the ECDH shared point (32 bytes). */
  sharedSecret(privateKey: Uint8Array, publicKey: Uint8Array): Uint8Array;
}

const COORDINATE_LENGTH = 32;
const SIGNATURE_LENGTH = 64;

function invalidKey(message: string): DidSealError {
  return new DidSealError(DidSealErrorCode.INVALID_KEY, message);
}

function decodeCoordinate(value: string, name: string): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = base64urlDecode(value);
  } catch {
    throw invalidKey(`JWK ${name} is not base64url`);
  }
  if (bytes.length !== COORDINATE_LENGTH) {
    throw invalidKey(`JWK ${name} must be ${COORDINATE_LENGTH} bytes`);
  }
  return bytes;
}

const ed25519Suite: CurveSuite = {
  keyType: "Ed25519",
  jwsAlg: "EdDSA",

  generatePrivateKey: () => ed25519.utils.randomPrivateKey(),

  isValidPrivateKey: (privateKey) => privateKey.length === 32,

  getPublicKey: (privateKey) => ed25519.getPublicKey(privateKey),

  sign: (data, privateKey) => ed25519.sign(data, privateKey),

  verify(signature, data, publicKey) {
    if (signature.length !== SIGNATURE_LENGTH || publicKey.length !== 32) return false;
    try {
      return ed25519.verify(signature, data, publicKey);
    } catch {
      return false;
    }
  },

  publicKeyToJwk(publicKey): OkpPublicJwk {
    return { kty: "OKP", crv: "Ed25519", x: base64urlEncode(publicKey) };
  },

  jwkToPublicKey(jwk) {
    if (jwk.kty !== "OKP" || jwk.crv !== "Ed25519") {
      throw invalidKey(`Expected an Ed25519 OKP key, got ${jwk.kty}/${jwk.crv}`);
    }
    const x = decodeCoordinate(jwk.x, "x");
    try {
      ed25519.ExtendedPoint.fromHex(x);
    } catch {
      throw invalidKey("JWK x is not an Ed25519 point");
    }
    return x;
  },
};

function weierstrassSuite(
  keyType: EcKeyType,
  jwsAlg: JwsAlgorithm,
  curve: CurveFn,
): EcCurveSuite {
  return {
    keyType,
    jwsAlg,

    generatePrivateKey: () => curve.utils.randomPrivateKey(),

    isValidPrivateKey: (privateKey) =>
      privateKey.length === 32 && curve.utils.isValidPrivateKey(privateKey),

    getPublicKey: (privateKey) => curve.getPublicKey(privateKey, true),

    // JWS ES256 / ES256K: ECDSA over SHA-256, 64-byte r || s (RFC 7518 §3.4)
    sign: (data, privateKey) => curve.sign(sha256(data), privateKey).toCompactRawBytes(),

    verify(signature, data, publicKey) {
      if (signature.length !== SIGNATURE_LENGTH) return false;
      try {
        const sig = curve.Signature.fromCompact(signature);
        return curve.verify(sig, sha256(data), publicKey);
      } catch {
        return false;
      }
    },

    publicKeyToJwk(publicKey): EcPublicJwk {
      const uncompressed = curve.ProjectivePoint.fromHex(publicKey).toRawBytes(false);
      return {
        kty: "EC",
        crv: keyType,
        x: base64urlEncode(uncompressed.slice(1, 33)),
        y: base64urlEncode(uncompressed.slice(33, 65)),
      };
    },

    jwkToPublicKey(jwk) {
      if (jwk.kty !== "EC" || jwk.crv !== keyType) {
        throw invalidKey(`Expected an EC ${keyType} key, got ${jwk.kty}/${jwk.crv}`);
      }
      const x = decodeCoordinate(jwk.x, "x");
      const y = decodeCoordinate(jwk.y, "y");
      const uncompressed = new Uint8Array(65);
      uncompressed[0] = 0x04;
      uncompressed.set(x, 1);
      uncompressed.set(y, 33);
      try {
        return curve.ProjectivePoint.fromHex(uncompressed).toRawBytes(true);
      } catch {
        throw invalidKey(`JWK is not a point on ${keyType}`);
      }
    },

    sharedSecret(privateKey, publicKey) {
      return curve.getSharedSecret(privateKey, publicKey, true).slice(1);
    },
  };
}

const p256Suite = weierstrassSuite("P-256", "ES256", p256);
const secp256k1Suite = weierstrassSuite("secp256k1", "ES256K", secp256k1);

const SUITES: Record<KeyType, CurveSuite> = {
  Ed25519: ed25519Suite,
  "P-256": p256Suite,
  secp256k1: secp256k1Suite,
};

const EC_SUITES: Record<EcKeyType, EcCurveSuite> = {
  "P-256": p256Suite,
  secp256k1: secp256k1Suite,
};

export function curveSuite(keyType: KeyType): CurveSuite {
  return SUITES[keyType];
}

export function ecCurveSuite(keyType: EcKeyType): EcCurveSuite {
  return EC_SUITES[keyType];
}

export function isEcKeyType(keyType: KeyType): keyType is EcKeyType {
  return keyType !== "Ed25519";
}

/** Map a JWS `alg` to the only key type allowed to use it. */
export function keyTypeForJwsAlg(alg: string): KeyType | undefined {
  switch (alg) {
    case "EdDSA":
      return "Ed25519";
    case "ES256":
      return "P-256";
    case "ES256K":
      return "secp256k1";
    default:
      return undefined;
  }
}
