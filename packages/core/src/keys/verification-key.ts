/**
 * didseal: public-only verification keys built from a JWK or a resolved
 * DID Document verification method.
 */

import { curveSuite, keyTypeForJwsAlg } from "../crypto/curves.js";
import { decodeMultikey } from "../did/did-key.js";
import type { VerificationMethod } from "../types/did.js";
import type { KeyType, PublicJwk, VerificationKey } from "../types/keys.js";
import type { JwsProtected } from "../types/messages.js";
import { publicJwkSchema } from "../envelope/schema.js";
import { DidSealError, DidSealErrorCode } from "../types/errors.js";

export class PublicVerificationKey implements VerificationKey {
  public readonly keyId: string;
  public readonly keyType: KeyType;
  private readonly jwk: PublicJwk;
  private readonly publicKey: Uint8Array;

  private constructor(keyId: string, jwk: PublicJwk, publicKey: Uint8Array) {
    this.keyId = keyId;
    this.keyType = jwk.crv;
    this.jwk = jwk;
    this.publicKey = publicKey;
  }

  /**
   * Build from an untrusted JWK value.
   * @throws {DidSealError} INVALID_KEY if the JWK is malformed or off-curve.
   */
  static fromJwk(keyId: string, jwk: unknown): PublicVerificationKey {
    const parsed = publicJwkSchema.safeParse(jwk);
    if (!parsed.success) {
      throw new DidSealError(
        DidSealErrorCode.INVALID_KEY,
        `Unsupported or malformed public JWK for ${keyId}`,
      );
    }
    const publicKey = curveSuite(parsed.data.crv).jwkToPublicKey(parsed.data);
    return new PublicVerificationKey(keyId, stripKid(parsed.data), publicKey);
  }

  /** Build from a raw public key (32-byte Ed25519 or compressed EC point). */
  static fromPublicKey(keyId: string, keyType: KeyType, publicKey: Uint8Array): PublicVerificationKey {
    const suite = curveSuite(keyType);
    let jwk: PublicJwk;
    try {
      jwk = suite.publicKeyToJwk(publicKey);
    } catch {
      throw new DidSealError(DidSealErrorCode.INVALID_KEY, `Invalid ${keyType} public key`);
    }
    return new PublicVerificationKey(keyId, jwk, suite.jwkToPublicKey(jwk));
  }

  /** Build from a DID Document verification method. */
  static fromVerificationMethod(method: VerificationMethod): PublicVerificationKey {
    if (method.type === "JsonWebKey2020") {
      return PublicVerificationKey.fromJwk(method.id, method.publicKeyJwk);
    }
    const { keyType, publicKey } = decodeMultikey(method.publicKeyMultibase);
    return PublicVerificationKey.fromPublicKey(method.id, keyType, publicKey);
  }

  publicKeyJwk(): PublicJwk {
    return { ...this.jwk, kid: this.keyId };
  }

  async verifySignature(
    signingInput: Uint8Array,
    signature: Uint8Array,
    protectedHeader: JwsProtected,
  ): Promise<boolean> {
    if (keyTypeForJwsAlg(protectedHeader.alg) !== this.keyType) {
      return false;
    }
    return curveSuite(this.keyType).verify(signature, signingInput, this.publicKey);
  }
}

function stripKid(jwk: PublicJwk): PublicJwk {
  if (jwk.kty === "OKP") {
    return { kty: jwk.kty, crv: jwk.crv, x: jwk.x };
  }
  return { kty: jwk.kty, crv: jwk.crv, x: jwk.x, y: jwk.y };
}
