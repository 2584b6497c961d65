/**
 * didseal: agent keys whose private material lives in this process.
 *
 * `Ed25519AgentKey` can only sign. `EcAgentKey` (P-256, secp256k1) can also
 * encrypt and decrypt, so asking an Ed25519 key for encryption is a type error
 * rather than a runtime surprise.
 */

import { curveSuite, ecCurveSuite, isEcKeyType } from "../crypto/curves.js";
import { generateKeyPair, keyPairFromPrivateKey, type KeyPair } from "../crypto/keys.js";
import { didKeyFromPublicKey, didKeyVerificationMethodId } from "../did/did-key.js";
import {
  createJwe as buildJwe,
  decryptForRecipient,
  decryptJwe,
  encryptForRecipient,
  JWE_ALG,
  JWE_ENC,
  type JweRecipientContext,
} from "../envelope/jwe.js";
import { createJws as buildJws } from "../envelope/jws.js";
import { base64urlEncode } from "../crypto/base64url.js";
import { moduleLogger } from "../logger.js";
import type {
  DecryptionKey,
  EcKeyType,
  EncryptedContent,
  EncryptionKey,
  KeyType,
  PrivateJwk,
  PublicJwk,
  SigningKey,
  VerificationKey,
} from "../types/keys.js";
import type {
  Jwe,
  JweAlgorithm,
  JweEncryption,
  Jws,
  JwsAlgorithm,
  JwsProtected,
} from "../types/messages.js";
import { PublicVerificationKey } from "./verification-key.js";

const log = moduleLogger("agent-key");

/** Identity a key is bound to. Defaults to a did:key of the public key. */
export interface KeyIdentity {
  did?: string;
  keyId?: string;
}

abstract class LocalAgentKeyBase implements SigningKey {
  public readonly keyId: string;
  public readonly did: string;
  public abstract readonly keyType: KeyType;
  protected readonly privateKey: Uint8Array;
  protected readonly publicKey: Uint8Array;

  protected constructor(keyPair: KeyPair, identity: KeyIdentity) {
    this.privateKey = keyPair.privateKey;
    this.publicKey = keyPair.publicKey;
    if (identity.did !== undefined) {
      this.did = identity.did;
      this.keyId = identity.keyId ?? `${identity.did}#key-1`;
    } else {
      this.did = didKeyFromPublicKey(keyPair.keyType, keyPair.publicKey);
      this.keyId = identity.keyId ?? didKeyVerificationMethodId(this.did);
    }
  }

  publicKeyJwk(): PublicJwk {
    return { ...curveSuite(this.keyType).publicKeyToJwk(this.publicKey), kid: this.keyId };
  }

  async sign(data: Uint8Array): Promise<Uint8Array> {
    return curveSuite(this.keyType).sign(data, this.privateKey);
  }

  recommendedJwsAlg(): JwsAlgorithm {
    return curveSuite(this.keyType).jwsAlg;
  }

  createJws(payload: Uint8Array, protectedHeader?: Partial<JwsProtected>): Promise<Jws> {
    return buildJws(this, payload, protectedHeader);
  }

  /** The public half as a standalone verification key. */
  toVerificationKey(): VerificationKey {
    return PublicVerificationKey.fromPublicKey(this.keyId, this.keyType, this.publicKey);
  }

  /** Copy of the raw private key. The only way private material leaves the key. */
  exportPrivateKey(): Uint8Array {
    log.info({ kid: this.keyId, keyType: this.keyType }, "private key exported");
    return this.privateKey.slice();
  }

  /** Private JWK (public members plus `d`). Logged like `exportPrivateKey`. */
  exportPrivateJwk(): PrivateJwk {
    return { ...this.publicKeyJwk(), d: base64urlEncode(this.exportPrivateKey()) };
  }
}

export class Ed25519AgentKey extends LocalAgentKeyBase {
  public readonly keyType = "Ed25519" as const;

  constructor(keyPair: KeyPair, identity: KeyIdentity = {}) {
    super(keyPair, identity);
  }
}

export class EcAgentKey extends LocalAgentKeyBase implements EncryptionKey, DecryptionKey {
  public readonly keyType: EcKeyType;

  constructor(keyPair: KeyPair & { keyType: EcKeyType }, identity: KeyIdentity = {}) {
    super(keyPair, identity);
    this.keyType = keyPair.keyType;
  }

  async encrypt(
    plaintext: Uint8Array,
    recipient: VerificationKey,
    aad?: Uint8Array,
  ): Promise<EncryptedContent> {
    return encryptForRecipient(plaintext, recipient, { senderKid: this.keyId, aad });
  }

  recommendedJweAlgEnc(): [JweAlgorithm, JweEncryption] {
    return [JWE_ALG, JWE_ENC];
  }

  createJwe(
    plaintext: Uint8Array,
    recipients: readonly VerificationKey[],
    protectedHeader?: { typ?: string },
  ): Promise<Jwe> {
    return buildJwe(plaintext, recipients, { senderKid: this.keyId, typ: protectedHeader?.typ });
  }

  async decrypt(
    content: EncryptedContent,
    aad?: Uint8Array,
    senderKey?: VerificationKey,
  ): Promise<Uint8Array> {
    return decryptForRecipient(content, this.recipientContext(), {
      senderKid: senderKey?.keyId,
      aad,
    });
  }

  async unwrapJwe(jwe: Jwe): Promise<Uint8Array> {
    const opened = await decryptJwe(jwe, this.recipientContext());
    return opened.plaintext;
  }

  private recipientContext(): JweRecipientContext {
    const suite = ecCurveSuite(this.keyType);
    return {
      keyId: this.keyId,
      keyType: this.keyType,
      agree: (publicKey) => suite.sharedSecret(this.privateKey, publicKey),
    };
  }
}

export type LocalAgentKey = Ed25519AgentKey | EcAgentKey;

function fromKeyPair(keyPair: KeyPair, identity: KeyIdentity): LocalAgentKey {
  const { keyType } = keyPair;
  if (isEcKeyType(keyType)) {
    return new EcAgentKey({ ...keyPair, keyType }, identity);
  }
  return new Ed25519AgentKey(keyPair, identity);
}

/** Generate a fresh key of the given type. */
export function generateAgentKey(keyType: "Ed25519", identity?: KeyIdentity): Ed25519AgentKey;
export function generateAgentKey(keyType: EcKeyType, identity?: KeyIdentity): EcAgentKey;
export function generateAgentKey(keyType: KeyType, identity?: KeyIdentity): LocalAgentKey;
export function generateAgentKey(keyType: KeyType, identity: KeyIdentity = {}): LocalAgentKey {
  return fromKeyPair(generateKeyPair(keyType), identity);
}

/**
 * Import a key from raw private-key bytes.
 * @throws {DidSealError} INVALID_KEY if the bytes are not a valid private key.
 */
export function importAgentKey(keyType: "Ed25519", privateKey: Uint8Array, identity?: KeyIdentity): Ed25519AgentKey;
export function importAgentKey(keyType: EcKeyType, privateKey: Uint8Array, identity?: KeyIdentity): EcAgentKey;
export function importAgentKey(keyType: KeyType, privateKey: Uint8Array, identity?: KeyIdentity): LocalAgentKey;
export function importAgentKey(
  keyType: KeyType,
  privateKey: Uint8Array,
  identity: KeyIdentity = {},
): LocalAgentKey {
  return fromKeyPair(keyPairFromPrivateKey(keyType, privateKey), identity);
}
