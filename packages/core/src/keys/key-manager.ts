/**
 * didseal: in-memory key manager.
 *
 * Maps key ids to local agent keys and answers the capability lookups the
 * pack/unpack pipeline makes. Verification keys for remote parties come from
 * local keys first, then from an optional `KeyResolver`.
 */

import { config } from "../config.js";
import type { KeyResolver } from "../did/resolve.js";
import { moduleLogger } from "../logger.js";
import type {
  DecryptionKey,
  EncryptionKey,
  KeyType,
  SigningKey,
  VerificationKey,
} from "../types/keys.js";
import { DidSealError, DidSealErrorCode } from "../types/errors.js";
import {
  EcAgentKey,
  generateAgentKey,
  importAgentKey,
  type KeyIdentity,
  type LocalAgentKey,
} from "./local-agent-key.js";
import { PublicVerificationKey } from "./verification-key.js";

const log = moduleLogger("key-manager");

/** Lookups the pack/unpack pipeline makes against a key store. */
export interface KeyManagerPacking {
  getSigningKey(kid: string): Promise<SigningKey>;
  getEncryptionKey(kid: string): Promise<EncryptionKey>;
  getDecryptionKey(kid: string): Promise<DecryptionKey>;
  resolveVerificationKey(kid: string): Promise<VerificationKey>;
  hasKey(kid: string): boolean;
  /** True when `kid` names a local key that can open a JWE. */
  canDecrypt(kid: string): boolean;
  listKeys(): string[];
}

export interface KeyManagerOptions {
  resolver?: KeyResolver;
  keys?: readonly LocalAgentKey[];
}

export class KeyManager implements KeyManagerPacking {
  private readonly keys = new Map<string, LocalAgentKey>();
  private readonly resolver?: KeyResolver;

  constructor(options: KeyManagerOptions = {}) {
    this.resolver = options.resolver;
    for (const key of options.keys ?? []) {
      this.addKey(key);
    }
  }

  /**
   * Add a key under its key id.
   * @throws {DidSealError} INVALID_PARAMETER if the id is already taken.
   */
  addKey(key: LocalAgentKey): void {
    if (this.keys.has(key.keyId)) {
      throw new DidSealError(
        DidSealErrorCode.INVALID_PARAMETER,
        `Key already registered: ${key.keyId}`,
      );
    }
    this.keys.set(key.keyId, key);
    log.debug({ kid: key.keyId, keyType: key.keyType }, "key added");
  }

  /** Generate and register a new key; the key type defaults from configuration. */
  generateKey(keyType: KeyType = config.defaultKeyType, identity?: KeyIdentity): LocalAgentKey {
    const key = generateAgentKey(keyType, identity);
    this.addKey(key);
    return key;
  }

  /** Import raw private-key bytes and register the resulting key. */
  importKey(keyType: KeyType, privateKey: Uint8Array, identity?: KeyIdentity): LocalAgentKey {
    const key = importAgentKey(keyType, privateKey, identity);
    this.addKey(key);
    return key;
  }

  removeKey(kid: string): boolean {
    const removed = this.keys.delete(kid);
    if (removed) log.debug({ kid }, "key removed");
    return removed;
  }

  hasKey(kid: string): boolean {
    return this.keys.has(kid);
  }

  canDecrypt(kid: string): boolean {
    return this.keys.get(kid) instanceof EcAgentKey;
  }

  listKeys(): string[] {
    return [...this.keys.keys()];
  }

  /** @throws {DidSealError} KEY_NOT_FOUND */
  getKey(kid: string): LocalAgentKey {
    const key = this.keys.get(kid);
    if (key === undefined) {
      throw new DidSealError(DidSealErrorCode.KEY_NOT_FOUND, `Key not found: ${kid}`, { kid });
    }
    return key;
  }

  async getSigningKey(kid: string): Promise<SigningKey> {
    return this.getKey(kid);
  }

  /** @throws {DidSealError} UNSUPPORTED_ALGORITHM for keys that cannot do ECDH. */
  async getEncryptionKey(kid: string): Promise<EcAgentKey> {
    return this.getEcKey(kid, "encryption");
  }

  /** @throws {DidSealError} UNSUPPORTED_ALGORITHM for keys that cannot do ECDH. */
  async getDecryptionKey(kid: string): Promise<EcAgentKey> {
    return this.getEcKey(kid, "decryption");
  }

  /**
   * Verification key for `kid`: a local key's public half, else the resolver's answer.
   * @throws {DidSealError} KEY_NOT_FOUND
   */
  async resolveVerificationKey(kid: string): Promise<VerificationKey> {
    const local = this.keys.get(kid);
    if (local !== undefined) {
      return local.toVerificationKey();
    }
    if (this.resolver === undefined) {
      throw new DidSealError(DidSealErrorCode.KEY_NOT_FOUND, `Key not found: ${kid}`, { kid });
    }
    const jwk = await this.resolver.resolveJwk(kid);
    try {
      return PublicVerificationKey.fromJwk(kid, jwk);
    } catch (err) {
      throw new DidSealError(
        DidSealErrorCode.KEY_NOT_FOUND,
        `Resolved key for ${kid} is unusable`,
        { kid, cause: err instanceof Error ? err.message : String(err) },
      );
    }
  }

  private getEcKey(kid: string, capability: string): EcAgentKey {
    const key = this.getKey(kid);
    if (!(key instanceof EcAgentKey)) {
      throw new DidSealError(
        DidSealErrorCode.UNSUPPORTED_ALGORITHM,
        `${key.keyType} key ${kid} does not support ${capability}`,
        { kid, keyType: key.keyType },
      );
    }
    return key;
  }
}
