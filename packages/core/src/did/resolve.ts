/**
 * didseal: resolving a DID or key id to public key material.
 *
 * The envelope layer needs one capability from DID resolution: "given a DID
 * or key id, return a public key in JWK form, or fail with KEY_NOT_FOUND".
 * Network-backed resolvers implement `KeyResolver`; the ones here work from
 * documents already in memory or from the identifier itself (did:key).
 */

import type { DIDDocument, VerificationMethod } from "../types/did.js";
import type { PublicJwk } from "../types/keys.js";
import { DidSealError, DidSealErrorCode, isDidSealError } from "../types/errors.js";
import { PublicVerificationKey } from "../keys/verification-key.js";
import { buildDidKeyDocument, isDidKey } from "./did-key.js";

export interface KeyResolver {
  /** @throws {DidSealError} KEY_NOT_FOUND when the id cannot be resolved. */
  resolveJwk(didOrKid: string): Promise<PublicJwk>;
}

function keyNotFound(id: string, reason?: string): DidSealError {
  return new DidSealError(
    DidSealErrorCode.KEY_NOT_FOUND,
    reason ? `Key not found: ${id} (${reason})` : `Key not found: ${id}`,
    { id },
  );
}

function splitKid(didOrKid: string): { did: string; fragment?: string } {
  const hash = didOrKid.indexOf("#");
  if (hash === -1) return { did: didOrKid };
  return { did: didOrKid.slice(0, hash), fragment: didOrKid.slice(hash + 1) };
}

function absoluteMethodId(did: string, id: string): string {
  return id.startsWith("#") ? `${did}${id}` : id;
}

/**
 * Select a verification method from a document and return its JWK, with
 * `kid` set to the method's absolute id. A bare DID selects the first
 * authentication method.
 */
export function jwkFromDocument(document: DIDDocument, didOrKid: string): PublicJwk {
  const { did, fragment } = splitKid(didOrKid);
  let wanted: string | undefined;
  if (fragment !== undefined) {
    wanted = `${did}#${fragment}`;
  } else {
    const first = document.authentication[0];
    wanted = first !== undefined ? absoluteMethodId(did, first) : undefined;
  }

  const method: VerificationMethod | undefined = document.verificationMethod.find(
    (vm) => absoluteMethodId(document.id, vm.id) === wanted,
  );
  if (wanted === undefined || method === undefined) {
    throw keyNotFound(didOrKid, "no matching verification method");
  }

  try {
    return PublicVerificationKey.fromVerificationMethod({ ...method, id: wanted }).publicKeyJwk();
  } catch (err) {
    throw keyNotFound(didOrKid, err instanceof Error ? err.message : "unusable verification method");
  }
}

/** Resolves against DID Documents registered in memory. */
export class DidDocumentResolver implements KeyResolver {
  private readonly documents = new Map<string, DIDDocument>();

  constructor(documents: readonly DIDDocument[] = []) {
    for (const document of documents) {
      this.register(document);
    }
  }

  register(document: DIDDocument): void {
    this.documents.set(document.id, document);
  }

  unregister(did: string): boolean {
    return this.documents.delete(did);
  }

  async resolveJwk(didOrKid: string): Promise<PublicJwk> {
    const { did } = splitKid(didOrKid);
    const document = this.documents.get(did);
    if (document === undefined) {
      throw keyNotFound(didOrKid, "unknown DID");
    }
    return jwkFromDocument(document, didOrKid);
  }
}

/** Resolves did:key identifiers from the key embedded in the DID. */
export class DidKeyResolver implements KeyResolver {
  async resolveJwk(didOrKid: string): Promise<PublicJwk> {
    const { did } = splitKid(didOrKid);
    if (!isDidKey(did)) {
      throw keyNotFound(didOrKid, "not a did:key");
    }
    let document: DIDDocument;
    try {
      document = buildDidKeyDocument(did);
    } catch (err) {
      throw keyNotFound(didOrKid, err instanceof Error ? err.message : "undecodable did:key");
    }
    return jwkFromDocument(document, didOrKid);
  }
}

/** Tries each resolver in order; the first one that knows the key wins. */
export class ChainedKeyResolver implements KeyResolver {
  constructor(private readonly resolvers: readonly KeyResolver[]) {}

  async resolveJwk(didOrKid: string): Promise<PublicJwk> {
    for (const resolver of this.resolvers) {
      try {
        return await resolver.resolveJwk(didOrKid);
      } catch (err) {
        if (!isDidSealError(err, DidSealErrorCode.KEY_NOT_FOUND)) throw err;
      }
    }
    throw keyNotFound(didOrKid);
  }
}
