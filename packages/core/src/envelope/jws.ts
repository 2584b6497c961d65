/**
 * didseal: JWS construction and verification (RFC 7515).
 *
 * General JSON serialization is the wire form; compact serialization is
 * supported for single-signature envelopes whose protected header names the
 * key, since compact form has no unprotected header.
 */

import {
  base64urlDecode,
  base64urlDecodeString,
  base64urlEncode,
  base64urlEncodeString,
} from "../crypto/base64url.js";
import { moduleLogger } from "../logger.js";
import type { SigningKey, VerificationKey } from "../types/keys.js";
import { DIDCOMM_SIGNED, type Jws, type JwsProtected } from "../types/messages.js";
import { DidSealError, DidSealErrorCode } from "../types/errors.js";
import { jwsProtectedSchema, jwsSchema, parseJson, parseWith } from "./schema.js";

const log = moduleLogger("jws");

/** The parts of a signing key JWS construction needs. */
export type JwsSigner = Pick<SigningKey, "keyId" | "sign" | "recommendedJwsAlg">;

/** Resolves the verification key named by a signature's `kid`. */
export type VerificationKeyLookup = (kid: string) => Promise<VerificationKey>;

export interface VerifiedJws {
  payload: Uint8Array;
  /** Key ids of every signature, all of which verified. */
  signerKids: string[];
}

function signingInput(protectedB64: string, payloadB64: string): Uint8Array {
  return new TextEncoder().encode(`${protectedB64}.${payloadB64}`);
}

/**
 * Sign `payload` and return a single-signature JWS.
 * `alg` always comes from the key; `typ` defaults to the DIDComm signed type.
 */
export async function createJws(
  signer: JwsSigner,
  payload: Uint8Array,
  protectedHeader?: Partial<JwsProtected>,
): Promise<Jws> {
  const header: JwsProtected = {
    typ: protectedHeader?.typ ?? DIDCOMM_SIGNED,
    alg: signer.recommendedJwsAlg(),
  };
  if (protectedHeader?.kid !== undefined) {
    header.kid = protectedHeader.kid;
  }

  const protectedB64 = base64urlEncodeString(JSON.stringify(header));
  const payloadB64 = base64urlEncode(payload);
  const signature = await signer.sign(signingInput(protectedB64, payloadB64));

  return {
    payload: payloadB64,
    signatures: [
      {
        protected: protectedB64,
        signature: base64urlEncode(signature),
        header: { kid: signer.keyId },
      },
    ],
  };
}

/**
 * Validate the shape of an untrusted JWS value.
 * @throws {DidSealError} SERIALIZATION_ERROR if it is not a general JWS.
 */
export function parseJws(value: unknown): Jws {
  return parseWith(jwsSchema, value, DidSealErrorCode.SERIALIZATION_ERROR, "JWS");
}

function verificationFailed(kid: string, reason: string): DidSealError {
  log.debug({ kid, reason }, "JWS signature rejected");
  return new DidSealError(DidSealErrorCode.VERIFICATION_FAILED, "Signature verification failed", {
    kid,
  });
}

function decodeProtected(kid: string, protectedB64: string): JwsProtected {
  let json: unknown;
  try {
    json = parseJson(base64urlDecodeString(protectedB64), DidSealErrorCode.VERIFICATION_FAILED, "JWS protected header");
  } catch {
    throw verificationFailed(kid, "undecodable protected header");
  }
  const result = jwsProtectedSchema.safeParse(json);
  if (!result.success) {
    throw verificationFailed(kid, "unsupported protected header");
  }
  return result.data;
}

/**
 * Verify every signature of `jws` and return the decoded payload.
 * The signing input is rebuilt from the envelope's own fields.
 * @throws {DidSealError} VERIFICATION_FAILED on any mismatch; KEY_NOT_FOUND
 *   when `lookup` cannot resolve a signer.
 */
export async function verifyJws(jws: Jws, lookup: VerificationKeyLookup): Promise<VerifiedJws> {
  if (jws.signatures.length === 0) {
    throw new DidSealError(DidSealErrorCode.VERIFICATION_FAILED, "JWS carries no signatures");
  }

  const signerKids: string[] = [];
  for (const entry of jws.signatures) {
    const kid = entry.header.kid;
    const header = decodeProtected(kid, entry.protected);
    if (header.kid !== undefined && header.kid !== kid) {
      throw verificationFailed(kid, "protected kid does not match header kid");
    }

    let signature: Uint8Array;
    try {
      signature = base64urlDecode(entry.signature);
    } catch {
      throw verificationFailed(kid, "undecodable signature");
    }

    const key = await lookup(kid);
    const valid = await key.verifySignature(signingInput(entry.protected, jws.payload), signature, header);
    if (!valid) {
      throw verificationFailed(kid, "signature mismatch");
    }
    signerKids.push(kid);
  }

  let payload: Uint8Array;
  try {
    payload = base64urlDecode(jws.payload);
  } catch {
    throw new DidSealError(DidSealErrorCode.INVALID_FORMAT, "JWS payload is not base64url");
  }
  return { payload, signerKids };
}

/** Sign `payload` with the key id carried in the protected header. */
export async function createCompactJws(signer: JwsSigner, payload: Uint8Array): Promise<string> {
  const jws = await createJws(signer, payload, { kid: signer.keyId });
  return toCompactJws(jws);
}

/**
 * Compact serialization of a single-signature JWS.
 * @throws {DidSealError} INVALID_FORMAT if the JWS has several signatures or
 *   its protected header does not name the key.
 */
export function toCompactJws(jws: Jws): string {
  const [entry] = jws.signatures;
  if (jws.signatures.length !== 1 || entry === undefined) {
    throw new DidSealError(
      DidSealErrorCode.INVALID_FORMAT,
      "Compact serialization requires exactly one signature",
    );
  }
  const header = parseJson(
    base64urlDecodeString(entry.protected),
    DidSealErrorCode.INVALID_FORMAT,
    "JWS protected header",
  );
  const parsed = jwsProtectedSchema.safeParse(header);
  if (!parsed.success || parsed.data.kid !== entry.header.kid) {
    throw new DidSealError(
      DidSealErrorCode.INVALID_FORMAT,
      "Compact serialization requires the protected header to carry the kid",
    );
  }
  return `${entry.protected}.${jws.payload}.${entry.signature}`;
}

/**
 * Parse `protected.payload.signature` into general form.
 * @throws {DidSealError} SERIALIZATION_ERROR for a malformed compact JWS.
 */
export function parseCompactJws(compact: string): Jws {
  const parts = compact.split(".");
  if (parts.length !== 3) {
    throw new DidSealError(
      DidSealErrorCode.SERIALIZATION_ERROR,
      "Invalid compact JWS: must have three dot-separated parts",
    );
  }
  const [protectedB64, payloadB64, signatureB64] = parts;

  let header: JwsProtected;
  try {
    header = parseWith(
      jwsProtectedSchema,
      JSON.parse(base64urlDecodeString(protectedB64)),
      DidSealErrorCode.SERIALIZATION_ERROR,
      "compact JWS header",
    );
  } catch {
    throw new DidSealError(
      DidSealErrorCode.SERIALIZATION_ERROR,
      "Invalid compact JWS: protected header is not a JWS header",
    );
  }
  if (header.kid === undefined) {
    throw new DidSealError(
      DidSealErrorCode.SERIALIZATION_ERROR,
      "Invalid compact JWS: protected header has no kid",
    );
  }

  return {
    payload: payloadB64,
    signatures: [{ protected: protectedB64, signature: signatureB64, header: { kid: header.kid } }],
  };
}
