/**
 * didseal: multi-recipient JWE (RFC 7516) with ECDH-ES+A256KW and A256GCM.
 *
 * One ephemeral key pair, one CEK and one IV per envelope. Each recipient
 * gets the CEK wrapped under its own KEK:
 *
 *   Z   = ECDH(ephemeral private, recipient public)
 *   KEK = ConcatKDF(Z, apu = sender kid or empty, apv = recipient kid, 256)
 *   encrypted_key = AES-KW(KEK, CEK)
 *
 * The base64url protected header is the AES-GCM associated data, so the
 * ephemeral key and every other protected field are authenticated.
 *
 * Encryption is ECDH-ES: the sender contributes no static key to the
 * agreement, and `sender_kid` is an unauthenticated hint. Tampering with it
 * breaks the KEK derivation, but anyone can name any sender.
 */

import { sha256 } from "@noble/hashes/sha256";
import { utf8ToBytes } from "@noble/hashes/utils";
import {
  base64urlDecode,
  base64urlDecodeString,
  base64urlEncode,
  base64urlEncodeString,
} from "../crypto/base64url.js";
import { generateCek, openContent, sealContent } from "../crypto/content.js";
import { ecCurveSuite, type EcCurveSuite } from "../crypto/curves.js";
import { deriveKeyEcdhEs } from "../crypto/kdf.js";
import { unwrapKeyAesKw, wrapKeyAesKw } from "../crypto/key-wrap.js";
import { moduleLogger } from "../logger.js";
import type {
  EcKeyType,
  EcPublicJwk,
  EncryptedContent,
  VerificationKey,
} from "../types/keys.js";
import {
  DIDCOMM_ENCRYPTED,
  type Jwe,
  type JweAlgorithm,
  type JweEncryption,
  type JweProtected,
  type JweRecipient,
} from "../types/messages.js";
import { DidSealError, DidSealErrorCode } from "../types/errors.js";
import { jweProtectedSchema, jweSchema, parseJson, parseWith } from "./schema.js";

const log = moduleLogger("jwe");

export const JWE_ALG: JweAlgorithm = "ECDH-ES+A256KW";
export const JWE_ENC: JweEncryption = "A256GCM";

const KEK_BITS = 256;
const EMPTY = new Uint8Array(0);

export interface CreateJweOptions {
  /** Named in each recipient header and bound into the KDF as PartyUInfo. */
  senderKid?: string;
  /** Overrides the protected `typ`. */
  typ?: string;
  /** Protected `cty`, set when the plaintext is itself an envelope. */
  cty?: string;
}

/**
 * The local side of a decryption: the key id recipients are matched on and
 * the ECDH agreement with the key's private scalar, which never leaves the key.
 */
export interface JweRecipientContext {
  keyId: string;
  keyType: EcKeyType;
  agree(publicKey: Uint8Array): Uint8Array;
}

export interface DecryptedJwe {
  plaintext: Uint8Array;
  recipientKid: string;
  /** Unauthenticated sender hint from the recipient header. */
  senderKidHint?: string;
}

interface Ephemeral {
  suite: EcCurveSuite;
  privateKey: Uint8Array;
  epk: EcPublicJwk;
}

function decryptionFailed(reason: string, err?: unknown): DidSealError {
  log.debug({ reason, cause: err instanceof Error ? err.message : undefined }, "JWE rejected");
  return new DidSealError(DidSealErrorCode.DECRYPTION_FAILED, "decryption failed");
}

/** The single EC curve shared by all recipients. */
function recipientCurve(recipients: readonly VerificationKey[]): EcKeyType {
  let curve: EcKeyType | undefined;
  for (const recipient of recipients) {
    const jwk = recipient.publicKeyJwk();
    if (jwk.kty !== "EC") {
      throw new DidSealError(
        DidSealErrorCode.UNSUPPORTED_ALGORITHM,
        `Recipient ${recipient.keyId} has a ${jwk.crv} key, which cannot do key agreement`,
      );
    }
    if (curve !== undefined && curve !== jwk.crv) {
      throw new DidSealError(
        DidSealErrorCode.UNSUPPORTED_ALGORITHM,
        "All recipients of one JWE must use the same curve",
        { curves: [curve, jwk.crv] },
      );
    }
    curve = jwk.crv;
  }
  if (curve === undefined) {
    throw new DidSealError(DidSealErrorCode.INVALID_PARAMETER, "No recipients specified for JWE");
  }
  return curve;
}

function generateEphemeral(keyType: EcKeyType): Ephemeral {
  const suite = ecCurveSuite(keyType);
  const privateKey = suite.generatePrivateKey();
  return { suite, privateKey, epk: suite.publicKeyToJwk(suite.getPublicKey(privateKey)) };
}

function wrapCekFor(
  ephemeral: Ephemeral,
  recipient: VerificationKey,
  cek: Uint8Array,
  apu: Uint8Array,
): Uint8Array {
  const recipientPublic = ephemeral.suite.jwkToPublicKey(recipient.publicKeyJwk());
  const z = ephemeral.suite.sharedSecret(ephemeral.privateKey, recipientPublic);
  const kek = deriveKeyEcdhEs(z, apu, utf8ToBytes(recipient.keyId), KEK_BITS);
  const wrapped = wrapKeyAesKw(kek, cek);
  z.fill(0);
  kek.fill(0);
  return wrapped;
}

function unwrapCek(
  context: JweRecipientContext,
  epk: EcPublicJwk,
  encryptedKey: Uint8Array,
  apu: Uint8Array,
): Uint8Array {
  if (epk.crv !== context.keyType) {
    throw new DidSealError(DidSealErrorCode.UNSUPPORTED_ALGORITHM, "epk curve does not match key");
  }
  const epkPublic = ecCurveSuite(context.keyType).jwkToPublicKey(epk);
  const z = context.agree(epkPublic);
  const kek = deriveKeyEcdhEs(z, apu, utf8ToBytes(context.keyId), KEK_BITS);
  z.fill(0);
  try {
    return unwrapKeyAesKw(kek, encryptedKey);
  } finally {
    kek.fill(0);
  }
}

/** base64url(SHA-256(sorted recipient kids joined by ".")) */
export function recipientSetApv(kids: readonly string[]): string {
  return base64urlEncode(sha256(utf8ToBytes([...kids].sort().join("."))));
}

/**
 * Encrypt `plaintext` for every recipient.
 * @throws {DidSealError} INVALID_PARAMETER for an empty or duplicated
 *   recipient list; UNSUPPORTED_ALGORITHM for Ed25519 or mixed-curve recipients.
 */
export async function createJwe(
  plaintext: Uint8Array,
  recipients: readonly VerificationKey[],
  options: CreateJweOptions = {},
): Promise<Jwe> {
  const kids = recipients.map((r) => r.keyId);
  if (new Set(kids).size !== kids.length) {
    throw new DidSealError(DidSealErrorCode.INVALID_PARAMETER, "Duplicate recipient key id");
  }
  const curve = recipientCurve(recipients);
  const ephemeral = generateEphemeral(curve);
  const cek = generateCek();
  const apu = options.senderKid !== undefined ? utf8ToBytes(options.senderKid) : EMPTY;

  try {
    const header: JweProtected = {
      epk: ephemeral.epk,
      apv: recipientSetApv(kids),
      ...(options.senderKid !== undefined ? { apu: base64urlEncodeString(options.senderKid) } : {}),
      typ: options.typ ?? DIDCOMM_ENCRYPTED,
      ...(options.cty !== undefined ? { cty: options.cty } : {}),
      enc: JWE_ENC,
      alg: JWE_ALG,
    };
    const protectedB64 = base64urlEncodeString(JSON.stringify(header));
    const sealed = sealContent(cek, plaintext, utf8ToBytes(protectedB64));

    const entries: JweRecipient[] = recipients.map((recipient) => ({
      encrypted_key: base64urlEncode(wrapCekFor(ephemeral, recipient, cek, apu)),
      header:
        options.senderKid !== undefined
          ? { kid: recipient.keyId, sender_kid: options.senderKid }
          : { kid: recipient.keyId },
    }));

    log.debug({ recipients: kids.length, curve }, "JWE created");
    return {
      protected: protectedB64,
      recipients: entries,
      iv: base64urlEncode(sealed.iv),
      ciphertext: base64urlEncode(sealed.ciphertext),
      tag: base64urlEncode(sealed.tag),
    };
  } finally {
    cek.fill(0);
    ephemeral.privateKey.fill(0);
  }
}

/**
 * Validate the shape of an untrusted JWE value.
 * @throws {DidSealError} SERIALIZATION_ERROR if it is not a general JWE.
 */
export function parseJwe(value: unknown): Jwe {
  return parseWith(jweSchema, value, DidSealErrorCode.SERIALIZATION_ERROR, "JWE");
}

/**
 * Decode the protected header of a JWE.
 * @throws {DidSealError} with `code` when the header is not a supported JWE header.
 */
export function decodeJweProtected(
  jwe: Jwe,
  code: DidSealErrorCode = DidSealErrorCode.SERIALIZATION_ERROR,
): JweProtected {
  let json: string;
  try {
    json = base64urlDecodeString(jwe.protected);
  } catch {
    throw new DidSealError(code, "JWE protected header is not base64url");
  }
  const what = "JWE protected header";
  return parseWith(jweProtectedSchema, parseJson(json, code, what), code, what);
}

/**
 * Open the JWE entry addressed to `context.keyId`.
 * @throws {DidSealError} DECRYPTION_FAILED: "not an intended recipient" when
 *   no entry names the key, otherwise one uniform message for every cause.
 */
export async function decryptJwe(jwe: Jwe, context: JweRecipientContext): Promise<DecryptedJwe> {
  const entry = jwe.recipients.find((r) => r.header.kid === context.keyId);
  if (entry === undefined) {
    throw new DidSealError(DidSealErrorCode.DECRYPTION_FAILED, "not an intended recipient", {
      kid: context.keyId,
    });
  }

  let plaintext: Uint8Array;
  try {
    const header = decodeJweProtected(jwe, DidSealErrorCode.DECRYPTION_FAILED);
    const senderKid = entry.header.sender_kid;
    const apu = senderKid !== undefined ? utf8ToBytes(senderKid) : EMPTY;
    const cek = unwrapCek(context, header.epk, base64urlDecode(entry.encrypted_key), apu);
    try {
      plaintext = openContent(
        cek,
        {
          ciphertext: base64urlDecode(jwe.ciphertext),
          iv: base64urlDecode(jwe.iv),
          tag: base64urlDecode(jwe.tag),
        },
        utf8ToBytes(jwe.protected),
      );
    } finally {
      cek.fill(0);
    }
  } catch (err) {
    throw decryptionFailed("JWE entry could not be opened", err);
  }

  const senderKidHint = entry.header.sender_kid;
  return senderKidHint !== undefined
    ? { plaintext, recipientKid: context.keyId, senderKidHint }
    : { plaintext, recipientKid: context.keyId };
}

/**
 * Encrypt for one recipient, returning the detached parts. The recipient's
 * kid is PartyVInfo and `senderKid`, when given, is PartyUInfo.
 */
export function encryptForRecipient(
  plaintext: Uint8Array,
  recipient: VerificationKey,
  options: { senderKid?: string; aad?: Uint8Array } = {},
): EncryptedContent {
  const ephemeral = generateEphemeral(recipientCurve([recipient]));
  const cek = generateCek();
  try {
    const apu = options.senderKid !== undefined ? utf8ToBytes(options.senderKid) : EMPTY;
    const sealed = sealContent(cek, plaintext, options.aad);
    return {
      ...sealed,
      encryptedKey: wrapCekFor(ephemeral, recipient, cek, apu),
      epk: ephemeral.epk,
    };
  } finally {
    cek.fill(0);
    ephemeral.privateKey.fill(0);
  }
}

/**
 * Inverse of `encryptForRecipient`.
 * @throws {DidSealError} DECRYPTION_FAILED with one uniform message.
 */
export function decryptForRecipient(
  content: EncryptedContent,
  context: JweRecipientContext,
  options: { senderKid?: string; aad?: Uint8Array } = {},
): Uint8Array {
  try {
    const apu = options.senderKid !== undefined ? utf8ToBytes(options.senderKid) : EMPTY;
    const cek = unwrapCek(context, content.epk, content.encryptedKey, apu);
    try {
      return openContent(cek, content, options.aad);
    } finally {
      cek.fill(0);
    }
  } catch (err) {
    throw decryptionFailed("detached content could not be opened", err);
  }
}
