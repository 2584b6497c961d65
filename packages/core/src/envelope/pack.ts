/**
 * didseal: the pack/unpack pipeline.
 *
 * `pack` turns a JSON payload into a transport string under one security
 * mode. `unpack` infers the mode from the wire shape alone, drives the
 * matching verify/decrypt path with keys from the key manager, and reports
 * provenance for the caller's own trust policy.
 */

import { canonicalBytes, canonicalize } from "../crypto/canonical.js";
import { config } from "../config.js";
import type { KeyManagerPacking } from "../keys/key-manager.js";
import { moduleLogger } from "../logger.js";
import type { VerificationKey } from "../types/keys.js";
import { DIDCOMM_SIGNED, type Jwe, type Jws } from "../types/messages.js";
import { DidSealError, DidSealErrorCode, isDidSealError } from "../types/errors.js";
import { createJwe, decodeJweProtected, parseJwe } from "./jwe.js";
import { parseCompactJws, parseJws, toCompactJws, verifyJws } from "./jws.js";
import { parseJson } from "./schema.js";

const log = moduleLogger("pack");

/** How a payload is protected. Chosen per `pack` call. */
export type SecurityMode =
  | { kind: "plain" }
  | { kind: "signed"; signingKeyId: string; compact?: boolean }
  | { kind: "encrypted"; senderKeyId?: string; recipients: readonly VerificationKey[] }
  | { kind: "signed-encrypted"; signingKeyId: string; recipients: readonly VerificationKey[] };

export type SecurityModeKind = SecurityMode["kind"];

export interface Provenance {
  mode: SecurityModeKind;
  /** Key ids whose signatures verified. Empty for unsigned envelopes. */
  signerKids: string[];
  /** Unauthenticated `sender_kid` from the JWE recipient header. */
  senderKidHint?: string;
  /** Local key that opened the JWE. */
  recipientKid?: string;
}

export interface UnpackOptions {
  /** Reject plain and unsigned encrypted envelopes with POLICY_VIOLATION. */
  requireSignature?: boolean;
  /** Reject any other mode with POLICY_VIOLATION. Absent accepts every mode. */
  expectedMode?: SecurityModeKind;
  /** Only try this local key when opening a JWE. */
  expectedRecipientKid?: string;
  /** Defaults to `config.maxEnvelopeBytes`. */
  maxEnvelopeBytes?: number;
}

export interface Unpacked {
  payload: unknown;
  provenance: Provenance;
}

const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Serialize `payload` under `mode`.
 * @throws {DidSealError} KEY_NOT_FOUND for an unknown signing or sender key;
 *   UNSUPPORTED_ALGORITHM when a key lacks the capability the mode needs.
 */
export async function pack(
  payload: unknown,
  mode: SecurityMode,
  keyManager: KeyManagerPacking,
): Promise<string> {
  switch (mode.kind) {
    case "plain":
      return canonicalize(payload);

    case "signed": {
      const signer = await keyManager.getSigningKey(mode.signingKeyId);
      const jws = await signer.createJws(
        canonicalBytes(payload),
        mode.compact === true ? { kid: signer.keyId } : undefined,
      );
      log.debug({ kid: signer.keyId, compact: mode.compact === true }, "payload signed");
      return mode.compact === true ? toCompactJws(jws) : JSON.stringify(jws);
    }

    case "encrypted": {
      const plaintext = canonicalBytes(payload);
      let jwe: Jwe;
      if (mode.senderKeyId !== undefined) {
        const sender = await keyManager.getEncryptionKey(mode.senderKeyId);
        jwe = await sender.createJwe(plaintext, mode.recipients);
      } else {
        jwe = await createJwe(plaintext, mode.recipients);
      }
      return JSON.stringify(jwe);
    }

    case "signed-encrypted": {
      const signer = await keyManager.getSigningKey(mode.signingKeyId);
      const jws = await signer.createJws(canonicalBytes(payload));
      const jwe = await createJwe(new TextEncoder().encode(JSON.stringify(jws)), mode.recipients, {
        senderKid: signer.keyId,
        cty: DIDCOMM_SIGNED,
      });
      return JSON.stringify(jwe);
    }
  }
}

function policyViolation(mode: SecurityModeKind): DidSealError {
  log.debug({ mode }, "unsigned envelope rejected");
  return new DidSealError(
    DidSealErrorCode.POLICY_VIOLATION,
    `Signature required but envelope is ${mode}`,
    { mode },
  );
}

function assertExpectedMode(actual: SecurityModeKind, options: UnpackOptions): void {
  const expected = options.expectedMode;
  if (expected === undefined || expected === actual) return;
  log.debug({ expected, actual }, "unexpected envelope mode rejected");
  throw new DidSealError(
    DidSealErrorCode.POLICY_VIOLATION,
    `Expected a ${expected} envelope but got ${actual}`,
    { expected, actual },
  );
}

function decodePayload(bytes: Uint8Array, what: string): unknown {
  let text: string;
  try {
    text = decoder.decode(bytes);
  } catch {
    throw new DidSealError(DidSealErrorCode.SERIALIZATION_ERROR, `${what} is not UTF-8`);
  }
  return parseJson(text, DidSealErrorCode.SERIALIZATION_ERROR, what);
}

function hasField(value: unknown, field: string): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && field in value;
}

function looksCompact(transport: string): boolean {
  return transport.split(".").length === 3;
}

async function unpackSigned(jws: Jws, keyManager: KeyManagerPacking): Promise<Unpacked> {
  const verified = await verifyJws(jws, (kid) => keyManager.resolveVerificationKey(kid));
  return {
    payload: decodePayload(verified.payload, "JWS payload"),
    provenance: { mode: "signed", signerKids: verified.signerKids },
  };
}

/**
 * Local keys that may open `jwe`, in recipient order. A recipient entry
 * naming a key the manager does not hold, or one that cannot decrypt, is
 * skipped.
 */
function candidateRecipients(
  jwe: Jwe,
  keyManager: KeyManagerPacking,
  expectedRecipientKid: string | undefined,
): string[] {
  return jwe.recipients
    .map((entry) => entry.header.kid)
    .filter((kid) => expectedRecipientKid === undefined || kid === expectedRecipientKid)
    .filter((kid) => keyManager.canDecrypt(kid));
}

async function unpackEncrypted(
  jwe: Jwe,
  keyManager: KeyManagerPacking,
  options: UnpackOptions,
): Promise<Unpacked> {
  const header = decodeJweProtected(jwe, DidSealErrorCode.DECRYPTION_FAILED);
  const nested = header.cty === DIDCOMM_SIGNED;
  assertExpectedMode(nested ? "signed-encrypted" : "encrypted", options);

  const candidates = candidateRecipients(jwe, keyManager, options.expectedRecipientKid);
  if (candidates.length === 0) {
    throw new DidSealError(DidSealErrorCode.DECRYPTION_FAILED, "not an intended recipient");
  }

  let opened: { plaintext: Uint8Array; recipientKid: string } | undefined;
  let lastError: unknown;
  for (const kid of candidates) {
    try {
      const key = await keyManager.getDecryptionKey(kid);
      opened = { plaintext: await key.unwrapJwe(jwe), recipientKid: kid };
      break;
    } catch (err) {
      if (!isDidSealError(err, DidSealErrorCode.DECRYPTION_FAILED)) throw err;
      lastError = err;
    }
  }
  if (opened === undefined) {
    throw lastError;
  }

  const { recipientKid, plaintext } = opened;
  const entry = jwe.recipients.find((r) => r.header.kid === recipientKid);
  const senderKidHint = entry?.header.sender_kid;
  const hint = senderKidHint !== undefined ? { senderKidHint } : {};

  if (nested) {
    const inner = parseJws(decodePayload(plaintext, "nested JWS"));
    const verified = await verifyJws(inner, (kid) => keyManager.resolveVerificationKey(kid));
    if (senderKidHint !== undefined && !verified.signerKids.includes(senderKidHint)) {
      log.debug({ senderKidHint, signerKids: verified.signerKids }, "sender hint does not match signer");
      throw new DidSealError(
        DidSealErrorCode.VERIFICATION_FAILED,
        "JWE sender does not match the nested JWS signer",
      );
    }
    return {
      payload: decodePayload(verified.payload, "JWS payload"),
      provenance: { mode: "signed-encrypted", signerKids: verified.signerKids, recipientKid, ...hint },
    };
  }

  if (options.requireSignature === true) {
    throw policyViolation("encrypted");
  }
  return {
    payload: decodePayload(plaintext, "JWE plaintext"),
    provenance: { mode: "encrypted", signerKids: [], recipientKid, ...hint },
  };
}

/**
 * Recover the payload of a transport string and report how it was protected.
 * @throws {DidSealError} INVALID_PARAMETER for oversized input;
 *   SERIALIZATION_ERROR for malformed envelopes; VERIFICATION_FAILED or
 *   DECRYPTION_FAILED when a signature or ciphertext does not check out;
 *   POLICY_VIOLATION when `requireSignature` is set and nothing is signed,
 *   or when the envelope is not of `expectedMode`.
 */
export async function unpack(
  transport: string,
  keyManager: KeyManagerPacking,
  options: UnpackOptions = {},
): Promise<Unpacked> {
  const limit = options.maxEnvelopeBytes ?? config.maxEnvelopeBytes;
  const size = Buffer.byteLength(transport, "utf8");
  if (size > limit) {
    throw new DidSealError(
      DidSealErrorCode.INVALID_PARAMETER,
      `Envelope of ${size} bytes exceeds the ${limit} byte limit`,
      { size, limit },
    );
  }

  const text = transport.trim();
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    if (!looksCompact(text)) {
      throw new DidSealError(DidSealErrorCode.SERIALIZATION_ERROR, "Envelope is not valid JSON");
    }
    const compact = parseCompactJws(text);
    assertExpectedMode("signed", options);
    return unpackSigned(compact, keyManager);
  }

  if (hasField(parsed, "signatures")) {
    const jws = parseJws(parsed);
    assertExpectedMode("signed", options);
    return unpackSigned(jws, keyManager);
  }
  if (hasField(parsed, "recipients")) {
    return unpackEncrypted(parseJwe(parsed), keyManager, options);
  }
  assertExpectedMode("plain", options);
  if (options.requireSignature === true) {
    throw policyViolation("plain");
  }
  return { payload: parsed, provenance: { mode: "plain", signerKids: [] } };
}
