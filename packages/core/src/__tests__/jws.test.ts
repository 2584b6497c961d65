import { describe, it, expect } from "vitest";
import { utf8ToBytes } from "@noble/hashes/utils";
import {
  createCompactJws,
  createJws,
  parseCompactJws,
  parseJws,
  toCompactJws,
  verifyJws,
  type VerificationKeyLookup,
} from "../envelope/jws.js";
import { generateAgentKey, type LocalAgentKey } from "../keys/local-agent-key.js";
import {
  base64urlDecode,
  base64urlDecodeString,
  base64urlEncode,
  base64urlEncodeString,
} from "../crypto/base64url.js";
import { KEY_TYPES } from "../types/keys.js";
import type { Jws } from "../types/messages.js";
import { DidSealError, DidSealErrorCode } from "../types/errors.js";
import { expectSealError, expectSealRejection } from "./helpers.js";

const PAYLOAD = utf8ToBytes('{"amount":"100.00","currency":"USD"}');

function lookupFor(...keys: LocalAgentKey[]): VerificationKeyLookup {
  return async (kid) => {
    const key = keys.find((k) => k.keyId === kid);
    if (key === undefined) {
      throw new DidSealError(DidSealErrorCode.KEY_NOT_FOUND, `Key not found: ${kid}`);
    }
    return key.toVerificationKey();
  };
}

function flipByte(b64: string, index: number): string {
  const bytes = base64urlDecode(b64);
  bytes[index] ^= 0x01;
  return base64urlEncode(bytes);
}

function withSignature(jws: Jws, signature: string): Jws {
  const [entry] = jws.signatures;
  return { payload: jws.payload, signatures: [{ ...entry, signature }] };
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------
describe("createJws", () => {
  it("builds a general JWS with the default typ and the key's alg", async () => {
    const key = generateAgentKey("P-256");
    const jws = await key.createJws(PAYLOAD);
    expect(jws.payload).toBe(base64urlEncode(PAYLOAD));
    expect(jws.signatures).toHaveLength(1);
    expect(jws.signatures[0].header).toEqual({ kid: key.keyId });
    expect(JSON.parse(base64urlDecodeString(jws.signatures[0].protected))).toEqual({
      typ: "application/didcomm-signed+json",
      alg: "ES256",
    });
    expect(base64urlDecode(jws.signatures[0].signature).length).toBe(64);
  });

  it("takes typ from the caller but never alg", async () => {
    const key = generateAgentKey("Ed25519");
    const jws = await createJws(key, PAYLOAD, { typ: "application/jose+json", alg: "ES256K" });
    expect(JSON.parse(base64urlDecodeString(jws.signatures[0].protected))).toEqual({
      typ: "application/jose+json",
      alg: "EdDSA",
    });
  });
});

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------
describe.each(KEY_TYPES)("verifyJws (%s)", (keyType) => {
  it("returns the payload and signer of a valid JWS", async () => {
    const key = generateAgentKey(keyType);
    const jws = await key.createJws(PAYLOAD);
    const verified = await verifyJws(jws, lookupFor(key));
    expect(verified.payload).toEqual(PAYLOAD);
    expect(verified.signerKids).toEqual([key.keyId]);
  });

  it("rejects a JWS whose signature has any byte flipped", async () => {
    const key = generateAgentKey(keyType);
    const jws = await key.createJws(PAYLOAD);
    for (let i = 0; i < 64; i++) {
      const tampered = withSignature(jws, flipByte(jws.signatures[0].signature, i));
      const err = await expectSealRejection(verifyJws(tampered, lookupFor(key)), DidSealErrorCode.VERIFICATION_FAILED);
      expect(err.message).toBe("Signature verification failed");
    }
  });

  it("rejects a modified payload", async () => {
    const key = generateAgentKey(keyType);
    const jws = await key.createJws(PAYLOAD);
    const tampered = { ...jws, payload: base64urlEncodeString('{"amount":"999.00","currency":"USD"}') };
    await expectSealRejection(verifyJws(tampered, lookupFor(key)), DidSealErrorCode.VERIFICATION_FAILED);
  });
});

describe("verifyJws edge cases", () => {
  it("rejects a signature made by a different key under the same kid", async () => {
    const signer = generateAgentKey("P-256");
    const impostor = generateAgentKey("P-256");
    const jws = await impostor.createJws(PAYLOAD);
    const relabelled = {
      ...jws,
      signatures: [{ ...jws.signatures[0], header: { kid: signer.keyId } }],
    };
    await expectSealRejection(verifyJws(relabelled, lookupFor(signer)), DidSealErrorCode.VERIFICATION_FAILED);
  });

  it("rejects a protected header that switches the algorithm", async () => {
    const key = generateAgentKey("secp256k1");
    const jws = await key.createJws(PAYLOAD);
    const entry = jws.signatures[0];
    const swapped = base64urlEncodeString(JSON.stringify({ typ: "application/didcomm-signed+json", alg: "ES256" }));
    const tampered = { ...jws, signatures: [{ ...entry, protected: swapped }] };
    await expectSealRejection(verifyJws(tampered, lookupFor(key)), DidSealErrorCode.VERIFICATION_FAILED);
  });

  it("rejects an undecodable protected header", async () => {
    const key = generateAgentKey("Ed25519");
    const jws = await key.createJws(PAYLOAD);
    const tampered = { ...jws, signatures: [{ ...jws.signatures[0], protected: "not+base64" }] };
    await expectSealRejection(verifyJws(tampered, lookupFor(key)), DidSealErrorCode.VERIFICATION_FAILED);
  });

  it("surfaces KEY_NOT_FOUND for an unknown signer", async () => {
    const key = generateAgentKey("Ed25519");
    const jws = await key.createJws(PAYLOAD);
    await expectSealRejection(verifyJws(jws, lookupFor()), DidSealErrorCode.KEY_NOT_FOUND);
  });

  it("requires every signature to verify", async () => {
    const alice = generateAgentKey("P-256");
    const bob = generateAgentKey("Ed25519");
    const a = await alice.createJws(PAYLOAD);
    const b = await bob.createJws(PAYLOAD);
    const both: Jws = { payload: a.payload, signatures: [a.signatures[0], b.signatures[0]] };
    const verified = await verifyJws(both, lookupFor(alice, bob));
    expect(verified.signerKids).toEqual([alice.keyId, bob.keyId]);

    const broken: Jws = {
      payload: a.payload,
      signatures: [a.signatures[0], { ...b.signatures[0], signature: flipByte(b.signatures[0].signature, 0) }],
    };
    await expectSealRejection(verifyJws(broken, lookupFor(alice, bob)), DidSealErrorCode.VERIFICATION_FAILED);
  });
});

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------
describe("parseJws", () => {
  it("accepts a well-formed general JWS", async () => {
    const key = generateAgentKey("Ed25519");
    const jws = await key.createJws(PAYLOAD);
    expect(parseJws(JSON.parse(JSON.stringify(jws)))).toEqual(jws);
  });

  it.each([
    ["no signatures", { payload: "e30", signatures: [] }],
    ["missing kid", { payload: "e30", signatures: [{ protected: "e30", signature: "AA" }] }],
    ["not an object", "eyJ9"],
  ])("rejects a JWS with %s", (_label, value) => {
    expectSealError(() => parseJws(value), DidSealErrorCode.SERIALIZATION_ERROR);
  });
});

// ---------------------------------------------------------------------------
// Compact serialization
// ---------------------------------------------------------------------------
describe("Compact JWS", () => {
  it("round-trips through compact form with the kid in the protected header", async () => {
    const key = generateAgentKey("secp256k1");
    const compact = await createCompactJws(key, PAYLOAD);
    const parts = compact.split(".");
    expect(parts).toHaveLength(3);
    expect(JSON.parse(base64urlDecodeString(parts[0]))).toEqual({
      typ: "application/didcomm-signed+json",
      alg: "ES256K",
      kid: key.keyId,
    });
    const verified = await verifyJws(parseCompactJws(compact), lookupFor(key));
    expect(verified.payload).toEqual(PAYLOAD);
  });

  it("refuses to compact a JWS whose protected header lacks the kid", async () => {
    const key = generateAgentKey("Ed25519");
    const jws = await key.createJws(PAYLOAD);
    expectSealError(() => toCompactJws(jws), DidSealErrorCode.INVALID_FORMAT);
  });

  it("rejects compact input without three parts", () => {
    expectSealError(() => parseCompactJws("a.b"), DidSealErrorCode.SERIALIZATION_ERROR);
  });

  it("rejects compact input whose header has no kid", async () => {
    const key = generateAgentKey("Ed25519");
    const jws = await key.createJws(PAYLOAD);
    const entry = jws.signatures[0];
    const compact = `${entry.protected}.${jws.payload}.${entry.signature}`;
    expectSealError(() => parseCompactJws(compact), DidSealErrorCode.SERIALIZATION_ERROR);
  });

  it("rejects a protected kid that disagrees with the header kid", async () => {
    const signer = generateAgentKey("Ed25519");
    const other = generateAgentKey("Ed25519");
    const jws = await createJws(signer, PAYLOAD, { kid: other.keyId });
    await expectSealRejection(verifyJws(jws, lookupFor(signer, other)), DidSealErrorCode.VERIFICATION_FAILED);
  });
});
