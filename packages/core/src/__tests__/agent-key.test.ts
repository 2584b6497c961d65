import { describe, it, expect } from "vitest";
import { utf8ToBytes } from "@noble/hashes/utils";
import {
  EcAgentKey,
  Ed25519AgentKey,
  generateAgentKey,
  importAgentKey,
} from "../keys/local-agent-key.js";
import { PublicVerificationKey } from "../keys/verification-key.js";
import { base64urlEncode } from "../crypto/base64url.js";
import { KEY_TYPES, type KeyType } from "../types/keys.js";
import type { JwsProtected } from "../types/messages.js";
import { DidSealErrorCode } from "../types/errors.js";
import { expectSealError, expectSealRejection } from "./helpers.js";

const EXPECTED_ALG = { Ed25519: "EdDSA", "P-256": "ES256", secp256k1: "ES256K" } as const;
const DID_KEY_PREFIX = { Ed25519: "did:key:z6Mk", "P-256": "did:key:zDn", secp256k1: "did:key:zQ3s" } as const;

function header(keyType: KeyType): JwsProtected {
  return { typ: "application/didcomm-signed+json", alg: EXPECTED_ALG[keyType] };
}

// ---------------------------------------------------------------------------
// Generation and identity
// ---------------------------------------------------------------------------
describe.each(KEY_TYPES)("%s agent key", (keyType) => {
  it("defaults to a did:key identity", () => {
    const key = generateAgentKey(keyType);
    expect(key.keyType).toBe(keyType);
    expect(key.did.startsWith(DID_KEY_PREFIX[keyType])).toBe(true);
    expect(key.keyId).toBe(`${key.did}#${key.did.slice("did:key:".length)}`);
  });

  it("exports a public JWK carrying the key id", () => {
    const key = generateAgentKey(keyType);
    const jwk = key.publicKeyJwk();
    expect(jwk.crv).toBe(keyType);
    expect(jwk.kid).toBe(key.keyId);
    if (jwk.kty === "EC") {
      expect(keyType).not.toBe("Ed25519");
      expect(jwk.y).toMatch(/^[A-Za-z0-9_-]{43}$/);
    } else {
      expect(keyType).toBe("Ed25519");
    }
    expect(jwk.x).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(jwk).not.toHaveProperty("d");
  });

  it("recommends the JWS algorithm of its curve", () => {
    expect(generateAgentKey(keyType).recommendedJwsAlg()).toBe(EXPECTED_ALG[keyType]);
  });

  it("signs data that its verification key accepts", async () => {
    const key = generateAgentKey(keyType);
    const data = utf8ToBytes("header.payload");
    const signature = await key.sign(data);
    expect(signature.length).toBe(64);
    await expect(key.toVerificationKey().verifySignature(data, signature, header(keyType))).resolves.toBe(true);
  });

  it("rejects a signature with any byte flipped", async () => {
    const key = generateAgentKey(keyType);
    const verifier = key.toVerificationKey();
    const data = utf8ToBytes("header.payload");
    const signature = await key.sign(data);
    for (let i = 0; i < signature.length; i++) {
      const tampered = signature.slice();
      tampered[i] ^= 0x01;
      await expect(verifier.verifySignature(data, tampered, header(keyType))).resolves.toBe(false);
    }
  });

  it("rejects truncated and empty signatures without throwing", async () => {
    const key = generateAgentKey(keyType);
    const verifier = key.toVerificationKey();
    const data = utf8ToBytes("header.payload");
    const signature = await key.sign(data);
    await expect(verifier.verifySignature(data, signature.slice(0, 32), header(keyType))).resolves.toBe(false);
    await expect(verifier.verifySignature(data, new Uint8Array(0), header(keyType))).resolves.toBe(false);
  });

  it("rejects a signature checked under another key", async () => {
    const signer = generateAgentKey(keyType);
    const other = generateAgentKey(keyType);
    const data = utf8ToBytes("header.payload");
    const signature = await signer.sign(data);
    await expect(other.toVerificationKey().verifySignature(data, signature, header(keyType))).resolves.toBe(false);
  });

  it("re-imports to the same public key and identity", () => {
    const key = generateAgentKey(keyType);
    const imported = importAgentKey(keyType, key.exportPrivateKey());
    expect(imported.publicKeyJwk()).toEqual(key.publicKeyJwk());
    expect(imported.keyId).toBe(key.keyId);
  });

  it("round-trips its public JWK through PublicVerificationKey.fromJwk", async () => {
    const key = generateAgentKey(keyType);
    const verifier = PublicVerificationKey.fromJwk("did:example:bob#key-1", key.publicKeyJwk());
    expect(verifier.publicKeyJwk()).toEqual({ ...key.publicKeyJwk(), kid: "did:example:bob#key-1" });
    const data = utf8ToBytes("header.payload");
    await expect(verifier.verifySignature(data, await key.sign(data), header(keyType))).resolves.toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------
describe("Key capabilities", () => {
  it("gives Ed25519 keys signing only", () => {
    const key = generateAgentKey("Ed25519");
    expect(key).toBeInstanceOf(Ed25519AgentKey);
    expect(key).not.toBeInstanceOf(EcAgentKey);
    expect("encrypt" in key).toBe(false);
  });

  it.each(["P-256", "secp256k1"] as const)("gives %s keys ECDH encryption", (keyType) => {
    const key = generateAgentKey(keyType);
    expect(key).toBeInstanceOf(EcAgentKey);
    expect(key.recommendedJweAlgEnc()).toEqual(["ECDH-ES+A256KW", "A256GCM"]);
  });

  it("rejects a signature whose header names another curve's algorithm", async () => {
    const key = generateAgentKey("P-256");
    const data = utf8ToBytes("header.payload");
    const signature = await key.sign(data);
    await expect(key.toVerificationKey().verifySignature(data, signature, header("secp256k1"))).resolves.toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Import and export
// ---------------------------------------------------------------------------
describe("Key import and export", () => {
  it("binds an explicit DID with a default key id", () => {
    const key = generateAgentKey("P-256", { did: "did:example:alice" });
    expect(key.did).toBe("did:example:alice");
    expect(key.keyId).toBe("did:example:alice#key-1");
  });

  it("keeps an explicit key id", () => {
    const key = generateAgentKey("Ed25519", { did: "did:example:alice", keyId: "did:example:alice#sig" });
    expect(key.keyId).toBe("did:example:alice#sig");
  });

  it("imports a fixed Ed25519 seed deterministically", () => {
    const seed = new Uint8Array(32).fill(7);
    const a = importAgentKey("Ed25519", seed);
    const b = importAgentKey("Ed25519", seed);
    expect(a.did).toBe(b.did);
  });

  it("copies private material on import and export", () => {
    const seed = new Uint8Array(32).fill(9);
    const key = importAgentKey("secp256k1", seed);
    seed.fill(0);
    const exported = key.exportPrivateKey();
    expect(exported).toEqual(new Uint8Array(32).fill(9));
    exported.fill(0);
    expect(key.exportPrivateKey()).toEqual(new Uint8Array(32).fill(9));
  });

  it("exports a private JWK with d", () => {
    const seed = new Uint8Array(32).fill(3);
    const jwk = importAgentKey("P-256", seed).exportPrivateJwk();
    expect(jwk.d).toBe(base64urlEncode(seed));
    expect(jwk.kty).toBe("EC");
  });

  it.each([
    ["Ed25519", 31],
    ["P-256", 33],
    ["secp256k1", 0],
  ] as const)("rejects a %s private key of %i bytes", (keyType, length) => {
    expectSealError(() => importAgentKey(keyType, new Uint8Array(length).fill(1)), DidSealErrorCode.INVALID_KEY);
  });

  it("rejects the zero scalar for EC keys", () => {
    expectSealError(() => importAgentKey("P-256", new Uint8Array(32)), DidSealErrorCode.INVALID_KEY);
  });
});

// ---------------------------------------------------------------------------
// PublicVerificationKey.fromJwk
// ---------------------------------------------------------------------------
describe("PublicVerificationKey.fromJwk", () => {
  it("rejects a JWK of an unsupported type", () => {
    expectSealError(
      () => PublicVerificationKey.fromJwk("kid", { kty: "RSA", n: "AQAB", e: "AQAB" }),
      DidSealErrorCode.INVALID_KEY,
    );
  });

  it("rejects an EC point that is not on the curve", () => {
    const zero = base64urlEncode(new Uint8Array(32));
    expectSealError(
      () => PublicVerificationKey.fromJwk("kid", { kty: "EC", crv: "P-256", x: zero, y: zero }),
      DidSealErrorCode.INVALID_KEY,
    );
  });

  it("rejects coordinates of the wrong length", () => {
    expectSealError(
      () => PublicVerificationKey.fromJwk("kid", { kty: "OKP", crv: "Ed25519", x: "AAAA" }),
      DidSealErrorCode.INVALID_KEY,
    );
  });
});

// ---------------------------------------------------------------------------
// Detached encryption
// ---------------------------------------------------------------------------
describe("EcAgentKey encrypt / decrypt", () => {
  const plaintext = utf8ToBytes("This is a secret message...");

  it("decrypts content encrypted to it when told the sender", async () => {
    const alice = generateAgentKey("P-256");
    const bob = generateAgentKey("P-256");
    const content = await alice.encrypt(plaintext, bob.toVerificationKey());
    expect(content.encryptedKey.length).toBe(40);
    expect(content.iv.length).toBe(12);
    expect(content.tag.length).toBe(16);
    await expect(bob.decrypt(content, undefined, alice.toVerificationKey())).resolves.toEqual(plaintext);
  });

  it("fails when the sender is not the one bound into the KDF", async () => {
    const alice = generateAgentKey("secp256k1");
    const bob = generateAgentKey("secp256k1");
    const content = await alice.encrypt(plaintext, bob.toVerificationKey());
    const err = await expectSealRejection(bob.decrypt(content), DidSealErrorCode.DECRYPTION_FAILED);
    expect(err.message).toBe("decryption failed");
  });

  it("binds the associated data", async () => {
    const alice = generateAgentKey("P-256");
    const bob = generateAgentKey("P-256");
    const content = await alice.encrypt(plaintext, bob.toVerificationKey(), utf8ToBytes("aad-1"));
    await expectSealRejection(
      bob.decrypt(content, utf8ToBytes("aad-2"), alice.toVerificationKey()),
      DidSealErrorCode.DECRYPTION_FAILED,
    );
    await expect(bob.decrypt(content, utf8ToBytes("aad-1"), alice.toVerificationKey())).resolves.toEqual(plaintext);
  });

  it("refuses an Ed25519 recipient", async () => {
    const alice = generateAgentKey("P-256");
    const ed = generateAgentKey("Ed25519");
    await expectSealRejection(alice.encrypt(plaintext, ed.toVerificationKey()), DidSealErrorCode.UNSUPPORTED_ALGORITHM);
  });
});
