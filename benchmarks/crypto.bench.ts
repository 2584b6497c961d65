import { bench, describe } from "vitest";
import {
  canonicalize,
  createJwe,
  deriveKeyEcdhEs,
  DidKeyResolver,
  generateAgentKey,
  KeyManager,
  pack,
  unpack,
  unwrapKeyAesKw,
  wrapKeyAesKw,
} from "../packages/core/src/index.js";

const encoder = new TextEncoder();

// ---------------------------------------------------------------------------
// Key Generation
// ---------------------------------------------------------------------------
describe("Key Generation", () => {
  bench("Ed25519 agent key", () => {
    generateAgentKey("Ed25519");
  });

  bench("P-256 agent key", () => {
    generateAgentKey("P-256");
  });

  bench("secp256k1 agent key", () => {
    generateAgentKey("secp256k1");
  });
});

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------
describe("Primitives", () => {
  const secret = new Uint8Array(32).fill(0x42);
  const apu = encoder.encode("did:example:alice#key-1");
  const apv = encoder.encode("did:example:bob#key-1");
  const kek = new Uint8Array(32).fill(0x42);
  const cek = new Uint8Array(32).fill(0xab);
  const wrapped = wrapKeyAesKw(kek, cek);
  const nestedObject = { a: { b: { c: { d: 1, e: 2 }, f: 3 }, g: 4 }, h: 5 };

  bench("Concat KDF (256 bits)", () => {
    deriveKeyEcdhEs(secret, apu, apv, 256);
  });

  bench("AES-KW wrap 256-bit key", () => {
    wrapKeyAesKw(kek, cek);
  });

  bench("AES-KW unwrap 256-bit key", () => {
    unwrapKeyAesKw(kek, wrapped);
  });

  bench("Canonicalize nested 3-level object", () => {
    canonicalize(nestedObject);
  });
});

// ---------------------------------------------------------------------------
// Envelopes
// ---------------------------------------------------------------------------
const aliceManager = new KeyManager();
const bobManager = new KeyManager({ resolver: new DidKeyResolver() });
const alice = aliceManager.generateKey("P-256");
const bob = bobManager.generateKey("P-256");
const carol = generateAgentKey("P-256");
const payload = { type: "transfer", body: { amount: "100.00", asset: "USD", memo: "x".repeat(256) } };

const signed = await pack(payload, { kind: "signed", signingKeyId: alice.keyId }, aliceManager);
const encrypted = await pack(
  payload,
  { kind: "encrypted", senderKeyId: alice.keyId, recipients: [bob.toVerificationKey()] },
  aliceManager,
);

describe("Envelopes", () => {
  bench("Pack signed (ES256)", async () => {
    await pack(payload, { kind: "signed", signingKeyId: alice.keyId }, aliceManager);
  });

  bench("Unpack signed (ES256)", async () => {
    await unpack(signed, bobManager);
  });

  bench("Pack encrypted, one recipient", async () => {
    await pack(payload, { kind: "encrypted", senderKeyId: alice.keyId, recipients: [bob.toVerificationKey()] }, aliceManager);
  });

  bench("Unpack encrypted, one recipient", async () => {
    await unpack(encrypted, bobManager);
  });

  bench("createJwe, two recipients", async () => {
    await createJwe(encoder.encode(JSON.stringify(payload)), [bob.toVerificationKey(), carol.toVerificationKey()]);
  });
});
