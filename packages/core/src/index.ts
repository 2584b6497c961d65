/**
 * @didseal/core: DID-addressed signed and encrypted message envelopes.
 */

// Types
export * from "./types/errors.js";
export * from "./types/keys.js";
export * from "./types/messages.js";
export * from "./types/did.js";

// Configuration and logging
export { config, loadConfig, type SealConfig } from "./config.js";
export { logger, moduleLogger } from "./logger.js";

// Primitives
export {
  base64urlDecode,
  base64urlDecodeString,
  base64urlEncode,
  base64urlEncodeString,
} from "./crypto/base64url.js";
export { canonicalBytes, canonicalize } from "./crypto/canonical.js";
export { deriveKeyEcdhEs, ECDH_ES_A256KW } from "./crypto/kdf.js";
export { unwrapKeyAesKw, wrapKeyAesKw } from "./crypto/key-wrap.js";
export {
  CEK_LENGTH,
  generateCek,
  IV_LENGTH,
  openContent,
  sealContent,
  TAG_LENGTH,
  type SealedContent,
} from "./crypto/content.js";
export {
  curveSuite,
  ecCurveSuite,
  isEcKeyType,
  keyTypeForJwsAlg,
  type CurveSuite,
  type EcCurveSuite,
} from "./crypto/curves.js";
export { generateKeyPair, keyPairFromPrivateKey, type KeyPair } from "./crypto/keys.js";

// Keys
export {
  EcAgentKey,
  Ed25519AgentKey,
  generateAgentKey,
  importAgentKey,
  type KeyIdentity,
  type LocalAgentKey,
} from "./keys/local-agent-key.js";
export { PublicVerificationKey } from "./keys/verification-key.js";
export {
  KeyManager,
  type KeyManagerOptions,
  type KeyManagerPacking,
} from "./keys/key-manager.js";

// DIDs
export {
  buildDidKeyDocument,
  decodeMultikey,
  didKeyFromPublicKey,
  didKeyVerificationMethodId,
  encodeMultikey,
  isDidKey,
  type DecodedMultikey,
} from "./did/did-key.js";
export {
  ChainedKeyResolver,
  DidDocumentResolver,
  DidKeyResolver,
  jwkFromDocument,
  type KeyResolver,
} from "./did/resolve.js";

// Envelopes
export {
  createCompactJws,
  createJws,
  parseCompactJws,
  parseJws,
  toCompactJws,
  verifyJws,
  type JwsSigner,
  type VerificationKeyLookup,
  type VerifiedJws,
} from "./envelope/jws.js";
export {
  createJwe,
  decodeJweProtected,
  decryptForRecipient,
  decryptJwe,
  encryptForRecipient,
  JWE_ALG,
  JWE_ENC,
  parseJwe,
  recipientSetApv,
  type CreateJweOptions,
  type DecryptedJwe,
  type JweRecipientContext,
} from "./envelope/jwe.js";
export {
  pack,
  unpack,
  type Provenance,
  type SecurityMode,
  type SecurityModeKind,
  type UnpackOptions,
  type Unpacked,
} from "./envelope/pack.js";
export { createPlainMessage, type PlainMessageInit } from "./envelope/plain-message.js";
