/**
 * didseal: zod schemas for untrusted wire input.
 */

import { z } from "zod";
import { DidSealError, type DidSealErrorCode } from "../types/errors.js";

export const okpPublicJwkSchema = z.object({
  kty: z.literal("OKP"),
  crv: z.literal("Ed25519"),
  x: z.string(),
  kid: z.string().optional(),
});

export const ecPublicJwkSchema = z.object({
  kty: z.literal("EC"),
  crv: z.enum(["P-256", "secp256k1"]),
  x: z.string(),
  y: z.string(),
  kid: z.string().optional(),
});

export const publicJwkSchema = z.union([okpPublicJwkSchema, ecPublicJwkSchema]);

export const jwsProtectedSchema = z.object({
  typ: z.string(),
  alg: z.enum(["EdDSA", "ES256", "ES256K"]),
  kid: z.string().optional(),
});

export const jwsSchema = z.object({
  payload: z.string(),
  signatures: z
    .array(
      z.object({
        protected: z.string(),
        signature: z.string(),
        header: z.object({ kid: z.string().min(1) }),
      }),
    )
    .min(1),
});

export const jweProtectedSchema = z.object({
  epk: ecPublicJwkSchema,
  apv: z.string(),
  apu: z.string().optional(),
  typ: z.string(),
  cty: z.string().optional(),
  enc: z.literal("A256GCM"),
  alg: z.literal("ECDH-ES+A256KW"),
});

export const jweSchema = z.object({
  protected: z.string(),
  recipients: z
    .array(
      z.object({
        encrypted_key: z.string(),
        header: z.object({
          kid: z.string().min(1),
          sender_kid: z.string().optional(),
        }),
      }),
    )
    .min(1),
  iv: z.string(),
  ciphertext: z.string(),
  tag: z.string(),
});

/**
 * Parse `value` with `schema`, converting a failure into a DidSealError.
 * Only the first issue's path is reported; values are never echoed.
 */
export function parseWith<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  code: DidSealErrorCode,
  what: string,
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new DidSealError(code, `Malformed ${what}${where}`);
  }
  return result.data;
}

/** JSON.parse that reports failures as DidSealErrors. */
export function parseJson(text: string, code: DidSealErrorCode, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new DidSealError(code, `${what} is not valid JSON`);
  }
}
