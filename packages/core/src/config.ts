/**
 * didseal: runtime configuration.
 *
 * Loads environment variables with defaults suitable for local use. Values
 * are validated once at load time; an invalid value fails fast.
 */

import { z } from "zod";
import { KEY_TYPES, type KeyType } from "./types/keys.js";
import { MESSAGE_LIMITS } from "./types/messages.js";
import { DidSealError, DidSealErrorCode } from "./types/errors.js";

export interface SealConfig {
  /** Pino log level, or "silent" */
  logLevel: "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
  /** Largest transport string unpack accepts, in bytes */
  maxEnvelopeBytes: number;
  /** Key type used by KeyManager.generateKey() without an argument */
  defaultKeyType: KeyType;
}

type Env = Record<string, string | undefined>;

const configSchema = z.object({
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
  maxEnvelopeBytes: z.number().int().positive(),
  defaultKeyType: z.enum(["Ed25519", "P-256", "secp256k1"]),
});

function envInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envStr(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw !== undefined && raw !== "" ? raw : fallback;
}

/**
 * Read configuration from an environment map.
 * @throws {DidSealError} INVALID_PARAMETER naming the first invalid variable.
 */
export function loadConfig(env: Env = process.env): SealConfig {
  const result = configSchema.safeParse({
    logLevel: envStr(env, "DIDSEAL_LOG_LEVEL", "info").toLowerCase(),
    maxEnvelopeBytes: envInt(env, "DIDSEAL_MAX_ENVELOPE_BYTES", MESSAGE_LIMITS.MAX_ENVELOPE_SIZE),
    defaultKeyType: envStr(env, "DIDSEAL_DEFAULT_KEY_TYPE", "P-256"),
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new DidSealError(
      DidSealErrorCode.INVALID_PARAMETER,
      `Invalid configuration: ${issue.path.join(".")}: ${issue.message}`,
      { supportedKeyTypes: KEY_TYPES },
    );
  }
  return result.data;
}

export const config: SealConfig = loadConfig();
