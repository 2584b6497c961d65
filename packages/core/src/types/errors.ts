/**
 * didseal: error codes and typed error class.
 */

/** All didseal error codes organized by domain. */
export enum DidSealErrorCode {
  // Parameters (1xxx)
  INVALID_PARAMETER = "SEAL-1001",
  INVALID_FORMAT = "SEAL-1002",
  SERIALIZATION_ERROR = "SEAL-1003",

  // Keys (2xxx)
  INVALID_KEY = "SEAL-2001",
  UNSUPPORTED_ALGORITHM = "SEAL-2002",
  KEY_NOT_FOUND = "SEAL-2003",

  // Security (3xxx)
  INTEGRITY_CHECK_FAILED = "SEAL-3001",
  VERIFICATION_FAILED = "SEAL-3002",
  DECRYPTION_FAILED = "SEAL-3003",

  // Policy (4xxx)
  POLICY_VIOLATION = "SEAL-4001",
}

/** Typed error for didseal operations. */
export class DidSealError extends Error {
  /** Machine-readable error code. */
  public readonly code: DidSealErrorCode;
  /** Additional error context. Never carries key material. */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: DidSealErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "DidSealError";
    this.code = code;
    this.details = details;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, DidSealError.prototype);
  }
}

/**
 * Whether a code reports a cryptographic rejection (tampering, wrong key,
 * wrong recipient) rather than a malformed call or missing key.
 */
export function isSecurityFailure(code: DidSealErrorCode): boolean {
  return (
    code === DidSealErrorCode.INTEGRITY_CHECK_FAILED ||
    code === DidSealErrorCode.VERIFICATION_FAILED ||
    code === DidSealErrorCode.DECRYPTION_FAILED
  );
}

/** Narrow an unknown thrown value to a DidSealError with the given code. */
export function isDidSealError(
  err: unknown,
  code?: DidSealErrorCode,
): err is DidSealError {
  return err instanceof DidSealError && (code === undefined || err.code === code);
}
