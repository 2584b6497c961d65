import { describe, it, expect } from "vitest";
import {
  DidSealError,
  DidSealErrorCode,
  isDidSealError,
  isSecurityFailure,
} from "../types/errors.js";

describe("DidSealError", () => {
  it("carries code, message and details", () => {
    const err = new DidSealError(DidSealErrorCode.KEY_NOT_FOUND, "Key not found: k", { kid: "k" });
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(DidSealError);
    expect(err.name).toBe("DidSealError");
    expect(err.code).toBe("SEAL-2003");
    expect(err.message).toBe("Key not found: k");
    expect(err.details).toEqual({ kid: "k" });
  });

  it("narrows unknown values by code", () => {
    const err: unknown = new DidSealError(DidSealErrorCode.POLICY_VIOLATION, "nope");
    expect(isDidSealError(err)).toBe(true);
    expect(isDidSealError(err, DidSealErrorCode.POLICY_VIOLATION)).toBe(true);
    expect(isDidSealError(err, DidSealErrorCode.KEY_NOT_FOUND)).toBe(false);
    expect(isDidSealError(new Error("plain"))).toBe(false);
  });
});

describe("isSecurityFailure", () => {
  it.each([
    [DidSealErrorCode.INTEGRITY_CHECK_FAILED, true],
    [DidSealErrorCode.VERIFICATION_FAILED, true],
    [DidSealErrorCode.DECRYPTION_FAILED, true],
    [DidSealErrorCode.INVALID_PARAMETER, false],
    [DidSealErrorCode.KEY_NOT_FOUND, false],
    [DidSealErrorCode.POLICY_VIOLATION, false],
  ])("classifies %s as %s", (code, expected) => {
    expect(isSecurityFailure(code)).toBe(expected);
  });
});
