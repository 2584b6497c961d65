import { expect } from "vitest";
import { DidSealError, type DidSealErrorCode } from "../types/errors.js";

/** Assert that `fn` throws a DidSealError with `code`, and return it. */
export function expectSealError(fn: () => unknown, code: DidSealErrorCode): DidSealError {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(DidSealError);
  expect(caught).toHaveProperty("code", code);
  if (!(caught instanceof DidSealError)) throw new Error("unreachable");
  return caught;
}

/** Async counterpart of `expectSealError`. */
export async function expectSealRejection(
  promise: Promise<unknown>,
  code: DidSealErrorCode,
): Promise<DidSealError> {
  let caught: unknown;
  try {
    await promise;
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(DidSealError);
  expect(caught).toHaveProperty("code", code);
  if (!(caught instanceof DidSealError)) throw new Error("unreachable");
  return caught;
}
