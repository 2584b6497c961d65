/**
 * didseal: canonical JSON serialization of message payloads.
 */

import { utf8ToBytes } from "@noble/hashes/utils";
import { DidSealError, DidSealErrorCode } from "../types/errors.js";

/**
 * Deep-sort all object keys recursively to produce a canonical form.
 * Arrays preserve element order but objects within arrays are also sorted.
 * @throws {DidSealError} SERIALIZATION_ERROR for values JSON cannot represent.
 */
export function canonicalize(value: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(deepSortKeys(value));
  } catch (err) {
    throw new DidSealError(DidSealErrorCode.SERIALIZATION_ERROR, "Payload is not serializable", {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  if (json === undefined) {
    throw new DidSealError(DidSealErrorCode.SERIALIZATION_ERROR, "Payload is not serializable");
  }
  return json;
}

/** UTF-8 bytes of `canonicalize(value)`. */
export function canonicalBytes(value: unknown): Uint8Array {
  return utf8ToBytes(canonicalize(value));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepSortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(deepSortKeys);
  }
  if (isPlainObject(value)) {
    if (typeof value.toJSON === "function") {
      return value;
    }
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = deepSortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}
