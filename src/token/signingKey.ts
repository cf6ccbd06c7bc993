import { createSecretKey, type KeyObject } from "node:crypto";
import { InvalidKeyError } from "../errors/error.js";

export type SigningKey = KeyObject;

// HS256 needs a key at least as long as its digest.
export const MIN_HMAC_KEY_BYTES = 32;

const BASE64 =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}(?:==)?|[A-Za-z0-9+/]{3}=?)?$/;

/**
 * Decodes the base64 secret from configuration into an HMAC key.
 * Call once at startup and share the result.
 */
export function loadSigningKey(encoded: string): SigningKey {
  const trimmed = encoded.trim();
  if (!BASE64.test(trimmed)) {
    throw new InvalidKeyError("Signing key is not valid base64");
  }

  const bytes = Buffer.from(trimmed, "base64");
  if (bytes.length < MIN_HMAC_KEY_BYTES) {
    throw new InvalidKeyError(
      `Signing key must be at least ${MIN_HMAC_KEY_BYTES} bytes for HS256`,
      { actualBytes: bytes.length, minimumBytes: MIN_HMAC_KEY_BYTES },
    );
  }

  return createSecretKey(bytes);
}
