import { xsalsa20poly1305 } from "@noble/ciphers/salsa.js";
import { concatBytes, randomBytes } from "@noble/hashes/utils.js";
import { AuthenticationError, KeyLengthError } from "../errors/catalog.js";

/** Symmetric key length in bytes (XSalsa20-Poly1305). */
export const KEY_LENGTH = 32;
export const NONCE_LENGTH = 24;
export const TAG_LENGTH = 16;

function assertKeyLength(key: Uint8Array): void {
  if (key.length !== KEY_LENGTH) {
    throw new KeyLengthError(KEY_LENGTH, key.length);
  }
}

/** Generate a fresh random 32-byte key. */
export function generateKey(): Uint8Array {
  return randomBytes(KEY_LENGTH);
}

/**
 * Authenticated encryption with a fresh random nonce per call.
 * Format: nonce (24 bytes) || Poly1305 tag (16 bytes) || ciphertext,
 * the same layout as a NaCl secretbox with prepended nonce.
 *
 * @throws KeyLengthError if the key is not 32 bytes
 */
export function encrypt(key: Uint8Array, plaintext: Uint8Array): Uint8Array {
  assertKeyLength(key);
  const nonce = randomBytes(NONCE_LENGTH);
  const box = xsalsa20poly1305(key, nonce).encrypt(plaintext);
  return concatBytes(nonce, box);
}

/**
 * Decrypt output of {@link encrypt}.
 *
 * @throws KeyLengthError if the key is not 32 bytes
 * @throws AuthenticationError on a wrong key, tampering or truncation
 */
export function decrypt(key: Uint8Array, ciphertext: Uint8Array): Uint8Array {
  assertKeyLength(key);

  if (ciphertext.length < NONCE_LENGTH + TAG_LENGTH) {
    throw new AuthenticationError({ reason: "ciphertext too short" });
  }

  const nonce = ciphertext.subarray(0, NONCE_LENGTH);
  const box = ciphertext.subarray(NONCE_LENGTH);

  try {
    return xsalsa20poly1305(key, nonce).decrypt(box);
  } catch (err) {
    throw new AuthenticationError({
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}
