import { sha256 } from "@noble/hashes/sha2.js";
import { concatBytes } from "@noble/hashes/utils.js";
import { equalBytes } from "@noble/ciphers/utils.js";

export const PROOF_LENGTH = 32;

/**
 * Proof of storage: SHA-256(data || seed).
 *
 * `data` must be the layer the verifier holds itself, i.e. the owner's
 * ciphertext, never the node's double-encrypted bytes. `seed` is chosen
 * fresh by the challenger for every request.
 */
export function computeProof(data: Uint8Array, seed: Uint8Array): Uint8Array {
  return sha256(concatBytes(data, seed));
}

/** Constant-time comparison of two proofs. */
export function proofsEqual(a: Uint8Array, b: Uint8Array): boolean {
  return equalBytes(a, b);
}
