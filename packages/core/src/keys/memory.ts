import { randomBytes } from "@noble/hashes/utils.js";
import type { KeyVault } from "./vault.js";
import { assertValidBlobId } from "../storage/paths.js";

/**
 * In-memory key vault. The backing map is injectable so tests can check
 * that shredding overwrote the stored array before dropping it.
 */
export function createMemoryKeyVault(
  backing: Map<string, Uint8Array> = new Map(),
): KeyVault {
  return {
    async storeKey(blobId, key) {
      assertValidBlobId(blobId);
      backing.set(blobId, new Uint8Array(key));
    },

    async retrieveKey(blobId) {
      const stored = backing.get(blobId);
      return stored ? new Uint8Array(stored) : null;
    },

    async deleteKey(blobId) {
      const stored = backing.get(blobId);
      if (!stored) return;
      stored.set(randomBytes(stored.length));
      backing.delete(blobId);
    },
  };
}
