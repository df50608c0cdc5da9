import type { BlobStore } from "./interface.js";
import { assertValidBlobId } from "../paths.js";

/**
 * In-memory blob store. The backing map can be passed in so tests can
 * inspect exactly what a node persisted.
 */
export function createMemoryBlobStore(
  backing: Map<string, Uint8Array> = new Map(),
): BlobStore {
  return {
    async store(blobId, data) {
      assertValidBlobId(blobId);
      backing.set(blobId, new Uint8Array(data));
    },

    async retrieve(blobId) {
      const stored = backing.get(blobId);
      return stored ? new Uint8Array(stored) : null;
    },

    async delete(blobId) {
      return backing.delete(blobId);
    },

    async exists(blobId) {
      return backing.has(blobId);
    },
  };
}
