/**
 * Per-document key vault: blob id -> 32-byte document key.
 *
 * `deleteKey` is the crypto-erasure operation of record. Implementations
 * must overwrite the stored key material with random bytes of the same
 * length before removing the entry, and must treat a missing entry as a
 * no-op.
 */
export interface KeyVault {
  /** Associate a key with a blob id, replacing any previous key. */
  storeKey(blobId: string, key: Uint8Array): Promise<void>;

  /** @returns the key, or null if none is stored */
  retrieveKey(blobId: string): Promise<Uint8Array | null>;

  /** Shred then remove the key. Idempotent. */
  deleteKey(blobId: string): Promise<void>;
}
