/**
 * Blob storage backend.
 * Stores exactly the bytes it is given; it has no notion of encryption.
 * Callers are responsible for handing it ciphertext only.
 */
export interface BlobStore {
  /**
   * Store bytes under a blob id, replacing any existing blob.
   * @param blobId - validated blob id (see BLOB_ID_PATTERN)
   */
  store(blobId: string, data: Uint8Array): Promise<void>;

  /**
   * Read a blob.
   * @returns the stored bytes, or null if the blob does not exist
   */
  retrieve(blobId: string): Promise<Uint8Array | null>;

  /**
   * Delete a blob.
   * @returns true if deleted, false if not found
   */
  delete(blobId: string): Promise<boolean>;

  /** Check if a blob exists. */
  exists(blobId: string): Promise<boolean>;
}
