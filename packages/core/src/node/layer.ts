/**
 * The storage node's own encryption layer.
 *
 * Whatever bytes a node is asked to store (normally owner ciphertext) are
 * sealed under a node-side key before they touch the blob store, and only
 * this layer is removed again when the node answers a retrieve or proof
 * request.
 */

import { KEY_LENGTH, decrypt, generateKey } from "../crypto/cipher.js";
import { KeyLengthError } from "../errors/catalog.js";
import type { KeyVault } from "../keys/vault.js";
import type { BlobStore } from "../storage/adapters/interface.js";

export const ENCRYPTION_MODES = ["per-document", "node-keyed"] as const;

export type EncryptionMode = (typeof ENCRYPTION_MODES)[number];

export interface NodeLayer {
  readonly mode: EncryptionMode;
  /** Key to seal a newly received blob with. */
  keyForStore(blobId: string): Uint8Array;
  /** Record the key used for a blob once its ciphertext is persisted. */
  commitKey(blobId: string, key: Uint8Array): Promise<void>;
  /** @returns the key that opens a stored blob, or null if it was shredded */
  keyForRead(blobId: string): Promise<Uint8Array | null>;
  /** Crypto-erase a blob. No-op for node-keyed layers. */
  shred(blobId: string): Promise<void>;
}

/** Every blob gets its own key, kept in the vault until deletion. */
export function createPerDocumentLayer(vault: KeyVault): NodeLayer {
  return {
    mode: "per-document",
    keyForStore: () => generateKey(),
    commitKey: (blobId, key) => vault.storeKey(blobId, key),
    keyForRead: (blobId) => vault.retrieveKey(blobId),
    shred: (blobId) => vault.deleteKey(blobId),
  };
}

/**
 * One key for every blob. Deleting a blob removes its ciphertext but
 * there is no per-blob key to shred.
 */
export function createNodeKeyedLayer(nodeKey: Uint8Array): NodeLayer {
  if (nodeKey.length !== KEY_LENGTH) {
    throw new KeyLengthError(KEY_LENGTH, nodeKey.length);
  }
  const key = new Uint8Array(nodeKey);
  return {
    mode: "node-keyed",
    keyForStore: () => key,
    commitKey: async () => {},
    keyForRead: async () => key,
    shred: async () => {},
  };
}

/**
 * Read a blob and strip the node layer.
 *
 * @returns the bytes originally handed to the node, or null when the blob
 *   or its key is gone
 * @throws AuthenticationError if the stored ciphertext does not open
 */
export async function openStoredBlob(
  blobStore: BlobStore,
  layer: NodeLayer,
  blobId: string,
): Promise<Uint8Array | null> {
  const stored = await blobStore.retrieve(blobId);
  if (!stored) return null;
  const key = await layer.keyForRead(blobId);
  if (!key) return null;
  return decrypt(key, stored);
}
