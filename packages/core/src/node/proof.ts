import { computeProof } from "../crypto/proof.js";
import type { BlobStore } from "../storage/adapters/interface.js";
import { openStoredBlob, type NodeLayer } from "./layer.js";

export type ProofResult =
  | { found: true; proof: Uint8Array }
  | { found: false; proof: null };

/**
 * Answer a storage challenge. The proof covers the bytes the owner handed
 * over, so the owner can check it against its own copy.
 */
export async function provideProofOfStorage(
  blobStore: BlobStore,
  layer: NodeLayer,
  blobId: string,
  seed: Uint8Array,
): Promise<ProofResult> {
  const data = await openStoredBlob(blobStore, layer, blobId);
  if (!data) return { found: false, proof: null };
  return { found: true, proof: computeProof(data, seed) };
}
