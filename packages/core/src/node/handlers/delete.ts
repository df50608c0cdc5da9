import type { DeleteRequest } from "../../protocol/messages.js";
import type { NodeContext } from "../context.js";

/**
 * Shred the key first, then drop the ciphertext. Both steps are
 * idempotent. Deletion is anonymous, so nothing is published.
 */
export async function handleDeleteRequest(
  ctx: NodeContext,
  request: DeleteRequest,
): Promise<void> {
  const { blobId } = request;
  await ctx.layer.shred(blobId);
  const removed = await ctx.blobStore.delete(blobId);
  ctx.logger.debug({ blobId, removed }, "Delete request");
}
