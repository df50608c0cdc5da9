import { encrypt } from "../../crypto/cipher.js";
import { encodeMessage, type StoreRequest } from "../../protocol/messages.js";
import type { NodeContext } from "../context.js";

/**
 * Seal the received bytes under the node layer, persist blob then key, and
 * acknowledge. A persistence failure propagates and nothing is published.
 */
export async function handleStoreRequest(
  ctx: NodeContext,
  request: StoreRequest,
): Promise<void> {
  const { blobId } = request;
  const key = ctx.layer.keyForStore(blobId);
  await ctx.blobStore.store(blobId, encrypt(key, request.data));
  await ctx.layer.commitKey(blobId, key);

  ctx.logger.debug({ blobId, size: request.data.length }, "Stored blob");
  await ctx.bus.publish(
    ctx.queues.storeResponses,
    encodeMessage({
      type: "store_response",
      blobId,
      nodeId: ctx.nodeId,
      stored: true,
    }),
  );
}
