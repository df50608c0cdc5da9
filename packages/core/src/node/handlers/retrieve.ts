import {
  encodeMessage,
  type RetrieveRequest,
} from "../../protocol/messages.js";
import type { NodeContext } from "../context.js";
import { openStoredBlob } from "../layer.js";

export async function handleRetrieveRequest(
  ctx: NodeContext,
  request: RetrieveRequest,
): Promise<void> {
  const { blobId } = request;
  const data = await openStoredBlob(ctx.blobStore, ctx.layer, blobId);

  ctx.logger.debug({ blobId, found: data !== null }, "Retrieve request");
  await ctx.bus.publish(
    ctx.queues.retrieveResponses,
    encodeMessage({
      type: "retrieve_response",
      blobId,
      nodeId: ctx.nodeId,
      data,
      found: data !== null,
    }),
  );
}
