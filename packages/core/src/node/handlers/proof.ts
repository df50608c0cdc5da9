import { encodeMessage, type ProofRequest } from "../../protocol/messages.js";
import type { NodeContext } from "../context.js";
import { provideProofOfStorage } from "../proof.js";

export async function handleProofRequest(
  ctx: NodeContext,
  request: ProofRequest,
): Promise<void> {
  const { blobId } = request;
  const result = await provideProofOfStorage(
    ctx.blobStore,
    ctx.layer,
    blobId,
    request.seed,
  );

  ctx.logger.debug({ blobId, found: result.found }, "Proof request");
  await ctx.bus.publish(
    ctx.queues.proofResponses,
    encodeMessage({
      type: "proof_of_storage_response",
      blobId,
      nodeId: ctx.nodeId,
      proof: result.proof,
      found: result.found,
    }),
  );
}
