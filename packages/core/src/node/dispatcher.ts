import type { BusHandler, Subscription } from "../bus/interface.js";
import {
  decodeMessage,
  type Message,
  type RequestMessage,
  type RequestType,
} from "../protocol/messages.js";
import type { NodeContext } from "./context.js";
import {
  handleDeleteRequest,
  handleProofRequest,
  handleRetrieveRequest,
  handleStoreRequest,
} from "./handlers/index.js";

type RequestOf<T extends RequestType> = Extract<RequestMessage, { type: T }>;

function isRequestOf<T extends RequestType>(
  message: Message,
  type: T,
): message is RequestOf<T> {
  return message.type === type;
}

/**
 * Wrap a handler for one request queue. Anything that does not decode, or
 * decodes to a message that does not belong on this queue, is dropped
 * with a debug log: the queues are shared and unknown traffic is noise.
 * Handler errors propagate to the bus.
 */
export function createRequestDispatcher<T extends RequestType>(
  ctx: NodeContext,
  source: string,
  type: T,
  handle: (ctx: NodeContext, request: RequestOf<T>) => Promise<void>,
): BusHandler {
  return async (payload) => {
    const decoded = decodeMessage(payload);
    if (!decoded.ok) {
      ctx.logger.debug(
        { source, reason: decoded.reason },
        "Dropped malformed message",
      );
      return;
    }
    if (!isRequestOf(decoded.message, type)) {
      ctx.logger.debug(
        { source, type: decoded.message.type },
        "Dropped message of unexpected type",
      );
      return;
    }
    await handle(ctx, decoded.message);
  };
}

/**
 * Subscribe the four request handlers. Store and proof requests are work
 * for any one node; retrieve and delete requests are broadcast so every
 * node holding a replica answers or erases it.
 */
export function attachRequestHandlers(ctx: NodeContext): Subscription[] {
  const { bus, queues } = ctx;
  return [
    bus.subscribe(
      queues.storeRequests,
      createRequestDispatcher(
        ctx,
        queues.storeRequests,
        "store_request",
        handleStoreRequest,
      ),
    ),
    bus.subscribeBroadcast(
      queues.retrieveRequests,
      createRequestDispatcher(
        ctx,
        queues.retrieveRequests,
        "retrieve_request",
        handleRetrieveRequest,
      ),
    ),
    bus.subscribe(
      queues.proofRequests,
      createRequestDispatcher(
        ctx,
        queues.proofRequests,
        "proof_of_storage_request",
        handleProofRequest,
      ),
    ),
    bus.subscribeBroadcast(
      queues.deleteRequests,
      createRequestDispatcher(
        ctx,
        queues.deleteRequests,
        "delete_request",
        handleDeleteRequest,
      ),
    ),
  ];
}
