/**
 * Bus names shared by nodes and owners. `retrieveRequests` and
 * `deleteRequests` are broadcast topics; the rest are work queues.
 */
export interface QueueNames {
  storeRequests: string;
  storeResponses: string;
  retrieveRequests: string;
  retrieveResponses: string;
  proofRequests: string;
  proofResponses: string;
  deleteRequests: string;
}

export const DEFAULT_QUEUES = {
  storeRequests: "coffer.store.requests",
  storeResponses: "coffer.store.responses",
  retrieveRequests: "coffer.retrieve.requests",
  retrieveResponses: "coffer.retrieve.responses",
  proofRequests: "coffer.proof.requests",
  proofResponses: "coffer.proof.responses",
  deleteRequests: "coffer.delete.requests",
} as const satisfies QueueNames;
