export {
  ResponseRouter,
  type PendingResponse,
  type WaitOptions,
} from "./response-router.js";
export {
  createOwnerClient,
  DEFAULT_RESPONSE_TIMEOUT_MS,
  type OwnerClient,
  type OwnerClientOptions,
  type StoreOptions,
  type StoreResult,
  type LocalRetrieveResult,
  type RestoreResult,
  type VerifyOptions,
  type VerifyResult,
} from "./owner-client.js";
