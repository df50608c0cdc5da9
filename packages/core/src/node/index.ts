export {
  ENCRYPTION_MODES,
  createPerDocumentLayer,
  createNodeKeyedLayer,
  openStoredBlob,
  type EncryptionMode,
  type NodeLayer,
} from "./layer.js";
export { provideProofOfStorage, type ProofResult } from "./proof.js";
export type { NodeContext } from "./context.js";
export {
  handleStoreRequest,
  handleRetrieveRequest,
  handleProofRequest,
  handleDeleteRequest,
} from "./handlers/index.js";
export { createRequestDispatcher, attachRequestHandlers } from "./dispatcher.js";
