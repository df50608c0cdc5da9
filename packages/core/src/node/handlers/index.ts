export { handleStoreRequest } from "./store.js";
export { handleRetrieveRequest } from "./retrieve.js";
export { handleProofRequest } from "./proof.js";
export { handleDeleteRequest } from "./delete.js";
