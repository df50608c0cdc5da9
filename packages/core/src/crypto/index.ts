export {
  KEY_LENGTH,
  NONCE_LENGTH,
  TAG_LENGTH,
  generateKey,
  encrypt,
  decrypt,
} from "./cipher.js";
export { PROOF_LENGTH, computeProof, proofsEqual } from "./proof.js";
