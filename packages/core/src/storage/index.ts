export type { BlobStore } from "./adapters/interface.js";
export {
  createFilesystemBlobStore,
  type FilesystemBlobStoreOptions,
} from "./adapters/filesystem.js";
export { createMemoryBlobStore } from "./adapters/memory.js";
export {
  BLOB_ID_PATTERN,
  isValidBlobId,
  assertValidBlobId,
  buildBlobPath,
  buildKeyPath,
} from "./paths.js";
