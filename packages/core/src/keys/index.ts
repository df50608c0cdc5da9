export type { KeyVault } from "./vault.js";
export {
  createFilesystemKeyVault,
  type FilesystemKeyVaultOptions,
} from "./filesystem.js";
export {
  createSqliteKeyVault,
  initializeKeyDatabase,
  type SqliteKeyVault,
} from "./sqlite.js";
export { createMemoryKeyVault } from "./memory.js";
export { loadOrCreateNodeKey } from "./node-key.js";
