import { mkdir, open, readFile, unlink, writeFile } from "node:fs/promises";
import { randomBytes } from "@noble/hashes/utils.js";
import type { KeyVault } from "./vault.js";
import { buildKeyPath } from "../storage/paths.js";

export interface FilesystemKeyVaultOptions {
  dir: string;
}

function isNotFound(err: unknown): boolean {
  return (err as NodeJS.ErrnoException).code === "ENOENT";
}

/**
 * Filesystem key vault. Keys live at {dir}/{blobId}.key with mode 0600.
 *
 * Keys are written in place rather than via temp file + rename: shredding
 * overwrites the file's own blocks, and a rename would leave an earlier
 * inode's contents behind on disk.
 */
export function createFilesystemKeyVault(
  options: FilesystemKeyVaultOptions,
): KeyVault {
  const { dir } = options;

  return {
    async storeKey(blobId, key) {
      const keyPath = buildKeyPath(dir, blobId);
      await mkdir(dir, { recursive: true, mode: 0o700 });
      await writeFile(keyPath, key, { mode: 0o600 });
    },

    async retrieveKey(blobId) {
      try {
        const buf = await readFile(buildKeyPath(dir, blobId));
        return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
      } catch (err: unknown) {
        if (isNotFound(err)) return null;
        throw err;
      }
    },

    async deleteKey(blobId) {
      const keyPath = buildKeyPath(dir, blobId);

      const handle = await open(keyPath, "r+").catch((err: unknown) => {
        if (isNotFound(err)) return null;
        throw err;
      });
      if (!handle) return;

      try {
        const { size } = await handle.stat();
        await handle.write(randomBytes(size), 0, size, 0);
        await handle.sync();
      } finally {
        await handle.close();
      }

      try {
        await unlink(keyPath);
      } catch (err: unknown) {
        // A concurrent delete already removed it
        if (!isNotFound(err)) throw err;
      }
    },
  };
}
