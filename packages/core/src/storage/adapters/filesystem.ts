import { mkdir, readFile, rename, stat, unlink, writeFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import type { BlobStore } from "./interface.js";
import { buildBlobPath } from "../paths.js";

export interface FilesystemBlobStoreOptions {
  dir: string;
}

function isNotFound(err: unknown): boolean {
  return (err as NodeJS.ErrnoException).code === "ENOENT";
}

/**
 * Filesystem blob store.
 * Stores data at {dir}/{blobId}.blob; writes go through a temp file and a
 * rename so a reader never sees a partially written blob.
 */
export function createFilesystemBlobStore(
  options: FilesystemBlobStoreOptions,
): BlobStore {
  const { dir } = options;

  return {
    async store(blobId, data) {
      const filePath = buildBlobPath(dir, blobId);
      await mkdir(dir, { recursive: true });

      const tempPath = filePath + ".tmp." + randomUUID();
      await writeFile(tempPath, data);
      await rename(tempPath, filePath);
    },

    async retrieve(blobId) {
      try {
        const buf = await readFile(buildBlobPath(dir, blobId));
        return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
      } catch (err: unknown) {
        if (isNotFound(err)) return null;
        throw err;
      }
    },

    async delete(blobId) {
      try {
        await unlink(buildBlobPath(dir, blobId));
        return true;
      } catch (err: unknown) {
        if (isNotFound(err)) return false;
        throw err;
      }
    },

    async exists(blobId) {
      try {
        await stat(buildBlobPath(dir, blobId));
        return true;
      } catch (err: unknown) {
        if (isNotFound(err)) return false;
        throw err;
      }
    },
  };
}
