/**
 * Metadata file for a running storage node.
 *
 * `node.json` under the root path records PID, node id, mode, health port,
 * version and start time. The CLI reads it to find a running node.
 */

import { writeFile, readFile, unlink } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

export const NodeMetadataSchema = z.object({
  pid: z.number().int().positive(),
  nodeId: z.string(),
  mode: z.enum(["per-document", "node-keyed"]),
  healthPort: z.number().int().nullable(),
  version: z.string(),
  startedAt: z.string(),
});

export type NodeMetadata = z.infer<typeof NodeMetadataSchema>;

const PID_FILENAME = "node.json";

function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err as NodeJS.ErrnoException).code === "ENOENT"
  );
}

/** Resolve the metadata file path within the root. */
export function pidFilePath(rootPath: string): string {
  return join(rootPath, PID_FILENAME);
}

export async function writePidFile(
  rootPath: string,
  metadata: NodeMetadata,
): Promise<void> {
  await writeFile(
    pidFilePath(rootPath),
    JSON.stringify(metadata, null, 2),
    "utf-8",
  );
}

/**
 * Read node metadata. Returns null if the file is missing or does not
 * hold valid metadata.
 */
export async function readPidFile(
  rootPath: string,
): Promise<NodeMetadata | null> {
  let raw: string;
  try {
    raw = await readFile(pidFilePath(rootPath), "utf-8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = NodeMetadataSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/** Remove the metadata file if present. */
export async function removePidFile(rootPath: string): Promise<void> {
  try {
    await unlink(pidFilePath(rootPath));
  } catch (err) {
    if (!isNotFound(err)) throw err;
  }
}

function isAlive(pid: number): boolean {
  try {
    // signal 0 only checks that the process exists
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return (err as NodeJS.ErrnoException).code === "EPERM";
  }
}

/**
 * Metadata of the node recorded under the root, if its process is still
 * running. A stale file is removed.
 */
export async function checkRunningNode(
  rootPath: string,
): Promise<NodeMetadata | null> {
  const metadata = await readPidFile(rootPath);
  if (!metadata) return null;
  if (isAlive(metadata.pid)) return metadata;

  await removePidFile(rootPath);
  return null;
}
