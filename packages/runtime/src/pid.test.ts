import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm, writeFile, access } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  writePidFile,
  readPidFile,
  removePidFile,
  checkRunningNode,
  pidFilePath,
  type NodeMetadata,
} from "./pid.js";

describe("node metadata file", () => {
  let tempDir: string;

  afterEach(async () => {
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
    }
  });

  async function setup(): Promise<string> {
    tempDir = await mkdtemp(join(tmpdir(), "pid-test-"));
    return tempDir;
  }

  const sampleMetadata: NodeMetadata = {
    pid: process.pid,
    nodeId: "node-a",
    mode: "per-document",
    healthPort: 8080,
    version: "1.0.0",
    startedAt: "2026-01-01T00:00:00.000Z",
  };

  it("resolves the file path", async () => {
    const root = await setup();
    expect(pidFilePath(root)).toBe(join(root, "node.json"));
  });

  it("writes and reads metadata", async () => {
    const root = await setup();
    await writePidFile(root, sampleMetadata);

    expect(await readPidFile(root)).toEqual(sampleMetadata);
  });

  it("returns null when the file is missing", async () => {
    const root = await setup();
    expect(await readPidFile(root)).toBeNull();
  });

  it("returns null for a corrupt file", async () => {
    const root = await setup();
    await writeFile(pidFilePath(root), "{ not json");
    expect(await readPidFile(root)).toBeNull();
  });

  it("returns null for JSON that is not node metadata", async () => {
    const root = await setup();
    await writeFile(pidFilePath(root), JSON.stringify({ pid: "abc" }));
    expect(await readPidFile(root)).toBeNull();
  });

  it("removes the file and tolerates a second removal", async () => {
    const root = await setup();
    await writePidFile(root, sampleMetadata);

    await removePidFile(root);
    await expect(removePidFile(root)).resolves.toBeUndefined();
    await expect(access(pidFilePath(root))).rejects.toThrow();
  });

  it("reports a node whose process is alive", async () => {
    const root = await setup();
    await writePidFile(root, sampleMetadata);

    expect(await checkRunningNode(root)).toEqual(sampleMetadata);
  });

  it("cleans up metadata of a dead process", async () => {
    const root = await setup();
    await writePidFile(root, { ...sampleMetadata, pid: 2_147_483_646 });

    expect(await checkRunningNode(root)).toBeNull();
    expect(await readPidFile(root)).toBeNull();
  });
});
