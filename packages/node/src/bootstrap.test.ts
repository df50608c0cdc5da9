import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { NodeConfigSchema, type NodeConfig } from "@coffer/core/schemas";
import { createMemoryBus } from "@coffer/core/bus";
import { encrypt, generateKey } from "@coffer/core/crypto";
import { ModeMismatchError } from "@coffer/core/errors";
import { encodeMessage } from "@coffer/core/protocol";
import { makeMockLogger } from "@coffer/core/test-utils";
import { createStorageNode, resolveNodeId } from "./bootstrap.js";

function makeConfig(overrides: Record<string, unknown> = {}): NodeConfig {
  return NodeConfigSchema.parse({
    node: { id: "node-test" },
    bus: { backend: "memory" },
    ...overrides,
  });
}

describe("createStorageNode", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "bootstrap-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("reports healthy only after start", async () => {
    const ctx = await createStorageNode(makeConfig(), {
      rootPath: tempDir,
      logger: makeMockLogger(),
    });

    expect(ctx.state.getState()).toBe("starting");
    expect((await ctx.app.request("/health")).status).toBe(503);

    ctx.start();
    expect(ctx.state.getState()).toBe("consuming");
    expect((await ctx.app.request("/health")).status).toBe(200);

    await ctx.cleanup();
    expect(ctx.state.getState()).toBe("stopped");
  });

  it("stores double-encrypted blobs under the root (per-document)", async () => {
    const bus = createMemoryBus();
    const ctx = await createStorageNode(makeConfig(), {
      rootPath: tempDir,
      bus,
      logger: makeMockLogger(),
    });
    ctx.start();
    const ownerCiphertext = encrypt(generateKey(), new TextEncoder().encode("x"));

    await bus.publish(
      "coffer.store.requests",
      encodeMessage({ type: "store_request", blobId: "b1", data: ownerCiphertext }),
    );
    await bus.idle();

    expect(await readdir(join(tempDir, "blobs"))).toEqual(["b1.blob"]);
    expect(await readdir(join(tempDir, "keys"))).toEqual(["b1.key"]);
    expect(bus.queued("coffer.store.responses")).toBe(1);
    await ctx.cleanup();
  });

  it("keeps keys in keys.db with the sqlite vault", async () => {
    const bus = createMemoryBus();
    const ctx = await createStorageNode(
      makeConfig({ storage: { keyVault: "sqlite" } }),
      { rootPath: tempDir, bus, logger: makeMockLogger() },
    );
    ctx.start();

    await bus.publish(
      "coffer.store.requests",
      encodeMessage({
        type: "store_request",
        blobId: "b1",
        data: new Uint8Array([1, 2, 3]),
      }),
    );
    await bus.idle();
    await ctx.cleanup();

    const entries = await readdir(tempDir);
    expect(entries).toContain("keys.db");
    expect(entries).not.toContain("keys");
  });

  it("creates a node key in node-keyed mode", async () => {
    const ctx = await createStorageNode(
      makeConfig({ node: { id: "node-test", mode: "node-keyed" } }),
      { rootPath: tempDir, logger: makeMockLogger() },
    );

    const keyFile = JSON.parse(
      await readFile(join(tempDir, "node-key.json"), "utf-8"),
    );
    expect(keyFile.key).toMatch(/^[0-9a-f]{64}$/);
    expect(ctx.node.layer.mode).toBe("node-keyed");
    await ctx.cleanup();
  });

  it("refuses to reopen a root under another mode", async () => {
    const first = await createStorageNode(makeConfig(), {
      rootPath: tempDir,
      logger: makeMockLogger(),
    });
    await first.cleanup();

    await expect(
      createStorageNode(
        makeConfig({ node: { id: "node-test", mode: "node-keyed" } }),
        { rootPath: tempDir, logger: makeMockLogger() },
      ),
    ).rejects.toThrow(ModeMismatchError);
  });

  it("cleanup is idempotent", async () => {
    const ctx = await createStorageNode(makeConfig(), {
      rootPath: tempDir,
      logger: makeMockLogger(),
    });
    ctx.start();

    await ctx.cleanup();
    await expect(ctx.cleanup()).resolves.toBeUndefined();
  });
});

describe("resolveNodeId", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "node-id-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("prefers COFFER_NODE_ID", async () => {
    const config = NodeConfigSchema.parse({ node: { id: "from-config" } });
    expect(
      await resolveNodeId(config, tempDir, { COFFER_NODE_ID: "from-env" }),
    ).toBe("from-env");
  });

  it("uses the configured id", async () => {
    const config = NodeConfigSchema.parse({ node: { id: "from-config" } });
    expect(await resolveNodeId(config, tempDir, {})).toBe("from-config");
  });

  it("generates and persists an id when none is set", async () => {
    const config = NodeConfigSchema.parse({});

    const nodeId = await resolveNodeId(config, tempDir, {});

    expect(nodeId).toMatch(/^node-[0-9a-f]{8}$/);
    const saved = JSON.parse(
      await readFile(join(tempDir, "config.json"), "utf-8"),
    );
    expect(saved.node.id).toBe(nodeId);
  });
});
