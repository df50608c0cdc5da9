import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { InvalidBlobIdError } from "../../errors/catalog.js";
import { createFilesystemBlobStore } from "./filesystem.js";
import type { BlobStore } from "./interface.js";

const encoder = new TextEncoder();

describe("createFilesystemBlobStore", () => {
  let dir: string;
  let store: BlobStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "blob-store-test-"));
    store = createFilesystemBlobStore({ dir: join(dir, "blobs") });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("stores and retrieves bytes", async () => {
    await store.store("b1", encoder.encode("ciphertext"));
    expect(await store.retrieve("b1")).toEqual(encoder.encode("ciphertext"));
  });

  it("writes {blobId}.blob under the directory", async () => {
    await store.store("b1", encoder.encode("abc"));
    const onDisk = await readFile(join(dir, "blobs", "b1.blob"), "utf-8");
    expect(onDisk).toBe("abc");
  });

  it("leaves no temp files behind", async () => {
    await store.store("b1", encoder.encode("abc"));
    await store.store("b1", encoder.encode("def"));
    expect(await readdir(join(dir, "blobs"))).toEqual(["b1.blob"]);
  });

  it("store overwrites an existing blob", async () => {
    await store.store("b1", encoder.encode("old"));
    await store.store("b1", encoder.encode("new"));
    expect(await store.retrieve("b1")).toEqual(encoder.encode("new"));
  });

  it("retrieve returns null for a missing blob", async () => {
    expect(await store.retrieve("missing")).toBeNull();
  });

  it("exists reflects presence", async () => {
    expect(await store.exists("b1")).toBe(false);
    await store.store("b1", encoder.encode("x"));
    expect(await store.exists("b1")).toBe(true);
  });

  it("delete returns true once, then false", async () => {
    await store.store("b1", encoder.encode("x"));
    expect(await store.delete("b1")).toBe(true);
    expect(await store.delete("b1")).toBe(false);
    expect(await store.exists("b1")).toBe(false);
  });

  it("delete of a never-stored blob returns false", async () => {
    expect(await store.delete("never")).toBe(false);
  });

  it("stores empty blobs", async () => {
    await store.store("empty", new Uint8Array(0));
    expect(await store.retrieve("empty")).toEqual(new Uint8Array(0));
  });

  it("rejects blob ids that escape the directory", async () => {
    await expect(store.store("../evil", encoder.encode("x"))).rejects.toThrow(
      InvalidBlobIdError,
    );
  });
});
