import { describe, it, expect } from "vitest";
import { encrypt, generateKey } from "../crypto/cipher.js";
import { KeyLengthError } from "../errors/catalog.js";
import { createMemoryKeyVault } from "../keys/memory.js";
import { createMemoryBlobStore } from "../storage/adapters/memory.js";
import {
  createNodeKeyedLayer,
  createPerDocumentLayer,
  openStoredBlob,
} from "./layer.js";

const bytes = (text: string) => new TextEncoder().encode(text);

describe("createPerDocumentLayer", () => {
  it("hands out a fresh key for every blob", () => {
    const layer = createPerDocumentLayer(createMemoryKeyVault());
    expect(layer.keyForStore("a")).not.toEqual(layer.keyForStore("a"));
  });

  it("keeps committed keys in the vault until shredded", async () => {
    const keys = new Map<string, Uint8Array>();
    const layer = createPerDocumentLayer(createMemoryKeyVault(keys));
    const key = layer.keyForStore("doc");

    await layer.commitKey("doc", key);
    expect(await layer.keyForRead("doc")).toEqual(key);
    expect(keys.has("doc")).toBe(true);

    await layer.shred("doc");
    expect(await layer.keyForRead("doc")).toBeNull();
    expect(keys.has("doc")).toBe(false);
  });
});

describe("createNodeKeyedLayer", () => {
  it("uses the node key for every blob and never forgets it", async () => {
    const nodeKey = generateKey();
    const layer = createNodeKeyedLayer(nodeKey);

    expect(layer.keyForStore("a")).toEqual(nodeKey);
    await layer.shred("a");
    expect(await layer.keyForRead("a")).toEqual(nodeKey);
  });

  it("rejects a node key of the wrong length", () => {
    expect(() => createNodeKeyedLayer(new Uint8Array(16))).toThrow(
      KeyLengthError,
    );
  });
});

describe("openStoredBlob", () => {
  it("strips the node layer", async () => {
    const blobs = new Map<string, Uint8Array>();
    const layer = createNodeKeyedLayer(generateKey());
    const store = createMemoryBlobStore(blobs);
    await store.store("b", encrypt(layer.keyForStore("b"), bytes("inner")));

    expect(await openStoredBlob(store, layer, "b")).toEqual(bytes("inner"));
  });

  it("returns null for a missing blob", async () => {
    const layer = createNodeKeyedLayer(generateKey());
    expect(
      await openStoredBlob(createMemoryBlobStore(), layer, "nope"),
    ).toBeNull();
  });

  it("returns null when the per-document key is gone", async () => {
    const store = createMemoryBlobStore();
    const layer = createPerDocumentLayer(createMemoryKeyVault());
    await store.store("b", encrypt(generateKey(), bytes("orphan")));

    expect(await openStoredBlob(store, layer, "b")).toBeNull();
  });

  it("throws when the stored ciphertext does not open", async () => {
    const store = createMemoryBlobStore();
    const layer = createNodeKeyedLayer(generateKey());
    await store.store("b", encrypt(generateKey(), bytes("foreign")));

    await expect(openStoredBlob(store, layer, "b")).rejects.toMatchObject({
      errorCode: "AUTHENTICATION_FAILED",
    });
  });
});
