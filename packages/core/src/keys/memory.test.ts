import { describe, it, expect } from "vitest";
import { generateKey } from "../crypto/cipher.js";
import { createMemoryKeyVault } from "./memory.js";

describe("createMemoryKeyVault", () => {
  it("stores and retrieves a key", async () => {
    const vault = createMemoryKeyVault();
    const key = generateKey();
    await vault.storeKey("b1", key);
    expect(await vault.retrieveKey("b1")).toEqual(key);
  });

  it("retrieveKey returns null when absent", async () => {
    expect(await createMemoryKeyVault().retrieveKey("b1")).toBeNull();
  });

  it("deleteKey shreds the stored bytes before dropping the entry", async () => {
    const backing = new Map<string, Uint8Array>();
    const vault = createMemoryKeyVault(backing);
    const key = generateKey();

    await vault.storeKey("b1", key);
    const stored = backing.get("b1");
    expect(stored).toEqual(key);

    await vault.deleteKey("b1");

    expect(backing.has("b1")).toBe(false);
    expect(await vault.retrieveKey("b1")).toBeNull();
    expect(stored).toHaveLength(32);
    expect(Buffer.from(stored ?? []).equals(Buffer.from(key))).toBe(false);
  });

  it("deleteKey on a missing key is a no-op", async () => {
    const backing = new Map<string, Uint8Array>();
    const vault = createMemoryKeyVault(backing);
    await vault.deleteKey("never");
    expect(backing.size).toBe(0);
  });

  it("returned keys are copies", async () => {
    const backing = new Map<string, Uint8Array>();
    const vault = createMemoryKeyVault(backing);
    const key = generateKey();
    await vault.storeKey("b1", key);

    const copy = await vault.retrieveKey("b1");
    copy?.fill(0);
    expect(backing.get("b1")).toEqual(key);
  });
});
