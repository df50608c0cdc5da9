import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { generateKey } from "../crypto/cipher.js";
import {
  createSqliteKeyVault,
  initializeKeyDatabase,
  type SqliteKeyVault,
} from "./sqlite.js";

describe("createSqliteKeyVault", () => {
  let db: Database.Database;
  let vault: SqliteKeyVault;

  beforeEach(() => {
    db = new Database(":memory:");
    vault = createSqliteKeyVault(db);
  });

  afterEach(() => {
    vault.close();
  });

  it("stores and retrieves a key", async () => {
    const key = generateKey();
    await vault.storeKey("b1", key);
    expect(await vault.retrieveKey("b1")).toEqual(key);
  });

  it("storeKey replaces an earlier key", async () => {
    const second = generateKey();
    await vault.storeKey("b1", generateKey());
    await vault.storeKey("b1", second);

    expect(await vault.retrieveKey("b1")).toEqual(second);
    const row = db
      .prepare<[], { cnt: number }>("SELECT COUNT(*) AS cnt FROM document_keys")
      .get();
    expect(row?.cnt).toBe(1);
  });

  it("retrieveKey returns null when absent", async () => {
    expect(await vault.retrieveKey("missing")).toBeNull();
  });

  it("deleteKey removes the row", async () => {
    await vault.storeKey("b1", generateKey());
    await vault.deleteKey("b1");

    expect(await vault.retrieveKey("b1")).toBeNull();
    const row = db
      .prepare("SELECT * FROM document_keys WHERE blob_id = ?")
      .get("b1");
    expect(row).toBeUndefined();
  });

  it("deleteKey overwrites before deleting", async () => {
    const statements: string[] = [];
    const traced = new Database(":memory:", {
      verbose: (sql) => statements.push(String(sql)),
    });
    const tracedVault = createSqliteKeyVault(traced);

    await tracedVault.storeKey("b1", generateKey());
    statements.length = 0;
    await tracedVault.deleteKey("b1");

    const update = statements.findIndex((s) => s.startsWith("UPDATE"));
    const remove = statements.findIndex((s) => s.startsWith("DELETE"));
    expect(update).toBeGreaterThanOrEqual(0);
    expect(remove).toBeGreaterThan(update);

    tracedVault.close();
  });

  it("deleteKey is idempotent", async () => {
    await vault.deleteKey("never");
    await vault.storeKey("b1", generateKey());
    await vault.deleteKey("b1");
    await expect(vault.deleteKey("b1")).resolves.toBeUndefined();
  });
});

describe("initializeKeyDatabase", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "key-db-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("enables secure_delete and keeps the rollback journal", () => {
    const db = initializeKeyDatabase(join(dir, "keys.db"));

    expect(db.pragma("secure_delete", { simple: true })).toBe(1);
    expect(db.pragma("journal_mode", { simple: true })).toBe("delete");

    db.close();
  });

  it("persists keys across reopen", async () => {
    const path = join(dir, "keys.db");
    const key = generateKey();

    const first = createSqliteKeyVault(initializeKeyDatabase(path));
    await first.storeKey("b1", key);
    first.close();

    const second = createSqliteKeyVault(initializeKeyDatabase(path));
    expect(await second.retrieveKey("b1")).toEqual(key);
    second.close();
  });
});
