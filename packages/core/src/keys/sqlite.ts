import Database from "better-sqlite3";
import type { KeyVault } from "./vault.js";
import { assertValidBlobId } from "../storage/paths.js";

const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS document_keys (
  blob_id TEXT PRIMARY KEY,
  key BLOB NOT NULL,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%SZ', 'now'))
)`;

/**
 * Open/create the key database.
 *
 * secure_delete makes SQLite zero freed pages. The rollback journal is
 * kept (no WAL) because a WAL file would hold the pre-shred page until the
 * next checkpoint.
 */
export function initializeKeyDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);

  db.pragma("journal_mode = DELETE");
  db.pragma("secure_delete = ON");
  db.exec(CREATE_TABLE_SQL);

  return db;
}

interface KeyRow {
  key: Buffer;
}

export interface SqliteKeyVault extends KeyVault {
  close(): void;
}

export function createSqliteKeyVault(db: Database.Database): SqliteKeyVault {
  db.exec(CREATE_TABLE_SQL);

  const upsertStmt = db.prepare<{ blob_id: string; key: Buffer }>(
    `INSERT INTO document_keys (blob_id, key) VALUES (@blob_id, @key)
     ON CONFLICT(blob_id) DO UPDATE SET key = excluded.key`,
  );

  const selectStmt = db.prepare<{ blob_id: string }, KeyRow>(
    "SELECT key FROM document_keys WHERE blob_id = @blob_id",
  );

  const shredStmt = db.prepare<{ blob_id: string }>(
    "UPDATE document_keys SET key = randomblob(length(key)) WHERE blob_id = @blob_id",
  );

  const deleteStmt = db.prepare<{ blob_id: string }>(
    "DELETE FROM document_keys WHERE blob_id = @blob_id",
  );

  const shredAndDelete = db.transaction((blobId: string) => {
    const { changes } = shredStmt.run({ blob_id: blobId });
    if (changes === 0) return;
    deleteStmt.run({ blob_id: blobId });
  });

  return {
    async storeKey(blobId, key) {
      assertValidBlobId(blobId);
      upsertStmt.run({ blob_id: blobId, key: Buffer.from(key) });
    },

    async retrieveKey(blobId) {
      const row = selectStmt.get({ blob_id: blobId });
      return row ? new Uint8Array(row.key) : null;
    },

    async deleteKey(blobId) {
      shredAndDelete(blobId);
    },

    close() {
      db.close();
    },
  };
}
