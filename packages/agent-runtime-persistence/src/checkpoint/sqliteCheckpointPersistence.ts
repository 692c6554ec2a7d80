import { gunzipSync, gzipSync } from "node:zlib";

import { type CheckpointPersistence, CorruptCheckpointError } from "@warden/agent-runtime-core";
import type { Database as DatabaseInstance } from "better-sqlite3";
import Database from "better-sqlite3";

export interface SQLiteCheckpointPersistenceConfig {
  databasePath?: string;
  database?: DatabaseInstance;
  compressionThresholdBytes?: number;
}

const DEFAULT_COMPRESSION_THRESHOLD = 64 * 1024;

interface CheckpointRow {
  session_id: string;
  turn_index: number;
  saved_at: number;
  payload: Buffer;
  encoding: string;
  size_bytes: number;
}

type PreparedStatements = {
  upsert: Database.Statement<[string, number, number, Buffer, string, number]>;
  getLatest: Database.Statement<[string], CheckpointRow>;
  remove: Database.Statement<[string]>;
};

/**
 * One row per session; every save replaces the previous checkpoint in a
 * single statement, so a crash leaves either the old or the new blob.
 */
export class SQLiteCheckpointPersistence implements CheckpointPersistence {
  private readonly db: DatabaseInstance;
  private readonly compressionThreshold: number;
  private readonly statements: PreparedStatements;

  constructor(config: SQLiteCheckpointPersistenceConfig) {
    this.db = config.database ?? this.createDatabase(config.databasePath);
    this.compressionThreshold = config.compressionThresholdBytes ?? DEFAULT_COMPRESSION_THRESHOLD;
    this.initSchema();
    this.statements = this.prepareStatements();
  }

  async save(sessionId: string, turnIndex: number, blob: string): Promise<void> {
    const encoded = encodeBlob(blob, this.compressionThreshold);
    this.statements.upsert.run(
      sessionId,
      turnIndex,
      Date.now(),
      encoded.payload,
      encoded.encoding,
      encoded.sizeBytes
    );
  }

  async loadLatest(sessionId: string): Promise<string | undefined> {
    const row = this.statements.getLatest.get(sessionId);
    if (!row) {
      return undefined;
    }
    try {
      return decodeBlob(row.payload, row.encoding);
    } catch (error) {
      throw new CorruptCheckpointError(sessionId, "checkpoint payload could not be decoded", {
        cause: error,
      });
    }
  }

  async delete(sessionId: string): Promise<void> {
    this.statements.remove.run(sessionId);
  }

  close(): void {
    this.db.close();
  }

  private createDatabase(path?: string): DatabaseInstance {
    if (!path) {
      throw new Error("SQLiteCheckpointPersistence requires databasePath or database instance");
    }
    const db = new Database(path);
    db.pragma("journal_mode = WAL");
    return db;
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS session_checkpoints (
        session_id TEXT PRIMARY KEY,
        turn_index INTEGER NOT NULL,
        saved_at INTEGER NOT NULL,
        payload BLOB NOT NULL,
        encoding TEXT NOT NULL,
        size_bytes INTEGER NOT NULL
      )
    `);
  }

  private prepareStatements(): PreparedStatements {
    return {
      upsert: this.db.prepare<[string, number, number, Buffer, string, number]>(`
        INSERT INTO session_checkpoints (
          session_id,
          turn_index,
          saved_at,
          payload,
          encoding,
          size_bytes
        ) VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(session_id) DO UPDATE SET
          turn_index = excluded.turn_index,
          saved_at = excluded.saved_at,
          payload = excluded.payload,
          encoding = excluded.encoding,
          size_bytes = excluded.size_bytes
      `),
      getLatest: this.db.prepare<[string], CheckpointRow>(
        "SELECT * FROM session_checkpoints WHERE session_id = ?"
      ),
      remove: this.db.prepare<[string]>("DELETE FROM session_checkpoints WHERE session_id = ?"),
    };
  }
}

function encodeBlob(
  blob: string,
  compressionThreshold: number
): { payload: Buffer; encoding: string; sizeBytes: number } {
  const sizeBytes = Buffer.byteLength(blob);
  if (sizeBytes >= compressionThreshold) {
    return { payload: gzipSync(blob), encoding: "gzip", sizeBytes };
  }
  return { payload: Buffer.from(blob), encoding: "json", sizeBytes };
}

function decodeBlob(buffer: Buffer, encoding: string): string {
  return encoding === "gzip" ? gunzipSync(buffer).toString("utf8") : buffer.toString("utf8");
}
