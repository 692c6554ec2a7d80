/**
 * Decision Logs
 *
 * Append-only audit trail of every security decision. The in-memory log
 * serves tests and short-lived runs; the SQLite log survives restarts.
 */

import {
  type DecisionLog,
  type DecisionLogEntry,
  type DecisionLogFilter,
  type DecisionOutcome,
  parseSecurityTier,
} from "@warden/agent-runtime-core";
import type { Database as DatabaseInstance } from "better-sqlite3";
import Database from "better-sqlite3";

function matchesFilter(entry: DecisionLogEntry, filter: DecisionLogFilter): boolean {
  if (filter.sessionId && entry.sessionId !== filter.sessionId) {
    return false;
  }
  if (filter.toolName && entry.toolName !== filter.toolName) {
    return false;
  }
  if (filter.outcome && entry.outcome !== filter.outcome) {
    return false;
  }
  return true;
}

export class InMemoryDecisionLog implements DecisionLog {
  private readonly entries: DecisionLogEntry[] = [];

  async record(entry: DecisionLogEntry): Promise<void> {
    this.entries.push({ ...entry });
  }

  async list(filter: DecisionLogFilter = {}): Promise<DecisionLogEntry[]> {
    const matching = this.entries.filter((entry) => matchesFilter(entry, filter));
    const limited = filter.limit ? matching.slice(-filter.limit) : matching;
    return limited.map((entry) => ({ ...entry }));
  }
}

// ============================================================================
// SQLite
// ============================================================================

export interface SQLiteDecisionLogConfig {
  databasePath?: string;
  database?: DatabaseInstance;
}

interface DecisionRow {
  id: number;
  session_id: string;
  call_id: string;
  tool_name: string;
  outcome: string;
  base_tier: string;
  effective_tier: string;
  matched_pattern: string | null;
  reason: string;
  is_sub_agent: number;
  timestamp: number;
}

type InsertParams = [
  string,
  string,
  string,
  string,
  string,
  string,
  string | null,
  string,
  number,
  number,
];

export class SQLiteDecisionLog implements DecisionLog {
  private readonly db: DatabaseInstance;
  private readonly insert: Database.Statement<InsertParams>;

  constructor(config: SQLiteDecisionLogConfig) {
    this.db = config.database ?? this.createDatabase(config.databasePath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS decision_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        call_id TEXT NOT NULL,
        tool_name TEXT NOT NULL,
        outcome TEXT NOT NULL,
        base_tier TEXT NOT NULL,
        effective_tier TEXT NOT NULL,
        matched_pattern TEXT,
        reason TEXT NOT NULL,
        is_sub_agent INTEGER NOT NULL DEFAULT 0,
        timestamp INTEGER NOT NULL
      )
    `);
    this.db.exec("CREATE INDEX IF NOT EXISTS idx_decision_log_session ON decision_log(session_id)");
    this.insert = this.db.prepare<InsertParams>(`
      INSERT INTO decision_log (
        session_id,
        call_id,
        tool_name,
        outcome,
        base_tier,
        effective_tier,
        matched_pattern,
        reason,
        is_sub_agent,
        timestamp
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  async record(entry: DecisionLogEntry): Promise<void> {
    this.insert.run(
      entry.sessionId,
      entry.callId,
      entry.toolName,
      entry.outcome,
      entry.baseTier,
      entry.effectiveTier,
      entry.matchedPattern ?? null,
      entry.reason,
      entry.isSubAgent ? 1 : 0,
      entry.timestamp
    );
  }

  async list(filter: DecisionLogFilter = {}): Promise<DecisionLogEntry[]> {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (filter.sessionId) {
      clauses.push("session_id = ?");
      params.push(filter.sessionId);
    }
    if (filter.toolName) {
      clauses.push("tool_name = ?");
      params.push(filter.toolName);
    }
    if (filter.outcome) {
      clauses.push("outcome = ?");
      params.push(filter.outcome);
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(" AND ")}` : "";
    let sql = `SELECT * FROM decision_log${where} ORDER BY id DESC`;
    if (filter.limit) {
      sql += " LIMIT ?";
      params.push(filter.limit);
    }

    const rows = this.db.prepare<Array<string | number>, DecisionRow>(sql).all(...params);
    return rows.reverse().map(mapRow);
  }

  close(): void {
    this.db.close();
  }

  private createDatabase(path?: string): DatabaseInstance {
    if (!path) {
      throw new Error("SQLiteDecisionLog requires databasePath or database instance");
    }
    const db = new Database(path);
    db.pragma("journal_mode = WAL");
    return db;
  }
}

function parseOutcome(value: string): DecisionOutcome {
  return value === "allow" || value === "needs_approval" ? value : "deny";
}

function mapRow(row: DecisionRow): DecisionLogEntry {
  return {
    sessionId: row.session_id,
    callId: row.call_id,
    toolName: row.tool_name,
    outcome: parseOutcome(row.outcome),
    baseTier: parseSecurityTier(row.base_tier) ?? "T4",
    effectiveTier: parseSecurityTier(row.effective_tier) ?? "T4",
    matchedPattern: row.matched_pattern ?? undefined,
    reason: row.reason,
    isSubAgent: row.is_sub_agent === 1,
    timestamp: row.timestamp,
  };
}
