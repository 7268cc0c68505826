/**
 * Database - SQLite ledger of finished tool executions
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import type { ExecutionResult, ExecutionStage } from "../types/execution.js";

export interface RunRecord {
  id: number;
  tool: string;
  topEntity?: string;
  stage: ExecutionStage;
  success: boolean;
  outputPath?: string;
  elapsedMs: number;
  errorKind?: string;
  errorCount: number;
  warningCount: number;
  createdAt: Date;
}

const runRowSchema = z.object({
  id: z.number().int(),
  tool: z.string(),
  top_entity: z.string().nullable(),
  stage: z.enum(["completed", "tool_failed", "timeout", "start_failed", "bridge_failed", "invalid_input"]),
  success: z.number().int(),
  output_path: z.string().nullable(),
  elapsed_ms: z.number().int(),
  error_kind: z.string().nullable(),
  error_count: z.number().int(),
  warning_count: z.number().int(),
  created_at: z.string(),
});

type RunRow = z.infer<typeof runRowSchema>;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    tool TEXT NOT NULL,
    top_entity TEXT,
    stage TEXT NOT NULL,
    success INTEGER NOT NULL,
    output_path TEXT,
    elapsed_ms INTEGER NOT NULL,
    error_kind TEXT,
    error_count INTEGER NOT NULL DEFAULT 0,
    warning_count INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_runs_created_at ON runs(created_at);
`;

/**
 * Run store. Opens lazily; pass ":memory:" for a throwaway database.
 */
class RunStore {
  private db: Database.Database | null = null;

  constructor(private readonly dbPath: string) {}

  /**
   * Get database instance, creating if needed
   */
  getDb(): Database.Database {
    if (!this.db) {
      if (this.dbPath !== ":memory:") {
        mkdirSync(dirname(this.dbPath), { recursive: true });
      }
      const db = new Database(this.dbPath);
      db.pragma("journal_mode = WAL");
      db.exec(SCHEMA);
      this.db = db;
    }
    return this.db;
  }

  /**
   * Close database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Record one finished execution and return its row id
   */
  record(tool: string, result: ExecutionResult, topEntity?: string): number {
    const db = this.getDb();
    const info = db
      .prepare(
        `INSERT INTO runs (tool, top_entity, stage, success, output_path, elapsed_ms, error_kind, error_count, warning_count, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        tool,
        topEntity ?? null,
        result.stage,
        result.success ? 1 : 0,
        result.outputPath ?? null,
        Math.round(result.elapsedMs),
        result.output.errorKind ?? result.failureKind ?? null,
        result.output.errors.length,
        result.output.warnings.length,
        new Date().toISOString()
      );
    return Number(info.lastInsertRowid);
  }

  /**
   * Most recent runs first
   */
  listRuns(limit = 20): RunRecord[] {
    const rows = this.getDb().prepare("SELECT * FROM runs ORDER BY id DESC LIMIT ?").all(limit);
    return rows.map((row) => this.rowToRun(runRowSchema.parse(row)));
  }

  getRun(id: number): RunRecord | null {
    const row = this.getDb().prepare("SELECT * FROM runs WHERE id = ?").get(id);
    if (row === undefined) return null;
    return this.rowToRun(runRowSchema.parse(row));
  }

  private rowToRun(row: RunRow): RunRecord {
    return {
      id: row.id,
      tool: row.tool,
      topEntity: row.top_entity ?? undefined,
      stage: row.stage,
      success: row.success === 1,
      outputPath: row.output_path ?? undefined,
      elapsedMs: row.elapsed_ms,
      errorKind: row.error_kind ?? undefined,
      errorCount: row.error_count,
      warningCount: row.warning_count,
      createdAt: new Date(row.created_at),
    };
  }
}

export { RunStore };
