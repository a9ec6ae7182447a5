import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { BenchError } from "../errors.js";
import { recordToRow, rowToRecord, tableColumns } from "../results/rows.js";
import { ResultTable } from "../results/table.js";
import type { RunRecord } from "../run/types.js";
import type { BatchMeta, ResultStore } from "./types.js";

interface BatchRow {
  label: string;
  created_at: string;
  updated_at: string;
}

/**
 * Result tables in SQLite, one batch per label. Each record is stored as its
 * flat result row, so what comes back is exactly what the CSV export would give.
 */
export class SqliteResultStore implements ResultStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS batches (
        label      TEXT PRIMARY KEY,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS records (
        label        TEXT NOT NULL REFERENCES batches(label) ON DELETE CASCADE,
        run_id       TEXT NOT NULL,
        position     INTEGER NOT NULL,
        dataset_id   TEXT NOT NULL,
        algorithm_id TEXT NOT NULL,
        status       TEXT NOT NULL,
        duration_ms  REAL NOT NULL,
        data         TEXT NOT NULL,
        PRIMARY KEY (label, run_id)
      );
      CREATE INDEX IF NOT EXISTS idx_records_label ON records(label, position);
      CREATE INDEX IF NOT EXISTS idx_batches_updated ON batches(updated_at);
    `);
  }

  saveRecord(label: string, record: RunRecord): void {
    const save = this.db.transaction(() => {
      this.touch(label);
      this.upsert(label, record);
    });
    save();
  }

  saveTable(label: string, table: ResultTable): BatchMeta {
    const save = this.db.transaction(() => {
      this.db.prepare("DELETE FROM records WHERE label = ?").run(label);
      this.touch(label);
      for (const record of table.records()) this.upsert(label, record);
    });
    save();

    const meta = this.listBatches().find((b) => b.label === label);
    if (!meta) throw new BenchError("StoreError", `Batch "${label}" was not saved`);
    return meta;
  }

  loadTable(label: string): ResultTable | null {
    const batch = this.db.prepare("SELECT label FROM batches WHERE label = ?").get(label);
    if (!batch) return null;

    const rows = this.db
      .prepare("SELECT data FROM records WHERE label = ? ORDER BY position")
      .all(label) as { data: string }[];

    const table = new ResultTable();
    for (const row of rows) table.set(rowToRecord(parseRow(row.data)));
    return table;
  }

  listBatches(limit = 50): BatchMeta[] {
    const batches = this.db
      .prepare("SELECT * FROM batches ORDER BY updated_at DESC, rowid DESC LIMIT ?")
      .all(limit) as BatchRow[];

    return batches.map((batch) => {
      const stats = this.db
        .prepare(
          `SELECT COUNT(*) AS total,
                  SUM(CASE WHEN status = 'Success' THEN 1 ELSE 0 END) AS succeeded,
                  SUM(CASE WHEN status = 'Failed' THEN 1 ELSE 0 END) AS failed,
                  SUM(duration_ms) AS duration
           FROM records WHERE label = ?`
        )
        .get(batch.label) as { total: number; succeeded: number | null; failed: number | null; duration: number | null };

      return {
        label: batch.label,
        createdAt: batch.created_at,
        updatedAt: batch.updated_at,
        recordCount: stats.total,
        succeededCount: stats.succeeded ?? 0,
        failedCount: stats.failed ?? 0,
        totalDuration: stats.duration ?? 0,
      };
    });
  }

  listLabels(): string[] {
    const rows = this.db
      .prepare("SELECT label FROM batches ORDER BY updated_at DESC, rowid DESC")
      .all() as { label: string }[];
    return rows.map((r) => r.label);
  }

  deleteBatch(label: string): boolean {
    this.db.prepare("DELETE FROM records WHERE label = ?").run(label);
    return this.db.prepare("DELETE FROM batches WHERE label = ?").run(label).changes > 0;
  }

  close(): void {
    this.db.close();
  }

  private touch(label: string): void {
    const now = new Date().toISOString();
    this.db
      .prepare(
        `INSERT INTO batches (label, created_at, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(label) DO UPDATE SET updated_at = excluded.updated_at`
      )
      .run(label, now, now);
  }

  private upsert(label: string, record: RunRecord): void {
    const row = recordToRow(record, tableColumns(new ResultTable([record])));
    const position = this.nextPosition(label, record.runId);
    this.db
      .prepare(
        `INSERT INTO records (label, run_id, position, dataset_id, algorithm_id, status, duration_ms, data)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(label, run_id) DO UPDATE SET
           status = excluded.status,
           duration_ms = excluded.duration_ms,
           data = excluded.data`
      )
      .run(
        label,
        record.runId,
        position,
        record.spec.datasetId,
        record.spec.algorithmId,
        record.status,
        record.durationMs,
        JSON.stringify(row)
      );
  }

  /** Existing records keep their position; new ones go after everything else in the batch. */
  private nextPosition(label: string, runId: string): number {
    const existing = this.db
      .prepare("SELECT position FROM records WHERE label = ? AND run_id = ?")
      .get(label, runId) as { position: number } | undefined;
    if (existing) return existing.position;
    const max = this.db
      .prepare("SELECT MAX(position) AS max FROM records WHERE label = ?")
      .get(label) as { max: number | null };
    return (max.max ?? -1) + 1;
  }
}

function parseRow(data: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(data);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new BenchError("StoreError", "Stored result row is not an object");
  }
  return Object.fromEntries(Object.entries(parsed));
}
