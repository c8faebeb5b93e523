import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { ExecutionStats } from './concurrency-controller';

export type ExecutionOutcome = 'completed' | 'failed' | 'requeued';

interface StatsRow {
  observed: number;
  completed: number | null;
  stalled: number | null;
}

const HOUR = 60 * 60 * 1000;

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS executions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      work_id TEXT NOT NULL,
      started_at INTEGER NOT NULL,
      finished_at INTEGER,
      outcome TEXT,
      reason TEXT,
      stalled_at INTEGER,
      overnight INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_executions_work ON executions(work_id);
    CREATE INDEX IF NOT EXISTS idx_executions_started ON executions(started_at);
    CREATE INDEX IF NOT EXISTS idx_executions_finished ON executions(finished_at);
  `);
}

/**
 * Append-only log of execution attempts. Feeds the trailing completion and
 * stall rates the concurrency controller works from; the ledger stays the
 * source of truth for item state.
 */
export class MetricsLog {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    initSchema(this.db);
  }

  recordStart(workId: string, startedAt: number, overnight: boolean): void {
    this.db
      .prepare<[string, number, number]>('INSERT INTO executions (work_id, started_at, overnight) VALUES (?, ?, ?)')
      .run(workId, startedAt, overnight ? 1 : 0);
  }

  recordFinish(workId: string, finishedAt: number, outcome: ExecutionOutcome, reason?: string): void {
    this.db
      .prepare<[number, string, string | null, string]>(`
        UPDATE executions
        SET finished_at = ?, outcome = ?, reason = ?
        WHERE work_id = ? AND finished_at IS NULL
      `)
      .run(finishedAt, outcome, reason ?? null, workId);
  }

  /** Flags the open execution of a work item as stalled; returns false if it already was. */
  markStalled(workId: string, at: number): boolean {
    const result = this.db
      .prepare<[number, string]>(`
        UPDATE executions
        SET stalled_at = ?
        WHERE work_id = ? AND finished_at IS NULL AND stalled_at IS NULL
      `)
      .run(at, workId);
    return result.changes > 0;
  }

  windowStats(now: number, windowHours: number): ExecutionStats {
    const since = now - windowHours * HOUR;
    const row = this.db
      .prepare<[number, number, number, number], StatsRow>(`
        SELECT
          COUNT(*) AS observed,
          SUM(CASE WHEN outcome = 'completed' AND finished_at >= ? THEN 1 ELSE 0 END) AS completed,
          SUM(CASE WHEN stalled_at >= ? THEN 1 ELSE 0 END) AS stalled
        FROM executions
        WHERE started_at >= ? OR finished_at IS NULL OR finished_at >= ?
      `)
      .get(since, since, since, since);

    return {
      observed: row?.observed ?? 0,
      completed: row?.completed ?? 0,
      stalled: row?.stalled ?? 0,
      windowHours,
    };
  }

  close(): void {
    this.db.close();
  }
}
