import type Database from 'better-sqlite3';
import { openDatabase } from './client.js';
import { RUN_LOG_SCHEMA } from './schema.js';

export interface NewRunLogEntry {
  status: string;
  dispatch: string;
  novelCount: number;
  failedSites: string[];
  summary: unknown;
  startedAt: string;
  finishedAt: string;
}

export interface RunLogEntry extends NewRunLogEntry {
  id: number;
}

export interface RunHistory {
  recordRun(entry: NewRunLogEntry): void;
}

/**
 * Operational log of finished runs, kept in its own SQLite file.
 * Opened lazily on first use.
 */
export class RunLog implements RunHistory {
  private db: Database.Database | null = null;

  constructor(private readonly dbPath: string) {}

  /**
   * Record a finished run
   */
  recordRun(entry: NewRunLogEntry): number {
    const result = this.open().prepare(`
      INSERT INTO scrape_runs (status, dispatch, novelCount, failedSites, summary, startedAt, finishedAt)
      VALUES (?, ?, ?, ?, ?, ?, ?) RETURNING id
    `).get(
      entry.status,
      entry.dispatch,
      entry.novelCount,
      JSON.stringify(entry.failedSites),
      JSON.stringify(entry.summary),
      entry.startedAt,
      entry.finishedAt
    ) as { id: number };
    return result.id;
  }

  getRecentRuns(limit = 10): RunLogEntry[] {
    const rows = this.open().prepare(`
      SELECT * FROM scrape_runs ORDER BY id DESC LIMIT ?
    `).all(limit) as Array<Record<string, unknown>>;
    return rows.map((row) => this.rowToRun(row));
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  private open(): Database.Database {
    this.db ??= openDatabase(this.dbPath, RUN_LOG_SCHEMA);
    return this.db;
  }

  private rowToRun(row: Record<string, unknown>): RunLogEntry {
    return {
      id: Number(row.id),
      status: String(row.status),
      dispatch: String(row.dispatch),
      novelCount: Number(row.novelCount),
      failedSites: row.failedSites ? JSON.parse(String(row.failedSites)) as string[] : [],
      summary: JSON.parse(String(row.summary)),
      startedAt: String(row.startedAt),
      finishedAt: String(row.finishedAt),
    };
  }
}
