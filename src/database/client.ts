import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import { SEEN_SCHEMA } from './schema.js';

export interface SeenEntry {
  key: string;
  source: string;
  url: string | null;
  title: string | null;
  firstSeenAt: string;
}

export interface OpenOptions {
  /** Open an existing file without creating, migrating or writing to it */
  readonly?: boolean;
}

/**
 * Open (and create when needed) a SQLite file in WAL mode with `schema` applied.
 * Read-only handles skip both, so they never modify the file.
 */
export function openDatabase(dbPath: string, schema: string, options: OpenOptions = {}): Database.Database {
  if (options.readonly) {
    return new Database(dbPath, { readonly: true, fileMustExist: true });
  }
  if (dbPath !== ':memory:') {
    mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.exec(schema);
  return db;
}

export class DatabaseClient {
  private db: Database.Database;

  constructor(dbPath?: string, options: OpenOptions = {}) {
    this.db = openDatabase(dbPath || process.env.DATABASE_PATH || './data/seen.db', SEEN_SCHEMA, options);
  }

  getSeenEntries(): SeenEntry[] {
    return this.db.prepare(`
      SELECT key, source, url, title, firstSeenAt FROM seen_listings ORDER BY firstSeenAt, key
    `).all() as SeenEntry[];
  }

  /**
   * Insert seen entries in one transaction. Keys already present keep their
   * original firstSeenAt. Returns the number of rows actually inserted.
   */
  insertSeen(entries: SeenEntry[]): number {
    const stmt = this.db.prepare(`
      INSERT OR IGNORE INTO seen_listings (key, source, url, title, firstSeenAt)
      VALUES (@key, @source, @url, @title, @firstSeenAt)
    `);
    const insertAll = this.db.transaction((rows: SeenEntry[]) => {
      let inserted = 0;
      for (const row of rows) {
        inserted += stmt.run(row).changes;
      }
      return inserted;
    });
    return insertAll(entries);
  }

  countSeenBySource(): Record<string, number> {
    const bySource: Record<string, number> = {};
    const rows = this.db.prepare('SELECT source, COUNT(*) as count FROM seen_listings GROUP BY source').all() as Array<{ source: string; count: number }>;
    for (const row of rows) {
      bySource[row.source] = row.count;
    }
    return bySource;
  }

  close(): void {
    this.db.close();
  }
}
