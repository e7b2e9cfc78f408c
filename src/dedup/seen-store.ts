import { existsSync, renameSync } from 'fs';
import { DatabaseClient, type SeenEntry } from '../database/index.js';
import { identityKey } from '../listings/identity.js';
import type { ListingRecord } from '../listings/types.js';

export interface Partition {
  novel: ListingRecord[];
  alreadySeen: ListingRecord[];
}

export interface StoreAnomaly {
  reason: string;
  /** Where the unreadable file was moved, if it existed */
  movedTo: string | null;
}

export interface LoadReport {
  size: number;
  anomaly: StoreAnomaly | null;
}

export interface StoreInspection extends LoadReport {
  bySource: Record<string, number>;
}

export interface DedupStore {
  load(): LoadReport;
  partition(candidates: readonly ListingRecord[]): Partition;
  commit(novel: readonly ListingRecord[], at?: Date): void;
  save(): void;
}

/**
 * SeenSet backed by SQLite. Keys are read into memory on load, novel keys are
 * staged by commit and written in a single transaction by save.
 */
export class SeenStore implements DedupStore {
  private db: DatabaseClient | null = null;
  private seen = new Map<string, string>();
  private pending: SeenEntry[] = [];

  constructor(private readonly dbPath: string) {}

  get size(): number {
    return this.seen.size;
  }

  has(key: string): boolean {
    return this.seen.has(key);
  }

  load(): LoadReport {
    this.pending = [];
    try {
      this.db ??= new DatabaseClient(this.dbPath);
      this.seen = new Map(this.db.getSeenEntries().map((e) => [e.key, e.firstSeenAt]));
      return { size: this.seen.size, anomaly: null };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`[seen-store] could not read ${this.dbPath} (${reason}); starting with an empty store`);
      this.seen = new Map();
      let movedTo: string | null = null;
      try {
        movedTo = this.quarantine();
      } catch (moveError) {
        console.error(`[seen-store] could not move ${this.dbPath} aside:`, moveError);
      }
      try {
        this.db = new DatabaseClient(this.dbPath);
      } catch (reopenError) {
        console.error(`[seen-store] could not recreate ${this.dbPath}:`, reopenError);
      }
      return { size: 0, anomaly: { reason, movedTo } };
    }
  }

  /**
   * Read the store without creating, repairing or moving it. An unreadable
   * file is reported as an anomaly and left where it is.
   */
  inspect(): StoreInspection {
    if (this.dbPath !== ':memory:' && !existsSync(this.dbPath)) {
      return { size: 0, anomaly: null, bySource: {} };
    }
    let db: DatabaseClient | null = null;
    try {
      db = new DatabaseClient(this.dbPath, { readonly: true });
      const entries = db.getSeenEntries();
      return { size: entries.length, anomaly: null, bySource: db.countSeenBySource() };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { size: 0, anomaly: { reason, movedTo: null }, bySource: {} };
    } finally {
      db?.close();
    }
  }

  partition(candidates: readonly ListingRecord[]): Partition {
    const novel: ListingRecord[] = [];
    const alreadySeen: ListingRecord[] = [];
    const novelKeys = new Set<string>();

    for (const listing of candidates) {
      const key = identityKey(listing);
      if (this.seen.has(key) || novelKeys.has(key)) {
        alreadySeen.push(listing);
      } else {
        novelKeys.add(key);
        novel.push(listing);
      }
    }
    return { novel, alreadySeen };
  }

  commit(novel: readonly ListingRecord[], at: Date = new Date()): void {
    const firstSeenAt = at.toISOString();
    for (const listing of novel) {
      const key = identityKey(listing);
      if (this.seen.has(key)) continue;
      this.seen.set(key, firstSeenAt);
      this.pending.push({ key, source: listing.source, url: listing.url, title: listing.title, firstSeenAt });
    }
  }

  save(): void {
    if (this.pending.length === 0) return;
    const db = this.requireDb();
    const inserted = db.insertSeen(this.pending);
    this.pending = [];
    console.log(`[seen-store] saved ${inserted} new keys (${this.seen.size} total)`);
  }

  countBySource(): Record<string, number> {
    return this.requireDb().countSeenBySource();
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  private requireDb(): DatabaseClient {
    if (!this.db) {
      throw new Error(`Seen store ${this.dbPath} is not open; call load() first`);
    }
    return this.db;
  }

  private quarantine(): string | null {
    if (this.db) {
      try {
        this.db.close();
      } catch (closeError) {
        console.warn('[seen-store] closing unreadable database failed:', closeError);
      }
      this.db = null;
    }
    if (this.dbPath === ':memory:' || !existsSync(this.dbPath)) return null;

    const movedTo = `${this.dbPath}.corrupt-${new Date().toISOString().replace(/[:.]/g, '-')}`;
    renameSync(this.dbPath, movedTo);
    for (const suffix of ['-wal', '-shm']) {
      if (existsSync(this.dbPath + suffix)) renameSync(this.dbPath + suffix, movedTo + suffix);
    }
    console.warn(`[seen-store] moved unreadable store to ${movedTo}`);
    return movedTo;
  }
}
