/**
 * Database schemas. The seen-listing store and the run log live in separate
 * files so that logging a run never touches the seen store.
 */

export const SEEN_SCHEMA = `
-- Listings that have already gone out in a digest
CREATE TABLE IF NOT EXISTS seen_listings (
  key TEXT PRIMARY KEY,              -- identity key: '<source>:<externalId>' or '<source>:url:<sha256>'
  source TEXT NOT NULL,              -- 'craigslist', 'apartments', 'hotpads', 'zillow'
  url TEXT,
  title TEXT,
  firstSeenAt TEXT NOT NULL          -- ISO timestamp of the run that sent it
);

CREATE INDEX IF NOT EXISTS idx_seen_listings_source ON seen_listings(source);
`;

export const RUN_LOG_SCHEMA = `
-- One row per finished run
CREATE TABLE IF NOT EXISTS scrape_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,

  status TEXT NOT NULL,              -- 'ok', 'partial', 'skipped', 'error'
  dispatch TEXT NOT NULL,            -- 'not-needed', 'sent', 'failed', 'dry-run'
  novelCount INTEGER DEFAULT 0,
  failedSites TEXT,                  -- JSON array of site ids
  summary TEXT NOT NULL,             -- JSON of the full run summary

  startedAt TEXT NOT NULL,
  finishedAt TEXT NOT NULL
);
`;
