/**
 * SQLite Database Schema
 */

export const SCHEMA = `
-- ═══════════════════════════════════════════════════════════════════════════════
-- Sync Records Table
-- One immutable row per source URL ever attempted
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS sync_records (
  source_url TEXT PRIMARY KEY,
  status TEXT NOT NULL CHECK (status IN ('success', 'failed', 'skipped')),
  remote_post_id TEXT,
  remote_post_url TEXT,
  title TEXT,
  detail TEXT,
  run_id INTEGER,
  recorded_at TEXT NOT NULL,
  CHECK (status = 'success' OR remote_post_id IS NULL),
  FOREIGN KEY (run_id) REFERENCES sync_runs(id)
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Sync Runs Table
-- Summary of each pipeline execution
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS sync_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_trigger TEXT NOT NULL CHECK (run_trigger IN ('scheduled', 'manual', 'cli')),
  status TEXT NOT NULL CHECK (status IN ('running', 'completed', 'failed')),
  started_at TEXT NOT NULL,
  finished_at TEXT,
  candidates_seen INTEGER NOT NULL DEFAULT 0,
  synced_count INTEGER NOT NULL DEFAULT 0,
  skipped_count INTEGER NOT NULL DEFAULT 0,
  error_count INTEGER NOT NULL DEFAULT 0,
  error TEXT
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- API Usage Table
-- Medium API requests per calendar month (YYYY-MM)
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS api_usage (
  month TEXT PRIMARY KEY,
  requests_used INTEGER NOT NULL DEFAULT 0,
  requests_limit INTEGER NOT NULL,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Indexes
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE INDEX IF NOT EXISTS idx_sync_records_recorded_at ON sync_records(recorded_at DESC);
CREATE INDEX IF NOT EXISTS idx_sync_records_status ON sync_records(status);
CREATE INDEX IF NOT EXISTS idx_sync_runs_started_at ON sync_runs(started_at DESC);
`;

export const MIGRATIONS: string[] = [];
