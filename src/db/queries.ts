/**
 * Database Queries and Operations
 */

import { getDatabase } from './index.js';
import { DuplicateKeyError } from '../utils/errors.js';
import {
  RUN_TRIGGERS,
  SYNC_STATUSES,
  type ApiUsage,
  type NewSyncRecord,
  type RunTrigger,
  type SyncRecord,
  type SyncRun,
  type SyncStatus,
} from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Sync Record Operations
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Check if a source URL has any sync record
 */
export function syncRecordExists(sourceUrl: string): boolean {
  const db = getDatabase();
  const stmt = db.prepare<[string], { found: number }>(
    'SELECT 1 AS found FROM sync_records WHERE source_url = ?'
  );
  return stmt.get(sourceUrl) !== undefined;
}

/**
 * Insert a new sync record
 *
 * The existence check and the insert share one transaction.
 */
export function insertSyncRecord(record: NewSyncRecord, recordedAt: Date = new Date()): SyncRecord {
  const db = getDatabase();
  const insert = db.prepare<[SyncRecordRow]>(`
    INSERT INTO sync_records (
      source_url, status, remote_post_id, remote_post_url, title, detail, run_id, recorded_at
    )
    VALUES (
      @source_url, @status, @remote_post_id, @remote_post_url, @title, @detail, @run_id, @recorded_at
    )
  `);

  const row: SyncRecordRow = {
    source_url: record.sourceUrl,
    status: record.status,
    remote_post_id: record.status === 'success' ? record.remotePostId ?? null : null,
    remote_post_url: record.status === 'success' ? record.remotePostUrl ?? null : null,
    title: record.title ?? null,
    detail: record.detail ?? null,
    run_id: record.runId ?? null,
    recorded_at: recordedAt.toISOString(),
  };

  const write = db.transaction((next: SyncRecordRow) => {
    if (syncRecordExists(next.source_url)) {
      throw new DuplicateKeyError(next.source_url);
    }
    insert.run(next);
  });
  write(row);

  return mapSyncRecordRow(row);
}

/**
 * Get the sync record for a source URL
 */
export function getSyncRecord(sourceUrl: string): SyncRecord | null {
  const db = getDatabase();
  const stmt = db.prepare<[string], SyncRecordRow>('SELECT * FROM sync_records WHERE source_url = ?');
  const row = stmt.get(sourceUrl);
  return row ? mapSyncRecordRow(row) : null;
}

export interface SyncRecordFilter {
  status?: SyncStatus;
  search?: string;
}

export interface Pagination {
  limit?: number;
  offset?: number;
}

/**
 * List sync records, most recent first
 */
export function listSyncRecords(
  filter: SyncRecordFilter = {},
  { limit = 50, offset = 0 }: Pagination = {}
): SyncRecord[] {
  const db = getDatabase();
  const stmt = db.prepare<[FilterParams], SyncRecordRow>(`
    SELECT * FROM sync_records
    WHERE (@status IS NULL OR status = @status)
    AND (@search IS NULL OR title LIKE @search OR source_url LIKE @search)
    ORDER BY recorded_at DESC, rowid DESC
    LIMIT @limit OFFSET @offset
  `);

  const rows = stmt.all({
    status: filter.status ?? null,
    search: filter.search ? `%${filter.search}%` : null,
    limit,
    offset,
  });
  return rows.map(mapSyncRecordRow);
}

/**
 * Count sync records, optionally by status
 */
export function countSyncRecords(status?: SyncStatus): number {
  const db = getDatabase();
  const stmt = db.prepare<[{ status: string | null }], { count: number }>(
    'SELECT COUNT(*) AS count FROM sync_records WHERE (@status IS NULL OR status = @status)'
  );
  return stmt.get({ status: status ?? null })?.count ?? 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Sync Run Operations
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Open a run row and return its id
 */
export function startSyncRun(trigger: RunTrigger, startedAt: Date): number {
  const db = getDatabase();
  const stmt = db.prepare<[string, string]>(`
    INSERT INTO sync_runs (run_trigger, status, started_at)
    VALUES (?, 'running', ?)
  `);
  const info = stmt.run(trigger, startedAt.toISOString());
  return Number(info.lastInsertRowid);
}

export interface SyncRunOutcome {
  status: 'completed' | 'failed';
  finishedAt: Date;
  candidatesSeen: number;
  syncedCount: number;
  skippedCount: number;
  errorCount: number;
  error?: string;
}

/**
 * Close a run row with its final counts
 */
export function finishSyncRun(id: number, outcome: SyncRunOutcome): void {
  const db = getDatabase();
  const stmt = db.prepare(`
    UPDATE sync_runs SET
      status = @status,
      finished_at = @finished_at,
      candidates_seen = @candidates_seen,
      synced_count = @synced_count,
      skipped_count = @skipped_count,
      error_count = @error_count,
      error = @error
    WHERE id = @id
  `);
  stmt.run({
    id,
    status: outcome.status,
    finished_at: outcome.finishedAt.toISOString(),
    candidates_seen: outcome.candidatesSeen,
    synced_count: outcome.syncedCount,
    skipped_count: outcome.skippedCount,
    error_count: outcome.errorCount,
    error: outcome.error ?? null,
  });
}

/**
 * List runs, most recent first
 */
export function listSyncRuns(limit: number = 10): SyncRun[] {
  const db = getDatabase();
  const stmt = db.prepare<[number], SyncRunRow>(
    'SELECT * FROM sync_runs ORDER BY started_at DESC, id DESC LIMIT ?'
  );
  return stmt.all(limit).map(mapSyncRunRow);
}

/**
 * Get the most recent run
 */
export function getLatestSyncRun(): SyncRun | null {
  return listSyncRuns(1)[0] ?? null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// API Usage
// ═══════════════════════════════════════════════════════════════════════════════

function monthKey(date: Date): string {
  return date.toISOString().slice(0, 7);
}

/**
 * Add requests to the current month's usage
 */
export function incrementApiUsage(count: number, requestsLimit: number, now: Date = new Date()): ApiUsage {
  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO api_usage (month, requests_used, requests_limit)
    VALUES (@month, @count, @limit)
    ON CONFLICT(month) DO UPDATE SET
      requests_used = requests_used + excluded.requests_used,
      requests_limit = excluded.requests_limit,
      updated_at = datetime('now')
  `);
  stmt.run({ month: monthKey(now), count, limit: requestsLimit });
  return getApiUsage(requestsLimit, now);
}

/**
 * Get usage for the month of `now`
 */
export function getApiUsage(requestsLimit: number, now: Date = new Date()): ApiUsage {
  const db = getDatabase();
  const month = monthKey(now);
  const stmt = db.prepare<[string], { requests_used: number; requests_limit: number }>(
    'SELECT requests_used, requests_limit FROM api_usage WHERE month = ?'
  );
  const row = stmt.get(month);
  const requestsUsed = row?.requests_used ?? 0;
  const limit = row?.requests_limit ?? requestsLimit;

  return {
    month,
    requestsUsed,
    requestsLimit: limit,
    requestsRemaining: Math.max(0, limit - requestsUsed),
  };
}

/** Requests always left unspent by a run */
export const QUOTA_RESERVE = 100;

/**
 * Whether `requestsNeeded` more requests fit in this month's quota
 */
export function hasQuotaFor(usage: ApiUsage, requestsNeeded: number, reserve: number = QUOTA_RESERVE): boolean {
  return usage.requestsRemaining > requestsNeeded + reserve;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Statistics
// ═══════════════════════════════════════════════════════════════════════════════

export interface DbStats {
  totalArticles: number;
  totalSyncs: number;
  failedCount: number;
  skippedCount: number;
  lastRunAt: Date | null;
}

/**
 * Get database statistics
 */
export function getStats(): DbStats {
  const latest = getLatestSyncRun();

  return {
    totalArticles: countSyncRecords(),
    totalSyncs: countSyncRecords('success'),
    failedCount: countSyncRecords('failed'),
    skippedCount: countSyncRecords('skipped'),
    lastRunAt: latest?.startedAt ?? null,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helper Functions
// ═══════════════════════════════════════════════════════════════════════════════

interface SyncRecordRow {
  source_url: string;
  status: string;
  remote_post_id: string | null;
  remote_post_url: string | null;
  title: string | null;
  detail: string | null;
  run_id: number | null;
  recorded_at: string;
}

interface SyncRunRow {
  id: number;
  run_trigger: string;
  status: string;
  started_at: string;
  finished_at: string | null;
  candidates_seen: number;
  synced_count: number;
  skipped_count: number;
  error_count: number;
  error: string | null;
}

interface FilterParams {
  status: string | null;
  search: string | null;
  limit: number;
  offset: number;
}

function toSyncStatus(value: string): SyncStatus {
  const status = SYNC_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown sync status in database: ${value}`);
  }
  return status;
}

function toRunTrigger(value: string): RunTrigger {
  const trigger = RUN_TRIGGERS.find((candidate) => candidate === value);
  if (!trigger) {
    throw new Error(`Unknown run trigger in database: ${value}`);
  }
  return trigger;
}

function toRunStatus(value: string): SyncRun['status'] {
  switch (value) {
    case 'running':
    case 'completed':
    case 'failed':
      return value;
    default:
      throw new Error(`Unknown run status in database: ${value}`);
  }
}

// Mappers
function mapSyncRecordRow(row: SyncRecordRow): SyncRecord {
  return {
    sourceUrl: row.source_url,
    status: toSyncStatus(row.status),
    remotePostId: row.remote_post_id ?? undefined,
    remotePostUrl: row.remote_post_url ?? undefined,
    title: row.title ?? undefined,
    detail: row.detail ?? undefined,
    runId: row.run_id ?? undefined,
    recordedAt: new Date(row.recorded_at),
  };
}

function mapSyncRunRow(row: SyncRunRow): SyncRun {
  return {
    id: row.id,
    trigger: toRunTrigger(row.run_trigger),
    status: toRunStatus(row.status),
    startedAt: new Date(row.started_at),
    finishedAt: row.finished_at ? new Date(row.finished_at) : null,
    candidatesSeen: row.candidates_seen,
    syncedCount: row.synced_count,
    skippedCount: row.skipped_count,
    errorCount: row.error_count,
    error: row.error ?? undefined,
  };
}
