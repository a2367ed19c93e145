/**
 * Sync Ledger
 *
 * Deduplication authority: one immutable record per source URL. The pipeline
 * depends on these interfaces; the SQLite-backed implementations below are the
 * only writers of sync_records and sync_runs.
 */

import {
  countSyncRecords,
  finishSyncRun,
  getLatestSyncRun,
  getSyncRecord,
  insertSyncRecord,
  listSyncRecords,
  listSyncRuns,
  startSyncRun,
  syncRecordExists,
  type Pagination,
  type SyncRecordFilter,
  type SyncRunOutcome,
} from './queries.js';
import type { NewSyncRecord, RunTrigger, SyncRecord, SyncRun, SyncStatus } from '../types/index.js';

export interface SyncLedger {
  hasSeen(sourceUrl: string): boolean;
  /** @throws DuplicateKeyError when the URL already has a record */
  record(record: NewSyncRecord): SyncRecord;
  get(sourceUrl: string): SyncRecord | null;
  list(filter?: SyncRecordFilter, pagination?: Pagination): SyncRecord[];
  count(status?: SyncStatus): number;
}

export interface RunLog {
  start(trigger: RunTrigger, startedAt: Date): number;
  finish(id: number, outcome: SyncRunOutcome): void;
  list(limit?: number): SyncRun[];
  latest(): SyncRun | null;
}

export const sqliteLedger: SyncLedger = {
  hasSeen: syncRecordExists,
  record: (record) => insertSyncRecord(record),
  get: getSyncRecord,
  list: listSyncRecords,
  count: countSyncRecords,
};

export const sqliteRunLog: RunLog = {
  start: startSyncRun,
  finish: finishSyncRun,
  list: listSyncRuns,
  latest: getLatestSyncRun,
};

export type { SyncRecordFilter, Pagination, SyncRunOutcome };
