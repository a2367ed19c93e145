/**
 * Core types for the Medium → WordPress sync
 */

export type BodyFormat = 'markdown' | 'html';

export interface ArticleCandidate {
  sourceUrl: string;
  sourceId: string;
  title: string;
  subtitle: string;
  author: string;
  rawBody: string;
  bodyFormat: BodyFormat;
  publishedAt: Date | null;
  tags: string[];
  language: string;
}

export const SYNC_STATUSES = ['success', 'failed', 'skipped'] as const;
export type SyncStatus = (typeof SYNC_STATUSES)[number];

export interface SyncRecord {
  sourceUrl: string;
  status: SyncStatus;
  remotePostId?: string;
  remotePostUrl?: string;
  title?: string;
  detail?: string;
  runId?: number;
  recordedAt: Date;
}

export type NewSyncRecord = Omit<SyncRecord, 'recordedAt'>;

export const RUN_TRIGGERS = ['scheduled', 'manual', 'cli'] as const;
export type RunTrigger = (typeof RUN_TRIGGERS)[number];

export interface SyncRun {
  id: number;
  trigger: RunTrigger;
  status: 'running' | 'completed' | 'failed';
  startedAt: Date;
  finishedAt: Date | null;
  candidatesSeen: number;
  syncedCount: number;
  skippedCount: number;
  errorCount: number;
  error?: string;
}

export interface RunResult {
  status: 'completed' | 'failed' | 'rejected';
  runId?: number;
  trigger: RunTrigger;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  candidatesSeen: number;
  synced: number;
  skipped: number;
  failed: number;
  error?: string;
}

export type PostStatus = 'draft' | 'publish' | 'pending';
export type LanguagePreference = 'en' | 'pt' | 'both';

/**
 * Immutable settings snapshot consumed by one pipeline run
 */
export interface SyncConfig {
  readonly keywords: readonly string[];
  readonly maxArticles: number;
  readonly recentDays: number;
  readonly languagePreference: LanguagePreference;
  readonly translate: boolean;
  readonly targetLanguage: string;
  readonly postStatus: PostStatus;
  readonly category: string;
  readonly addAuthorCredit: boolean;
  readonly addSourceLink: boolean;
}

export interface ApiUsage {
  month: string;
  requestsUsed: number;
  requestsLimit: number;
  requestsRemaining: number;
}
