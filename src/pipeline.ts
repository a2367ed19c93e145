/**
 * Sync Pipeline
 *
 * Orchestrates one sync run:
 * 1. Search Medium for candidates
 * 2. Skip anything the ledger has already seen
 * 3. Screen out blocked, off-topic and wrong-language articles
 * 4. Translate (optional)
 * 5. Publish to WordPress
 * 6. Record the outcome in the ledger
 *
 * Candidates are processed one at a time, in source order. One article's
 * failure is recorded and the run moves on; only a source failure (or a
 * ledger invariant violation) fails the whole run.
 */

import { z } from 'zod';
import { screenCandidate } from './filter/index.js';
import { normalizePostTags } from './config/tags.js';
import { hasQuotaFor } from './db/queries.js';
import { logger } from './utils/logger.js';
import {
  InvalidCandidateError,
  QuotaExhaustedError,
  SettingsError,
  describeError,
} from './utils/errors.js';
import type { SourceClient } from './source/index.js';
import type { ContentTransformer } from './transformer/index.js';
import type { PublishClient } from './publisher/index.js';
import type { RunLog, SyncLedger } from './db/ledger.js';
import type {
  ApiUsage,
  ArticleCandidate,
  RunResult,
  RunTrigger,
  SyncConfig,
  SyncRecord,
} from './types/index.js';

/** Candidates requested per article slot, so already-seen results do not starve a run */
export const CANDIDATE_OVERFETCH = 3;

/** Article info plus body: the least a search pays per candidate */
const REQUESTS_PER_CANDIDATE = 2;

/**
 * Source API requests one run is expected to spend
 */
export function estimateRequests(config: Pick<SyncConfig, 'keywords' | 'maxArticles'>): number {
  return config.keywords.length + config.maxArticles * REQUESTS_PER_CANDIDATE;
}

const syncConfigSchema = z.object({
  keywords: z.array(z.string().trim().min(1)).min(1),
  maxArticles: z.number().int().positive(),
  recentDays: z.number().int().positive(),
  languagePreference: z.enum(['en', 'pt', 'both']),
  translate: z.boolean(),
  targetLanguage: z.string().min(1),
  postStatus: z.enum(['draft', 'publish', 'pending']),
  category: z.string().trim().min(1),
  addAuthorCredit: z.boolean(),
  addSourceLink: z.boolean(),
});

export interface PipelineDeps {
  source: SourceClient;
  /** null when translation is not configured */
  transformer: ContentTransformer | null;
  publisher: PublishClient;
  ledger: SyncLedger;
  runLog: RunLog;
  /** Current month's source API usage; runs are refused when the quota is too low */
  usage?: () => ApiUsage;
  now?: () => Date;
}

export interface PipelineStatus {
  running: boolean;
  lastResult: RunResult | null;
}

export type SyncOneOutcome = 'synced' | 'failed' | 'skipped' | 'duplicate' | 'rejected';

export interface SyncOneResult {
  outcome: SyncOneOutcome;
  record?: SyncRecord;
  error?: string;
}

interface RunCounts {
  candidatesSeen: number;
  synced: number;
  skipped: number;
  failed: number;
}

const ALREADY_RUNNING = 'Sync already running';

function validateConfig(config: SyncConfig): SyncConfig {
  const parsed = syncConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new SettingsError(
      'Invalid sync configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export class SyncPipeline {
  private running = false;
  private lastResult: RunResult | null = null;
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  getStatus(): PipelineStatus {
    return { running: this.running, lastResult: this.lastResult };
  }

  /**
   * Run the full sync once; rejected while another run or single sync is active
   */
  async run(config: SyncConfig, trigger: RunTrigger = 'manual'): Promise<RunResult> {
    const startedAt = this.now();

    if (this.running) {
      logger.warn({ trigger }, 'Sync already running, rejecting trigger');
      return {
        status: 'rejected',
        trigger,
        startedAt,
        finishedAt: startedAt,
        durationMs: 0,
        candidatesSeen: 0,
        synced: 0,
        skipped: 0,
        failed: 0,
        error: ALREADY_RUNNING,
      };
    }

    this.running = true;
    try {
      const result = await this.execute(config, trigger, startedAt);
      this.lastResult = result;
      return result;
    } finally {
      this.running = false;
    }
  }

  /**
   * Sync a single article by URL, bypassing search and relevance screening
   */
  async syncOne(url: string, config: SyncConfig): Promise<SyncOneResult> {
    if (this.running) {
      logger.warn({ url }, 'Sync already running, rejecting single-article sync');
      return { outcome: 'rejected', error: ALREADY_RUNNING };
    }

    this.running = true;
    try {
      return await this.executeOne(url, config);
    } finally {
      this.running = false;
    }
  }

  private async execute(config: SyncConfig, trigger: RunTrigger, startedAt: Date): Promise<RunResult> {
    const { ledger, runLog, source } = this.deps;
    const runId = runLog.start(trigger, startedAt);
    const counts: RunCounts = { candidatesSeen: 0, synced: 0, skipped: 0, failed: 0 };

    logger.info({ runId, trigger }, 'Starting sync run');

    try {
      const settings = validateConfig(config);
      this.checkQuota(estimateRequests(settings));

      const candidates = await source.search({
        keywords: settings.keywords,
        recentDays: settings.recentDays,
        limit: settings.maxArticles * CANDIDATE_OVERFETCH,
      });
      counts.candidatesSeen = candidates.length;

      let attempted = 0;
      for (const candidate of candidates) {
        if (attempted >= settings.maxArticles) {
          break;
        }

        const sourceUrl = candidate.sourceUrl.trim();
        if (!sourceUrl) {
          const error = new InvalidCandidateError(`Candidate ${candidate.sourceId || '(no id)'} has no URL`);
          logger.warn({ runId, sourceId: candidate.sourceId, title: candidate.title, error }, 'Skipping invalid candidate');
          counts.skipped++;
          continue;
        }

        if (ledger.hasSeen(sourceUrl)) {
          logger.info({ runId, url: sourceUrl }, 'Already synced, skipping');
          counts.skipped++;
          continue;
        }

        const screening = screenCandidate(candidate, settings);
        if (!screening.accepted) {
          // Language and relevance depend on the settings, so only blocked content is remembered
          if (screening.rule === 'blocked') {
            ledger.record({
              sourceUrl,
              status: 'skipped',
              title: candidate.title,
              detail: `filter: ${screening.reason ?? 'rejected'}`,
              runId,
            });
          }
          logger.info({ runId, url: sourceUrl, rule: screening.rule, reason: screening.reason }, 'Candidate filtered out');
          counts.skipped++;
          continue;
        }

        attempted++;
        const record = await this.processCandidate({ ...candidate, sourceUrl }, settings, runId);
        if (record.status === 'success') {
          counts.synced++;
        } else {
          counts.failed++;
        }
      }

      return this.finishRun(runId, trigger, startedAt, counts);
    } catch (error) {
      logger.error({ runId, error }, 'Sync run failed');
      return this.finishRun(runId, trigger, startedAt, counts, describeError(error));
    }
  }

  private async executeOne(url: string, config: SyncConfig): Promise<SyncOneResult> {
    const { ledger, source } = this.deps;

    let settings: SyncConfig;
    try {
      settings = validateConfig(config);
      this.checkQuota(REQUESTS_PER_CANDIDATE);
    } catch (error) {
      return { outcome: 'failed', error: describeError(error) };
    }

    const requestedUrl = url.trim();
    if (!requestedUrl) {
      return { outcome: 'skipped', error: 'URL is required' };
    }

    const existing = ledger.get(requestedUrl);
    if (existing) {
      logger.info({ url: requestedUrl, status: existing.status }, 'Article already in ledger');
      return { outcome: 'duplicate', record: existing };
    }

    let candidate: ArticleCandidate;
    try {
      candidate = await source.fetchArticle(requestedUrl);
    } catch (error) {
      logger.warn({ url: requestedUrl, stage: 'fetch', error }, 'Could not fetch article');
      return {
        outcome: error instanceof InvalidCandidateError ? 'skipped' : 'failed',
        error: describeError(error),
      };
    }

    const sourceUrl = candidate.sourceUrl.trim() || requestedUrl;
    const canonical = sourceUrl === requestedUrl ? null : ledger.get(sourceUrl);
    if (canonical) {
      logger.info({ url: sourceUrl, requestedUrl, status: canonical.status }, 'Article already in ledger');
      return { outcome: 'duplicate', record: canonical };
    }

    const record = await this.processCandidate({ ...candidate, sourceUrl }, settings);
    return record.status === 'success'
      ? { outcome: 'synced', record }
      : { outcome: 'failed', record, error: record.detail };
  }

  private checkQuota(needed: number): void {
    if (!this.deps.usage) {
      return;
    }
    const usage = this.deps.usage();
    if (!hasQuotaFor(usage, needed)) {
      throw new QuotaExhaustedError(
        `Monthly Medium API quota too low: ${usage.requestsRemaining} requests left, ${needed} needed`
      );
    }
  }

  /**
   * Transform, publish and record one unseen candidate
   */
  private async processCandidate(
    candidate: ArticleCandidate,
    settings: SyncConfig,
    runId?: number
  ): Promise<SyncRecord> {
    const { ledger, publisher, transformer } = this.deps;
    const { sourceUrl } = candidate;

    let title = candidate.title;
    let subtitle = candidate.subtitle;
    let body = candidate.rawBody;

    if (settings.translate && transformer) {
      try {
        title = await transformer.transform(title, settings.targetLanguage);
        if (subtitle) {
          subtitle = await transformer.transform(subtitle, settings.targetLanguage);
        }
        body = await transformer.transform(body, settings.targetLanguage, candidate.bodyFormat);
      } catch (error) {
        logger.error({ runId, url: sourceUrl, stage: 'transform', error }, 'Translation failed');
        return ledger.record({
          sourceUrl,
          status: 'failed',
          title: candidate.title,
          detail: `transform: ${describeError(error)}`,
          runId,
        });
      }
    } else if (settings.translate) {
      logger.warn({ url: sourceUrl }, 'Translation enabled but no translator configured, publishing original text');
    }

    let published: { id: string; link?: string };
    try {
      published = await publisher.publish({
        title,
        body,
        bodyFormat: candidate.bodyFormat,
        excerpt: subtitle || undefined,
        tags: normalizePostTags(candidate.tags),
        authorCredit: settings.addAuthorCredit ? candidate.author : undefined,
        sourceLink: settings.addSourceLink ? sourceUrl : undefined,
        status: settings.postStatus,
        category: settings.category,
      });
    } catch (error) {
      logger.error({ runId, url: sourceUrl, stage: 'publish', error }, 'Publishing failed');
      return ledger.record({
        sourceUrl,
        status: 'failed',
        title,
        detail: `publish: ${describeError(error)}`,
        runId,
      });
    }

    logger.info({ runId, url: sourceUrl, postId: published.id }, 'Article synced');
    return ledger.record({
      sourceUrl,
      status: 'success',
      remotePostId: published.id,
      remotePostUrl: published.link,
      title,
      runId,
    });
  }

  private finishRun(
    runId: number,
    trigger: RunTrigger,
    startedAt: Date,
    counts: RunCounts,
    error?: string
  ): RunResult {
    const finishedAt = this.now();
    const status = error === undefined ? 'completed' : 'failed';

    this.deps.runLog.finish(runId, {
      status,
      finishedAt,
      candidatesSeen: counts.candidatesSeen,
      syncedCount: counts.synced,
      skippedCount: counts.skipped,
      errorCount: counts.failed,
      error,
    });

    const result: RunResult = {
      status,
      runId,
      trigger,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      ...counts,
      error,
    };

    logger.info({ result }, status === 'completed' ? 'Sync run complete' : 'Sync run aborted');
    return result;
  }
}
