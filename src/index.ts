#!/usr/bin/env node
/**
 * Medium → WordPress Sync
 *
 * Searches Medium for recent articles on the configured keywords, translates
 * them (optional) and publishes each one to WordPress exactly once.
 *
 * Usage:
 *   node dist/index.js                    - Service mode: daily scheduler + dashboard
 *   node dist/index.js --run              - Run one sync and exit
 *   node dist/index.js --sync-url=<url>   - Sync a single Medium article and exit
 */

import { serve } from '@hono/node-server';
import { config } from './config/index.js';
import { SettingsStore } from './config/settings.js';
import { logger } from './utils/logger.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { initDatabase, closeDatabase } from './db/index.js';
import { getApiUsage, getStats, incrementApiUsage } from './db/queries.js';
import { sqliteLedger, sqliteRunLog } from './db/ledger.js';
import { MediumClient } from './source/index.js';
import { createTranslator } from './transformer/index.js';
import { WordPressClient } from './publisher/index.js';
import { SyncPipeline } from './pipeline.js';
import { SyncScheduler } from './scheduler.js';
import { createDashboardApp } from './dashboard/index.js';
import type { RunResult, RunTrigger, SyncConfig } from './types/index.js';

// Parse command line arguments
const args = process.argv.slice(2);
const isRunOnce = args.includes('--run');
const syncUrl = args.find((arg) => arg.startsWith('--sync-url='))?.slice('--sync-url='.length);

const settings = new SettingsStore();

const source = new MediumClient({
  apiKey: config.medium.apiKey ?? '',
  apiHost: config.medium.apiHost,
  timeoutMs: config.medium.timeout,
  rateLimiter: new RateLimiter(config.medium.requestsPerSecond),
  onRequest: () => {
    incrementApiUsage(1, config.medium.monthlyLimit);
  },
});

const transformer = createTranslator(config.openai.apiKey, config.openai.model);

const wordpressConfigured = Boolean(
  config.wordpress.url && config.wordpress.username && config.wordpress.password
);
const publisher = new WordPressClient({
  url: config.wordpress.url ?? '',
  username: config.wordpress.username ?? '',
  password: config.wordpress.password ?? '',
  timeoutMs: config.wordpress.timeout,
});

const pipeline = new SyncPipeline({
  source,
  transformer,
  publisher,
  ledger: sqliteLedger,
  runLog: sqliteRunLog,
  usage: () => getApiUsage(config.medium.monthlyLimit),
});

/**
 * Settings snapshot for one run; translation is dropped when no translator is wired
 */
function resolveSyncConfig(): SyncConfig {
  const syncConfig = settings.toSyncConfig();
  if (syncConfig.translate && !transformer) {
    logger.warn('Translation enabled but OPENAI_API_KEY is not set, syncing untranslated');
    return Object.freeze({ ...syncConfig, translate: false });
  }
  return syncConfig;
}

function logRunSummary(result: RunResult): void {
  logger.info('');
  logger.info('Sync Summary:');
  logger.info(`  Status:     ${result.status}${result.error ? ` (${result.error})` : ''}`);
  logger.info(`  Candidates: ${result.candidatesSeen}`);
  logger.info(`  Synced:     ${result.synced}`);
  logger.info(`  Skipped:    ${result.skipped}`);
  logger.info(`  Failed:     ${result.failed}`);
  logger.info(`  Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);
}

async function executeSync(trigger: RunTrigger): Promise<RunResult | null> {
  const validation = settings.validate();
  validation.warnings.forEach((warning) => logger.warn(warning));
  if (!validation.valid) {
    logger.error({ errors: validation.errors }, 'Settings are incomplete, sync not started');
    return null;
  }

  const result = await pipeline.run(resolveSyncConfig(), trigger);
  logRunSummary(result);
  return result;
}

async function main(): Promise<void> {
  logger.info({ env: config.app.env, version: config.app.version }, 'Starting Medium → WordPress sync');

  // Initialize database and settings
  try {
    initDatabase();
    settings.load();
    const stats = getStats();
    logger.info(
      {
        totalArticles: stats.totalArticles,
        synced: stats.totalSyncs,
        failed: stats.failedCount,
        lastRun: stats.lastRunAt?.toISOString() ?? 'never',
      },
      'Database ready'
    );
  } catch (error) {
    logger.fatal({ error }, 'Failed to initialize');
    process.exit(1);
  }

  if (syncUrl !== undefined) {
    const result = await pipeline.syncOne(syncUrl, resolveSyncConfig());
    logger.info({ outcome: result.outcome, record: result.record, error: result.error }, 'Single-article sync finished');
    closeDatabase();
    process.exit(result.outcome === 'failed' || result.outcome === 'rejected' ? 1 : 0);
  }

  if (isRunOnce) {
    const result = await executeSync('cli');
    closeDatabase();
    process.exit(result?.status === 'completed' ? 0 : 1);
  }

  // Service mode: daily scheduler + dashboard
  const scheduler = new SyncScheduler(() => executeSync('scheduled'));
  const { schedule } = settings.getAll();
  scheduler.scheduleDaily(schedule, schedule.enabled);

  const app = createDashboardApp({
    pipeline,
    settings,
    scheduler,
    ledger: sqliteLedger,
    runLog: sqliteRunLog,
    publisher: wordpressConfigured ? publisher : null,
    syncConfig: resolveSyncConfig,
    usage: () => getApiUsage(config.medium.monthlyLimit),
    token: config.dashboard.token,
  });

  if (!config.dashboard.token) {
    logger.warn('DASHBOARD_TOKEN not set, API routes are unauthenticated');
  }

  const server = serve({ fetch: app.fetch, port: config.dashboard.port }, (info) => {
    logger.info({ port: info.port, nextRun: scheduler.getNextRun()?.toISOString() ?? null }, 'Dashboard listening');
  });

  // Graceful shutdown handler
  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down...');
    scheduler.stop();
    server.close();
    closeDatabase();
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
