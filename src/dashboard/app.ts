/**
 * Dashboard / HTTP API
 *
 * Status page, ledger listing, manual triggers and settings management.
 * The status page and /api/* require a bearer token when DASHBOARD_TOKEN is set;
 * /health stays open.
 */

import { Hono, type Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { bearerAuth } from 'hono/bearer-auth';
import { logger as requestLogger } from 'hono/logger';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { SettingsError, describeError } from '../utils/errors.js';
import { SYNC_STATUSES } from '../types/index.js';
import { renderStatusPage } from './views.js';
import { estimateRequests, type SyncPipeline } from '../pipeline.js';
import { hasQuotaFor } from '../db/queries.js';
import type { SettingsStore } from '../config/settings.js';
import type { SyncScheduler } from '../scheduler.js';
import type { RunLog, SyncLedger } from '../db/ledger.js';
import type { PublishClient } from '../publisher/index.js';
import type { ApiUsage, SyncConfig } from '../types/index.js';

export interface DashboardDeps {
  pipeline: SyncPipeline;
  settings: SettingsStore;
  scheduler: SyncScheduler;
  ledger: SyncLedger;
  runLog: RunLog;
  /** null when WordPress credentials are missing */
  publisher: PublishClient | null;
  /** Run settings resolved for the wired adapters */
  syncConfig: () => SyncConfig;
  usage: () => ApiUsage;
  token?: string;
}

const RecordsQuery = z.object({
  status: z.enum(SYNC_STATUSES).optional(),
  search: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const RunsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

const SyncArticleBody = z.object({
  url: z.string().trim().min(1, 'url is required'),
});

const AutomationBody = z.object({
  enabled: z.boolean(),
});

async function parseJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    return null;
  }
}

export function createDashboardApp(deps: DashboardDeps): Hono {
  const { pipeline, settings, scheduler, ledger, runLog } = deps;
  const startTime = Date.now();
  const app = new Hono();

  app.use('*', requestLogger((message: string) => logger.debug(message)));

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    logger.error({ error: err, path: c.req.path }, 'Unhandled dashboard error');
    return c.json({ error: 'internal_error', message: err.message }, 500);
  });

  if (deps.token) {
    const auth = bearerAuth({ token: deps.token });
    app.use('/', auth);
    app.use('/api/*', auth);
  }

  const reschedule = (): void => {
    const { schedule } = settings.getAll();
    scheduler.scheduleDaily(schedule, schedule.enabled);
  };

  const status = () => {
    const { running, lastResult } = pipeline.getStatus();
    return {
      running,
      totalArticles: ledger.count(),
      totalSyncs: ledger.count('success'),
      failedCount: ledger.count('failed'),
      skippedCount: ledger.count('skipped'),
      automationEnabled: scheduler.isEnabled(),
      nextScheduledRun: scheduler.getNextRun(),
      lastRun: runLog.latest(),
      lastResult,
    };
  };

  app.get('/', (c) => c.html(renderStatusPage({ ...status(), records: ledger.list({}, { limit: 20 }) })));

  app.get('/health', (c) =>
    c.json({
      status: 'ok',
      running: pipeline.getStatus().running,
      uptime: Math.floor((Date.now() - startTime) / 1000),
    })
  );

  app.get('/api/status', (c) => c.json(status()));

  app.get('/api/records', (c) => {
    const parsed = RecordsQuery.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ error: 'validation_error', message: parsed.error.message }, 400);
    }
    const { status: recordStatus, search, limit, offset } = parsed.data;
    return c.json({
      records: ledger.list({ status: recordStatus, search }, { limit, offset }),
      total: ledger.count(recordStatus),
      limit,
      offset,
    });
  });

  app.get('/api/runs', (c) => {
    const parsed = RunsQuery.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ error: 'validation_error', message: parsed.error.message }, 400);
    }
    return c.json({ runs: runLog.list(parsed.data.limit) });
  });

  app.get('/api/usage', (c) => {
    const usage = deps.usage();
    return c.json({ ...usage, canSync: hasQuotaFor(usage, estimateRequests(deps.syncConfig())) });
  });

  app.post('/api/sync', async (c) => {
    const validation = settings.validate();
    if (!validation.valid) {
      return c.json({ error: 'invalid_settings', errors: validation.errors }, 400);
    }

    const result = await pipeline.run(deps.syncConfig(), 'manual');
    if (result.status === 'rejected') {
      return c.json(result, 409);
    }
    return c.json(result, result.status === 'completed' ? 200 : 500);
  });

  app.post('/api/sync-article', async (c) => {
    const parsed = SyncArticleBody.safeParse(await parseJsonBody(c));
    if (!parsed.success) {
      return c.json({ error: 'validation_error', message: 'url is required' }, 400);
    }

    const result = await pipeline.syncOne(parsed.data.url, deps.syncConfig());
    if (result.outcome === 'rejected') {
      return c.json(result, 409);
    }
    return c.json(result, result.outcome === 'failed' ? 500 : 200);
  });

  app.post('/api/automation', async (c) => {
    const parsed = AutomationBody.safeParse(await parseJsonBody(c));
    if (!parsed.success) {
      return c.json({ error: 'validation_error', message: 'enabled must be a boolean' }, 400);
    }

    settings.update('schedule', { enabled: parsed.data.enabled });
    if (parsed.data.enabled) {
      scheduler.resume();
    } else {
      scheduler.pause();
    }

    return c.json({
      automationEnabled: scheduler.isEnabled(),
      nextScheduledRun: scheduler.getNextRun(),
    });
  });

  app.get('/api/settings', (c) => c.json(settings.getAll()));

  app.put('/api/settings', async (c) => {
    const body = await parseJsonBody(c);
    if (body === null) {
      return c.json({ error: 'invalid_json' }, 400);
    }

    try {
      const updated = settings.replace(body);
      reschedule();
      return c.json(updated);
    } catch (error) {
      if (error instanceof SettingsError) {
        return c.json({ error: 'invalid_settings', message: error.message, issues: error.issues }, 400);
      }
      throw error;
    }
  });

  app.post('/api/settings/reset', (c) => {
    const reset = settings.reset();
    reschedule();
    return c.json(reset);
  });

  app.get('/api/settings/validate', (c) => c.json(settings.validate()));

  app.post('/api/test-connection', async (c) => {
    if (!deps.publisher) {
      return c.json({ wordpress: false, message: 'WordPress is not configured' });
    }
    try {
      const ok = await deps.publisher.testConnection();
      return c.json({ wordpress: ok });
    } catch (error) {
      return c.json({ wordpress: false, message: describeError(error) });
    }
  });

  return app;
}
