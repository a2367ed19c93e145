import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CANDIDATE_OVERFETCH, SyncPipeline } from './pipeline.js';
import { closeDatabase, initDatabase } from './db/index.js';
import { sqliteLedger, sqliteRunLog } from './db/ledger.js';
import {
  InvalidCandidateError,
  PublishRejectedError,
  PublishUnavailableError,
  SourceUnavailableError,
  TransformFailedError,
} from './utils/errors.js';
import type { SearchQuery, SourceClient } from './source/index.js';
import type { ContentTransformer } from './transformer/index.js';
import type { PublishClient, PublishRequest, PublishedPost } from './publisher/index.js';
import type { ApiUsage, ArticleCandidate, BodyFormat, SyncConfig } from './types/index.js';

const baseConfig: SyncConfig = {
  keywords: ['python'],
  maxArticles: 2,
  recentDays: 30,
  languagePreference: 'both',
  translate: true,
  targetLanguage: 'pt',
  postStatus: 'draft',
  category: 'Technology',
  addAuthorCredit: true,
  addSourceLink: true,
};

function candidate(id: string, overrides: Partial<ArticleCandidate> = {}): ArticleCandidate {
  return {
    sourceUrl: `https://medium.com/@writer/python-post-${id}`,
    sourceId: id,
    title: `Python article ${id}`,
    subtitle: '',
    author: 'Test Writer',
    rawBody: `# Python ${id}\n\nBody text for article ${id}.`,
    bodyFormat: 'markdown',
    publishedAt: new Date('2026-03-01T00:00:00Z'),
    tags: ['python'],
    language: 'en',
    ...overrides,
  };
}

function createSource(candidates: ArticleCandidate[]) {
  const search = vi.fn<(query: SearchQuery) => Promise<ArticleCandidate[]>>(async () => candidates);
  const fetchArticle = vi.fn<(url: string) => Promise<ArticleCandidate>>();
  const source: SourceClient = { search, fetchArticle };
  return { source, search, fetchArticle };
}

function createPublisher() {
  let nextId = 100;
  const publish = vi.fn<(request: PublishRequest) => Promise<PublishedPost>>(async () => {
    nextId++;
    return { id: String(nextId), link: `https://blog.example.com/?p=${nextId}` };
  });
  const publisher: PublishClient = { publish, testConnection: async () => true };
  return { publisher, publish };
}

function createTransformer() {
  const transform = vi.fn<(text: string, targetLanguage: string, format?: BodyFormat) => Promise<string>>(
    async (text, targetLanguage) => `[${targetLanguage}] ${text}`
  );
  const transformer: ContentTransformer = { transform };
  return { transformer, transform };
}

function createPipeline(candidates: ArticleCandidate[], usage?: () => ApiUsage) {
  const source = createSource(candidates);
  const publisher = createPublisher();
  const transformer = createTransformer();
  const pipeline = new SyncPipeline({
    source: source.source,
    transformer: transformer.transformer,
    publisher: publisher.publisher,
    ledger: sqliteLedger,
    runLog: sqliteRunLog,
    usage,
  });
  return { pipeline, ...source, ...publisher, ...transformer };
}

beforeEach(() => {
  initDatabase(':memory:');
});

afterEach(() => {
  closeDatabase();
});

describe('SyncPipeline.run', () => {
  it('skips seen articles and publishes the new ones', async () => {
    const a = candidate('a');
    const b = candidate('b');
    const c = candidate('c');
    sqliteLedger.record({ sourceUrl: a.sourceUrl, status: 'success', remotePostId: '1' });

    const { pipeline, search, publish } = createPipeline([a, b, c]);
    const result = await pipeline.run(baseConfig);

    expect(result).toMatchObject({ status: 'completed', candidatesSeen: 3, synced: 2, skipped: 1, failed: 0 });
    expect(search).toHaveBeenCalledWith({
      keywords: ['python'],
      recentDays: 30,
      limit: 2 * CANDIDATE_OVERFETCH,
    });
    expect(publish.mock.calls.map(([request]) => request.title)).toEqual([
      '[pt] Python article b',
      '[pt] Python article c',
    ]);
    expect(sqliteLedger.count()).toBe(3);
    expect(sqliteLedger.get(b.sourceUrl)).toMatchObject({ status: 'success', remotePostId: '101', runId: result.runId });
    expect(sqliteLedger.get(c.sourceUrl)).toMatchObject({ status: 'success', remotePostId: '102' });
  });

  it('publishes nothing new on a second identical run', async () => {
    const { pipeline, publish } = createPipeline([candidate('a'), candidate('b')]);

    await pipeline.run(baseConfig);
    const second = await pipeline.run(baseConfig);

    expect(second).toMatchObject({ status: 'completed', synced: 0, skipped: 2, failed: 0 });
    expect(publish).toHaveBeenCalledTimes(2);
    expect(sqliteLedger.count()).toBe(2);
  });

  it('attempts at most maxArticles candidates, in source order', async () => {
    const candidates = ['1', '2', '3', '4', '5'].map((id) => candidate(id));
    const { pipeline, publish } = createPipeline(candidates);

    const result = await pipeline.run(baseConfig);

    expect(result.synced).toBe(2);
    expect(publish.mock.calls.map(([request]) => request.sourceLink)).toEqual([
      'https://medium.com/@writer/python-post-1',
      'https://medium.com/@writer/python-post-2',
    ]);
    expect(sqliteLedger.hasSeen('https://medium.com/@writer/python-post-3')).toBe(false);
    expect(sqliteLedger.count()).toBe(2);
  });

  it('records a transform failure and keeps going', async () => {
    const { pipeline, transform, publish } = createPipeline([candidate('a'), candidate('b')]);
    transform.mockImplementation(async (text, targetLanguage) => {
      if (text.includes('article a')) {
        throw new TransformFailedError('Translation returned empty text');
      }
      return `[${targetLanguage}] ${text}`;
    });

    const result = await pipeline.run(baseConfig);

    expect(result).toMatchObject({ status: 'completed', synced: 1, failed: 1 });
    expect(publish).toHaveBeenCalledTimes(1);
    const failed = sqliteLedger.get('https://medium.com/@writer/python-post-a');
    expect(failed?.status).toBe('failed');
    expect(failed?.remotePostId).toBeUndefined();
    expect(failed?.detail).toBe('transform: Translation returned empty text');
    expect(sqliteLedger.get('https://medium.com/@writer/python-post-b')?.status).toBe('success');
  });

  it('records rejected and unavailable publishes as failed', async () => {
    const { pipeline, publish } = createPipeline([candidate('a'), candidate('b')]);
    publish
      .mockRejectedValueOnce(new PublishRejectedError('WordPress returned 401 for POST /posts', 401))
      .mockRejectedValueOnce(new PublishUnavailableError('WordPress request failed: POST /posts'));

    const result = await pipeline.run(baseConfig);

    expect(result).toMatchObject({ status: 'completed', synced: 0, failed: 2 });
    expect(sqliteLedger.get('https://medium.com/@writer/python-post-a')?.detail).toBe(
      'publish: WordPress returned 401 for POST /posts'
    );
    expect(sqliteLedger.get('https://medium.com/@writer/python-post-b')?.detail).toBe(
      'publish: WordPress request failed: POST /posts'
    );
  });

  it('aborts without ledger writes when the source fails', async () => {
    const { pipeline, search, publish } = createPipeline([]);
    search.mockRejectedValue(new SourceUnavailableError('Medium API returned 503 for /search/articles?query=python'));

    const result = await pipeline.run(baseConfig, 'scheduled');

    expect(result).toMatchObject({
      status: 'failed',
      trigger: 'scheduled',
      synced: 0,
      skipped: 0,
      failed: 0,
      error: 'Medium API returned 503 for /search/articles?query=python',
    });
    expect(publish).not.toHaveBeenCalled();
    expect(sqliteLedger.count()).toBe(0);
    expect(sqliteRunLog.latest()).toMatchObject({ status: 'failed', trigger: 'scheduled' });
  });

  it('rejects a run while another is active', async () => {
    const { pipeline, search } = createPipeline([]);
    let release: (candidates: ArticleCandidate[]) => void = () => undefined;
    search.mockImplementation(
      () =>
        new Promise<ArticleCandidate[]>((resolve) => {
          release = resolve;
        })
    );

    const first = pipeline.run(baseConfig);
    expect(pipeline.getStatus().running).toBe(true);

    const second = await pipeline.run(baseConfig);
    const single = await pipeline.syncOne('https://medium.com/@writer/python-post-x', baseConfig);

    expect(second).toMatchObject({ status: 'rejected', error: 'Sync already running' });
    expect(second.runId).toBeUndefined();
    expect(single).toEqual({ outcome: 'rejected', error: 'Sync already running' });
    expect(sqliteRunLog.list()).toHaveLength(1);

    release([candidate('a')]);
    const firstResult = await first;

    expect(firstResult).toMatchObject({ status: 'completed', synced: 1 });
    expect(pipeline.getStatus()).toEqual({ running: false, lastResult: firstResult });
    expect(sqliteLedger.count()).toBe(1);
  });

  it('skips candidates without a URL without recording them', async () => {
    const { pipeline, publish } = createPipeline([candidate('a', { sourceUrl: '  ' }), candidate('b')]);

    const result = await pipeline.run(baseConfig);

    expect(result).toMatchObject({ synced: 1, skipped: 1, failed: 0 });
    expect(publish).toHaveBeenCalledTimes(1);
    expect(sqliteLedger.count()).toBe(1);
  });

  it('records blocked content as skipped without using an article slot', async () => {
    const hiring = candidate('job', { title: 'We are hiring Python developers' });
    const { pipeline, publish } = createPipeline([hiring, candidate('a'), candidate('b')]);

    const result = await pipeline.run(baseConfig);

    expect(result).toMatchObject({ synced: 2, skipped: 1 });
    expect(publish).toHaveBeenCalledTimes(2);
    expect(sqliteLedger.get(hiring.sourceUrl)).toMatchObject({
      status: 'skipped',
      detail: 'filter: blocked keyword "hiring" (recruiting)',
    });
  });

  it('does not remember language or relevance rejections', async () => {
    const portuguese = candidate('pt', { language: 'pt' });
    const offTopic = candidate('go', { title: 'Notes on Go', tags: ['golang'] });
    const { pipeline, publish } = createPipeline([portuguese, offTopic]);

    const first = await pipeline.run({ ...baseConfig, languagePreference: 'en' });

    expect(first).toMatchObject({ synced: 0, skipped: 2 });
    expect(publish).not.toHaveBeenCalled();
    expect(sqliteLedger.count()).toBe(0);

    const second = await pipeline.run({ ...baseConfig, languagePreference: 'both', keywords: ['python', 'go'] });

    expect(second).toMatchObject({ synced: 2, skipped: 0 });
    expect(publish.mock.calls.map(([request]) => request.sourceLink)).toEqual([
      portuguese.sourceUrl,
      offTopic.sourceUrl,
    ]);
  });

  it('translates an HTML body as HTML', async () => {
    const article = candidate('h', { rawBody: '<p>Python body text here.</p>', bodyFormat: 'html' });
    const { pipeline, transform } = createPipeline([article]);

    await pipeline.run(baseConfig);

    expect(transform).toHaveBeenCalledWith('Python article h', 'pt');
    expect(transform).toHaveBeenCalledWith('<p>Python body text here.</p>', 'pt', 'html');
  });

  it('refuses to run when the monthly quota is too low', async () => {
    const usage = (): ApiUsage => ({ month: '2026-10', requestsUsed: 2395, requestsLimit: 2500, requestsRemaining: 105 });
    const { pipeline, search, publish } = createPipeline([candidate('a')], usage);

    const result = await pipeline.run(baseConfig);

    expect(result).toMatchObject({
      status: 'failed',
      synced: 0,
      error: 'Monthly Medium API quota too low: 105 requests left, 5 needed',
    });
    expect(search).not.toHaveBeenCalled();
    expect(publish).not.toHaveBeenCalled();
    expect(sqliteLedger.count()).toBe(0);
    expect(sqliteRunLog.latest()).toMatchObject({ status: 'failed' });
  });

  it('runs when the quota covers the run and its reserve', async () => {
    const usage = (): ApiUsage => ({ month: '2026-10', requestsUsed: 2394, requestsLimit: 2500, requestsRemaining: 106 });
    const { pipeline } = createPipeline([candidate('a')], usage);

    const result = await pipeline.run(baseConfig);

    expect(result).toMatchObject({ status: 'completed', synced: 1 });
  });

  it('publishes the original text when translation is off', async () => {
    const { pipeline, transform, publish } = createPipeline([candidate('a')]);

    await pipeline.run({ ...baseConfig, translate: false, addAuthorCredit: false, addSourceLink: false });

    expect(transform).not.toHaveBeenCalled();
    expect(publish).toHaveBeenCalledWith({
      title: 'Python article a',
      body: '# Python a\n\nBody text for article a.',
      bodyFormat: 'markdown',
      excerpt: undefined,
      tags: ['python'],
      authorCredit: undefined,
      sourceLink: undefined,
      status: 'draft',
      category: 'Technology',
    });
  });

  it('fails an invalid configuration before calling the source', async () => {
    const { pipeline, search } = createPipeline([candidate('a')]);

    const result = await pipeline.run({ ...baseConfig, keywords: [] });

    expect(result.status).toBe('failed');
    expect(result.error).toBe('Invalid sync configuration');
    expect(search).not.toHaveBeenCalled();
  });
});

describe('SyncPipeline.syncOne', () => {
  it('syncs a single article without relevance screening', async () => {
    const { pipeline, fetchArticle, publish } = createPipeline([]);
    const offTopic = candidate('z', { title: 'Gardening notes', tags: [] });
    fetchArticle.mockResolvedValue(offTopic);

    const result = await pipeline.syncOne(offTopic.sourceUrl, baseConfig);

    expect(result.outcome).toBe('synced');
    expect(result.record).toMatchObject({ sourceUrl: offTopic.sourceUrl, status: 'success', remotePostId: '101' });
    expect(result.record?.runId).toBeUndefined();
    expect(publish).toHaveBeenCalledTimes(1);
  });

  it('reports a duplicate for an already recorded URL', async () => {
    const { pipeline, fetchArticle } = createPipeline([]);
    sqliteLedger.record({ sourceUrl: 'https://medium.com/@writer/python-post-a', status: 'failed' });

    const result = await pipeline.syncOne('https://medium.com/@writer/python-post-a', baseConfig);

    expect(result.outcome).toBe('duplicate');
    expect(result.record?.status).toBe('failed');
    expect(fetchArticle).not.toHaveBeenCalled();
  });

  it('reports a duplicate when the canonical URL is already recorded', async () => {
    const { pipeline, fetchArticle, publish } = createPipeline([]);
    const article = candidate('a');
    sqliteLedger.record({ sourceUrl: article.sourceUrl, status: 'success', remotePostId: '5' });
    fetchArticle.mockResolvedValue(article);

    const result = await pipeline.syncOne('https://writer.medium.com/python-post-a?source=rss', baseConfig);

    expect(result.outcome).toBe('duplicate');
    expect(result.record?.remotePostId).toBe('5');
    expect(publish).not.toHaveBeenCalled();
  });

  it('fails without fetching when the quota is used up', async () => {
    const usage = (): ApiUsage => ({ month: '2026-10', requestsUsed: 2500, requestsLimit: 2500, requestsRemaining: 0 });
    const { pipeline, fetchArticle } = createPipeline([], usage);

    const result = await pipeline.syncOne('https://medium.com/@writer/python-post-a', baseConfig);

    expect(result).toEqual({
      outcome: 'failed',
      error: 'Monthly Medium API quota too low: 0 requests left, 2 needed',
    });
    expect(fetchArticle).not.toHaveBeenCalled();
  });

  it('skips a URL that is not a Medium article', async () => {
    const { pipeline, fetchArticle } = createPipeline([]);
    fetchArticle.mockRejectedValue(new InvalidCandidateError('Not a Medium article URL: https://example.com/'));

    const result = await pipeline.syncOne('https://example.com/', baseConfig);

    expect(result).toEqual({ outcome: 'skipped', error: 'Not a Medium article URL: https://example.com/' });
    expect(sqliteLedger.count()).toBe(0);
  });

  it('returns the failed record when publishing fails', async () => {
    const { pipeline, fetchArticle, publish } = createPipeline([]);
    fetchArticle.mockResolvedValue(candidate('a'));
    publish.mockRejectedValue(new PublishRejectedError('WordPress returned 403 for POST /posts', 403));

    const result = await pipeline.syncOne('https://medium.com/@writer/python-post-a', baseConfig);

    expect(result.outcome).toBe('failed');
    expect(result.error).toBe('publish: WordPress returned 403 for POST /posts');
    expect(sqliteLedger.get('https://medium.com/@writer/python-post-a')?.status).toBe('failed');
  });
});
