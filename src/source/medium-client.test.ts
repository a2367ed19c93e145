import { afterEach, describe, expect, it, vi } from 'vitest';
import { MediumClient, extractArticleId, parseMediumDate } from './medium-client.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { InvalidCandidateError, SourceUnavailableError } from '../utils/errors.js';

type Route = () => Response;

function json(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(routes: Record<string, Route>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const url = new URL(href);
    const route = routes[`${url.pathname}${url.search}`];
    return route ? route() : json({ message: 'Not found' }, 404);
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function articleInfo(id: string, publishedAt: string, author: string = 'u1') {
  return {
    id,
    title: `Article ${id}`,
    subtitle: `About ${id}`,
    author,
    published_at: publishedAt,
    url: `https://medium.com/@writer/article-${id}`,
    tags: ['python'],
    lang: 'en',
  };
}

const NOW = new Date('2026-03-10T00:00:00Z');

function createClient(onRequest?: () => void): MediumClient {
  return new MediumClient({
    apiKey: 'test-key',
    apiHost: 'medium2.p.rapidapi.com',
    rateLimiter: new RateLimiter(0),
    onRequest,
    now: () => NOW,
  });
}

const searchRoutes: Record<string, Route> = {
  '/search/articles?query=python': () => json({ articles: ['aaaa1111', 'bbbb2222', 'cccc3333'] }),
  '/search/articles?query=rust': () => json({ articles: ['bbbb2222', 'dddd4444'] }),
  '/article/aaaa1111': () => json(articleInfo('aaaa1111', '2026-03-05 10:00:00')),
  '/article/aaaa1111/markdown': () => json({ markdown: '# A' }),
  '/article/bbbb2222': () => json(articleInfo('bbbb2222', '2026-03-08 12:00:00')),
  '/article/bbbb2222/markdown': () => json({ markdown: '' }),
  '/article/bbbb2222/html': () => json({ html: '<p>B</p>' }),
  '/article/cccc3333': () => json(articleInfo('cccc3333', '2025-12-01 09:00:00')),
  '/article/cccc3333/markdown': () => json({ markdown: '# C' }),
  '/article/dddd4444': () => json(articleInfo('dddd4444', '2026-03-09 08:00:00')),
  '/article/dddd4444/markdown': () => json({ markdown: '# D' }),
  '/user/u1': () => json({ fullname: 'Writer One', username: 'writer1' }),
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('MediumClient.search', () => {
  it('collects recent articles across keywords, newest first', async () => {
    stubFetch(searchRoutes);
    const onRequest = vi.fn();

    const candidates = await createClient(onRequest).search({
      keywords: ['python', 'rust'],
      recentDays: 30,
      limit: 10,
    });

    expect(candidates.map((c) => c.sourceId)).toEqual(['dddd4444', 'bbbb2222', 'aaaa1111']);
    expect(candidates[2]).toEqual({
      sourceUrl: 'https://medium.com/@writer/article-aaaa1111',
      sourceId: 'aaaa1111',
      title: 'Article aaaa1111',
      subtitle: 'About aaaa1111',
      author: 'Writer One',
      rawBody: '# A',
      bodyFormat: 'markdown',
      publishedAt: new Date('2026-03-05T10:00:00Z'),
      tags: ['python'],
      language: 'en',
    });
    expect(candidates[1]).toMatchObject({ rawBody: '<p>B</p>', bodyFormat: 'html' });
    // 2 searches, 4 article lookups, 3 markdown, 1 html, 1 author
    expect(onRequest).toHaveBeenCalledTimes(11);
  });

  it('skips old articles before fetching their body', async () => {
    const fetchMock = stubFetch(searchRoutes);

    await createClient().search({ keywords: ['python'], recentDays: 30, limit: 10 });

    const paths = fetchMock.mock.calls.map(([input]) => new URL(String(input)).pathname);
    expect(paths).toContain('/article/cccc3333');
    expect(paths).not.toContain('/article/cccc3333/markdown');
  });

  it('stops fetching once the limit is reached', async () => {
    const fetchMock = stubFetch(searchRoutes);

    const candidates = await createClient().search({ keywords: ['python', 'rust'], recentDays: 30, limit: 1 });

    expect(candidates.map((c) => c.sourceId)).toEqual(['aaaa1111']);
    expect(fetchMock).toHaveBeenCalledTimes(4);
  });

  it('sends the RapidAPI headers', async () => {
    const fetchMock = stubFetch({ '/search/articles?query=python': () => json({ articles: [] }) });

    await createClient().search({ keywords: ['python'], recentDays: 30, limit: 5 });

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://medium2.p.rapidapi.com/search/articles?query=python');
    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({
      headers: { 'X-RapidAPI-Key': 'test-key', 'X-RapidAPI-Host': 'medium2.p.rapidapi.com' },
    });
  });

  it('fails the whole search when one article lookup fails', async () => {
    stubFetch({ ...searchRoutes, '/article/bbbb2222': () => json({ message: 'boom' }, 500) });

    await expect(
      createClient().search({ keywords: ['python'], recentDays: 30, limit: 10 })
    ).rejects.toThrow(new SourceUnavailableError('Medium API returned 500 for /article/bbbb2222'));
  });

  it('reports rejected credentials', async () => {
    stubFetch({ '/search/articles?query=python': () => json({ message: 'Invalid API key' }, 401) });

    await expect(
      createClient().search({ keywords: ['python'], recentDays: 30, limit: 5 })
    ).rejects.toThrow('Medium API rejected credentials (401)');
  });

  it('wraps network errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    const error = await createClient()
      .search({ keywords: ['python'], recentDays: 30, limit: 5 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({ message: 'Medium API request failed: /search/articles?query=python' });
  });

  it('rejects responses of the wrong shape', async () => {
    stubFetch({ '/search/articles?query=python': () => json({ articles: 'none' }) });

    await expect(
      createClient().search({ keywords: ['python'], recentDays: 30, limit: 5 })
    ).rejects.toThrow('Unexpected Medium API response for /search/articles?query=python');
  });
});

describe('MediumClient.fetchArticle', () => {
  it('loads an article from its URL', async () => {
    stubFetch(searchRoutes);

    const article = await createClient().fetchArticle('https://medium.com/@writer/article-aaaa1111');

    expect(article).toMatchObject({ sourceId: 'aaaa1111', author: 'Writer One', rawBody: '# A' });
  });

  it('falls back to the author id when the user lookup fails', async () => {
    stubFetch({
      '/article/eeee5555': () => json(articleInfo('eeee5555', '2026-03-01 00:00:00', 'u2')),
      '/article/eeee5555/markdown': () => json({ markdown: '# E' }),
    });

    const article = await createClient().fetchArticle('https://medium.com/p/eeee5555');

    expect(article.author).toBe('u2');
  });

  it('rejects URLs without an article id', async () => {
    await expect(createClient().fetchArticle('https://example.com/')).rejects.toBeInstanceOf(
      InvalidCandidateError
    );
  });
});

describe('extractArticleId', () => {
  it('reads the trailing hex id', () => {
    expect(extractArticleId('https://medium.com/@writer/my-first-post-1a2b3c4d5e6f')).toBe('1a2b3c4d5e6f');
    expect(extractArticleId('https://medium.com/p/1A2B3C4D5E6F?source=rss')).toBe('1a2b3c4d5e6f');
    expect(extractArticleId('https://medium.com/@writer')).toBeNull();
    expect(extractArticleId('not a url')).toBeNull();
  });
});

describe('parseMediumDate', () => {
  it('parses Medium timestamps as UTC', () => {
    expect(parseMediumDate('2026-03-05 10:00:00')).toEqual(new Date('2026-03-05T10:00:00Z'));
    expect(parseMediumDate('2026-03-05T10:00:00Z')).toEqual(new Date('2026-03-05T10:00:00Z'));
    expect(parseMediumDate('soon')).toBeNull();
    expect(parseMediumDate(null)).toBeNull();
  });
});
