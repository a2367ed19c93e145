/**
 * Medium API Client
 *
 * Searches Medium through the RapidAPI "medium2" endpoints and turns results
 * into article candidates. Any failed request fails the whole call: callers
 * get the complete candidate list or an error, never a silent partial list.
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { InvalidCandidateError, SourceUnavailableError } from '../utils/errors.js';
import type { ArticleCandidate } from '../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SearchQuery {
  keywords: readonly string[];
  recentDays: number;
  limit: number;
}

/**
 * Source of article candidates
 */
export interface SourceClient {
  search(query: SearchQuery): Promise<ArticleCandidate[]>;
  fetchArticle(url: string): Promise<ArticleCandidate>;
}

export interface MediumClientOptions {
  apiKey: string;
  apiHost: string;
  timeoutMs?: number;
  rateLimiter?: RateLimiter;
  /** Called once per HTTP request, for quota tracking */
  onRequest?: () => void;
  now?: () => Date;
}

const searchResponseSchema = z.object({
  articles: z.array(z.string()).optional(),
  article_ids: z.array(z.string()).optional(),
});

const articleInfoSchema = z.object({
  id: z.string().optional(),
  title: z.string().default(''),
  subtitle: z.string().nullish(),
  author: z.string().default(''),
  published_at: z.string().nullish(),
  url: z.string().nullish(),
  tags: z.array(z.string()).default([]),
  lang: z.string().nullish(),
});

const userSchema = z.object({
  fullname: z.string().nullish(),
  username: z.string().nullish(),
});

const markdownSchema = z.object({ markdown: z.string().default('') });
const htmlSchema = z.object({ html: z.string().default('') });

type ArticleInfo = z.infer<typeof articleInfoSchema>;

/**
 * Parse Medium's "YYYY-MM-DD HH:mm:ss" (UTC) timestamps
 */
export function parseMediumDate(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  const iso = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}(:\d{2})?$/.test(trimmed)
    ? `${trimmed.replace(' ', 'T')}Z`
    : trimmed;
  const date = new Date(iso);

  return isNaN(date.getTime()) ? null : date;
}

/**
 * Extract the hexadecimal article id that ends a Medium post URL
 */
export function extractArticleId(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }

  const lastSegment = pathname.split('/').filter(Boolean).pop() ?? '';
  const match = /(?:^|-)([0-9a-f]{8,12})$/i.exec(lastSegment);
  return match?.[1]?.toLowerCase() ?? null;
}

export class MediumClient implements SourceClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly rateLimiter: RateLimiter;
  private readonly onRequest?: () => void;
  private readonly now: () => Date;
  private readonly authorNames = new Map<string, string>();

  constructor(options: MediumClientOptions) {
    this.baseUrl = `https://${options.apiHost}`;
    this.headers = {
      'X-RapidAPI-Key': options.apiKey,
      'X-RapidAPI-Host': options.apiHost,
    };
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(2);
    this.onRequest = options.onRequest;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Search every keyword in turn, newest first, capped at `limit`
   */
  async search({ keywords, recentDays, limit }: SearchQuery): Promise<ArticleCandidate[]> {
    const cutoff = this.now().getTime() - recentDays * DAY_MS;
    const candidates: ArticleCandidate[] = [];
    const seenIds = new Set<string>();

    logger.info({ keywords, recentDays, limit }, 'Searching Medium');

    for (const keyword of keywords) {
      if (candidates.length >= limit) {
        break;
      }

      const ids = await this.searchIds(keyword);
      logger.info({ keyword, found: ids.length }, 'Medium search results');

      for (const id of ids) {
        if (candidates.length >= limit) {
          break;
        }
        if (seenIds.has(id)) {
          continue;
        }
        seenIds.add(id);

        // Body and author cost extra requests, so the date is checked on the info alone
        const info = await this.getInfo(id);
        const publishedAt = parseMediumDate(info.published_at);
        if (!publishedAt || publishedAt.getTime() < cutoff) {
          logger.debug({ id, publishedAt: publishedAt?.toISOString() ?? null }, 'Article outside recency window');
          continue;
        }

        candidates.push(await this.buildCandidate(id, info));
      }
    }

    candidates.sort(
      (a, b) => (b.publishedAt?.getTime() ?? 0) - (a.publishedAt?.getTime() ?? 0)
    );

    logger.info({ candidates: candidates.length }, 'Medium search complete');
    return candidates;
  }

  /**
   * Fetch one article by its Medium URL
   */
  async fetchArticle(url: string): Promise<ArticleCandidate> {
    const id = extractArticleId(url);
    if (!id) {
      throw new InvalidCandidateError(`Not a Medium article URL: ${url}`);
    }

    const candidate = await this.buildCandidate(id, await this.getInfo(id));
    return candidate.sourceUrl ? candidate : { ...candidate, sourceUrl: url };
  }

  private async searchIds(keyword: string): Promise<string[]> {
    const data = await this.request(
      `/search/articles?query=${encodeURIComponent(keyword)}`,
      searchResponseSchema
    );
    return data.articles ?? data.article_ids ?? [];
  }

  private async getInfo(id: string): Promise<ArticleInfo> {
    return this.request(`/article/${id}`, articleInfoSchema);
  }

  private async buildCandidate(id: string, info: ArticleInfo): Promise<ArticleCandidate> {
    const { body, format } = await this.getContent(id);
    const author = await this.resolveAuthor(info.author);

    return toCandidate(id, info, author, body, format);
  }

  /**
   * Markdown first; HTML when Medium has no markdown rendition
   */
  private async getContent(id: string): Promise<{ body: string; format: 'markdown' | 'html' }> {
    const { markdown } = await this.request(`/article/${id}/markdown`, markdownSchema);
    if (markdown.trim()) {
      return { body: markdown, format: 'markdown' };
    }

    const { html } = await this.request(`/article/${id}/html`, htmlSchema);
    return { body: html, format: 'html' };
  }

  private async resolveAuthor(authorId: string): Promise<string> {
    if (!authorId) {
      return '';
    }

    const cached = this.authorNames.get(authorId);
    if (cached !== undefined) {
      return cached;
    }

    let name = authorId;
    try {
      const user = await this.request(`/user/${authorId}`, userSchema);
      name = user.fullname || user.username || authorId;
    } catch (error) {
      logger.warn({ error, authorId }, 'Could not resolve author name, using id');
    }

    this.authorNames.set(authorId, name);
    return name;
  }

  private async request<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    await this.rateLimiter.waitForSlot();
    this.onRequest?.();

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        headers: this.headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new SourceUnavailableError(`Medium API request failed: ${path}`, { cause: error });
    }

    if (!response.ok) {
      const message =
        response.status === 401 || response.status === 403
          ? `Medium API rejected credentials (${response.status})`
          : `Medium API returned ${response.status} for ${path}`;
      throw new SourceUnavailableError(message, { status: response.status });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SourceUnavailableError(`Medium API returned invalid JSON for ${path}`, { cause: error });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SourceUnavailableError(`Unexpected Medium API response for ${path}`, {
        cause: parsed.error,
      });
    }

    return parsed.data;
  }
}

function toCandidate(
  id: string,
  info: ArticleInfo,
  author: string,
  body: string,
  format: 'markdown' | 'html'
): ArticleCandidate {
  return {
    sourceUrl: info.url?.trim() ?? '',
    sourceId: info.id ?? id,
    title: info.title,
    subtitle: info.subtitle ?? '',
    author,
    rawBody: body,
    bodyFormat: format,
    publishedAt: parseMediumDate(info.published_at),
    tags: info.tags,
    language: info.lang ?? 'en',
  };
}
