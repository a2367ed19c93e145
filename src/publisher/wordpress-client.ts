/**
 * WordPress REST API Client
 *
 * Creates posts through /wp-json/wp/v2 with an application password.
 * Categories and tags are looked up by name and created when missing.
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { PublishRejectedError, PublishUnavailableError } from '../utils/errors.js';
import { buildExcerpt, buildPostContent, renderBody } from './formatter.js';
import type { BodyFormat, PostStatus } from '../types/index.js';

export interface PublishRequest {
  title: string;
  body: string;
  bodyFormat: BodyFormat;
  excerpt?: string;
  authorCredit?: string;
  sourceLink?: string;
  /** Tag names; already normalized by the caller */
  tags?: readonly string[];
  status: PostStatus;
  category: string;
}

export interface PublishedPost {
  id: string;
  link?: string;
}

/**
 * Publish target for synced articles
 */
export interface PublishClient {
  /** @throws PublishRejectedError | PublishUnavailableError */
  publish(request: PublishRequest): Promise<PublishedPost>;
  testConnection(): Promise<boolean>;
}

export interface WordPressClientOptions {
  url: string;
  username: string;
  password: string;
  timeoutMs?: number;
}

const postSchema = z.object({
  id: z.number(),
  link: z.string().optional(),
  status: z.string().optional(),
});

const categorySchema = z.object({
  id: z.number(),
  name: z.string(),
});

const tagSchema = z.object({
  id: z.number(),
  name: z.string(),
  slug: z.string().optional(),
});

const errorBodySchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
});

/** Client errors that are worth another attempt on a later run */
const TRANSIENT_CLIENT_STATUSES = new Set([408, 429]);

function decodeEntities(value: string): string {
  return value.replace(/&amp;/g, '&').replace(/&#039;/g, "'").replace(/&quot;/g, '"');
}

export class WordPressClient implements PublishClient {
  private readonly apiUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly categoryIds = new Map<string, number>();
  private readonly tagIds = new Map<string, number>();

  constructor(options: WordPressClientOptions) {
    this.apiUrl = `${options.url.replace(/\/+$/, '')}/wp-json/wp/v2`;
    this.authorization = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString('base64')}`;
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async publish(request: PublishRequest): Promise<PublishedPost> {
    const categoryId = await this.resolveCategoryId(request.category);
    const tagIds = await this.resolveTagIds(request.tags ?? []);

    const html = renderBody(request.body, request.bodyFormat);
    const content = buildPostContent({
      html,
      authorCredit: request.authorCredit,
      sourceLink: request.sourceLink,
    });

    const post = await this.send('POST', '/posts', postSchema, {
      title: request.title,
      content,
      excerpt: buildExcerpt(request.excerpt ?? '', html),
      status: request.status,
      categories: [categoryId],
      ...(tagIds.length > 0 ? { tags: tagIds } : {}),
      format: 'standard',
    });

    logger.info({ postId: post.id, link: post.link, status: post.status }, 'WordPress post created');

    return { id: String(post.id), link: post.link };
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.send('GET', '/posts?per_page=1', z.array(z.unknown()));
      return true;
    } catch (error) {
      logger.warn({ error }, 'WordPress connection test failed');
      return false;
    }
  }

  /**
   * Category id by name (case-insensitive), created when missing
   */
  async resolveCategoryId(name: string): Promise<number> {
    const key = name.trim().toLowerCase();
    const cached = this.categoryIds.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const matches = await this.send(
      'GET',
      `/categories?search=${encodeURIComponent(name.trim())}&per_page=100`,
      z.array(categorySchema)
    );
    const existing = matches.find((category) => decodeEntities(category.name).toLowerCase() === key);

    let id: number;
    if (existing) {
      id = existing.id;
    } else {
      logger.info({ category: name }, 'Creating WordPress category');
      const created = await this.send('POST', '/categories', categorySchema, { name: name.trim() });
      id = created.id;
    }

    this.categoryIds.set(key, id);
    return id;
  }

  /**
   * Tag ids by name or slug, creating missing tags; cached per client
   */
  async resolveTagIds(names: readonly string[]): Promise<number[]> {
    const ids: number[] = [];

    for (const name of names) {
      const key = name.trim().toLowerCase();
      if (!key) {
        continue;
      }

      let id = this.tagIds.get(key);
      if (id === undefined) {
        const matches = await this.send(
          'GET',
          `/tags?search=${encodeURIComponent(key)}&per_page=100`,
          z.array(tagSchema)
        );
        const existing = matches.find(
          (tag) => tag.slug === key || decodeEntities(tag.name).toLowerCase() === key
        );

        if (existing) {
          id = existing.id;
        } else {
          logger.info({ tag: key }, 'Creating WordPress tag');
          id = (await this.send('POST', '/tags', tagSchema, { name: key })).id;
        }
        this.tagIds.set(key, id);
      }

      if (!ids.includes(id)) {
        ids.push(id);
      }
    }

    return ids;
  }

  private async send<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown
  ): Promise<T> {
    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}${path}`, {
        method,
        headers: {
          Authorization: this.authorization,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new PublishUnavailableError(`WordPress request failed: ${method} ${path}`, { cause: error });
    }

    if (!response.ok) {
      const detail = await readErrorMessage(response);
      const message = `WordPress returned ${response.status} for ${method} ${path}${detail ? `: ${detail}` : ''}`;

      if (response.status >= 500 || TRANSIENT_CLIENT_STATUSES.has(response.status)) {
        throw new PublishUnavailableError(message, { status: response.status });
      }
      throw new PublishRejectedError(message, response.status);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new PublishUnavailableError(`WordPress returned invalid JSON for ${method} ${path}`, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new PublishUnavailableError(`Unexpected WordPress response for ${method} ${path}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}

async function readErrorMessage(response: Response): Promise<string | undefined> {
  try {
    const parsed = errorBodySchema.safeParse(await response.json());
    return parsed.success ? parsed.data.message : undefined;
  } catch {
    return undefined;
  }
}
