/**
 * WordPress post tags
 *
 * Medium tags are normalized to slugs and kept only when they are on the
 * allow-list in relevant-tags.json.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

export const DEFAULT_POST_TAGS: readonly string[] = ['tech', 'programming'];
export const MAX_POST_TAGS = 5;

function loadRelevantTags(): ReadonlySet<string> {
  const raw: unknown = JSON.parse(readFileSync(new URL('./relevant-tags.json', import.meta.url), 'utf-8'));
  return new Set(z.array(z.string()).parse(raw));
}

export const RELEVANT_TAGS = loadRelevantTags();

export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase().replace(/[\s_]+/g, '-');
}

/**
 * Relevant tags in source order, de-duplicated, capped; defaults when none match
 */
export function normalizePostTags(tags: readonly string[]): string[] {
  const relevant = [...new Set(tags.map(normalizeTag))].filter((tag) => RELEVANT_TAGS.has(tag));
  return relevant.length > 0 ? relevant.slice(0, MAX_POST_TAGS) : [...DEFAULT_POST_TAGS];
}
