/**
 * Candidate Screening
 *
 * Rejects promotional/recruiting posts, off-topic results and articles in an
 * unwanted language before anything is translated or published.
 */

import { BLOCKED_CATEGORIES, BLOCKED_KEYWORDS, type BlockedCategory } from '../config/keywords.js';
import { logger } from '../utils/logger.js';
import type { ArticleCandidate, LanguagePreference, SyncConfig } from '../types/index.js';

export type ScreeningRule = 'blocked' | 'language' | 'relevance';

/**
 * Screening outcome for one candidate
 *
 * Only 'blocked' depends on the article alone; the other rules depend on the
 * run settings and may pass on a later run.
 */
export interface ScreeningResult {
  accepted: boolean;
  rule?: ScreeningRule;
  reason?: string;
}

export interface BlockedMatch {
  keyword: string;
  category: BlockedCategory;
}

/** Only the start of the body is scanned for blocked keywords */
const BODY_SCAN_LENGTH = 1000;

/**
 * Normalize text for matching (lowercase, remove accents)
 */
function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '');
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, accent-insensitive keyword check
 */
export function containsKeyword(text: string, keyword: string): boolean {
  const normalizedKeyword = normalizeText(keyword.trim());
  if (!normalizedKeyword) {
    return false;
  }
  const regex = new RegExp(`(?<![a-z0-9])${escapeRegex(normalizedKeyword)}(?![a-z0-9])`);
  return regex.test(normalizeText(text));
}

function normalizeTag(tag: string): string {
  return normalizeText(tag).trim().replace(/[\s_]+/g, '-');
}

/**
 * Find the first blocked keyword in title, subtitle or the start of the body
 */
export function findBlockedKeyword(candidate: ArticleCandidate): BlockedMatch | null {
  const haystacks = [candidate.title, candidate.subtitle, candidate.rawBody.slice(0, BODY_SCAN_LENGTH)];

  for (const category of BLOCKED_CATEGORIES) {
    for (const keyword of BLOCKED_KEYWORDS[category]) {
      if (haystacks.some((text) => containsKeyword(text, keyword))) {
        return { keyword, category };
      }
    }
  }

  return null;
}

/**
 * A candidate is relevant when a search keyword appears in its title, subtitle or tags
 */
export function isRelevant(candidate: ArticleCandidate, keywords: readonly string[]): boolean {
  const tags = new Set(candidate.tags.map(normalizeTag));

  return keywords.some(
    (keyword) =>
      containsKeyword(candidate.title, keyword) ||
      containsKeyword(candidate.subtitle, keyword) ||
      tags.has(normalizeTag(keyword))
  );
}

/**
 * Language preference check ('pt' also accepts regional variants such as pt-BR)
 */
export function matchesLanguage(candidate: ArticleCandidate, preference: LanguagePreference): boolean {
  if (preference === 'both') {
    return true;
  }
  const language = candidate.language.toLowerCase();
  return language === preference || language.startsWith(`${preference}-`);
}

/**
 * Screen a candidate against the run settings
 */
export function screenCandidate(
  candidate: ArticleCandidate,
  config: Pick<SyncConfig, 'keywords' | 'languagePreference'>
): ScreeningResult {
  let result: ScreeningResult = { accepted: true };

  const blocked = findBlockedKeyword(candidate);
  if (blocked) {
    result = {
      accepted: false,
      rule: 'blocked',
      reason: `blocked keyword "${blocked.keyword}" (${blocked.category})`,
    };
  } else if (!matchesLanguage(candidate, config.languagePreference)) {
    result = { accepted: false, rule: 'language', reason: `language "${candidate.language}" not wanted` };
  } else if (!isRelevant(candidate, config.keywords)) {
    result = { accepted: false, rule: 'relevance', reason: 'no search keyword in title, subtitle or tags' };
  }

  logger.debug(
    {
      url: candidate.sourceUrl,
      title: candidate.title.slice(0, 50),
      accepted: result.accepted,
      rule: result.rule,
      reason: result.reason,
    },
    'Candidate screened'
  );

  return result;
}
