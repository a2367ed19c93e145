/**
 * Filter Module
 *
 * Keyword, relevance and language screening of candidates
 */

export {
  screenCandidate,
  findBlockedKeyword,
  isRelevant,
  matchesLanguage,
  containsKeyword,
  type ScreeningResult,
  type ScreeningRule,
  type BlockedMatch,
} from './matcher.js';

export { BLOCKED_KEYWORDS, type BlockedCategory } from '../config/keywords.js';
