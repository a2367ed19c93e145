/**
 * Source Module
 *
 * Medium article search and lookup
 */

export {
  MediumClient,
  extractArticleId,
  parseMediumDate,
  type SourceClient,
  type SearchQuery,
  type MediumClientOptions,
} from './medium-client.js';
