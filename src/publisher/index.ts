/**
 * Publisher Module
 *
 * WordPress publishing and post formatting
 */

export {
  WordPressClient,
  type PublishClient,
  type PublishRequest,
  type PublishedPost,
  type WordPressClientOptions,
} from './wordpress-client.js';

export { renderBody, buildExcerpt, buildPostContent, escapeHtml, stripHtml } from './formatter.js';
