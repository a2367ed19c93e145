/**
 * Post Formatter
 *
 * Renders article bodies to HTML and adds the credit footer
 */

import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import remarkRehype from 'remark-rehype';
import rehypeStringify from 'rehype-stringify';
import type { BodyFormat } from '../types/index.js';

const EXCERPT_LENGTH = 150;

const markdownProcessor = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype, { allowDangerousHtml: true })
  .use(rehypeStringify, { allowDangerousHtml: true });

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Markdown (GFM) to HTML; HTML bodies pass through
 */
export function renderBody(body: string, format: BodyFormat): string {
  if (!body.trim()) {
    return '';
  }
  if (format === 'html') {
    return body;
  }
  return String(markdownProcessor.processSync(body)).trim();
}

export function stripHtml(html: string): string {
  return html
    .replace(/<[^>]*>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Subtitle when present, otherwise the start of the body text
 */
export function buildExcerpt(subtitle: string, html: string, maxLength: number = EXCERPT_LENGTH): string {
  if (subtitle.trim()) {
    return subtitle.trim();
  }
  const text = stripHtml(html);
  return text.length > maxLength ? `${text.slice(0, maxLength).trimEnd()}...` : text;
}

export interface PostContentParts {
  html: string;
  authorCredit?: string;
  sourceLink?: string;
}

/**
 * Body HTML followed by author credit and link to the original
 */
export function buildPostContent({ html, authorCredit, sourceLink }: PostContentParts): string {
  const credit: string[] = [];

  if (authorCredit?.trim()) {
    credit.push(`Originally written by <strong>${escapeHtml(authorCredit.trim())}</strong>.`);
  }
  if (sourceLink?.trim()) {
    credit.push(
      `<a href="${escapeHtml(sourceLink.trim())}" target="_blank" rel="noopener">Read the original article on Medium</a>`
    );
  }

  if (credit.length === 0) {
    return html;
  }

  return `${html}\n<hr />\n<p class="source-credit">${credit.join(' ')}</p>`;
}
