/**
 * Article Translator
 *
 * Translates and lightly rewrites article text with an OpenAI chat model.
 * Code is swapped for placeholders before the request and restored afterwards:
 * fenced and inline code in Markdown, code/pre/script/style elements in HTML.
 */

import OpenAI from 'openai';
import { unified } from 'unified';
import rehypeParse from 'rehype-parse';
import rehypeStringify from 'rehype-stringify';
import { visit, SKIP } from 'unist-util-visit';
import type { Text } from 'hast';
import { logger } from '../utils/logger.js';
import { TransformFailedError, describeError } from '../utils/errors.js';
import type { BodyFormat } from '../types/index.js';

/**
 * Text transformation applied before publishing
 */
export interface ContentTransformer {
  transform(text: string, targetLanguage: string, format?: BodyFormat): Promise<string>;
}

export interface CompletionRequest {
  system: string;
  user: string;
}

export type CompletionFn = (request: CompletionRequest) => Promise<string>;

/** Shorter text is returned as-is */
const MIN_TRANSLATABLE_LENGTH = 10;

const CODE_PATTERN = /```[\s\S]*?```|`[^`\n]+`/g;

const UNTRANSLATED_ELEMENTS = new Set(['code', 'pre', 'script', 'style']);

const htmlProcessor = unified().use(rehypeParse, { fragment: true }).use(rehypeStringify);

const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  pt: 'Brazilian Portuguese',
  'pt-br': 'Brazilian Portuguese',
  es: 'Spanish',
  fr: 'French',
  de: 'German',
  it: 'Italian',
};

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code.toLowerCase()] ?? code;
}

function placeholder(index: number): string {
  return `[[CODE_${index}]]`;
}

interface ProtectedText {
  text: string;
  blocks: string[];
}

function protectMarkdown(text: string): ProtectedText {
  const blocks: string[] = [];
  const protectedText = text.replace(CODE_PATTERN, (block) => {
    blocks.push(block);
    return placeholder(blocks.length - 1);
  });
  return { text: protectedText, blocks };
}

function protectHtml(html: string): ProtectedText {
  const blocks: string[] = [];
  const tree = htmlProcessor.parse(html);

  visit(tree, 'element', (node, index, parent) => {
    if (!UNTRANSLATED_ELEMENTS.has(node.tagName) || !parent || index === undefined) {
      return;
    }
    blocks.push(htmlProcessor.stringify({ type: 'root', children: [node] }));
    const marker: Text = { type: 'text', value: placeholder(blocks.length - 1) };
    parent.children[index] = marker;
    return SKIP;
  });

  return { text: htmlProcessor.stringify(tree), blocks };
}

function buildSystemPrompt(targetLanguage: string): string {
  return `You are a professional translator of software engineering articles.
Translate the text the user sends into ${languageName(targetLanguage)} and rewrite it in your own words while keeping every fact, example and the author's intent.

Rules:
- Keep the Markdown or HTML structure exactly (headings, lists, links, emphasis, tags).
- Leave placeholders such as [[CODE_0]] untouched and in place.
- Keep product names, library names and technical terms that are usually left in English.
- Reply with the translated text only, without comments or surrounding quotes.`;
}

/**
 * Completion function backed by the OpenAI chat API
 */
export function createOpenAiCompletion(client: OpenAI, model: string): CompletionFn {
  return async ({ system, user }) => {
    const response = await client.chat.completions.create({
      model,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
      temperature: 0,
    });

    logger.debug({ model, tokensUsed: response.usage?.total_tokens ?? 0 }, 'Completion received');
    return response.choices[0]?.message?.content ?? '';
  };
}

export class Translator implements ContentTransformer {
  constructor(private readonly complete: CompletionFn) {}

  async transform(text: string, targetLanguage: string, format: BodyFormat = 'markdown'): Promise<string> {
    if (text.trim().length < MIN_TRANSLATABLE_LENGTH) {
      return text;
    }

    const { text: protectedText, blocks: codeBlocks } =
      format === 'html' ? protectHtml(text) : protectMarkdown(text);

    let translated: string;
    try {
      translated = await this.complete({
        system: buildSystemPrompt(targetLanguage),
        user: protectedText,
      });
    } catch (error) {
      throw new TransformFailedError(`Translation request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!translated.trim()) {
      throw new TransformFailedError('Translation returned empty text');
    }

    let restored = translated;
    codeBlocks.forEach((block, index) => {
      const marker = placeholder(index);
      if (!restored.includes(marker)) {
        throw new TransformFailedError(`Translation dropped code block ${index}`);
      }
      restored = restored.split(marker).join(block);
    });

    logger.debug(
      { targetLanguage, format, inputLength: text.length, outputLength: restored.length, codeBlocks: codeBlocks.length },
      'Text translated'
    );

    return restored;
  }
}

/**
 * Translator from an API key, or null when translation is not configured
 */
export function createTranslator(apiKey: string | undefined, model: string): Translator | null {
  if (!apiKey) {
    return null;
  }
  return new Translator(createOpenAiCompletion(new OpenAI({ apiKey }), model));
}
