/**
 * Transformer Module
 *
 * OpenAI-powered article translation
 */

export {
  Translator,
  createTranslator,
  createOpenAiCompletion,
  languageName,
  type ContentTransformer,
  type CompletionFn,
  type CompletionRequest,
} from './translator.js';
