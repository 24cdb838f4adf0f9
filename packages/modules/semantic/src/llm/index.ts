export {
  OpenAITranslator,
  UnavailableTranslator,
  TRANSLATOR_PROMPT,
  promptHash,
} from './translator';
export type { QueryTranslator, TranslateOptions, OpenAITranslatorOptions } from './translator';
export { OpenAIEmbeddingProvider, UnavailableEmbeddingProvider } from './embeddings';
export type { EmbeddingProvider, EmbedOptions, OpenAIEmbeddingOptions } from './embeddings';
