/**
 * Embeddings Module
 *
 * Provider clients, the provider factory, retry policy and the
 * bounded-concurrency embedder.
 */

export type { EmbeddingProvider, EmbeddingProviderType, EmbedOptions, FetchFn } from './types.js';

export { assertEmbeddableText, errorForStatus, requestJson, type RequestJsonOptions } from './http.js';

export {
  OllamaEmbeddingProvider,
  DEFAULT_OLLAMA_HOST,
  DEFAULT_OLLAMA_EMBEDDING_MODEL,
  type OllamaEmbeddingOptions,
} from './ollama.js';

export {
  OpenAIEmbeddingProvider,
  OPENAI_EMBEDDING_MODELS,
  DEFAULT_OPENAI_EMBEDDING_MODEL,
  toEmbeddingError,
  type OpenAIEmbeddingOptions,
  type OpenAIEmbeddingsClient,
} from './openai.js';

export {
  CloudflareEmbeddingProvider,
  CLOUDFLARE_API_BASE,
  CLOUDFLARE_EMBEDDING_MODELS,
  DEFAULT_CLOUDFLARE_EMBEDDING_MODEL,
  type CloudflareEmbeddingOptions,
} from './cloudflare.js';

export { createEmbeddingProvider, type CreateProviderOptions } from './provider.js';

export { withRetry, backoffDelay, DEFAULT_RETRY_OPTIONS, type RetryOptions, type Sleep } from './retry.js';

export {
  embedNodes,
  embedWithRetry,
  DEFAULT_CONCURRENCY,
  type EmbedderOptions,
} from './embedder.js';
