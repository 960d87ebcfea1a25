/**
 * Embedding Provider Factory
 *
 * Creates the configured embedding provider. Credentials come from the
 * environment and are checked here, so a missing key fails before any
 * node is touched.
 */

import { loadEnv, type EnvVars } from '../config/env.js';
import type { EmbeddingConfig } from '../config/schema.js';
import { APIKeyError } from '../errors/index.js';
import { CloudflareEmbeddingProvider } from './cloudflare.js';
import { OllamaEmbeddingProvider } from './ollama.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import type { EmbeddingProvider, FetchFn } from './types.js';

export interface CreateProviderOptions {
  /** Defaults to the process environment */
  env?: EnvVars;
  /** Injected into the fetch-based providers (tests) */
  fetchFn?: FetchFn;
}

/**
 * Create an embedding provider from configuration.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const provider = createEmbeddingProvider(config.embedding);
 * const vector = await provider.embed('Hello, world!');
 * ```
 *
 * @throws APIKeyError when a cloud provider's credentials are missing
 */
export function createEmbeddingProvider(
  config: Pick<EmbeddingConfig, 'provider' | 'model' | 'timeout_ms'>,
  options: CreateProviderOptions = {}
): EmbeddingProvider {
  const env = options.env ?? loadEnv();

  switch (config.provider) {
    case 'ollama':
      return new OllamaEmbeddingProvider({
        model: config.model,
        host: env.OLLAMA_HOST,
        timeoutMs: config.timeout_ms,
        fetchFn: options.fetchFn,
      });

    case 'openai':
      if (!env.OPENAI_API_KEY) {
        throw new APIKeyError('OpenAI', 'OPENAI_API_KEY');
      }
      return new OpenAIEmbeddingProvider({
        apiKey: env.OPENAI_API_KEY,
        model: config.model,
        timeoutMs: config.timeout_ms,
      });

    case 'cloudflare':
      if (!env.CLOUDFLARE_API_TOKEN) {
        throw new APIKeyError('Cloudflare', 'CLOUDFLARE_API_TOKEN');
      }
      if (!env.CLOUDFLARE_ACCOUNT_ID) {
        throw new APIKeyError('Cloudflare', 'CLOUDFLARE_ACCOUNT_ID');
      }
      return new CloudflareEmbeddingProvider({
        apiToken: env.CLOUDFLARE_API_TOKEN,
        accountId: env.CLOUDFLARE_ACCOUNT_ID,
        model: config.model,
        timeoutMs: config.timeout_ms,
        fetchFn: options.fetchFn,
      });
  }
}
