/**
 * OpenAI Embedding Provider (cloud)
 *
 * Uses the official SDK's `embeddings.create`. The SDK's own retries are
 * disabled (`maxRetries: 0`) so the pipeline's retry policy is the only one
 * in play.
 *
 * SECURITY: the API key is passed straight to the SDK and never logged.
 */

import OpenAI from 'openai';

import {
  CancelledError,
  EmbeddingError,
  InvalidResponseError,
  ProviderUnavailableError,
  RateLimitError,
} from '../errors/index.js';
import type { Vector } from '../nodes/types.js';
import { assertEmbeddableText, errorForStatus } from './http.js';
import type { EmbeddingProvider, EmbedOptions } from './types.js';

export const OPENAI_EMBEDDING_MODELS = [
  'text-embedding-3-large',
  'text-embedding-3-small',
  'text-embedding-ada-002',
] as const;

/** 1536 dimensions */
export const DEFAULT_OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small';

/**
 * The slice of the OpenAI client this provider needs.
 * Lets tests pass a fake instead of a real client.
 */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string },
      options?: { signal?: AbortSignal }
    ): PromiseLike<{ data: Array<{ embedding: number[] }> }>;
  };
  models: {
    list(): PromiseLike<unknown>;
  };
}

export interface OpenAIEmbeddingOptions {
  /** Required unless `client` is given */
  apiKey?: string;
  /** @default 'text-embedding-3-small' */
  model?: string;
  /** OpenAI-compatible endpoints (Azure, proxies) */
  baseURL?: string;
  timeoutMs?: number;
  client?: OpenAIEmbeddingsClient;
}

/**
 * Translate an SDK failure into the embedding error taxonomy.
 */
export function toEmbeddingError(error: unknown): EmbeddingError {
  if (error instanceof EmbeddingError) {
    return error;
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new CancelledError();
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ProviderUnavailableError('openai', error.message);
  }
  if (error instanceof OpenAI.APIError) {
    if (error.status === undefined) {
      return new ProviderUnavailableError('openai', error.message);
    }
    if (error.status === 429) {
      return new RateLimitError('openai', error.message);
    }
    return errorForStatus('openai', error.status, error.message);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProviderUnavailableError('openai', message);
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;
  private readonly client: OpenAIEmbeddingsClient;

  constructor(options: OpenAIEmbeddingOptions) {
    this.model = options.model ?? DEFAULT_OPENAI_EMBEDDING_MODEL;
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<Vector> {
    assertEmbeddableText(text, this.name);

    let response: { data: Array<{ embedding: number[] }> };
    try {
      response = await this.client.embeddings.create(
        { model: this.model, input: text },
        { signal: options.signal }
      );
    } catch (error) {
      throw toEmbeddingError(error);
    }

    const vector = response.data[0]?.embedding;
    if (!vector || vector.length === 0) {
      throw new InvalidResponseError(this.name, 'empty "data" array');
    }

    return vector;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }
}
