/**
 * Ollama Embedding Provider (local inference)
 *
 * Talks to a local Ollama server: POST {host}/api/embeddings with
 * `{ model, prompt }`, answered by `{ embedding: number[] }`.
 *
 * No API key required; the server must be running and the model pulled
 * (`ollama pull bge-large`).
 */

import { z } from 'zod';

import { InvalidResponseError } from '../errors/index.js';
import type { Vector } from '../nodes/types.js';
import { assertEmbeddableText, requestJson } from './http.js';
import type { EmbeddingProvider, EmbedOptions, FetchFn } from './types.js';

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

/** BGE-large: 1024 dimensions */
export const DEFAULT_OLLAMA_EMBEDDING_MODEL = 'bge-large';

export interface OllamaEmbeddingOptions {
  /** @default 'bge-large' */
  model?: string;
  /** @default 'http://localhost:11434' */
  host?: string;
  /** Per-request timeout in milliseconds; local models can be slow on first load */
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

const OllamaEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  readonly model: string;
  readonly host: string;
  private readonly timeoutMs: number;
  private readonly fetchFn?: FetchFn;

  constructor(options: OllamaEmbeddingOptions = {}) {
    this.model = options.model ?? DEFAULT_OLLAMA_EMBEDDING_MODEL;
    this.host = (options.host ?? DEFAULT_OLLAMA_HOST).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 0;
    this.fetchFn = options.fetchFn;
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<Vector> {
    assertEmbeddableText(text, this.name);

    const body = await requestJson({
      provider: this.name,
      url: `${this.host}/api/embeddings`,
      body: { model: this.model, prompt: text },
      signal: options.signal,
      timeoutMs: this.timeoutMs,
      fetchFn: this.fetchFn,
    });

    const parsed = OllamaEmbeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidResponseError(this.name, 'missing "embedding" array');
    }

    return parsed.data.embedding;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await requestJson({
        provider: this.name,
        url: `${this.host}/api/tags`,
        method: 'GET',
        timeoutMs: this.timeoutMs,
        fetchFn: this.fetchFn,
      });
      return true;
    } catch {
      return false;
    }
  }
}
