/**
 * Cloudflare Workers AI Embedding Provider (cloud)
 *
 * POST https://api.cloudflare.com/client/v4/accounts/{account}/ai/run/{model}
 * with `{ text }`; the vector is `result.data[0]`.
 *
 * Requires CLOUDFLARE_API_TOKEN and CLOUDFLARE_ACCOUNT_ID.
 */

import { z } from 'zod';

import { InvalidResponseError } from '../errors/index.js';
import type { Vector } from '../nodes/types.js';
import { assertEmbeddableText, requestJson } from './http.js';
import type { EmbeddingProvider, EmbedOptions, FetchFn } from './types.js';

export const CLOUDFLARE_API_BASE = 'https://api.cloudflare.com/client/v4';

/** BGE-base: 768 dimensions */
export const DEFAULT_CLOUDFLARE_EMBEDDING_MODEL = '@cf/baai/bge-base-en-v1.5';

export const CLOUDFLARE_EMBEDDING_MODELS = [
  '@cf/baai/bge-small-en-v1.5',
  '@cf/baai/bge-base-en-v1.5',
  '@cf/baai/bge-large-en-v1.5',
] as const;

export interface CloudflareEmbeddingOptions {
  apiToken: string;
  accountId: string;
  /** @default '@cf/baai/bge-base-en-v1.5' */
  model?: string;
  timeoutMs?: number;
  /** Override the API base (proxies, tests) */
  baseUrl?: string;
  fetchFn?: FetchFn;
}

const CloudflareEmbeddingResponseSchema = z.object({
  result: z.object({
    data: z.array(z.array(z.number()).min(1)).min(1),
  }),
});

export class CloudflareEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'cloudflare';
  readonly model: string;
  private readonly apiToken: string;
  private readonly baseUrl: string;
  private readonly accountUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn?: FetchFn;

  constructor(options: CloudflareEmbeddingOptions) {
    this.model = options.model ?? DEFAULT_CLOUDFLARE_EMBEDDING_MODEL;
    this.apiToken = options.apiToken;
    this.baseUrl = (options.baseUrl ?? CLOUDFLARE_API_BASE).replace(/\/+$/, '');
    this.accountUrl = `${this.baseUrl}/accounts/${options.accountId}`;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.fetchFn = options.fetchFn;
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<Vector> {
    assertEmbeddableText(text, this.name);

    const body = await requestJson({
      provider: this.name,
      url: `${this.accountUrl}/ai/run/${this.model}`,
      headers: { Authorization: `Bearer ${this.apiToken}` },
      body: { text },
      signal: options.signal,
      timeoutMs: this.timeoutMs,
      fetchFn: this.fetchFn,
    });

    const parsed = CloudflareEmbeddingResponseSchema.safeParse(body);
    const vector = parsed.success ? parsed.data.result.data[0] : undefined;
    if (!vector) {
      throw new InvalidResponseError(this.name, 'missing "result.data" vectors');
    }

    return vector;
  }

  /** Verifies the API token */
  async isAvailable(): Promise<boolean> {
    try {
      await requestJson({
        provider: this.name,
        url: `${this.baseUrl}/user/tokens/verify`,
        method: 'GET',
        headers: { Authorization: `Bearer ${this.apiToken}` },
        timeoutMs: this.timeoutMs,
        fetchFn: this.fetchFn,
      });
      return true;
    } catch {
      return false;
    }
  }
}
