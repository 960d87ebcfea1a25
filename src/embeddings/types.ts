/**
 * Embedding Provider Types
 *
 * Every backend (local or cloud) satisfies the same contract, so the
 * pipeline only ever depends on `EmbeddingProvider`.
 */

import type { Vector } from '../nodes/types.js';

export type EmbeddingProviderType = 'ollama' | 'openai' | 'cloudflare';

/**
 * Per-call options.
 */
export interface EmbedOptions {
  /** Abort the request (the run was cancelled or a sibling call failed) */
  signal?: AbortSignal;
}

/**
 * Turns text into a fixed-length vector.
 *
 * Contract shared by all variants:
 * - non-empty text resolves to a fresh vector of the model's dimensionality
 * - empty or whitespace-only text rejects with EmptyInputError, before any I/O
 * - network/auth/server failures reject with ProviderUnavailableError
 *   and throttling with RateLimitError (both retryable)
 * - anything else the backend answers that is not an embedding rejects with
 *   InvalidResponseError
 */
export interface EmbeddingProvider {
  /** Provider identifier, e.g. "ollama" */
  readonly name: EmbeddingProviderType;
  /** Model the vectors come from */
  readonly model: string;

  embed(text: string, options?: EmbedOptions): Promise<Vector>;

  /** Cheap connectivity probe; never throws */
  isAvailable(): Promise<boolean>;
}

/** Injectable fetch, defaults to the global one */
export type FetchFn = typeof fetch;
