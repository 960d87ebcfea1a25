/**
 * HTTP helpers shared by the fetch-based providers (Ollama, Cloudflare).
 *
 * Translates transport and status failures into the embedding error
 * taxonomy so the retry policy can tell retryable from fatal.
 */

import {
  CancelledError,
  EmptyInputError,
  InvalidResponseError,
  ProviderUnavailableError,
  RateLimitError,
  type EmbeddingError,
} from '../errors/index.js';
import { preview } from '../utils/logger.js';
import type { FetchFn } from './types.js';

/**
 * Reject blank text before any request is made.
 */
export function assertEmbeddableText(text: string, provider: string): void {
  if (text.trim().length === 0) {
    throw new EmptyInputError(provider);
  }
}

/**
 * Map a non-2xx HTTP status to an embedding error.
 *
 * 429 is throttling; auth failures, missing models, timeouts and server
 * errors mean the provider is unusable right now; any other client error is
 * a request the provider will never accept.
 */
export function errorForStatus(
  provider: string,
  status: number,
  body: string
): EmbeddingError {
  const detail = `HTTP ${status}${body ? `: ${preview(body, 160)}` : ''}`;

  if (status === 429) {
    return new RateLimitError(provider, detail);
  }
  if (status === 401 || status === 403 || status === 404 || status === 408 || status >= 500) {
    return new ProviderUnavailableError(provider, detail, status);
  }
  return new InvalidResponseError(provider, detail);
}

export interface RequestJsonOptions {
  provider: string;
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
  /** Abort the request after this many milliseconds (0 disables) */
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

/**
 * Perform a request and parse its JSON body.
 *
 * @throws CancelledError when `signal` aborts
 * @throws ProviderUnavailableError on network failure or timeout
 * @throws RateLimitError / ProviderUnavailableError / InvalidResponseError on bad status
 * @throws InvalidResponseError when the body is not JSON
 */
export async function requestJson(options: RequestJsonOptions): Promise<unknown> {
  const {
    provider,
    url,
    method = 'POST',
    headers = {},
    body,
    signal,
    timeoutMs = 0,
    fetchFn = fetch,
  } = options;

  if (signal?.aborted) {
    throw new CancelledError();
  }

  // One controller fed by both the caller's signal and the timeout
  const controller = new AbortController();
  let timedOut = false;
  const timer =
    timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, timeoutMs)
      : null;
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  let response: Response;
  try {
    response = await fetchFn(url, {
      method,
      headers: {
        'Content-Type': 'application/json',
        ...headers,
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: controller.signal,
    });
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    if (timedOut) {
      throw new ProviderUnavailableError(provider, `request timed out after ${timeoutMs}ms`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ProviderUnavailableError(provider, message);
  } finally {
    if (timer) clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }

  const text = await response.text();

  if (!response.ok) {
    throw errorForStatus(provider, response.status, text);
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new InvalidResponseError(provider, `body is not JSON (${preview(text, 80)})`);
  }
}
