/**
 * Embedder Orchestration
 *
 * Computes one vector per node with a bounded worker pool. Results are
 * written by node index, so completion order never affects the output.
 *
 * Failure handling:
 * 1. Retryable failures are retried per node (see retry.ts)
 * 2. The first node that still fails aborts every in-flight sibling call
 *    and is reported with its `nodeIndex`
 * 3. A caller abort ends the run with CancelledError
 *
 * Either abort also cuts short any sibling that is waiting out a backoff.
 */

import { CancelledError, DimensionMismatchError, EmbeddingError } from '../errors/index.js';
import type { Node, Vector } from '../nodes/types.js';
import { preview, silentLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_RETRY_OPTIONS, withRetry, type Sleep } from './retry.js';
import type { EmbeddingProvider } from './types.js';

export const DEFAULT_CONCURRENCY = 4;

export interface EmbedderOptions {
  /** Maximum in-flight provider calls @default 4 */
  concurrency?: number;
  /** @default 3 */
  maxRetries?: number;
  /** @default 1000 */
  backoffMs?: number;
  /** Cancels the whole run */
  signal?: AbortSignal;
  /** Called after every node that gets a vector */
  onProgress?: (done: number, total: number) => void;
  logger?: Logger;
  /** Injectable backoff wait (tests) */
  sleep?: Sleep;
}

/**
 * Embed a single text with the retry policy applied.
 */
export async function embedWithRetry(
  provider: EmbeddingProvider,
  text: string,
  options: EmbedderOptions = {}
): Promise<Vector> {
  const {
    maxRetries = DEFAULT_RETRY_OPTIONS.maxRetries,
    backoffMs = DEFAULT_RETRY_OPTIONS.backoffMs,
    signal,
    sleep,
    logger = silentLogger,
  } = options;

  return withRetry(() => provider.embed(text, { signal }), {
    maxRetries,
    backoffMs,
    signal,
    sleep,
    onRetry: (error, retry, delayMs) => {
      logger.debug?.(
        `Retrying "${preview(text)}" (${retry}/${maxRetries}) in ${delayMs}ms: ${error.message}`
      );
    },
  });
}

/**
 * Compute embeddings for `nodes`.
 *
 * Nodes that already carry an embedding keep it and cost no call.
 *
 * @returns vectors in node order (`result[i]` belongs to `nodes[i]`)
 * @throws the first node failure, tagged with `nodeIndex` when it is an EmbeddingError
 * @throws DimensionMismatchError when the provider returns vectors of mixed length
 * @throws CancelledError when `signal` aborts
 */
export async function embedNodes(
  nodes: readonly Node[],
  provider: EmbeddingProvider,
  options: EmbedderOptions = {}
): Promise<Vector[]> {
  const {
    concurrency = DEFAULT_CONCURRENCY,
    signal,
    onProgress,
    logger = silentLogger,
  } = options;

  if (signal?.aborted) {
    throw new CancelledError();
  }

  const vectors: Array<Vector | undefined> = nodes.map((node) => node.embedding);
  const pending: number[] = [];
  vectors.forEach((vector, index) => {
    if (!vector) pending.push(index);
  });

  const total = nodes.length;
  let done = total - pending.length;

  if (pending.length > 0) {
    // Aborted by the caller or by the first failing node
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let failed = false;
    let failure: unknown;
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (!controller.signal.aborted) {
        const index = pending[cursor++];
        if (index === undefined) return;
        const node = nodes[index];
        if (!node) return;

        try {
          vectors[index] = await embedWithRetry(provider, node.text, {
            ...options,
            signal: controller.signal,
          });
        } catch (error) {
          if (!failed) {
            failed = true;
            failure = error;
            if (error instanceof EmbeddingError) {
              error.nodeIndex = index;
            }
            controller.abort();
          }
          return;
        }

        done++;
        onProgress?.(done, total);
      }
    };

    const workerCount = Math.max(1, Math.min(concurrency, pending.length));
    logger.debug?.(
      `Embedding ${pending.length} node(s) with ${provider.name}/${provider.model} (${workerCount} worker(s))`
    );

    try {
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (signal?.aborted) {
      throw new CancelledError();
    }
    if (failed) {
      throw failure;
    }
  }

  const result: Vector[] = [];
  let dimensions: number | undefined;

  for (const [index, vector] of vectors.entries()) {
    if (!vector) {
      throw new CancelledError();
    }
    dimensions ??= vector.length;
    if (vector.length !== dimensions) {
      const error = new DimensionMismatchError(
        `Node #${index} embedding has ${vector.length} dimensions, expected ${dimensions}`
      );
      error.nodeIndex = index;
      throw error;
    }
    result.push(vector);
  }

  return result;
}
