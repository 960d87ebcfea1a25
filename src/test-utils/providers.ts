/**
 * Test Utilities - Scripted Embedding Providers
 *
 * In-process stand-ins for the embedding backends. Tests decide which
 * vector each text gets, how many calls fail first, and how long calls take.
 *
 * @example
 * ```typescript
 * const [a, b] = chainVectors([0.9]);
 * const provider = new ScriptedEmbeddingProvider({ vectors: { first: a, second: b } });
 * ```
 */

import { CancelledError, ProviderUnavailableError } from '../errors/index.js';
import { assertEmbeddableText } from '../embeddings/http.js';
import type { EmbeddingProvider, EmbedOptions, EmbeddingProviderType } from '../embeddings/types.js';
import type { Vector } from '../nodes/types.js';

export interface ScriptedProviderOptions {
  /** Vector per exact text */
  vectors?: Record<string, Vector>;
  /** Vector for texts not listed in `vectors` @default [1, 0] */
  fallback?: (text: string) => Vector;
  /** The first N calls fail (before any vector is returned) */
  failures?: number;
  /** Error thrown by failing calls @default ProviderUnavailableError */
  failWith?: (text: string) => Error;
  /** Per-call latency; aborts early when the call's signal fires */
  delayMs?: number | ((text: string) => number);
  name?: EmbeddingProviderType;
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class ScriptedEmbeddingProvider implements EmbeddingProvider {
  readonly name: EmbeddingProviderType;
  readonly model = 'scripted';
  /** Every text passed to `embed`, in call order */
  readonly calls: string[] = [];
  /** Highest number of calls in flight at once */
  maxInFlight = 0;

  private inFlight = 0;
  private failuresLeft: number;

  constructor(private readonly options: ScriptedProviderOptions = {}) {
    this.name = options.name ?? 'ollama';
    this.failuresLeft = options.failures ?? 0;
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<Vector> {
    assertEmbeddableText(text, this.name);
    if (options.signal?.aborted) {
      throw new CancelledError();
    }

    this.calls.push(text);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      const { delayMs = 0 } = this.options;
      const delay = typeof delayMs === 'function' ? delayMs(text) : delayMs;
      if (delay > 0) {
        await wait(delay, options.signal);
      }

      if (this.failuresLeft > 0) {
        this.failuresLeft--;
        throw this.options.failWith?.(text) ??
          new ProviderUnavailableError(this.name, 'scripted failure');
      }

      const vector = this.options.vectors?.[text] ?? this.options.fallback?.(text) ?? [1, 0];
      return [...vector];
    } finally {
      this.inFlight--;
    }
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

/**
 * Unit vectors in the plane whose consecutive cosine similarities are
 * exactly `similarities` (up to floating point).
 *
 * chainVectors([0.82, 0.15]) returns three vectors v0, v1, v2 with
 * cos(v0, v1) = 0.82 and cos(v1, v2) = 0.15.
 */
export function chainVectors(similarities: number[]): Vector[] {
  let angle = 0;
  const vectors: Vector[] = [[1, 0]];
  for (const similarity of similarities) {
    angle += Math.acos(similarity);
    vectors.push([Math.cos(angle), Math.sin(angle)]);
  }
  return vectors;
}
