/**
 * Semantic Merge Step
 *
 * Two phases:
 * 1. Embed every node (bounded concurrency, see embedder.ts)
 * 2. One greedy left-to-right sweep: the running accumulator absorbs the
 *    next node while the merge policy allows it, otherwise it is emitted
 *
 * No backtracking and no all-pairs comparison: a node is only ever
 * compared with the accumulator directly before it.
 */

import { embedNodes, embedWithRetry, type EmbedderOptions } from '../embeddings/embedder.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import { EmbeddingError } from '../errors/index.js';
import { mergeNodes } from '../nodes/node.js';
import type { Node, Vector } from '../nodes/types.js';
import { cosineSimilarity } from '../similarity/cosine.js';
import { DEFAULT_MAX_TOKENS, MergePolicy } from './merge-policy.js';
import type { PipelineContext, ProcessingStep } from './types.js';

/**
 * Vector that stands for a freshly merged accumulator.
 * - reembed: embed the merged text (one extra call, only if another node follows)
 * - inherit_last: reuse the right-hand node's vector
 */
export type MergedEmbeddingStrategy = 'reembed' | 'inherit_last';

export interface CombineNodesSemanticallyOptions {
  provider: EmbeddingProvider;
  /** @default MergePolicy with threshold 0.6 and the heuristic counter */
  policy?: MergePolicy;
  /** @default 1000 */
  maxTokens?: number;
  /** @default 'reembed' */
  mergedEmbedding?: MergedEmbeddingStrategy;
  /** Worker pool size, retries and backoff for every embedding call */
  embedder?: Pick<EmbedderOptions, 'concurrency' | 'maxRetries' | 'backoffMs' | 'sleep'>;
}

function tagNode<T>(index: number, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof EmbeddingError && error.nodeIndex === undefined) {
      error.nodeIndex = index;
    }
    throw error;
  }
}

export class CombineNodesSemantically implements ProcessingStep {
  readonly name = 'CombineNodesSemantically';
  readonly policy: MergePolicy;
  readonly maxTokens: number;
  readonly mergedEmbedding: MergedEmbeddingStrategy;
  private readonly provider: EmbeddingProvider;
  private readonly embedder: CombineNodesSemanticallyOptions['embedder'];

  constructor(options: CombineNodesSemanticallyOptions) {
    this.provider = options.provider;
    this.policy = options.policy ?? new MergePolicy();
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.mergedEmbedding = options.mergedEmbedding ?? 'reembed';
    this.embedder = options.embedder;
  }

  dispose(): void {
    this.policy.counter.dispose?.();
  }

  async process(nodes: Node[], ctx: PipelineContext): Promise<Node[]> {
    const [first] = nodes;
    // Nothing to compare: no provider call
    if (!first || nodes.length === 1) {
      return nodes;
    }

    const embedderOptions: EmbedderOptions = {
      ...this.embedder,
      signal: ctx.signal,
      logger: ctx.logger,
    };

    // Phase 1: fan-out/fan-in
    const pending = nodes.filter((node) => !node.embedding).length;
    const embedStart = performance.now();
    ctx.onStageStart?.('embedding', pending);

    const vectors = await embedNodes(nodes, this.provider, {
      ...embedderOptions,
      onProgress: (done, total) => ctx.onProgress?.('embedding', done, total),
    });

    ctx.onStageComplete?.('embedding', {
      stage: 'embedding',
      processed: pending,
      total: nodes.length,
      durationMs: Math.round(performance.now() - embedStart),
      details: {
        provider: this.provider.name,
        model: this.provider.model,
        dimensions: vectors[0]?.length,
      },
    });

    // Phase 2: sequential sweep
    const mergeStart = performance.now();
    ctx.onStageStart?.('merging', nodes.length);

    const output: Node[] = [];
    let acc: Node = first;
    let accVector: Vector | undefined = vectors[0];
    let accStart = 0;
    let stale = false;
    let merges = 0;
    let reembeds = 0;

    for (let i = 1; i < nodes.length; i++) {
      const next = nodes[i];
      const nextVector = vectors[i];
      if (!next || !nextVector) continue;

      // Lazy: only re-embed a merged accumulator when it is compared again
      if (stale || !accVector) {
        const text = acc.text;
        try {
          accVector = await embedWithRetry(this.provider, text, embedderOptions);
        } catch (error) {
          if (error instanceof EmbeddingError) {
            error.nodeIndex = accStart;
          }
          throw error;
        }
        stale = false;
        reembeds++;
      }

      const current = accVector;
      const score = tagNode(i, () => cosineSimilarity(current, nextVector));

      if (this.policy.shouldMerge(acc, next, score, this.maxTokens)) {
        ctx.logger.debug?.(`Merging node #${i} into #${accStart} (similarity ${score.toFixed(3)})`);
        acc = mergeNodes(acc, next);
        merges++;
        if (this.mergedEmbedding === 'inherit_last') {
          accVector = nextVector;
        } else {
          stale = true;
        }
      } else {
        output.push(acc);
        acc = next;
        accVector = nextVector;
        accStart = i;
      }

      ctx.onProgress?.('merging', i + 1, nodes.length);
    }

    output.push(acc);

    ctx.onStageComplete?.('merging', {
      stage: 'merging',
      processed: nodes.length,
      total: nodes.length,
      durationMs: Math.round(performance.now() - mergeStart),
      details: { merges, reembeds, nodesOut: output.length },
    });

    return output;
  }
}
