/**
 * Ingestion Pipelines
 *
 * A pipeline is an ordered list of processing steps run over the node
 * sequence. It doesn't know HOW to display progress; it forwards the
 * stage callbacks to its steps and lets the caller render them.
 *
 * Guarantees for every variant:
 * - the caller's nodes are never mutated (steps work on copies)
 * - no returned node carries an embedding
 */

import type { Config } from '../config/schema.js';
import { createEmbeddingProvider, type CreateProviderOptions } from '../embeddings/provider.js';
import type { Sleep } from '../embeddings/retry.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import { CancelledError } from '../errors/index.js';
import { stripEmbedding } from '../nodes/node.js';
import type { Node } from '../nodes/types.js';
import { createTokenCounter, type TokenCounter } from '../tokens/counter.js';
import { silentLogger } from '../utils/logger.js';
import { MergePolicy } from './merge-policy.js';
import {
  CombineNodesSemantically,
  type CombineNodesSemanticallyOptions,
  type MergedEmbeddingStrategy,
} from './semantic.js';
import { CombineNodesSpatially, type CombineNodesSpatiallyOptions } from './spatial.js';
import type { PipelineContext, PipelineRunOptions, ProcessingStep } from './types.js';

export abstract class IngestionPipeline {
  protected readonly transformations: ProcessingStep[] = [];

  /**
   * @param defaults - run options used when `process` is called without them
   */
  constructor(protected readonly defaults: PipelineRunOptions = {}) {}

  /** Steps in execution order */
  get steps(): readonly ProcessingStep[] {
    return this.transformations;
  }

  /**
   * Add a step to the end of the pipeline.
   */
  appendTransform(step: ProcessingStep): void {
    this.transformations.push(step);
  }

  /**
   * Run every step in order.
   *
   * @throws CancelledError when the signal aborts between or during steps
   * @throws EmbeddingError subclasses from the semantic step
   */
  async process(nodes: readonly Node[], options: PipelineRunOptions = {}): Promise<Node[]> {
    const { logger = silentLogger, signal, ...hooks } = { ...this.defaults, ...options };
    const ctx: PipelineContext = { ...hooks, logger, signal };

    let working: Node[] = nodes.map((node) => structuredClone(node));

    for (const step of this.transformations) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      logger.debug?.(`Processing with ${step.name}`);
      working = await step.process(working, ctx);
    }

    return working.map(stripEmbedding);
  }

  /**
   * Release what the steps hold (the cl100k encoder). The pipeline can
   * still run afterwards.
   */
  dispose(): void {
    for (const step of this.transformations) {
      step.dispose?.();
    }
  }
}

/**
 * No steps: returns the input nodes unchanged (minus embeddings).
 */
export class NoOpIngestionPipeline extends IngestionPipeline {}

/**
 * Layout-only merging, no embeddings.
 */
export class BasicIngestionPipeline extends IngestionPipeline {
  constructor(options: CombineNodesSpatiallyOptions = {}, defaults: PipelineRunOptions = {}) {
    super(defaults);
    this.transformations.push(new CombineNodesSpatially(options));
  }
}

export interface SemanticIngestionPipelineOptions {
  provider: EmbeddingProvider;
  /** @default 0.6 */
  similarityThreshold?: number;
  /** @default 1000 */
  maxTokens?: number;
  /** @default heuristic counter */
  tokenCounter?: TokenCounter;
  /** @default 'reembed' */
  mergedEmbedding?: MergedEmbeddingStrategy;
  embedder?: CombineNodesSemanticallyOptions['embedder'];
}

/**
 * Embedding-similarity merging.
 *
 * @example
 * ```typescript
 * const pipeline = new SemanticIngestionPipeline({
 *   provider: new OllamaEmbeddingProvider(),
 *   similarityThreshold: 0.6,
 *   maxTokens: 1000,
 * });
 * const merged = await pipeline.process(nodes);
 * ```
 */
export class SemanticIngestionPipeline extends IngestionPipeline {
  constructor(options: SemanticIngestionPipelineOptions, defaults: PipelineRunOptions = {}) {
    super(defaults);
    this.transformations.push(
      new CombineNodesSemantically({
        provider: options.provider,
        policy: new MergePolicy(options.similarityThreshold, options.tokenCounter),
        maxTokens: options.maxTokens,
        mergedEmbedding: options.mergedEmbedding,
        embedder: options.embedder,
      })
    );
  }
}

export interface PipelineFromConfigOptions extends CreateProviderOptions {
  /** Use this provider instead of building one from `config.embedding` */
  provider?: EmbeddingProvider;
  /** Injectable backoff sleep (tests) */
  sleep?: Sleep;
}

/**
 * Build the pipeline `config.pipeline.type` names.
 *
 * @throws APIKeyError when the semantic pipeline needs missing credentials
 */
export function createPipelineFromConfig(
  config: Config,
  options: PipelineFromConfigOptions = {}
): IngestionPipeline {
  switch (config.pipeline.type) {
    case 'none':
      return new NoOpIngestionPipeline();

    case 'basic':
      return new BasicIngestionPipeline({
        xErrorMargin: config.spatial.x_error_margin,
        yErrorMargin: config.spatial.y_error_margin,
      });

    case 'semantic':
      return new SemanticIngestionPipeline({
        provider: options.provider ?? createEmbeddingProvider(config.embedding, options),
        similarityThreshold: config.merge.similarity_threshold,
        maxTokens: config.merge.max_tokens,
        tokenCounter: createTokenCounter(config.merge.token_counter),
        mergedEmbedding: config.merge.merged_embedding,
        embedder: {
          concurrency: config.embedding.max_concurrent,
          maxRetries: config.embedding.max_retry,
          backoffMs: config.embedding.retry_backoff_ms,
          sleep: options.sleep,
        },
      });
  }
}
