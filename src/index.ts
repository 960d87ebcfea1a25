/**
 * docfuse - Library Entry Point
 *
 * The CLI (`docfuse ingest`) covers the common case. This module exposes
 * the pieces for programs that hold their own fragments or providers.
 *
 * @example Semantic merge with a local Ollama server
 * ```typescript
 * import {
 *   loadFragments,
 *   nodesFromFragments,
 *   OllamaEmbeddingProvider,
 *   SemanticIngestionPipeline,
 *   toOutputNode,
 * } from 'docfuse';
 *
 * const nodes = nodesFromFragments(loadFragments('fragments.json'));
 * const pipeline = new SemanticIngestionPipeline({
 *   provider: new OllamaEmbeddingProvider({ model: 'bge-large' }),
 *   similarityThreshold: 0.6,
 *   maxTokens: 1000,
 * });
 *
 * const blocks = (await pipeline.process(nodes)).map(toOutputNode);
 * ```
 *
 * @packageDocumentation
 */

// Re-export types for library consumers
export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './nodes/index.js';
export * from './embeddings/index.js';
export * from './similarity/index.js';
export * from './tokens/index.js';
export * from './ingest/index.js';
export * from './errors/index.js';

export {
  loadConfig,
  DEFAULT_CONFIG,
  ConfigSchema,
  type Config,
  type EmbeddingConfig,
  type MergeConfig,
  type SpatialConfig,
  type PipelineType,
} from './config/index.js';

export { consoleLogger, silentLogger, type Logger } from './utils/logger.js';
