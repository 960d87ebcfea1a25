/**
 * Ingest Module
 *
 * Pipelines that turn the initial node sequence into merged blocks.
 */

export {
  IngestionPipeline,
  NoOpIngestionPipeline,
  BasicIngestionPipeline,
  SemanticIngestionPipeline,
  createPipelineFromConfig,
  type SemanticIngestionPipelineOptions,
  type PipelineFromConfigOptions,
} from './pipeline.js';

export {
  CombineNodesSemantically,
  type CombineNodesSemanticallyOptions,
  type MergedEmbeddingStrategy,
} from './semantic.js';

export {
  CombineNodesSpatially,
  formattingMatches,
  type CombineNodesSpatiallyOptions,
} from './spatial.js';

export { MergePolicy, DEFAULT_SIMILARITY_THRESHOLD, DEFAULT_MAX_TOKENS } from './merge-policy.js';

export type {
  IngestStage,
  StageStats,
  PipelineHooks,
  PipelineRunOptions,
  PipelineContext,
  ProcessingStep,
} from './types.js';
