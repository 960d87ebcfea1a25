/**
 * Ingestion Pipeline Types
 */

import type { Node } from '../nodes/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Stages reported through the pipeline hooks.
 * `loading` is reported by callers that read fragments before the run.
 */
export type IngestStage = 'loading' | 'embedding' | 'merging';

/**
 * Statistics for a completed stage.
 */
export interface StageStats {
  /** Which stage completed */
  stage: IngestStage;

  /** Number of items processed */
  processed: number;

  /** Total items in this stage */
  total: number;

  /** Time taken in milliseconds */
  durationMs: number;

  /** Additional stage-specific details */
  details?: Record<string, unknown>;
}

/**
 * Progress callbacks. The pipeline fires them; it never renders anything.
 */
export interface PipelineHooks {
  onStageStart?: (stage: IngestStage, total: number) => void;
  onProgress?: (stage: IngestStage, processed: number, total: number) => void;
  onStageComplete?: (stage: IngestStage, stats: StageStats) => void;
}

/**
 * Per-run options.
 */
export interface PipelineRunOptions extends PipelineHooks {
  logger?: Logger;
  /** Cancels the run; pending work is dropped and the run rejects with CancelledError */
  signal?: AbortSignal;
}

/**
 * What a step sees while it runs.
 */
export interface PipelineContext extends PipelineHooks {
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * One transformation over the ordered node sequence.
 *
 * Steps receive the pipeline's working copies and may return new nodes
 * freely; they must keep reading order.
 */
export interface ProcessingStep {
  readonly name: string;
  process(nodes: Node[], ctx: PipelineContext): Promise<Node[]>;
  /** Release resources held across runs */
  dispose?(): void;
}
