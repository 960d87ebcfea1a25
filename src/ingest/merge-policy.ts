/**
 * Merge Policy
 *
 * Decides whether two adjacent nodes fuse: similar enough AND the fused
 * text fits the token budget.
 */

import { ConfigError } from '../errors/index.js';
import { mergeNodes } from '../nodes/node.js';
import type { Node } from '../nodes/types.js';
import { HeuristicTokenCounter, type TokenCounter } from '../tokens/counter.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.6;
export const DEFAULT_MAX_TOKENS = 1000;

export class MergePolicy {
  readonly similarityThreshold: number;
  readonly counter: TokenCounter;

  /**
   * @throws ConfigError when the threshold is outside (0, 1]
   */
  constructor(
    similarityThreshold: number = DEFAULT_SIMILARITY_THRESHOLD,
    counter: TokenCounter = new HeuristicTokenCounter()
  ) {
    if (!(similarityThreshold > 0 && similarityThreshold <= 1)) {
      throw new ConfigError(
        `similarity_threshold must be in (0, 1], got ${similarityThreshold}`,
        'Run: docfuse config set merge.similarity_threshold 0.6'
      );
    }
    this.similarityThreshold = similarityThreshold;
    this.counter = counter;
  }

  /**
   * `score >= threshold` and the merged text costs at most `limit` tokens.
   * The token count is skipped when the score already fails.
   */
  shouldMerge(a: Node, b: Node, score: number, limit: number): boolean {
    if (score < this.similarityThreshold) {
      return false;
    }
    return this.counter.count(mergeNodes(a, b).text) <= limit;
  }
}
