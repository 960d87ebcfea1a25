/**
 * Token Counters
 *
 * Estimate how many tokens a piece of text costs. The merge policy uses
 * one counter for a whole run; counters never touch nodes.
 */

import { get_encoding, type Tiktoken } from 'tiktoken';

export type TokenCounterType = 'heuristic' | 'cl100k';

export interface TokenCounter {
  readonly name: TokenCounterType;
  /** Deterministic, non-decreasing with text length */
  count(text: string): number;
  /** Release native resources; the counter stays usable */
  dispose?(): void;
}

/** Average characters per token for English prose */
export const CHARS_PER_TOKEN = 4;

/**
 * ~4 characters per token. Fast, no tokenizer tables.
 */
export class HeuristicTokenCounter implements TokenCounter {
  readonly name = 'heuristic';

  count(text: string): number {
    return Math.ceil(text.length / CHARS_PER_TOKEN);
  }
}

/**
 * Exact counts with OpenAI's cl100k_base encoding.
 *
 * The encoder is WASM-backed: it is loaded on first use and freed by
 * `dispose()`. Counting after `dispose()` loads a fresh one.
 */
export class TiktokenCounter implements TokenCounter {
  readonly name = 'cl100k';
  private encoder: Tiktoken | null = null;

  count(text: string): number {
    if (!this.encoder) {
      this.encoder = get_encoding('cl100k_base');
    }
    return this.encoder.encode(text).length;
  }

  dispose(): void {
    this.encoder?.free();
    this.encoder = null;
  }
}

export function createTokenCounter(type: TokenCounterType = 'heuristic'): TokenCounter {
  switch (type) {
    case 'heuristic':
      return new HeuristicTokenCounter();
    case 'cl100k':
      return new TiktokenCounter();
  }
}
