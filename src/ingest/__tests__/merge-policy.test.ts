import { describe, it, expect } from 'vitest';

import { ConfigError } from '../../errors/index.js';
import type { Node } from '../../nodes/types.js';
import type { TokenCounter } from '../../tokens/counter.js';
import { MergePolicy } from '../merge-policy.js';

function node(text: string): Node {
  return { text, position: { page: 0, bbox: { x0: 0, y0: 0, x1: 1, y1: 1 } } };
}

const a = node('The cat sat.');
const b = node('on the mat.');

describe('MergePolicy', () => {
  it('merges at or above the threshold when the text fits', () => {
    const policy = new MergePolicy(0.6);

    expect(policy.shouldMerge(a, b, 0.6, 100)).toBe(true);
    expect(policy.shouldMerge(a, b, 0.82, 100)).toBe(true);
    expect(policy.shouldMerge(a, b, 0.5999, 100)).toBe(false);
  });

  it('counts the fused text against the token limit', () => {
    const policy = new MergePolicy(0.6);

    // "The cat sat. on the mat." is 24 characters, 6 heuristic tokens
    expect(policy.shouldMerge(a, b, 0.9, 6)).toBe(true);
    expect(policy.shouldMerge(a, b, 0.9, 5)).toBe(false);
  });

  it('skips counting when the score already fails', () => {
    const seen: string[] = [];
    const counter: TokenCounter = {
      name: 'heuristic',
      count: (text) => {
        seen.push(text);
        return 1;
      },
    };
    const policy = new MergePolicy(0.6, counter);

    policy.shouldMerge(a, b, 0.1, 100);
    expect(seen).toEqual([]);

    policy.shouldMerge(a, b, 0.7, 100);
    expect(seen).toEqual(['The cat sat. on the mat.']);
  });

  it('is monotonic in the threshold', () => {
    const thresholds = [0.1, 0.3, 0.5, 0.7, 0.9, 1];
    for (const score of [0.2, 0.55, 0.8, 1]) {
      const decisions = thresholds.map((t) => new MergePolicy(t).shouldMerge(a, b, score, 100));
      // once a stricter threshold rejects, every stricter one rejects too
      const firstReject = decisions.indexOf(false);
      if (firstReject >= 0) {
        expect(decisions.slice(firstReject).every((d) => !d)).toBe(true);
      }
    }
  });

  it.each([0, -0.5, 1.5, Number.NaN])('rejects threshold %s', (threshold) => {
    expect(() => new MergePolicy(threshold)).toThrow(ConfigError);
  });

  it('accepts a threshold of exactly 1', () => {
    const policy = new MergePolicy(1);

    expect(policy.shouldMerge(a, b, 1, 100)).toBe(true);
  });
});
