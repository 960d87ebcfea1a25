/**
 * Spatial Merge Step
 *
 * Layout-only fusion for the basic pipeline: a left-to-right sweep that
 * joins a node to the running block when it continues the same line, starts
 * the next line of the same paragraph, or completes a hyphenated word on
 * the following line. A hyphenated word is joined without a space; a soft
 * hyphen is dropped, a hard one kept. Geometry is compared against the last node absorbed into the block, so a
 * multi-line block still behaves like its latest line.
 *
 * Coordinates are top-left based: y0 is the top edge, y1 the bottom edge.
 */

import { mergeNodes } from '../nodes/node.js';
import type { FontInfo, Node } from '../nodes/types.js';
import type { PipelineContext, ProcessingStep } from './types.js';

export interface CombineNodesSpatiallyOptions {
  /** Horizontal tolerance in points @default 10 */
  xErrorMargin?: number;
  /** Vertical tolerance in points @default 4 */
  yErrorMargin?: number;
}

const HYPHEN_END = /[\u00AD-]$/;
const SOFT_HYPHEN_END = /\u00AD$/;

/** How a node continues the running block */
export type Continuation = 'line' | 'hyphen';

/**
 * Font name and size must agree wherever both nodes declare them.
 */
export function formattingMatches(a?: FontInfo, b?: FontInfo): boolean {
  if (a?.name !== undefined && b?.name !== undefined && a.name !== b.name) {
    return false;
  }
  if (a?.size !== undefined && b?.size !== undefined && a.size !== b.size) {
    return false;
  }
  return true;
}

export class CombineNodesSpatially implements ProcessingStep {
  readonly name = 'CombineNodesSpatially';
  readonly xErrorMargin: number;
  readonly yErrorMargin: number;

  constructor(options: CombineNodesSpatiallyOptions = {}) {
    this.xErrorMargin = options.xErrorMargin ?? 10;
    this.yErrorMargin = options.yErrorMargin ?? 4;
  }

  /**
   * Whether `next` continues the block whose latest node is `last`.
   */
  continues(last: Node, next: Node): boolean {
    return this.continuation(last, next) !== undefined;
  }

  continuation(last: Node, next: Node): Continuation | undefined {
    if (last.position.page !== next.position.page) {
      return undefined;
    }
    if (!formattingMatches(last.formatting, next.formatting)) {
      return undefined;
    }

    const prev = last.position.bbox;
    const cur = next.position.bbox;
    const x = this.xErrorMargin;
    const y = this.yErrorMargin;

    // Same line, small horizontal gap
    const sameBaseline = Math.abs(cur.y1 - prev.y1) <= y;
    if (sameBaseline && Math.abs(cur.x0 - prev.x1) <= x) {
      return 'line';
    }

    // Next line of the same paragraph
    const verticalGap = cur.y0 - prev.y1;
    if (Math.abs(verticalGap) <= y && Math.abs(cur.x0 - prev.x0) <= x) {
      return 'line';
    }

    // Word split across lines: the next line, at most one line height further down
    const lineHeight = prev.y1 - prev.y0;
    if (
      HYPHEN_END.test(last.text.trim()) &&
      cur.y0 > prev.y0 &&
      verticalGap <= lineHeight + y
    ) {
      return 'hyphen';
    }
    return undefined;
  }

  async process(nodes: Node[], ctx: PipelineContext): Promise<Node[]> {
    const [first] = nodes;
    if (!first) {
      return [];
    }

    const start = performance.now();
    ctx.onStageStart?.('merging', nodes.length);

    const output: Node[] = [];
    let acc = first;
    let last = first;
    let merges = 0;

    for (const [i, next] of nodes.entries()) {
      if (i === 0) continue;

      const continuation = this.continuation(last, next);
      if (continuation === 'hyphen') {
        const head = acc.text.trimEnd().replace(SOFT_HYPHEN_END, '');
        acc = mergeNodes({ ...acc, text: head }, next, '');
        merges++;
      } else if (continuation === 'line') {
        acc = mergeNodes(acc, next);
        merges++;
      } else {
        output.push(acc);
        acc = next;
      }
      last = next;

      ctx.onProgress?.('merging', i + 1, nodes.length);
    }

    output.push(acc);
    ctx.logger.debug?.(`Spatial merge: ${nodes.length} -> ${output.length} node(s)`);

    ctx.onStageComplete?.('merging', {
      stage: 'merging',
      processed: nodes.length,
      total: nodes.length,
      durationMs: Math.round(performance.now() - start),
      details: { merges, nodesOut: output.length },
    });

    return output;
  }
}
