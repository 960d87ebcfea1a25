/**
 * Spatial merge tests
 *
 * Boxes use top-left coordinates: y0 is the top edge, y1 the bottom edge.
 */

import { describe, it, expect } from 'vitest';

import type { BoundingBox, FontInfo, Node } from '../../nodes/types.js';
import { silentLogger } from '../../utils/logger.js';
import { CombineNodesSpatially, formattingMatches } from '../spatial.js';

function node(text: string, bbox: BoundingBox, page = 0, formatting?: FontInfo): Node {
  const result: Node = { text, position: { page, bbox } };
  if (formatting) result.formatting = formatting;
  return result;
}

const body: FontInfo = { name: 'Times-Roman', size: 10 };
const heading: FontInfo = { name: 'Times-Bold', size: 14 };

async function run(nodes: Node[], step = new CombineNodesSpatially()): Promise<string[]> {
  const result = await step.process(nodes, { logger: silentLogger });
  return result.map((n) => n.text);
}

describe('formattingMatches', () => {
  it('compares name and size only where both are known', () => {
    expect(formattingMatches(body, { ...body, bold: true })).toBe(true);
    expect(formattingMatches(body, heading)).toBe(false);
    expect(formattingMatches({ size: 10 }, { size: 11 })).toBe(false);
    expect(formattingMatches({ name: 'A' }, { size: 11 })).toBe(true);
    expect(formattingMatches(undefined, heading)).toBe(true);
  });
});

describe('CombineNodesSpatially', () => {
  it('joins fragments on the same line separated by a small gap', async () => {
    const texts = await run([
      node('Hello', { x0: 10, y0: 100, x1: 50, y1: 112 }),
      node('world', { x0: 55, y0: 100, x1: 90, y1: 112 }),
    ]);

    expect(texts).toEqual(['Hello world']);
  });

  it('keeps columns apart', async () => {
    const texts = await run([
      node('Left column', { x0: 10, y0: 100, x1: 200, y1: 112 }),
      node('Right column', { x0: 300, y0: 100, x1: 500, y1: 112 }),
    ]);

    expect(texts).toEqual(['Left column', 'Right column']);
  });

  it('joins consecutive lines of a paragraph', async () => {
    const texts = await run([
      node('The quick brown', { x0: 10, y0: 100, x1: 200, y1: 112 }, 0, body),
      node('fox jumps over', { x0: 12, y0: 114, x1: 190, y1: 126 }, 0, body),
      node('the lazy dog.', { x0: 10, y0: 128, x1: 150, y1: 140 }, 0, body),
    ]);

    expect(texts).toEqual(['The quick brown fox jumps over the lazy dog.']);
  });

  it('splits where the vertical gap exceeds the margin', async () => {
    const texts = await run([
      node('First paragraph.', { x0: 10, y0: 100, x1: 200, y1: 112 }),
      node('Second paragraph.', { x0: 10, y0: 130, x1: 200, y1: 142 }),
    ]);

    expect(texts).toEqual(['First paragraph.', 'Second paragraph.']);
  });

  it('splits on a change of font', async () => {
    const texts = await run([
      node('Results', { x0: 10, y0: 100, x1: 80, y1: 114 }, 0, heading),
      node('We measured', { x0: 10, y0: 116, x1: 200, y1: 126 }, 0, body),
    ]);

    expect(texts).toEqual(['Results', 'We measured']);
  });

  it('never merges across pages', async () => {
    const texts = await run([
      node('end of page', { x0: 10, y0: 100, x1: 200, y1: 112 }, 0),
      node('start of page', { x0: 10, y0: 100, x1: 200, y1: 112 }, 1),
    ]);

    expect(texts).toEqual(['end of page', 'start of page']);
  });

  it('completes a hyphenated word on the next line', async () => {
    const texts = await run([
      node('infor-', { x0: 150, y0: 100, x1: 200, y1: 112 }),
      node('mation', { x0: 10, y0: 120, x1: 60, y1: 132 }),
      node('soft\u00AD', { x0: 150, y0: 200, x1: 200, y1: 212 }),
      node('ware', { x0: 10, y0: 220, x1: 60, y1: 232 }),
    ]);

    // the hard hyphen stays, the soft one goes
    expect(texts).toEqual(['infor-mation', 'software']);
  });

  it('does not carry a hyphen more than a line further down', async () => {
    // gap 18 exceeds line height 12 plus the 4pt margin
    const texts = await run([
      node('infor-', { x0: 150, y0: 100, x1: 200, y1: 112 }),
      node('Page 3', { x0: 10, y0: 130, x1: 60, y1: 142 }),
    ]);

    expect(texts).toEqual(['infor-', 'Page 3']);
  });

  it('unions the boxes of a hyphen-joined word', async () => {
    const step = new CombineNodesSpatially();
    const head = node('infor-', { x0: 150, y0: 100, x1: 200, y1: 112 });
    const tail = node('mation', { x0: 10, y0: 120, x1: 60, y1: 132 });

    const [merged] = await step.process([head, tail], { logger: silentLogger });

    expect(step.continuation(head, tail)).toBe('hyphen');
    expect(merged?.position.bbox).toEqual({ x0: 10, y0: 100, x1: 200, y1: 132 });
  });

  it('does not treat a hyphen followed by text above it as a continuation', async () => {
    const texts = await run([
      node('co-', { x0: 150, y0: 200, x1: 200, y1: 212 }),
      node('caption', { x0: 10, y0: 50, x1: 60, y1: 62 }),
    ]);

    expect(texts).toEqual(['co-', 'caption']);
  });

  it('compares against the latest line of a block', async () => {
    // Line 3 lines up with line 2 but is far below line 1
    const texts = await run([
      node('one', { x0: 10, y0: 100, x1: 200, y1: 112 }),
      node('two', { x0: 10, y0: 114, x1: 200, y1: 126 }),
      node('three', { x0: 10, y0: 128, x1: 200, y1: 140 }),
    ]);

    expect(texts).toEqual(['one two three']);
  });

  it('respects custom margins', async () => {
    const nodes = [
      node('a', { x0: 10, y0: 100, x1: 50, y1: 112 }),
      node('b', { x0: 70, y0: 100, x1: 90, y1: 112 }),
    ];

    expect(await run(nodes)).toEqual(['a', 'b']);
    expect(await run(nodes, new CombineNodesSpatially({ xErrorMargin: 25 }))).toEqual(['a b']);
  });

  it('returns an empty list for no input', async () => {
    expect(await run([])).toEqual([]);
  });

  it('reports merge counts when the stage completes', async () => {
    const details: unknown[] = [];
    const step = new CombineNodesSpatially();

    await step.process(
      [
        node('Hello', { x0: 10, y0: 100, x1: 50, y1: 112 }),
        node('world', { x0: 55, y0: 100, x1: 90, y1: 112 }),
        node('Elsewhere', { x0: 10, y0: 400, x1: 90, y1: 412 }),
      ],
      { logger: silentLogger, onStageComplete: (_stage, stats) => details.push(stats.details) }
    );

    expect(details).toEqual([{ merges: 1, nodesOut: 2 }]);
  });
});
