/**
 * Node Operations
 *
 * Pure helpers for building, fusing and serialising nodes. Nothing here
 * mutates its inputs.
 */

import type { BoundingBox, Fragment, Node, OutputNode } from './types.js';

/**
 * Separator inserted between the texts of two fused nodes.
 */
export const NODE_SEPARATOR = ' ';

/**
 * Create a node from an extracted fragment.
 */
export function createNode(fragment: Fragment): Node {
  const node: Node = {
    text: fragment.text,
    position: {
      page: fragment.page,
      bbox: { ...fragment.bbox },
    },
  };

  if (fragment.font_info) {
    node.formatting = { ...fragment.font_info };
  }

  return node;
}

function unionBox(a: BoundingBox, b: BoundingBox): BoundingBox {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

/**
 * Fuse two adjacent nodes into a new one.
 *
 * - text: `a.text + separator + b.text`
 * - formatting: taken from `a` (first wins)
 * - position: `a`'s page; the box is the union of both when they share a
 *   page, otherwise `a`'s box
 * - embedding: unset
 */
export function mergeNodes(a: Node, b: Node, separator: string = NODE_SEPARATOR): Node {
  const samePage = a.position.page === b.position.page;

  const merged: Node = {
    text: a.text + separator + b.text,
    position: {
      page: a.position.page,
      bbox: samePage
        ? unionBox(a.position.bbox, b.position.bbox)
        : { ...a.position.bbox },
    },
  };

  if (a.formatting) {
    merged.formatting = { ...a.formatting };
  }

  return merged;
}

/**
 * Return a copy of the node without its embedding.
 */
export function stripEmbedding(node: Node): Node {
  const { embedding: _embedding, ...rest } = node;
  return rest;
}

/**
 * Reading order: page, then top edge, then left edge.
 */
export function compareReadingOrder(a: Node, b: Node): number {
  return (
    a.position.page - b.position.page ||
    a.position.bbox.y0 - b.position.bbox.y0 ||
    a.position.bbox.x0 - b.position.bbox.x0
  );
}

/**
 * Serialise a node for the output document.
 */
export function toOutputNode(node: Node): OutputNode {
  const output: OutputNode = {
    text: node.text,
    page_hint: node.position.page,
  };

  if (node.formatting) {
    output.font_info = { ...node.formatting };
  }

  return output;
}
