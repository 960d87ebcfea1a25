/**
 * Nodes Module
 *
 * Data model for the ingestion pipelines plus fragment loading.
 */

export {
  NODE_SEPARATOR,
  createNode,
  mergeNodes,
  stripEmbedding,
  compareReadingOrder,
  toOutputNode,
} from './node.js';

export {
  FragmentSchema,
  FragmentListSchema,
  parseFragments,
  loadFragments,
  nodesFromFragments,
  type NodesFromFragmentsOptions,
} from './fragments.js';

export type {
  BoundingBox,
  FontInfo,
  Fragment,
  NodePosition,
  Node,
  OutputNode,
  Vector,
} from './types.js';
