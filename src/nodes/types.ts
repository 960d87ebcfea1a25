/**
 * Node Types
 *
 * Fragments come from the extraction collaborator; Nodes are what the
 * ingestion pipelines work on; OutputNodes are what leaves the system.
 */

/**
 * Axis-aligned box in page coordinates (origin top-left, y grows downwards).
 */
export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * Font metadata attached to a fragment. Carried through merges untouched.
 */
export interface FontInfo {
  name?: string;
  size?: number;
  bold?: boolean;
  italic?: boolean;
}

/**
 * A raw positioned unit of text produced by the extraction step.
 */
export interface Fragment {
  text: string;
  /** Zero-based page index */
  page: number;
  bbox: BoundingBox;
  font_info?: FontInfo;
}

/**
 * Where a node sits in the source document.
 */
export interface NodePosition {
  page: number;
  bbox: BoundingBox;
}

/** Fixed-length embedding vector */
export type Vector = number[];

/**
 * The pipeline's working unit.
 *
 * `embedding` only exists while the semantic step runs; every pipeline
 * strips it before returning.
 */
export interface Node {
  text: string;
  position: NodePosition;
  formatting?: FontInfo;
  embedding?: Vector;
}

/**
 * Serialised node written to the output document. Never carries a vector.
 */
export interface OutputNode {
  text: string;
  page_hint: number;
  font_info?: FontInfo;
}
