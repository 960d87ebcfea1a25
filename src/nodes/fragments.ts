/**
 * Fragment Loading
 *
 * Validates the extraction collaborator's output and turns it into the
 * initial node sequence (one node per fragment).
 */

import * as fs from 'node:fs';
import { z } from 'zod';

import { FileNotFoundError, ValidationError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { compareReadingOrder, createNode } from './node.js';
import type { Fragment, Node } from './types.js';

export const BoundingBoxSchema = z.object({
  x0: z.number(),
  y0: z.number(),
  x1: z.number(),
  y1: z.number(),
});

export const FontInfoSchema = z.object({
  name: z.string().optional(),
  size: z.number().positive().optional(),
  bold: z.boolean().optional(),
  italic: z.boolean().optional(),
});

export const FragmentSchema = z.object({
  text: z.string(),
  page: z.number().int().min(0),
  bbox: BoundingBoxSchema,
  font_info: FontInfoSchema.optional(),
});

export const FragmentListSchema = z.array(FragmentSchema);

/**
 * Validate an already-parsed JSON value as a fragment list.
 *
 * @throws ValidationError listing every offending field
 */
export function parseFragments(value: unknown): Fragment[] {
  const result = FragmentListSchema.safeParse(value);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ValidationError('Invalid fragment list', issues);
  }

  return result.data;
}

/**
 * Read and validate a fragments JSON file.
 */
export function loadFragments(filePath: string): Fragment[] {
  if (!fs.existsSync(filePath)) {
    throw new FileNotFoundError(filePath);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ValidationError(`Invalid JSON in ${filePath}`, [message]);
  }

  return parseFragments(parsed);
}

export interface NodesFromFragmentsOptions {
  /** Sort into reading order (page, top, left) instead of trusting input order */
  sort?: boolean;
  logger?: Logger;
}

/**
 * Build the initial node sequence.
 *
 * Fragments whose text is empty or whitespace-only are skipped: providers
 * reject blank text, so such nodes could never take part in a semantic run.
 */
export function nodesFromFragments(
  fragments: Fragment[],
  options: NodesFromFragmentsOptions = {}
): Node[] {
  const { sort = false, logger = silentLogger } = options;

  const nodes: Node[] = [];
  fragments.forEach((fragment, index) => {
    if (fragment.text.trim().length === 0) {
      logger.debug?.(`Skipping blank fragment #${index}`);
      return;
    }
    nodes.push(createNode(fragment));
  });

  if (nodes.length !== fragments.length) {
    logger.warn(`Skipped ${fragments.length - nodes.length} blank fragment(s)`);
  }

  return sort ? [...nodes].sort(compareReadingOrder) : nodes;
}
