/**
 * Zod validation schemas for CLI inputs
 *
 * These schemas validate and transform user input from the command line.
 * Commander.js parses arguments, then we validate with Zod for:
 * - Type coercion (string "5" -> number 5)
 * - Custom validation rules
 * - Helpful error messages
 */

import { z } from 'zod';

import { ValidationError } from '../errors/index.js';

// ============================================================================
// GLOBAL OPTIONS SCHEMA
// ============================================================================

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
});

// ============================================================================
// INGEST COMMAND SCHEMA
// ============================================================================

/** "0.75" -> 0.75, rejecting anything that is not a finite number */
const numeric = (label: string) =>
  z
    .string()
    .transform((val) => Number(val))
    .refine((val) => Number.isFinite(val), { message: `${label} must be a number` });

const positiveInt = (label: string) =>
  numeric(label).refine((val) => Number.isInteger(val) && val >= 1, {
    message: `${label} must be a positive integer`,
  });

export const IngestOptionsSchema = z.object({
  pipeline: z.enum(['semantic', 'basic', 'none']).optional(),
  provider: z.enum(['ollama', 'openai', 'cloudflare']).optional(),
  model: z.string().min(1, 'Model name cannot be empty').optional(),
  threshold: numeric('threshold')
    .refine((val) => val > 0 && val <= 1, {
      message: 'threshold must be greater than 0 and at most 1',
    })
    .optional(),
  maxTokens: positiveInt('max-tokens').optional(),
  concurrency: positiveInt('concurrency')
    .refine((val) => val <= 64, { message: 'concurrency must be at most 64' })
    .optional(),
  sort: z.boolean().default(false),
  output: z.string().min(1, 'Output path cannot be empty').optional(),
});

export type IngestOptionsInput = z.input<typeof IngestOptionsSchema>;
export type IngestOptions = z.output<typeof IngestOptionsSchema>;

export const IngestArgsSchema = z.object({
  input: z.string().min(1, 'Fragments file is required'),
});

/** maxTokens -> max-tokens */
function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

/**
 * Parse command options, turning zod issues into a ValidationError.
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `--${toFlag(issue.path.join('.'))}: ${issue.message}` : issue.message
    );
    throw new ValidationError('Invalid options', issues);
  }
  return result.data;
}
