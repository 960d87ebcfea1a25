/**
 * Configuration Schema
 *
 * Defines the shape of ~/.docfuse/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Which ingestion pipeline runs
 * - semantic: embedding-similarity merge
 * - basic: layout (spatial) merge, no embeddings
 * - none: pass-through
 */
export const PipelineTypeSchema = z.enum(['semantic', 'basic', 'none']);

export const PipelineConfigSchema = z.object({
  type: PipelineTypeSchema.describe('Ingestion pipeline (semantic, basic or none)'),
});

/**
 * Embedding provider configuration
 * Supports a local provider (Ollama) and two cloud APIs
 */
export const EmbeddingConfigSchema = z.object({
  provider: z
    .enum(['ollama', 'openai', 'cloudflare'])
    .describe('Embedding provider (ollama runs locally, openai/cloudflare need credentials)'),
  model: z
    .string()
    .min(1)
    .optional()
    .describe('Embedding model name (defaults to the provider\'s recommended model)'),
  max_retry: z
    .number()
    .int()
    .min(0)
    .max(10)
    .describe('Additional attempts after a retryable failure (0-10, default 3)'),
  retry_backoff_ms: z
    .number()
    .int()
    .min(0)
    .max(60000)
    .describe('Delay before the first retry; doubles on each further retry (default 1000)'),
  max_concurrent: z
    .number()
    .int()
    .min(1)
    .max(64)
    .describe('Maximum embedding calls in flight (1-64, default 4)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout in milliseconds for a single embedding call (1000-600000, default 60000)'),
});

/**
 * Merge policy configuration (semantic pipeline)
 */
export const MergeConfigSchema = z.object({
  similarity_threshold: z
    .number()
    .gt(0)
    .max(1)
    .describe('Minimum cosine similarity for two adjacent nodes to merge (0-1]'),
  max_tokens: z
    .number()
    .int()
    .positive()
    .describe('Maximum token count of a merged node'),
  token_counter: z
    .enum(['heuristic', 'cl100k'])
    .describe('Token counter (heuristic = ceil(chars / 4), cl100k = tiktoken)'),
  merged_embedding: z
    .enum(['reembed', 'inherit_last'])
    .describe('Vector of a merged node (reembed = embed its text, inherit_last = right-hand vector)'),
});

/**
 * Layout tolerances (basic pipeline), in PDF points
 */
export const SpatialConfigSchema = z.object({
  x_error_margin: z.number().min(0).describe('Horizontal tolerance in points'),
  y_error_margin: z.number().min(0).describe('Vertical tolerance in points'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  pipeline: PipelineConfigSchema,
  embedding: EmbeddingConfigSchema,
  merge: MergeConfigSchema,
  spatial: SpatialConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;
export type PipelineType = z.infer<typeof PipelineTypeSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type MergeConfig = z.infer<typeof MergeConfigSchema>;
export type SpatialConfig = z.infer<typeof SpatialConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
