/**
 * Ingest Command
 *
 * Merges extracted text fragments into coherent blocks.
 *
 * Usage:
 *   docfuse ingest fragments.json                  Semantic merge with config defaults
 *   docfuse ingest fragments.json -o blocks.json   Choose the output file
 *   docfuse ingest fragments.json --pipeline basic Layout-only merge, no embeddings
 *   docfuse ingest fragments.json --json           Progress as NDJSON, nodes in the final event
 *
 * The ingestion pipeline:
 * 1. Loading - Validate fragments and build one node per fragment
 * 2. Embedding - Compute a vector per node (semantic pipeline only)
 * 3. Merging - Fuse adjacent nodes
 */

import { Command } from 'commander';
import { extname, resolve } from 'node:path';
import { writeFileSync } from 'node:fs';

import type { CommandContext } from '../types.js';
import { createProgressReporter, type IngestResult } from '../utils/progress.js';
import {
  IngestArgsSchema,
  IngestOptionsSchema,
  parseOptions,
  type IngestOptions,
} from '../validation.js';
import { loadConfig, SETUP_INSTRUCTIONS, type Config, type EnvVars } from '../../config/index.js';
import { createEmbeddingProvider } from '../../embeddings/provider.js';
import type { Sleep } from '../../embeddings/retry.js';
import type { EmbeddingProvider } from '../../embeddings/types.js';
import { APIKeyError } from '../../errors/index.js';
import { createPipelineFromConfig } from '../../ingest/pipeline.js';
import type { IngestStage } from '../../ingest/types.js';
import { loadFragments, nodesFromFragments } from '../../nodes/fragments.js';
import { toOutputNode } from '../../nodes/node.js';
import type { Node } from '../../nodes/types.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Collaborators the command normally builds itself.
 * Tests replace them with in-process stand-ins.
 */
export interface IngestDependencies {
  configPath?: string;
  env?: EnvVars;
  provider?: EmbeddingProvider;
  sleep?: Sleep;
  signal?: AbortSignal;
  /** Progress/summary output @default console.log */
  write?: (line: string) => void;
  /** Force spinner mode on or off @default stdout is a TTY */
  isInteractive?: boolean;
}

/**
 * fragments.json -> fragments.merged.json
 */
export function defaultOutputPath(inputPath: string): string {
  const ext = extname(inputPath);
  const base = ext.toLowerCase() === '.json' ? inputPath.slice(0, -ext.length) : inputPath;
  return `${base}.merged.json`;
}

/**
 * Command-line overrides on top of config.toml.
 */
function applyOverrides(config: Config, options: IngestOptions): Config {
  const switchesProvider =
    options.provider !== undefined && options.provider !== config.embedding.provider;

  return {
    pipeline: {
      type: options.pipeline ?? config.pipeline.type,
    },
    embedding: {
      ...config.embedding,
      provider: options.provider ?? config.embedding.provider,
      // A provider switch without --model falls back to that provider's default
      model: options.model ?? (switchesProvider ? undefined : config.embedding.model),
      max_concurrent: options.concurrency ?? config.embedding.max_concurrent,
    },
    merge: {
      ...config.merge,
      similarity_threshold: options.threshold ?? config.merge.similarity_threshold,
      max_tokens: options.maxTokens ?? config.merge.max_tokens,
    },
    spatial: { ...config.spatial },
  };
}

/**
 * Run one ingestion: load, merge, write.
 *
 * @returns the run summary
 */
export async function runIngest(
  input: string,
  rawOptions: unknown,
  ctx: CommandContext,
  deps: IngestDependencies = {}
): Promise<IngestResult> {
  const { input: inputArg } = parseOptions(IngestArgsSchema, { input });
  const options = parseOptions(IngestOptionsSchema, rawOptions);
  const startTime = performance.now();

  const config = applyOverrides(loadConfig(true, deps.configPath), options);
  const inputPath = resolve(inputArg);
  const outputPath = resolve(options.output ?? defaultOutputPath(inputArg));

  ctx.debug(`Input: ${inputPath}`);
  ctx.debug(`Pipeline: ${config.pipeline.type}`);

  const reporter = createProgressReporter({
    json: ctx.options.json,
    verbose: ctx.options.verbose,
    write: deps.write,
    isInteractive: deps.isInteractive,
  });

  const warnings: string[] = [];
  const logger: Logger = {
    warn: (message) => {
      warnings.push(message);
      reporter.warn(message);
    },
    debug: ctx.debug,
  };
  const stageDurations: Partial<Record<IngestStage, number>> = {};

  // Provider first: missing credentials fail before any work
  let provider: EmbeddingProvider | undefined;
  if (config.pipeline.type === 'semantic') {
    try {
      provider = deps.provider ?? createEmbeddingProvider(config.embedding, { env: deps.env });
    } catch (error) {
      if (error instanceof APIKeyError && !ctx.options.json) {
        ctx.log(SETUP_INSTRUCTIONS[config.embedding.provider]);
        ctx.log('');
      }
      throw error;
    }
    ctx.debug(`Embedding provider: ${provider.name}/${provider.model}`);
  }

  // Stage 1: loading
  const loadStart = performance.now();
  reporter.startStage('loading');
  const fragments = loadFragments(inputPath);
  const nodes = nodesFromFragments(fragments, { sort: options.sort, logger });
  stageDurations.loading = Math.round(performance.now() - loadStart);
  reporter.completeStage({
    stage: 'loading',
    processed: fragments.length,
    total: fragments.length,
    durationMs: stageDurations.loading,
  });

  // Stages 2-3: pipeline
  const pipeline = createPipelineFromConfig(config, { provider, sleep: deps.sleep });
  let merged: Node[];
  try {
    merged = await pipeline.process(nodes, {
      logger,
      signal: deps.signal,
      onStageStart: (stage, total) => reporter.startStage(stage, total),
      onProgress: (_stage, processed) => reporter.updateProgress(processed),
      onStageComplete: (stage, stats) => {
        stageDurations[stage] = stats.durationMs;
        reporter.completeStage(stats);
      },
    });
  } catch (error) {
    reporter.fail('Ingestion failed');
    throw error;
  } finally {
    pipeline.dispose();
  }

  const output = merged.map(toOutputNode);
  writeFileSync(outputPath, JSON.stringify(output, null, 2) + '\n', 'utf-8');

  const result: IngestResult = {
    inputPath,
    outputPath,
    pipeline: config.pipeline.type,
    embedding: provider ? { provider: provider.name, model: provider.model } : undefined,
    fragments: fragments.length,
    nodesIn: nodes.length,
    nodesOut: output.length,
    totalDurationMs: Math.round(performance.now() - startTime),
    stageDurations,
    warnings,
  };

  reporter.showSummary(result, ctx.options.json ? { nodes: output } : {});
  return result;
}

/**
 * Create the ingest command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('<fragments>', 'JSON file of extracted text fragments')
    .description('Merge extracted text fragments into coherent blocks')
    .option('-p, --pipeline <type>', 'Pipeline: semantic, basic or none')
    .option('--provider <name>', 'Embedding provider: ollama, openai or cloudflare')
    .option('-m, --model <name>', 'Embedding model')
    .option('-t, --threshold <number>', 'Minimum cosine similarity to merge (0-1]')
    .option('--max-tokens <number>', 'Maximum tokens per merged node')
    .option('-c, --concurrency <number>', 'Maximum embedding calls in flight')
    .option('--sort', 'Sort fragments into reading order (page, top, left) first', false)
    .option('-o, --output <file>', 'Output file (default: <fragments>.merged.json)')
    .action(async (input: string, cmdOptions: Record<string, unknown>) => {
      const ctx = getContext();

      // Ctrl+C cancels in-flight embedding calls
      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once('SIGINT', onSigint);

      try {
        await runIngest(input, cmdOptions, ctx, { signal: controller.signal });
      } finally {
        process.removeListener('SIGINT', onSigint);
      }
    });
}
