/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

/**
 * Default configuration
 * Local-first: Ollama needs no credentials
 */
export const DEFAULT_CONFIG: Config = {
  pipeline: {
    type: 'semantic',
  },

  embedding: {
    provider: 'ollama',
    // model omitted: each provider has its own default
    max_retry: 3,
    retry_backoff_ms: 1000, // 1s, 2s, 4s
    max_concurrent: 4,
    timeout_ms: 60000,
  },

  merge: {
    similarity_threshold: 0.6,
    max_tokens: 1000,
    token_counter: 'heuristic',
    merged_embedding: 'reembed',
  },

  // Tolerances for the basic (layout) pipeline, in points
  spatial: {
    x_error_margin: 10,
    y_error_margin: 4,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.docfuse/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# docfuse Configuration
# Location: ~/.docfuse/config.toml

# Pipeline: "semantic" (embedding similarity), "basic" (layout only) or "none"
[pipeline]
type = "${DEFAULT_CONFIG.pipeline.type}"

# Embedding Settings
# ollama runs locally (OLLAMA_HOST); openai needs OPENAI_API_KEY;
# cloudflare needs CLOUDFLARE_API_TOKEN and CLOUDFLARE_ACCOUNT_ID
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
# model = "bge-large"   # defaults to the provider's recommended model
max_retry = ${DEFAULT_CONFIG.embedding.max_retry}
retry_backoff_ms = ${DEFAULT_CONFIG.embedding.retry_backoff_ms}
max_concurrent = ${DEFAULT_CONFIG.embedding.max_concurrent}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

# Merge Settings (semantic pipeline)
[merge]
similarity_threshold = ${DEFAULT_CONFIG.merge.similarity_threshold}
max_tokens = ${DEFAULT_CONFIG.merge.max_tokens}
token_counter = "${DEFAULT_CONFIG.merge.token_counter}"   # or "cl100k"
merged_embedding = "${DEFAULT_CONFIG.merge.merged_embedding}"   # or "inherit_last"

# Layout Settings (basic pipeline)
[spatial]
x_error_margin = ${DEFAULT_CONFIG.spatial.x_error_margin}
y_error_margin = ${DEFAULT_CONFIG.spatial.y_error_margin}
`;
