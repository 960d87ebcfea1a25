/**
 * Environment Variable Handler
 *
 * Loads and provides secure access to embedding provider credentials.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 * - Only key presence/absence is reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

import { DEFAULT_OLLAMA_HOST } from '../embeddings/ollama.js';

// Load .env file (for local development)
// No-op if .env doesn't exist
dotenvConfig();

/**
 * Environment variable schema with optional values.
 * Keys are not required at load time: only the provider actually in use
 * needs its credentials, and that is checked when the provider is created.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OLLAMA_HOST: z.string().default(DEFAULT_OLLAMA_HOST),
  CLOUDFLARE_API_TOKEN: z.string().optional(),
  CLOUDFLARE_ACCOUNT_ID: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/**
 * Cached environment variables (loaded once at first access).
 * Access through loadEnv(); tests reset it with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

/** Treat blank values as unset */
function readVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Load environment variables (called once, then cached).
 * Does NOT validate key presence.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    OPENAI_API_KEY: readVar('OPENAI_API_KEY'),
    OLLAMA_HOST: readVar('OLLAMA_HOST'),
    CLOUDFLARE_API_TOKEN: readVar('CLOUDFLARE_API_TOKEN'),
    CLOUDFLARE_ACCOUNT_ID: readVar('CLOUDFLARE_ACCOUNT_ID'),
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check whether a cloud provider's credentials are configured,
 * WITHOUT exposing their values.
 */
export function hasCredentials(provider: 'openai' | 'cloudflare'): boolean {
  const env = loadEnv();
  switch (provider) {
    case 'openai':
      return Boolean(env.OPENAI_API_KEY);
    case 'cloudflare':
      return Boolean(env.CLOUDFLARE_API_TOKEN && env.CLOUDFLARE_ACCOUNT_ID);
  }
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

/**
 * Provider-specific setup instructions.
 * Shown by `docfuse ingest` when credentials are missing.
 */
export const SETUP_INSTRUCTIONS: Record<'ollama' | 'openai' | 'cloudflare', string> = {
  ollama: `
To embed with Ollama (local):

1. Install Ollama from https://ollama.com/
2. Start the server:

   ollama serve

3. Pull an embedding model:

   ollama pull bge-large

4. (Optional) Set a custom host:

   export OLLAMA_HOST="http://localhost:11434"
`.trim(),

  openai: `
To embed with OpenAI:

1. Create an API key at https://platform.openai.com/api-keys
2. Set the environment variable (or add it to a .env file):

   export OPENAI_API_KEY="..."
`.trim(),

  cloudflare: `
To embed with Cloudflare Workers AI:

1. Create an API token with the "Workers AI" permission
2. Set both environment variables (or add them to a .env file):

   export CLOUDFLARE_API_TOKEN="..."
   export CLOUDFLARE_ACCOUNT_ID="..."
`.trim(),
};
