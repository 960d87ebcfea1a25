/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `docfuse config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  PipelineConfigSchema,
  PipelineTypeSchema,
  EmbeddingConfigSchema,
  MergeConfigSchema,
  SpatialConfigSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  PipelineType,
  EmbeddingConfig,
  MergeConfig,
  SpatialConfig,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  getConfigKeys,
  resetConfig,
  listConfig,
} from './loader.js';

// Paths
export { DOCFUSE_DIR, CONFIG_PATH, getDocfuseDir, getConfigPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasCredentials,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';
