/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory (~/.docfuse)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 *
 * Every function takes an optional config path so tests can point it at a
 * temp directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML, { type AnyJson, type JsonMap } from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function isJsonMap(value: AnyJson | undefined): value is JsonMap {
  return isPlainObject(value);
}

/**
 * Deep merge two objects, with source values overriding target
 * This handles nested objects properly (unlike Object.assign or spread)
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function ensureConfigDir(configPath: string): void {
  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function readToml(configPath: string): JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: docfuse config reset --force`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, creates default config on first run
 * @throws ConfigError if config file exists but is invalid
 */
export function loadConfig(createIfMissing = true, configPath = getConfigPath()): Config {
  // If config doesn't exist, either create it or just use defaults
  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureConfigDir(configPath);
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = readToml(configPath);

  // Validate against the partial schema (allows missing fields)
  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      'Run: docfuse config reset --force  to restore defaults'
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(merged.error.issues)}`,
      'Run: docfuse config reset --force  to restore defaults'
    );
  }

  return merged.data;
}

/**
 * Look up a value by dot-notation path in any object
 */
function getPath(source: unknown, key: string): unknown {
  let current = source;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('merge.max_tokens') => 1000
 */
export function getConfigValue(key: string, configPath = getConfigPath()): unknown {
  return getPath(loadConfig(true, configPath), key);
}

/**
 * Every leaf key the schema knows, in dot notation
 */
export function getConfigKeys(): string[] {
  return Object.entries(ConfigSchema.shape).flatMap(([section, schema]) =>
    Object.keys(schema.shape).map((key) => `${section}.${key}`)
  );
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file
 */
export function setConfigValue(key: string, value: string, configPath = getConfigPath()): void {
  if (!getConfigKeys().includes(key)) {
    throw new ConfigError(
      `Unknown config key: '${key}'`,
      'Run: docfuse config list  to see available keys'
    );
  }

  ensureConfigDir(configPath);

  // Load existing config or start fresh
  const config: JsonMap = fs.existsSync(configPath) ? readToml(configPath) : {};

  const parts = key.split('.');
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError(
      'Invalid config key: empty key',
      'Run: docfuse config list  to see available keys'
    );
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const created: JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  // Validate the complete config before saving
  const validationResult = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config));
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validationResult.error.issues)}`,
      'Run: docfuse config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Overwrite the config file with the default template
 */
export function resetConfig(configPath = getConfigPath()): void {
  ensureConfigDir(configPath);
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

function flatten(obj: PlainObject, prefix = ''): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value)) {
      entries.push(...flatten(value, fullKey));
    } else {
      entries.push([fullKey, value]);
    }
  }

  return entries;
}

/**
 * List all config values in a flat format
 * Returns entries like ['merge.max_tokens', 1000]
 */
export function listConfig(configPath = getConfigPath()): Array<[string, unknown]> {
  return flatten(loadConfig(true, configPath));
}
