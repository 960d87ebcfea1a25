/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.docfuse/
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const DOCFUSE_DIR = join(homedir(), '.docfuse');
export const CONFIG_PATH = join(DOCFUSE_DIR, 'config.toml');

/**
 * Get the docfuse directory path (~/.docfuse)
 */
export function getDocfuseDir(): string {
  return DOCFUSE_DIR;
}

/**
 * Get the config file path (~/.docfuse/config.toml)
 */
export function getConfigPath(): string {
  return CONFIG_PATH;
}
