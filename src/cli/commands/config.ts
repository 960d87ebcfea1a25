/**
 * Config Command
 *
 * Manages ~/.docfuse/config.toml via CLI:
 *   docfuse config get <key>         - Get a specific value
 *   docfuse config set <key> <value> - Set a value
 *   docfuse config list              - Show all configuration
 *   docfuse config path              - Show config file location
 *   docfuse config reset --force     - Restore the default file
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  getConfigValue,
  setConfigValue,
  listConfig,
  resetConfig,
  getConfigPath,
} from '../../config/index.js';
import type { CommandContext } from '../types.js';

/**
 * Create the config command with all subcommands
 *
 * @param configPath - config file to operate on (tests pass a temp path)
 */
export function createConfigCommand(
  getContext: () => CommandContext,
  configPath: string = getConfigPath()
): Command {
  const configCmd = new Command('config')
    .description('Manage configuration settings');

  // docfuse config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., docfuse config get merge.max_tokens)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key, configPath);

        if (value === undefined) {
          ctx.error(`Unknown or unset config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('docfuse config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // docfuse config set <key> <value>
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., docfuse config set merge.similarity_threshold 0.7)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value, configPath);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key, configPath) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // docfuse config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();

      try {
        const entries = listConfig(configPath);

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        } else {
          ctx.log(chalk.bold('Configuration:'));
          ctx.log('');

          // Group by section for readability
          let currentGroup = '';
          for (const [key, value] of entries) {
            const group = key.split('.')[0] ?? '';

            if (group !== currentGroup) {
              if (currentGroup !== '') ctx.log('');
              currentGroup = group;
            }

            ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
          }

          ctx.log('');
          ctx.log(chalk.dim(`Config file: ${configPath}`));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // docfuse config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  // docfuse config reset
  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        resetConfig(configPath);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Handle config errors with user-friendly messages
 */
function handleConfigError(ctx: CommandContext, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';

  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message }));
  } else {
    ctx.error(message);
  }

  process.exitCode = 1;
}
