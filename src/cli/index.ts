#!/usr/bin/env node
/**
 * docfuse CLI Entry Point
 *
 * This is the main entry point for the `docfuse` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { createIngestCommand } from './commands/ingest.js';
import { GlobalOptionsSchema, parseOptions } from './validation.js';
import {
  handleError,
  createGlobalErrorHandler,
  CLIError,
} from '../errors/index.js';

const VERSION = process.env.DOCFUSE_VERSION ?? '0.1.0';

// Create the root program
const program = new Command();

program
  .name('docfuse')
  .description('Merge extracted document fragments into semantically coherent blocks')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('docfuse ingest fragments.json')}                   Semantic merge (config defaults)
  ${chalk.cyan('docfuse ingest fragments.json -o blocks.json')}    Write merged nodes to blocks.json
  ${chalk.cyan('docfuse ingest fragments.json --pipeline basic')}  Layout-only merge, no embeddings
  ${chalk.cyan('docfuse config list')}                             Show all configuration
  ${chalk.cyan('docfuse config set merge.max_tokens 500')}         Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
export function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  return parseOptions(GlobalOptionsSchema, program.opts());
}

// Ingest command - merge a fragments file
program.addCommand(createIngestCommand(() => createContext(getGlobalOptions())));

// Config command - manage ~/.docfuse/config.toml
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

// Handle unknown commands gracefully
program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    `Run: docfuse --help  to see available commands`
  );
});

// Parse arguments and execute
async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
