/**
 * Error handler for CLI error formatting and display
 *
 * This module provides:
 * - Colored error output for terminal
 * - JSON output for programmatic use
 * - Verbose mode for debugging with stack traces
 */

import chalk from 'chalk';
import { CLIError, EmbeddingError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** Input node that triggered an ingestion failure */
  node_index?: number;
  stack?: string;
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so it can be tested without process.exit.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (error instanceof CLIError) {
    const nodeIndex = error instanceof EmbeddingError ? error.nodeIndex : undefined;

    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: error.code,
        hint: error.hint,
        node_index: nodeIndex,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (nodeIndex !== undefined) {
      lines.push(chalk.dim('Node: ') + `#${nodeIndex}`);
    }

    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    }

    return lines.join('\n');
  }

  if (error instanceof Error) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: 1,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    } else {
      lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
    }

    return lines.join('\n');
  }

  // Strings, numbers and other thrown values
  if (json) {
    return JSON.stringify({ error: String(error), code: 1 }, null, 2);
  }

  return chalk.red('Error: ') + String(error);
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Handle an error by formatting and exiting.
 *
 * Writes to stderr and exits with the error's code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  const formatted = formatError(error, options);
  const code = getExitCode(error);

  console.error(formatted);

  process.exit(code);
}

/**
 * Create a global error handler that can be attached to process events.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
