/**
 * Tests for config command
 *
 * Runs the subcommands through Commander against a temp config file.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { createConfigCommand } from '../config.js';
import type { CommandContext } from '../../types.js';
import { getConfigValue } from '../../../config/loader.js';

const TEST_DIR = path.join(os.tmpdir(), '.docfuse-config-cmd-test-' + process.pid);
const CONFIG_PATH = path.join(TEST_DIR, 'config.toml');

describe('createConfigCommand', () => {
  let logOutput: string[];
  let errorOutput: string[];
  let consoleOutput: string[];

  function run(args: string[], json = false): Promise<unknown> {
    const ctx: CommandContext = {
      options: { verbose: false, json },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: (msg: string) => errorOutput.push(msg),
    };
    const cmd = createConfigCommand(() => ctx, CONFIG_PATH);
    cmd.exitOverride();
    return cmd.parseAsync(args, { from: 'user' });
  }

  beforeEach(() => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
    logOutput = [];
    errorOutput = [];
    consoleOutput = [];
    vi.spyOn(console, 'log').mockImplementation((msg: unknown) => {
      consoleOutput.push(String(msg));
    });
    vi.spyOn(console, 'error').mockImplementation((msg: unknown) => {
      consoleOutput.push(String(msg));
    });
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it('has get, set, list, path and reset subcommands', () => {
    const cmd = createConfigCommand(() => {
      throw new Error('not used');
    }, CONFIG_PATH);

    expect(cmd.commands.map((c) => c.name())).toEqual(['get', 'set', 'list', 'path', 'reset']);
  });

  it('gets a value', async () => {
    await run(['get', 'merge.max_tokens']);

    expect(logOutput).toEqual(['1000']);
  });

  it('gets a value as JSON', async () => {
    await run(['get', 'pipeline.type'], true);

    expect(consoleOutput).toEqual(['{"key":"pipeline.type","value":"semantic"}']);
  });

  it('reports unknown keys on get', async () => {
    await run(['get', 'merge.nope']);

    expect(errorOutput).toEqual(['Unknown or unset config key: merge.nope']);
    expect(process.exitCode).toBe(1);
  });

  it('sets a value', async () => {
    await run(['set', 'merge.similarity_threshold', '0.75']);

    expect(getConfigValue('merge.similarity_threshold', CONFIG_PATH)).toBe(0.75);
    expect(logOutput).toHaveLength(1);
    expect(logOutput[0]).toContain('merge.similarity_threshold');
  });

  it('rejects invalid values', async () => {
    await run(['set', 'merge.max_tokens', '0']);

    expect(errorOutput).toHaveLength(1);
    expect(errorOutput[0]).toContain("Invalid value for 'merge.max_tokens'");
    expect(process.exitCode).toBe(1);
  });

  it('lists values as JSON', async () => {
    await run(['list'], true);

    const listed = JSON.parse(consoleOutput.join('\n'));
    expect(listed['merge.max_tokens']).toBe(1000);
    expect(listed['spatial.y_error_margin']).toBe(4);
  });

  it('shows the config path', async () => {
    await run(['path']);

    expect(logOutput).toEqual([CONFIG_PATH]);
  });

  it('requires --force to reset', async () => {
    await run(['set', 'merge.max_tokens', '500']);
    await run(['reset']);

    expect(process.exitCode).toBe(1);
    expect(getConfigValue('merge.max_tokens', CONFIG_PATH)).toBe(500);

    process.exitCode = undefined;
    await run(['reset', '--force']);

    expect(getConfigValue('merge.max_tokens', CONFIG_PATH)).toBe(1000);
  });
});
