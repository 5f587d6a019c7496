/**
 * Tests for CLI option handling
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CommanderError, InvalidArgumentError } from 'commander';
import type { GlobalConfig, RecentsOptions } from '../core/models/index.js';
import {
  exitCodeForError,
  parsePositiveInt,
  resolveOnlyPair,
  resolveRecentsOptions,
  resolveSectionFilter,
} from '../app/cli/helpers.js';
import { createProgram, type RecentsCommand } from '../app/cli/program.js';
import { GlobalConfigManager, getDefaultHistoryFile } from '../infra/config/index.js';
import { ConfigurationError, PrerequisiteMissingError } from '../shared/utils/error.js';
import { resetDebugLogger } from '../shared/utils/debug.js';

const BASE_CONFIG: GlobalConfig = {
  days: 7,
  truncateChars: 25,
  dimLookedUp: true,
  hideLookedUp: false,
  logLevel: 'info',
  verbose: false,
  show: { formulae: true, casks: true, new: true, updated: true },
};

describe('parsePositiveInt', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInt('7')).toBe(7);
    expect(parsePositiveInt(' 30 ')).toBe(30);
  });

  it.each(['0', '-1', 'abc', '1.5', ''])('should reject %j', (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe('resolveOnlyPair', () => {
  it('should show only the flagged side', () => {
    expect(resolveOnlyPair(true, undefined, [true, true])).toEqual([true, false]);
    expect(resolveOnlyPair(undefined, true, [true, true])).toEqual([false, true]);
  });

  it('should treat both flags like neither', () => {
    expect(resolveOnlyPair(true, true, [true, false])).toEqual([true, false]);
    expect(resolveOnlyPair(undefined, undefined, [false, true])).toEqual([false, true]);
  });

  it('should let a flag show a side the config hides', () => {
    expect(resolveOnlyPair(undefined, true, [true, false])).toEqual([false, true]);
  });
});

describe('resolveSectionFilter', () => {
  it('should combine catalog and category flags independently', () => {
    const filter = resolveSectionFilter({ onlyCask: true, onlyUpdated: true }, BASE_CONFIG.show);
    expect(filter).toEqual({ formulae: false, casks: true, new: false, updated: true });
  });

  it('should apply per-side toggles over the configured visibility', () => {
    // Given
    const configured = { formulae: true, casks: false, new: true, updated: true };

    // When
    const filter = resolveSectionFilter({ formula: false, cask: true, updated: false }, configured);

    // Then
    expect(filter).toEqual({ formulae: false, casks: true, new: true, updated: false });
  });

  it('should let an only flag decide its pair over the toggles', () => {
    const filter = resolveSectionFilter({ onlyCask: true, formula: true, new: false }, BASE_CONFIG.show);
    expect(filter).toEqual({ formulae: false, casks: true, new: false, updated: true });
  });
});

describe('resolveRecentsOptions', () => {
  it('should fall back to config values', () => {
    const options = resolveRecentsOptions({ color: true }, BASE_CONFIG, '/home/test/.zsh_history');
    expect(options).toEqual({
      days: 7,
      truncateChars: 25,
      dimLookedUp: true,
      hideLookedUp: false,
      historyFile: '/home/test/.zsh_history',
      color: true,
      plain: false,
      show: { formulae: true, casks: true, new: true, updated: true },
    });
  });

  it('should let flags override config values', () => {
    const config: GlobalConfig = { ...BASE_CONFIG, days: 14, historyFile: '/home/test/.bash_history' };
    const options = resolveRecentsOptions(
      { days: 3, truncateChars: 10, dimLookedUp: false, hideLookedUp: true, color: false, plain: true, historyFile: '/tmp/hist' },
      config,
      '/home/test/.zsh_history',
    );
    expect(options.days).toBe(3);
    expect(options.truncateChars).toBe(10);
    expect(options.dimLookedUp).toBe(false);
    expect(options.hideLookedUp).toBe(true);
    expect(options.color).toBe(false);
    expect(options.plain).toBe(true);
    expect(options.historyFile).toBe('/tmp/hist');
  });

  it('should prefer the configured history file over the default', () => {
    const config: GlobalConfig = { ...BASE_CONFIG, historyFile: '/home/test/.bash_history' };
    expect(resolveRecentsOptions({}, config, '/home/test/.zsh_history').historyFile).toBe('/home/test/.bash_history');
  });
});

describe('exitCodeForError', () => {
  it('should exit 1 for every failure kind', () => {
    expect(exitCodeForError(new ConfigurationError('bad'))).toBe(1);
    expect(exitCodeForError(new PrerequisiteMissingError('Homebrew'))).toBe(1);
    expect(exitCodeForError(new Error('unexpected'))).toBe(1);
  });
});

describe('createProgram', () => {
  let configDir: string;
  const originalConfigDir = process.env.BREW_RECENTS_CONFIG_DIR;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'brew-recents-cli-'));
    process.env.BREW_RECENTS_CONFIG_DIR = configDir;
    GlobalConfigManager.resetInstance();
    resetDebugLogger();
  });

  afterEach(() => {
    if (originalConfigDir === undefined) {
      delete process.env.BREW_RECENTS_CONFIG_DIR;
    } else {
      process.env.BREW_RECENTS_CONFIG_DIR = originalConfigDir;
    }
    GlobalConfigManager.resetInstance();
    rmSync(configDir, { recursive: true, force: true });
  });

  async function parse(args: string[]): Promise<RecentsOptions | undefined> {
    let received: RecentsOptions | undefined;
    const run = vi.fn<RecentsCommand>(async (options) => {
      received = options;
    });
    const program = createProgram(run)
      .exitOverride()
      .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
    await program.parseAsync(args, { from: 'user' });
    return received;
  }

  it('should run with defaults when no flags are given', async () => {
    const options = await parse([]);

    expect(options).toEqual({
      days: 7,
      truncateChars: 25,
      dimLookedUp: true,
      hideLookedUp: false,
      historyFile: getDefaultHistoryFile(),
      color: true,
      plain: false,
      show: { formulae: true, casks: true, new: true, updated: true },
    });
  });

  it('should map flags onto options', async () => {
    const options = await parse([
      '--days', '3', '-t', '12', '--only-cask', '--only-new',
      '--no-dim-looked-up', '--hide-looked-up', '--no-color', '--history-file', '/tmp/hist',
    ]);

    expect(options).toEqual({
      days: 3,
      truncateChars: 12,
      dimLookedUp: false,
      hideLookedUp: true,
      historyFile: '/tmp/hist',
      color: false,
      plain: false,
      show: { formulae: false, casks: true, new: true, updated: false },
    });
  });

  it('should ignore argument order for conflicting only flags', async () => {
    const first = await parse(['--only-cask', '--only-formula']);
    const second = await parse(['--only-formula', '--only-cask']);

    expect(first?.show).toEqual({ formulae: true, casks: true, new: true, updated: true });
    expect(second?.show).toEqual(first?.show);
  });

  it('should map per-side toggles and their short flags', async () => {
    const long = await parse(['--no-formula', '--no-updated']);
    const short = await parse(['-F', '-U']);
    const combined = await parse(['-CN']);

    expect(long?.show).toEqual({ formulae: false, casks: true, new: true, updated: false });
    expect(short?.show).toEqual(long?.show);
    expect(combined?.show).toEqual({ formulae: true, casks: false, new: false, updated: true });
  });

  it('should let a positive toggle show a side the config hides', async () => {
    writeFileSync(join(configDir, 'config.yaml'), 'show:\n  casks: false\n  new: false\n', 'utf-8');

    const options = await parse(['-c', '--new']);

    expect(options?.show).toEqual({ formulae: true, casks: true, new: true, updated: true });
  });

  it('should read defaults from the config file', async () => {
    writeFileSync(join(configDir, 'config.yaml'), 'days: 14\nshow:\n  updated: false\n', 'utf-8');

    const options = await parse(['--plain']);

    expect(options?.days).toBe(14);
    expect(options?.plain).toBe(true);
    expect(options?.show).toEqual({ formulae: true, casks: true, new: true, updated: false });
  });

  it('should reject a non-numeric day count', async () => {
    const error = await parse(['--days', 'soon']).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CommanderError);
    expect(error).toMatchObject({ code: 'commander.invalidArgument', exitCode: 1 });
  });

  it('should reject a missing option value', async () => {
    const error = await parse(['--truncate-chars']).catch((err: unknown) => err);

    expect(error).toMatchObject({ code: 'commander.optionMissingArgument', exitCode: 1 });
  });

  it('should surface a broken config file as a configuration error', async () => {
    writeFileSync(join(configDir, 'config.yaml'), 'days: -2\n', 'utf-8');

    await expect(parse([])).rejects.toBeInstanceOf(ConfigurationError);
  });
});
