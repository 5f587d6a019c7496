/**
 * Tests for retrieval fan-out and the report flow
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import type { CatalogSource, RecentsOptions } from '../core/models/index.js';
import type { ChangeFilter, PackageSource } from '../infra/homebrew/index.js';
import { collectRawChanges, loadMembershipSets } from '../features/recents/collect.js';
import { runRecents, type RecentsDependencies } from '../features/recents/runRecents.js';
import { PrerequisiteMissingError } from '../shared/utils/error.js';
import { initDebugLogger, resetDebugLogger } from '../shared/utils/debug.js';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

type ChangeTable = Record<string, Record<ChangeFilter, string[]>>;

function createFakeSource(changes: ChangeTable, installed: string[] = [], inspected: string[] = []) {
  return {
    ensureAvailable: vi.fn<PackageSource['ensureAvailable']>().mockResolvedValue(undefined),
    getRepoDir: vi.fn<PackageSource['getRepoDir']>(async (source: CatalogSource) => `/taps/${source.tap}`),
    getRawChanges: vi.fn<PackageSource['getRawChanges']>(async (repoDir: string, _days: number, filter: ChangeFilter) => {
      const table = changes[repoDir];
      if (!table) throw new Error(`unknown repo ${repoDir}`);
      return table[filter];
    }),
    getInstalledSet: vi.fn<PackageSource['getInstalledSet']>(async () => new Set(installed)),
    getInspectedSet: vi.fn<PackageSource['getInspectedSet']>(async () => new Set(inspected)),
  } satisfies PackageSource;
}

const CHANGES: ChangeTable = {
  '/taps/homebrew/core': { A: ['Formula/abc.rb', 'Formula/xyz.rb'], M: ['Formula/jq.rb'] },
  '/taps/homebrew/cask': { A: ['Casks/zed.rb'], M: [] },
};

const ALL = { formulae: true, casks: true, new: true, updated: true };

describe('collectRawChanges', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should fetch every enabled group', async () => {
    // Given
    const source = createFakeSource(CHANGES);

    // When
    const { groups, failures } = await collectRawChanges(source, 7, ALL);

    // Then
    expect(groups).toEqual({
      'formula:new': ['Formula/abc.rb', 'Formula/xyz.rb'],
      'formula:updated': ['Formula/jq.rb'],
      'cask:new': ['Casks/zed.rb'],
      'cask:updated': [],
    });
    expect(failures).toEqual([]);
    expect(source.getRepoDir).toHaveBeenCalledTimes(2);
    expect(source.getRawChanges).toHaveBeenCalledWith('/taps/homebrew/core', 7, 'A', 'Formula/');
    expect(source.getRawChanges).toHaveBeenCalledWith('/taps/homebrew/cask', 7, 'M', 'Casks/');
  });

  it('should only touch enabled catalogs', async () => {
    const source = createFakeSource(CHANGES);

    const { groups } = await collectRawChanges(source, 7, { ...ALL, casks: false, updated: false });

    expect(groups).toEqual({ 'formula:new': ['Formula/abc.rb', 'Formula/xyz.rb'] });
    expect(source.getRepoDir).toHaveBeenCalledTimes(1);
    expect(source.getRawChanges).toHaveBeenCalledTimes(1);
  });

  it('should degrade a failing group to empty without affecting others', async () => {
    // Given
    const source = createFakeSource(CHANGES);
    source.getRawChanges.mockImplementation(async (repoDir, _days, filter) => {
      if (repoDir === '/taps/homebrew/core' && filter === 'M') throw new Error('git log failed');
      const table = CHANGES[repoDir];
      return table ? table[filter] : [];
    });

    // When
    const { groups, failures } = await collectRawChanges(source, 7, ALL);

    // Then
    expect(groups['formula:updated']).toEqual([]);
    expect(groups['formula:new']).toEqual(['Formula/abc.rb', 'Formula/xyz.rb']);
    expect(groups['cask:new']).toEqual(['Casks/zed.rb']);
    expect(failures).toEqual([
      { key: { catalog: 'formula', category: 'updated' }, message: 'git log failed' },
    ]);
  });

  it('should degrade both groups of a catalog whose repository cannot be found', async () => {
    const source = createFakeSource(CHANGES);
    source.getRepoDir.mockImplementation(async (catalog) => {
      if (catalog.catalog === 'cask') throw new Error('No available tap homebrew/cask');
      return `/taps/${catalog.tap}`;
    });

    const { groups, failures } = await collectRawChanges(source, 7, ALL);

    expect(groups['cask:new']).toEqual([]);
    expect(groups['cask:updated']).toEqual([]);
    expect(failures.map((failure) => failure.key.category)).toEqual(['new', 'updated']);
    expect(source.getRepoDir).toHaveBeenCalledTimes(2);
  });
});

describe('loadMembershipSets', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should build both sets', async () => {
    const source = createFakeSource(CHANGES, ['abc'], ['jq']);

    const membership = await loadMembershipSets(source, '/home/test/.zsh_history');

    expect([...membership.installed]).toEqual(['abc']);
    expect([...membership.inspected]).toEqual(['jq']);
    expect(source.getInspectedSet).toHaveBeenCalledWith('/home/test/.zsh_history');
  });

  it('should fall back to an empty installed set when brew list fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const source = createFakeSource(CHANGES, [], ['jq']);
    source.getInstalledSet.mockRejectedValue(new Error('brew list failed'));

    const membership = await loadMembershipSets(source, '/home/test/.zsh_history');

    expect(membership.installed.size).toBe(0);
    expect([...membership.inspected]).toEqual(['jq']);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});

describe('runRecents', () => {
  const options: RecentsOptions = {
    days: 7,
    truncateChars: 25,
    dimLookedUp: true,
    hideLookedUp: false,
    historyFile: '/home/test/.zsh_history',
    color: true,
    plain: false,
    show: { formulae: true, casks: false, new: true, updated: false },
  };

  function deps(source: PackageSource): RecentsDependencies & { write: Mock<(text: string) => void> } {
    return { source, outputWidth: 40, colorLevel: 1, write: vi.fn<(text: string) => void>() };
  }

  it('should print the assembled report', async () => {
    // Given
    const source = createFakeSource(CHANGES, ['abc']);
    const dependencies = deps(source);

    // When
    const text = await runRecents(options, dependencies);

    // Then
    expect(text).toBe(
      'Recent Homebrew packages (last 7 days):\n'
      + '\n🆕 New formulae:\n'
      + '\x1b[1m\x1b[3m\x1b[32m•abc\x1b[39m\x1b[23m\x1b[22m    xyz\n'
      + '\n',
    );
    expect(dependencies.write).toHaveBeenCalledWith(text);
  });

  it('should print unstyled names in plain mode', async () => {
    const source = createFakeSource(CHANGES, ['abc']);
    const dependencies = deps(source);

    const text = await runRecents({ ...options, plain: true }, dependencies);

    expect(text).toBe('Recent Homebrew packages (last 7 days):\n\n🆕 New formulae:\nabc    xyz\n\n');
  });

  it('should stop before any work when brew is missing', async () => {
    const source = createFakeSource(CHANGES);
    source.ensureAvailable.mockRejectedValue(new PrerequisiteMissingError('Homebrew', 'Homebrew is not installed.'));
    const dependencies = deps(source);

    await expect(runRecents(options, dependencies)).rejects.toBeInstanceOf(PrerequisiteMissingError);
    expect(source.getRawChanges).not.toHaveBeenCalled();
    expect(source.getInstalledSet).not.toHaveBeenCalled();
    expect(dependencies.write).not.toHaveBeenCalled();
  });

  it('should still print the report and log which groups failed', async () => {
    // Given
    const logDir = mkdtempSync(join(tmpdir(), 'brew-recents-run-'));
    const logFile = join(logDir, 'debug.log');
    resetDebugLogger();
    initDebugLogger({ enabled: true, logFile }, logDir);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const source = createFakeSource(CHANGES);
    source.getRawChanges.mockRejectedValue(new Error('git log failed'));
    const dependencies = deps(source);

    try {
      // When
      const text = await runRecents(options, dependencies);

      // Then
      expect(text).toBe('Recent Homebrew packages (last 7 days):\n\nNo recent packages found.\n\n');
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(readFileSync(logFile, 'utf-8')).toContain('"failedGroups": [\n    "formula:new"\n  ]');
    } finally {
      errorSpy.mockRestore();
      resetDebugLogger();
      rmSync(logDir, { recursive: true, force: true });
    }
  });
});
