/**
 * HomebrewClient — the report's view of brew and its taps.
 */

import type { CatalogSource } from '../../core/models/index.js';
import { ensureBrewAvailable, getInstalledSet, getRepoDir } from './brew.js';
import { getRawChanges, type ChangeFilter } from './changes.js';
import { getInspectedSet } from './history.js';
import { execCommand, type CommandRunner } from './runner.js';

/** Collaborators the report needs; tests substitute in-memory fakes. */
export interface PackageSource {
  ensureAvailable(): Promise<void>;
  getRepoDir(source: CatalogSource): Promise<string>;
  getRawChanges(repoDir: string, days: number, filter: ChangeFilter, pathPrefix: string): Promise<string[]>;
  getInstalledSet(): Promise<Set<string>>;
  getInspectedSet(historyFile: string): Promise<Set<string>>;
}

export class HomebrewClient implements PackageSource {
  constructor(private readonly run: CommandRunner = execCommand) {}

  ensureAvailable(): Promise<void> {
    return ensureBrewAvailable(this.run);
  }

  getRepoDir(source: CatalogSource): Promise<string> {
    return getRepoDir(this.run, source.tap);
  }

  getRawChanges(repoDir: string, days: number, filter: ChangeFilter, pathPrefix: string): Promise<string[]> {
    return getRawChanges(this.run, repoDir, days, filter, pathPrefix);
  }

  getInstalledSet(): Promise<Set<string>> {
    return getInstalledSet(this.run);
  }

  getInspectedSet(historyFile: string): Promise<Set<string>> {
    return getInspectedSet(historyFile);
  }
}
